import { errorMessage } from "../core/errors.js";
import { AgentFunction, FunctionParameters, JsonObject } from "../core/types.js";
import { DocumentSearch } from "./searchClient.js";

export const SALES_DOCS_FUNCTION = "get_sales_docs";
export const CUSTOMER_DOCS_FUNCTION = "get_customer_docs";
export const USER_DOCS_FUNCTION = "get_user_docs";

export interface RetrievalSources {
  sales: DocumentSearch;
  accounts: DocumentSearch;
  user: DocumentSearch;
}

function queryParameters(description: string): FunctionParameters {
  return {
    type: "object",
    properties: {
      query: { type: "string", description },
    },
    required: ["query"],
  };
}

/**
 * Wraps a search source as a declared function. Lookup failures come back as
 * text so a single failed search never aborts the turn.
 */
function retrievalFunction(
  name: string,
  description: string,
  queryDescription: string,
  label: string,
  source: DocumentSearch,
): AgentFunction {
  return {
    name,
    description,
    parameters: queryParameters(queryDescription),
    async execute(args: JsonObject, signal: AbortSignal): Promise<string> {
      const query = args.query;
      if (typeof query !== "string" || !query.trim()) {
        return "Input error: The query must be a non-empty string.";
      }

      try {
        const docs = await source.search(query.trim(), signal);
        if (!docs) {
          return `No relevant documents found in the ${label} index.`;
        }
        return docs;
      } catch (error) {
        return `An error occurred while retrieving documents from the ${label} index: ${errorMessage(error)}`;
      }
    },
  };
}

export function buildRetrievalFunctions(sources: RetrievalSources): AgentFunction[] {
  return [
    retrievalFunction(
      SALES_DOCS_FUNCTION,
      "Retrieve sales strategy and methodology documents. Use when the request involves how to sell, plan or run a pursuit.",
      "The query from the user.",
      "sales",
      sources.sales,
    ),
    retrievalFunction(
      CUSTOMER_DOCS_FUNCTION,
      "Retrieve documents about the target account. Use when the request involves the company being pursued.",
      "The query and the target account company name provided by the user.",
      "pursuit",
      sources.accounts,
    ),
    retrievalFunction(
      USER_DOCS_FUNCTION,
      "Retrieve documents about the company the user represents: offerings, case studies and references.",
      "The query and the name of the company the user represents.",
      "user",
      sources.user,
    ),
  ];
}
