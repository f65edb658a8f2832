const TITLE_FIELDS = ["document_title", "title", "sourcefile", "category"] as const;
const CONTENT_FIELDS = ["content_text", "content", "chunk"] as const;

export interface DocumentSearch {
  readonly indexName: string;
  search(query: string, signal?: AbortSignal): Promise<string>;
}

export interface AzureSearchConfig {
  endpoint: string;
  apiKey: string;
  apiVersion: string;
  indexName: string;
  top: number;
}

interface AzureSearchResponse {
  value?: Array<Record<string, unknown>>;
}

/**
 * Full-text search against one Azure AI Search index. Returns the matching
 * documents rendered as plain text, one block per document, or the empty
 * string when nothing matched.
 */
export class AzureSearchClient implements DocumentSearch {
  readonly indexName: string;

  private readonly config: AzureSearchConfig;

  constructor(config: AzureSearchConfig) {
    this.config = config;
    this.indexName = config.indexName;
  }

  async search(query: string, signal?: AbortSignal): Promise<string> {
    const url =
      `${this.config.endpoint}/indexes/${encodeURIComponent(this.config.indexName)}` +
      `/docs/search?api-version=${encodeURIComponent(this.config.apiVersion)}`;

    const timeout = AbortSignal.timeout(10_000);
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "api-key": this.config.apiKey,
      },
      body: JSON.stringify({
        search: query,
        top: this.config.top,
        queryType: "simple",
      }),
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    });

    if (!response.ok) {
      throw new Error(`Azure Search error ${response.status}: ${(await response.text()).slice(0, 200)}`);
    }

    const payload = (await response.json()) as AzureSearchResponse;
    return (payload.value ?? [])
      .map(renderDocument)
      .filter((text) => text.length > 0)
      .join("\n\n");
  }
}

export function renderDocument(document: Record<string, unknown>): string {
  const title = firstText(document, TITLE_FIELDS);
  const body = cleanText(firstText(document, CONTENT_FIELDS));

  if (title && body) {
    return `${title}\n${body}`;
  }
  return title || body;
}

export function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function firstText(document: Record<string, unknown>, fields: readonly string[]): string {
  for (const field of fields) {
    const value = document[field];
    if (typeof value === "string" && value.trim()) {
      return value.trim();
    }
  }
  return "";
}
