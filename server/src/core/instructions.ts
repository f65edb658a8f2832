import { SalesAssistantRequest } from "./types.js";

type InstructionContext = Pick<
  SalesAssistantRequest,
  "userCompany" | "targetAccount" | "demandStage" | "additionalInstructions"
>;

/**
 * Binds the request's domain parameters into the agent's instructions.
 */
export function buildInstructions(agentName: string, context: InstructionContext): string {
  const lines = [
    `You are ${agentName}, a sales assistant helping a seller at ${context.userCompany} pursue ${context.targetAccount}.`,
    `The user's company is "${context.userCompany}". The target account is "${context.targetAccount}".`,
    "Use get_sales_docs for questions about sales strategy or methodology.",
    `Use get_customer_docs for questions about the target account; pass the account name, for example {"query": "${context.targetAccount}"}.`,
    `Use get_user_docs for questions about ${context.userCompany}, its offerings or its references.`,
    "Ground every recommendation in the retrieved documents and say so when nothing relevant was found.",
  ];

  if (context.demandStage) {
    lines.push(`The pursuit is currently in the "${context.demandStage}" demand stage; tailor advice to that stage.`);
  }
  if (context.additionalInstructions) {
    lines.push(context.additionalInstructions);
  }

  return lines.join("\n");
}
