import { ServerConfig } from "../config.js";
import { AgentCapability } from "../core/types.js";
import { AnthropicAgent } from "./anthropicAgent.js";
import { BedrockAgent } from "./bedrockAgent.js";

export function buildAgent(config: ServerConfig): AgentCapability {
  if (config.agentProvider === "bedrock") {
    return new BedrockAgent({
      modelId: config.bedrock.modelId,
      region: config.bedrock.region,
    });
  }

  if (!config.anthropic.apiKey) {
    throw new Error("ANTHROPIC_API_KEY is required when AGENT_PROVIDER=anthropic");
  }

  return new AnthropicAgent({
    apiKey: config.anthropic.apiKey,
    model: config.anthropic.model,
    maxTokens: config.anthropic.maxTokens,
    partialDelayMs: config.anthropic.partialDelayMs,
  });
}
