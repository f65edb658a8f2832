export type AgentProviderName = "anthropic" | "bedrock";

export interface SearchIndexConfig {
  sales: string;
  accounts: string;
  user: string;
}

export interface ServerConfig {
  port: number;
  agentProvider: AgentProviderName;
  agentName: string;
  maxRequestBytes: number;
  maxTurns: number;
  rateLimitPerMinute: number;
  anthropic: {
    /** Checked when the agent is built; only the Anthropic agent needs it. */
    apiKey?: string;
    model: string;
    maxTokens: number;
    partialDelayMs: number;
  };
  bedrock: {
    modelId: string;
    region: string;
  };
  search: {
    endpoint: string;
    apiKey: string;
    apiVersion: string;
    top: number;
    indexes: SearchIndexConfig;
  };
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): ServerConfig {
  const agentProvider: AgentProviderName =
    (env.AGENT_PROVIDER ?? "anthropic").toLowerCase() === "bedrock" ? "bedrock" : "anthropic";

  return {
    port: parseInteger(env.PORT, 8080),
    agentProvider,
    agentName: env.AGENT_NAME?.trim() || "SalesAssistant",
    maxRequestBytes: parseInteger(env.MAX_REQUEST_BYTES, 65_536),
    maxTurns: parseInteger(env.MAX_TURNS, 20),
    rateLimitPerMinute: parseInteger(env.RATE_LIMIT_PER_MIN, 30),
    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY?.trim() || undefined,
      model: env.ANTHROPIC_MODEL ?? "claude-haiku-4-5",
      maxTokens: parseInteger(env.ANTHROPIC_MAX_TOKENS, 1024),
      partialDelayMs: parseInteger(env.ANTHROPIC_PARTIAL_DELAY_MS, 40),
    },
    bedrock: {
      modelId: env.BEDROCK_MODEL_ID ?? "amazon.nova-lite-v1:0",
      region: env.AWS_REGION ?? "us-east-1",
    },
    search: {
      endpoint: required(env, "AZURE_SEARCH_ENDPOINT").replace(/\/+$/, ""),
      apiKey: required(env, "AZURE_SEARCH_API_KEY"),
      apiVersion: env.AZURE_SEARCH_API_VERSION ?? "2024-07-01",
      top: parseInteger(env.AZURE_SEARCH_TOP, 3),
      indexes: {
        sales: env.AZURE_SEARCH_INDEX_SALES ?? "sales-methodology",
        accounts: env.AZURE_SEARCH_INDEX_ACCOUNTS ?? "target-accounts",
        user: env.AZURE_SEARCH_INDEX_USER ?? "user-company",
      },
    },
  };
}

export function parseInteger(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }

  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value) || value <= 0) {
    return fallback;
  }
  return value;
}

function required(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new Error(`${name} is required`);
  }
  return value;
}
