import { AgentCapabilityError } from "../core/errors.js";
import { AgentCapability, AgentFunction, AgentInvocation, ConversationTurn } from "../core/types.js";
import { callFunction } from "../tools/functionCalls.js";
import { chunkText, streamFromChunks } from "./chunking.js";

export interface AnthropicAgentConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  partialDelayMs: number;
  maxToolTurns?: number;
}

// ---------------------------------------------------------------------------
// Anthropic API wire types
// ---------------------------------------------------------------------------

interface AnthropicTextBlock {
  type: "text";
  text: string;
}

interface AnthropicToolUseBlock {
  type: "tool_use";
  id: string;
  name: string;
  input: unknown;
}

type AnthropicContentBlock = AnthropicTextBlock | AnthropicToolUseBlock;

interface AnthropicMessageResponse {
  content?: AnthropicContentBlock[];
  stop_reason?: string;
}

interface AnthropicToolResultBlock {
  type: "tool_result";
  tool_use_id: string;
  content: string;
}

interface AnthropicMessage {
  role: "user" | "assistant";
  content: string | AnthropicContentBlock[] | AnthropicToolResultBlock[];
}

interface AnthropicToolSchema {
  name: string;
  description: string;
  input_schema: AgentFunction["parameters"];
}

const ANTHROPIC_URL = "https://api.anthropic.com/v1/messages";

// ---------------------------------------------------------------------------
// Agent implementation
// ---------------------------------------------------------------------------

export class AnthropicAgent implements AgentCapability {
  readonly name = "anthropic";

  private readonly config: AnthropicAgentConfig;

  constructor(config: AnthropicAgentConfig) {
    this.config = config;
  }

  async invoke(invocation: AgentInvocation): Promise<string> {
    const fullText = await this.runAgentLoop(invocation);

    // The Messages API call is not streamed; the final text is paced out in
    // word-aligned chunks so clients still render it incrementally.
    const chunks = chunkText(fullText, 30, 80);
    for await (const chunk of streamFromChunks(chunks, this.config.partialDelayMs, invocation.signal)) {
      invocation.listener.content(chunk);
    }
    return fullText;
  }

  /**
   * Calls the model, executes every requested function, and continues until
   * the model stops asking for tools.
   */
  private async runAgentLoop(invocation: AgentInvocation): Promise<string> {
    const { functions, listener, signal } = invocation;
    const messages: AnthropicMessage[] = toAnthropicMessages(invocation.history);
    const tools: AnthropicToolSchema[] = functions.map((fn) => ({
      name: fn.name,
      description: fn.description,
      input_schema: fn.parameters,
    }));

    const maxToolTurns = this.config.maxToolTurns ?? 5;
    let toolTurns = 0;

    while (toolTurns <= maxToolTurns) {
      const response = await this.callAPI(invocation.instructions, messages, tools, signal);

      const content = response.content ?? [];
      messages.push({ role: "assistant", content });

      if (response.stop_reason !== "tool_use") {
        return content
          .filter((b): b is AnthropicTextBlock => b.type === "text")
          .map((b) => b.text.trim())
          .join("\n")
          .trim();
      }

      const toolUseBlocks = content.filter(
        (b): b is AnthropicToolUseBlock => b.type === "tool_use",
      );
      if (toolUseBlocks.length === 0) {
        throw new AgentCapabilityError("Model requested tool use without a tool_use block.");
      }

      // Any text next to tool_use blocks is the model narrating its plan.
      for (const block of content) {
        if (block.type === "text" && block.text.trim()) {
          listener.intermediate(block.text.trim());
        }
      }

      const toolResults: AnthropicToolResultBlock[] = await Promise.all(
        toolUseBlocks.map(async (block) => ({
          type: "tool_result" as const,
          tool_use_id: block.id,
          content: await callFunction(functions, block.id, block.name, block.input, listener, signal),
        })),
      );

      messages.push({ role: "user", content: toolResults });
      toolTurns++;
    }

    throw new AgentCapabilityError(`Model kept requesting tools after ${maxToolTurns} rounds.`);
  }

  private async callAPI(
    system: string,
    messages: AnthropicMessage[],
    tools: AnthropicToolSchema[],
    signal: AbortSignal,
  ): Promise<AnthropicMessageResponse> {
    const body: Record<string, unknown> = {
      model: this.config.model,
      max_tokens: this.config.maxTokens,
      system,
      messages,
    };

    if (tools.length > 0) {
      body.tools = tools;
    }

    const response = await fetch(ANTHROPIC_URL, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        "x-api-key": this.config.apiKey,
        "anthropic-version": "2023-06-01",
      },
      body: JSON.stringify(body),
      signal: AbortSignal.any([signal, AbortSignal.timeout(60_000)]),
    });

    if (!response.ok) {
      const bodyText = await response.text();
      throw new AgentCapabilityError(`anthropic_http_${response.status}:${bodyText.slice(0, 120)}`);
    }

    return (await response.json()) as AnthropicMessageResponse;
  }
}

function toAnthropicMessages(history: readonly ConversationTurn[]): AnthropicMessage[] {
  return history
    .filter((turn) => turn.content.trim().length > 0)
    .map((turn) => ({ role: turn.role, content: turn.content }));
}
