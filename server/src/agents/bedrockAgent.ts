/**
 * Amazon Bedrock ConverseStream agent.
 *
 * Text deltas are forwarded to the listener as they arrive. When the model
 * stops for tool use, every requested function runs and the loop continues
 * with the results until the model ends its turn.
 */

import {
  BedrockRuntimeClient,
  ConverseStreamCommand,
  type ContentBlock,
  type ConverseStreamCommandInput,
  type ConverseStreamCommandOutput,
  type Message,
  type ToolConfiguration,
} from "@aws-sdk/client-bedrock-runtime";
import { decodeArguments } from "../core/activityListener.js";
import { AgentCapabilityError } from "../core/errors.js";
import { logger } from "../core/logger.js";
import { AgentCapability, AgentFunction, AgentInvocation, ConversationTurn, JsonObject } from "../core/types.js";
import { callFunction } from "../tools/functionCalls.js";

export interface BedrockAgentConfig {
  modelId: string;
  region: string;
  maxTokens?: number;
  temperature?: number;
  maxToolTurns?: number;
}

export type ConverseStreamFn = (
  input: ConverseStreamCommandInput,
  signal: AbortSignal,
) => Promise<ConverseStreamCommandOutput>;

const REQUEST_TIMEOUT_MS = 60_000;

interface RequestedToolUse {
  toolUseId: string;
  name: string;
  input: JsonObject;
}

interface RoundResult {
  text: string;
  toolUses: RequestedToolUse[];
  stopReason: string;
}

export class BedrockAgent implements AgentCapability {
  readonly name = "bedrock";

  private readonly config: BedrockAgentConfig;
  private readonly converse: ConverseStreamFn;

  constructor(config: BedrockAgentConfig, converse?: ConverseStreamFn) {
    this.config = config;
    if (converse) {
      this.converse = converse;
    } else {
      const client = new BedrockRuntimeClient({ region: config.region });
      this.converse = (input, signal) =>
        client.send(new ConverseStreamCommand(input), {
          abortSignal: AbortSignal.any([signal, AbortSignal.timeout(REQUEST_TIMEOUT_MS)]),
        });
    }
  }

  async invoke(invocation: AgentInvocation): Promise<string> {
    const { functions, listener, signal } = invocation;
    const messages = toBedrockMessages(invocation.history);
    const toolConfig = toToolConfiguration(functions);
    const maxToolTurns = this.config.maxToolTurns ?? 5;

    let answer = "";
    for (let round = 0; round <= maxToolTurns; round++) {
      const result = await this.converseRound(invocation, messages, toolConfig);
      answer += result.text;

      const assistantContent: ContentBlock[] = [];
      if (result.text) {
        assistantContent.push({ text: result.text });
      }
      for (const toolUse of result.toolUses) {
        assistantContent.push({
          toolUse: { toolUseId: toolUse.toolUseId, name: toolUse.name, input: toolUse.input },
        });
      }
      if (assistantContent.length > 0) {
        messages.push({ role: "assistant", content: assistantContent });
      }

      if (result.stopReason !== "tool_use" || result.toolUses.length === 0 || signal.aborted) {
        return answer;
      }

      const toolResults: ContentBlock[] = await Promise.all(
        result.toolUses.map(async (toolUse): Promise<ContentBlock> => ({
          toolResult: {
            toolUseId: toolUse.toolUseId,
            content: [
              { text: await callFunction(functions, toolUse.toolUseId, toolUse.name, toolUse.input, listener, signal) },
            ],
            status: "success",
          },
        })),
      );
      messages.push({ role: "user", content: toolResults });
    }

    throw new AgentCapabilityError(`Model kept requesting tools after ${maxToolTurns} rounds.`);
  }

  private async converseRound(
    invocation: AgentInvocation,
    messages: Message[],
    toolConfig: ToolConfiguration | undefined,
  ): Promise<RoundResult> {
    const input: ConverseStreamCommandInput = {
      modelId: this.config.modelId,
      system: [{ text: invocation.instructions }],
      messages,
      toolConfig,
      inferenceConfig: {
        maxTokens: this.config.maxTokens ?? 2048,
        temperature: this.config.temperature ?? 0.3,
      },
    };

    logger.debug(`calling Bedrock ConverseStream model=${this.config.modelId} messages=${messages.length}`);

    const response = await this.converse(input, invocation.signal);
    if (!response.stream) {
      throw new AgentCapabilityError("No stream in Bedrock response");
    }

    const round: RoundResult = { text: "", toolUses: [], stopReason: "end_turn" };
    let currentToolUseId = "";
    let currentToolName = "";
    let toolInputJson = "";

    for await (const chunk of response.stream) {
      if (invocation.signal.aborted) {
        break;
      }

      const deltaText = chunk.contentBlockDelta?.delta?.text;
      if (deltaText) {
        round.text += deltaText;
        invocation.listener.content(deltaText);
      }

      const toolUseStart = chunk.contentBlockStart?.start?.toolUse;
      if (toolUseStart) {
        currentToolUseId = toolUseStart.toolUseId ?? "";
        currentToolName = toolUseStart.name ?? "";
        toolInputJson = "";
      }

      const toolInputDelta = chunk.contentBlockDelta?.delta?.toolUse?.input;
      if (toolInputDelta) {
        toolInputJson += toolInputDelta;
      }

      if (chunk.contentBlockStop !== undefined && currentToolUseId && currentToolName) {
        round.toolUses.push({
          toolUseId: currentToolUseId,
          name: currentToolName,
          input: decodeArguments(toolInputJson),
        });
        currentToolUseId = "";
        currentToolName = "";
        toolInputJson = "";
      }

      if (chunk.messageStop) {
        round.stopReason = chunk.messageStop.stopReason ?? "end_turn";
      }

      const streamError =
        chunk.internalServerException ??
        chunk.modelStreamErrorException ??
        chunk.validationException ??
        chunk.throttlingException;
      if (streamError) {
        throw new AgentCapabilityError(streamError.message ?? "Bedrock stream failed");
      }
    }

    return round;
  }
}

function toBedrockMessages(history: readonly ConversationTurn[]): Message[] {
  return history
    .filter((turn) => turn.content.trim().length > 0)
    .map((turn) => ({ role: turn.role, content: [{ text: turn.content }] }));
}

function toToolConfiguration(functions: readonly AgentFunction[]): ToolConfiguration | undefined {
  if (functions.length === 0) {
    return undefined;
  }
  return {
    tools: functions.map((fn) => ({
      toolSpec: {
        name: fn.name,
        description: fn.description,
        inputSchema: {
          json: {
            type: fn.parameters.type,
            properties: fn.parameters.properties,
            required: fn.parameters.required,
          },
        },
      },
    })),
  };
}
