import { PayloadTooLargeError, RequestValidationError } from "./errors.js";
import {
  ContentEvent,
  ErrorEvent,
  FunctionCallEvent,
  FunctionResultEvent,
  IntermediateEvent,
  JsonObject,
  SalesAssistantRequest,
  StreamCompleteEvent,
  ThreadInfoEvent,
} from "./types.js";

const MAX_THREAD_ID_LENGTH = 128;

export interface ParseResult {
  request?: SalesAssistantRequest;
  requestId?: string;
  error?: RequestValidationError | PayloadTooLargeError;
}

/**
 * Validates a raw request body. Accepts `threadId` as an alias of
 * `thread_id`; an empty thread id means "start a new thread".
 */
export function parseSalesRequest(raw: string, maxBytes: number): ParseResult {
  const size = Buffer.byteLength(raw, "utf8");
  if (size > maxBytes) {
    return { error: new PayloadTooLargeError(size, maxBytes) };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { error: new RequestValidationError("Body must be valid JSON.") };
  }

  if (!isRecord(parsed)) {
    return { error: new RequestValidationError("Body must be a JSON object.") };
  }

  const query = requiredText(parsed, "query");
  if (query === undefined) {
    return { error: new RequestValidationError("query must be a non-empty string.") };
  }
  const userCompany = requiredText(parsed, "user_company");
  if (userCompany === undefined) {
    return { error: new RequestValidationError("user_company must be a non-empty string.") };
  }
  const targetAccount = requiredText(parsed, "target_account");
  if (targetAccount === undefined) {
    return { error: new RequestValidationError("target_account must be a non-empty string.") };
  }

  const rawThreadId = parsed.thread_id ?? parsed.threadId;
  let threadId: string | undefined;
  if (typeof rawThreadId === "string") {
    threadId = rawThreadId.trim() || undefined;
  } else if (rawThreadId !== undefined && rawThreadId !== null) {
    return { error: new RequestValidationError("thread_id must be a string.") };
  }
  if (threadId && threadId.length > MAX_THREAD_ID_LENGTH) {
    return {
      error: new RequestValidationError(`thread_id must be at most ${MAX_THREAD_ID_LENGTH} characters.`),
    };
  }

  for (const key of ["demand_stage", "additional_instructions", "request_id"]) {
    const value = parsed[key];
    if (value !== undefined && value !== null && typeof value !== "string") {
      return { error: new RequestValidationError(`${key} must be a string.`) };
    }
  }

  return {
    requestId: asString(parsed.request_id)?.trim() || undefined,
    request: {
      query,
      threadId,
      userCompany,
      targetAccount,
      demandStage: asString(parsed.demand_stage)?.trim() || undefined,
      additionalInstructions: asString(parsed.additional_instructions)?.trim() || undefined,
    },
  };
}

export function threadInfo(agentName: string, threadId: string): ThreadInfoEvent {
  return { type: "thread_info", agent_name: agentName, thread_id: threadId };
}

export function functionCall(functionName: string, args: JsonObject): FunctionCallEvent {
  return { type: "function_call", function_name: functionName, arguments: args };
}

export function functionResult(functionName: string, result: string): FunctionResultEvent {
  return { type: "function_result", function_name: functionName, result };
}

export function content(text: string): ContentEvent {
  return { type: "content", content: text };
}

export function intermediate(text: string): IntermediateEvent {
  return { type: "intermediate", content: text };
}

export function streamError(message: string): ErrorEvent {
  return { type: "error", error: message };
}

export function streamComplete(): StreamCompleteEvent {
  return { type: "stream_complete" };
}

export function asString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requiredText(source: Record<string, unknown>, key: string): string | undefined {
  const value = asString(source[key])?.trim();
  return value ? value : undefined;
}
