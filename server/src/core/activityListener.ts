import { EventChannel } from "./eventChannel.js";
import { content, functionCall, functionResult, intermediate, isRecord } from "./events.js";
import { logger } from "./logger.js";
import { ActivityListener, FunctionCallRecord, JsonObject, JsonValue } from "./types.js";

interface OutstandingCall {
  callId: string;
  name: string;
  arguments: JsonObject;
}

/**
 * Translates agent runtime notifications into stream events on a turn's
 * channel. Each notification enqueues one event, in call order, until the
 * turn's abort signal fires.
 */
export class ChannelActivityListener implements ActivityListener {
  private readonly channel: EventChannel;
  private readonly signal: AbortSignal | undefined;
  private readonly outstanding = new Map<string, OutstandingCall>();
  private readonly completed: FunctionCallRecord[] = [];
  private streamed = "";

  constructor(channel: EventChannel, signal?: AbortSignal) {
    this.channel = channel;
    this.signal = signal;
  }

  /** Concatenation of every content chunk emitted so far. */
  get streamedContent(): string {
    return this.streamed;
  }

  get functionCalls(): FunctionCallRecord[] {
    return [...this.completed];
  }

  get outstandingCount(): number {
    return this.outstanding.size;
  }

  functionCall(callId: string, name: string, args: unknown): void {
    if (this.abandoned()) {
      return;
    }

    const decoded = decodeArguments(args);
    this.outstanding.set(callId, { callId, name, arguments: decoded });
    logger.info(`function call ${name}`, { threadId: this.channel.threadId, callId });
    this.channel.push(functionCall(name, decoded));
  }

  functionResult(callId: string, name: string, result: unknown): void {
    if (this.abandoned()) {
      return;
    }

    const text = serializeFunctionResult(result);
    const pending = this.outstanding.get(callId);
    if (pending) {
      this.outstanding.delete(callId);
      this.completed.push({ callId, name: pending.name, arguments: pending.arguments, result: text });
    } else {
      logger.warn(`function result for unknown call ${name}`, { threadId: this.channel.threadId, callId });
    }
    this.channel.push(functionResult(pending?.name ?? name, text));
  }

  content(text: string): void {
    if (this.abandoned() || !text) {
      return;
    }
    this.streamed += text;
    this.channel.push(content(text));
  }

  intermediate(text: string): void {
    if (this.abandoned()) {
      return;
    }
    this.channel.push(intermediate(text));
  }

  /**
   * Closes every call that never reported a result, in call order, so a
   * failed turn leaves no orphaned `function_call` on the stream.
   */
  settleOutstanding(reason: string): void {
    for (const call of [...this.outstanding.values()]) {
      this.functionResult(call.callId, call.name, `Function call did not complete: ${reason}`);
    }
  }

  private abandoned(): boolean {
    return this.signal?.aborted === true || this.channel.isClosed;
  }
}

/**
 * Normalizes whatever argument form a runtime hands over into a JSON object.
 * Malformed or non-object arguments become `{}`.
 */
export function decodeArguments(args: unknown): JsonObject {
  let candidate: unknown = args;

  if (typeof candidate === "string") {
    const trimmed = candidate.trim();
    if (!trimmed) {
      return {};
    }
    try {
      candidate = JSON.parse(trimmed);
    } catch {
      return {};
    }
  }

  if (candidate instanceof Map) {
    candidate = Object.fromEntries(
      [...candidate.entries()].filter(([key]) => typeof key === "string"),
    );
  }

  if (!isRecord(candidate)) {
    return {};
  }

  const decoded: JsonObject = {};
  for (const [key, value] of Object.entries(candidate)) {
    const json = toJsonValue(value);
    if (json !== undefined) {
      decoded[key] = json;
    }
  }
  return decoded;
}

/**
 * Renders a function's return value as text: strings as-is, nullish as the
 * empty string, everything else as JSON, falling back to `String()` for
 * values JSON cannot encode.
 */
export function serializeFunctionResult(result: unknown): string {
  if (typeof result === "string") {
    return result;
  }
  if (result === undefined || result === null) {
    return "";
  }
  try {
    const encoded = JSON.stringify(result);
    if (typeof encoded === "string") {
      return encoded;
    }
  } catch {
    // cycles and BigInt land here
  }
  return String(result);
}

function toJsonValue(value: unknown, seen: Set<object> = new Set()): JsonValue | undefined {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "object") {
    return undefined;
  }
  if (seen.has(value)) {
    return undefined;
  }
  seen.add(value);

  let out: JsonValue;
  if (Array.isArray(value)) {
    out = value.map((item) => toJsonValue(item, seen) ?? null);
  } else {
    const entries: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      const json = toJsonValue(item, seen);
      if (json !== undefined) {
        entries[key] = json;
      }
    }
    out = entries;
  }

  seen.delete(value);
  return out;
}
