import { EventChannel } from "./eventChannel.js";
import { logger } from "./logger.js";
import { FunctionCallRecord, JsonObject, SequencedEvent } from "./types.js";

export type FrameFormat = "sse" | "json";

/** Where encoded frames go. `write` must hand the frame to the transport immediately. */
export interface FrameSink {
  readonly closed: boolean;
  write(frame: string): void;
  end(): void;
}

export function encodeSseFrame(sequenced: SequencedEvent): string {
  const { type } = sequenced.event;
  return `id: ${sequenced.seq}\nevent: ${type}\ndata: ${JSON.stringify(sequenced.event)}\n\n`;
}

/** `request_id` is left out when no id is given. */
export function encodeJsonFrame(sequenced: SequencedEvent, requestId?: string): string {
  const { type, ...data } = sequenced.event;
  return JSON.stringify({
    seq: sequenced.seq,
    event: type,
    thread_id: sequenced.threadId,
    request_id: requestId,
    data,
  });
}

/**
 * Drains one turn's channel into a sink, one frame per event with no
 * coalescing, and ends the sink exactly once.
 */
export class StreamEncoder {
  private readonly sink: FrameSink;
  private readonly encode: (sequenced: SequencedEvent) => string;
  private ended = false;
  private wroteComplete = false;

  constructor(sink: FrameSink, format: FrameFormat, requestId?: string) {
    this.sink = sink;
    this.encode =
      format === "sse" ? encodeSseFrame : (sequenced) => encodeJsonFrame(sequenced, requestId);
  }

  /** False when the sink went away before `stream_complete` was written. */
  get completed(): boolean {
    return this.wroteComplete;
  }

  async pipe(channel: EventChannel): Promise<number> {
    let written = 0;

    for await (const sequenced of channel) {
      if (this.ended || this.sink.closed) {
        logger.debug(`sink closed before ${sequenced.event.type}`, { threadId: channel.threadId });
        break;
      }

      this.sink.write(this.encode(sequenced));
      written += 1;

      if (sequenced.event.type === "stream_complete") {
        this.wroteComplete = true;
        break;
      }
    }

    this.end();
    return written;
  }

  private end(): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    if (!this.sink.closed) {
      this.sink.end();
    }
  }
}

export interface TurnSummary {
  threadId: string;
  answer: string;
  functionCalls: Array<Pick<FunctionCallRecord, "name" | "arguments" | "result">>;
  error?: string;
}

/**
 * Consumes a whole turn without streaming it, for callers that want one
 * JSON response. Results are paired with calls in arrival order per name.
 */
export async function collectTurn(channel: EventChannel): Promise<TurnSummary> {
  const summary: TurnSummary = { threadId: channel.threadId, answer: "", functionCalls: [] };
  const pending = new Map<string, Array<{ name: string; arguments: JsonObject }>>();

  for await (const { event } of channel) {
    switch (event.type) {
      case "function_call": {
        const queue = pending.get(event.function_name) ?? [];
        queue.push({ name: event.function_name, arguments: event.arguments });
        pending.set(event.function_name, queue);
        break;
      }
      case "function_result": {
        const call = pending.get(event.function_name)?.shift();
        summary.functionCalls.push({
          name: event.function_name,
          arguments: call?.arguments ?? {},
          result: event.result,
        });
        break;
      }
      case "content":
        summary.answer += event.content;
        break;
      case "error":
        summary.error = event.error;
        break;
      default:
        break;
    }
  }

  return summary;
}
