import { logger } from "./logger.js";
import { SequencedEvent, StreamEvent } from "./types.js";

const DEFAULT_HIGH_WATER_MARK = 512;
const MAX_TRACE_ENTRIES = 24;

/**
 * FIFO queue between one turn's producer and a single consumer.
 *
 * Every accepted event gets the next sequence number, starting at 1. Pushing
 * `stream_complete` closes the channel; after close, pushes are dropped and
 * `pop()` drains what is buffered, then resolves `undefined`.
 */
export class EventChannel implements AsyncIterable<SequencedEvent> {
  readonly threadId: string;

  private readonly buffer: SequencedEvent[] = [];
  private readonly recentTypes: string[] = [];
  private readonly waiters: Array<(event: SequencedEvent | undefined) => void> = [];
  private readonly highWaterMark: number;
  private nextSeq = 1;
  private closed = false;
  private warnedHighWater = false;

  constructor(threadId: string, highWaterMark: number = DEFAULT_HIGH_WATER_MARK) {
    this.threadId = threadId;
    this.highWaterMark = highWaterMark;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  /** Types of the most recently accepted events, oldest first. */
  get trace(): readonly string[] {
    return this.recentTypes;
  }

  push(event: StreamEvent): boolean {
    if (this.closed) {
      logger.debug(`dropped ${event.type} after channel close`, { threadId: this.threadId });
      return false;
    }

    const sequenced: SequencedEvent = {
      seq: this.nextSeq++,
      threadId: this.threadId,
      event,
    };

    this.recentTypes.push(event.type);
    if (this.recentTypes.length > MAX_TRACE_ENTRIES) {
      this.recentTypes.shift();
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(sequenced);
    } else {
      this.buffer.push(sequenced);
      if (this.buffer.length >= this.highWaterMark && !this.warnedHighWater) {
        this.warnedHighWater = true;
        logger.warn(`event channel backlog reached ${this.buffer.length}`, { threadId: this.threadId });
      }
    }

    if (event.type === "stream_complete") {
      this.close();
    }
    return true;
  }

  pop(): Promise<SequencedEvent | undefined> {
    const next = this.buffer.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    // Waiters only exist while the buffer is empty.
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<SequencedEvent> {
    while (true) {
      const next = await this.pop();
      if (!next) {
        return;
      }
      yield next;
    }
  }
}
