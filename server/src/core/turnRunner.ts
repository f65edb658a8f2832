import { ChannelActivityListener } from "./activityListener.js";
import { AgentCapabilityError, errorMessage } from "./errors.js";
import { EventChannel } from "./eventChannel.js";
import { streamComplete, streamError, threadInfo } from "./events.js";
import { buildInstructions } from "./instructions.js";
import { LogContext, logger } from "./logger.js";
import { SessionLease, SessionStore } from "./sessionStore.js";
import { AgentCapability, AgentFunction, ConversationTurn, SalesAssistantRequest } from "./types.js";

export interface TurnRunnerConfig {
  agentName: string;
  channelHighWaterMark?: number;
}

export interface RunTurnOptions {
  /** Fires when the consumer goes away; the turn is abandoned. */
  signal?: AbortSignal;
  requestId?: string;
}

export type TurnOutcome =
  | { status: "completed"; threadId: string; answer: string }
  | { status: "failed"; threadId: string; error: string }
  | { status: "abandoned"; threadId: string };

export interface TurnHandle {
  threadId: string;
  events: EventChannel;
  /** Settles when the turn is over. Never rejects. */
  done: Promise<TurnOutcome>;
}

export class TurnRunner {
  private readonly agent: AgentCapability;
  private readonly sessions: SessionStore;
  private readonly functions: readonly AgentFunction[];
  private readonly config: TurnRunnerConfig;

  constructor(
    agent: AgentCapability,
    sessions: SessionStore,
    functions: readonly AgentFunction[],
    config: TurnRunnerConfig,
  ) {
    this.agent = agent;
    this.sessions = sessions;
    this.functions = functions;
    this.config = config;
  }

  get agentName(): string {
    return this.config.agentName;
  }

  /**
   * Starts one agent turn and returns its event stream immediately. Throws
   * `ThreadBusyError` before any event exists when the thread already has a
   * turn in progress.
   */
  runTurn(request: SalesAssistantRequest, options: RunTurnOptions = {}): TurnHandle {
    const lease = this.sessions.acquire(request.threadId);
    const channel = new EventChannel(lease.threadId, this.config.channelHighWaterMark);
    const done = this.drive(lease, request, channel, options);

    return { threadId: lease.threadId, events: channel, done };
  }

  private async drive(
    lease: SessionLease,
    request: SalesAssistantRequest,
    channel: EventChannel,
    options: RunTurnOptions,
  ): Promise<TurnOutcome> {
    const threadId = lease.threadId;
    const context: LogContext = { threadId, requestId: options.requestId };
    const signal = options.signal ?? new AbortController().signal;
    const listener = new ChannelActivityListener(channel, signal);

    const onAbort = (): void => channel.close();
    if (signal.aborted) {
      channel.close();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    const userTurn: ConversationTurn = { role: "user", content: request.query };
    const history = [...lease.session.history, userTurn];

    logger.info(`turn #${lease.session.turnCount + 1} started with agent=${this.agent.name}`, context);
    channel.push(threadInfo(this.config.agentName, threadId));

    try {
      const answer = await this.agent.invoke({
        history,
        instructions: buildInstructions(this.config.agentName, request),
        functions: this.functions,
        listener,
        signal,
      });

      if (signal.aborted) {
        return abandoned(threadId, context);
      }

      const streamed = listener.streamedContent;
      const finalAnswer = streamed || answer;
      if (!finalAnswer.trim()) {
        throw new AgentCapabilityError("Empty response from the agent.");
      }
      if (!streamed) {
        listener.content(answer);
      }
      listener.settleOutstanding("the agent finished without reporting a result");

      const functionCalls = listener.functionCalls;
      lease.commit([
        userTurn,
        functionCalls.length
          ? { role: "assistant", content: finalAnswer, functionCalls }
          : { role: "assistant", content: finalAnswer },
      ]);

      channel.push(streamComplete());
      return { status: "completed", threadId, answer: finalAnswer };
    } catch (error) {
      if (signal.aborted) {
        return abandoned(threadId, context);
      }

      const message = errorMessage(error);
      logger.error(`agent turn failed: ${message}`, context);
      listener.settleOutstanding(message);
      channel.push(streamError(message));
      channel.push(streamComplete());
      return { status: "failed", threadId, error: message };
    } finally {
      signal.removeEventListener("abort", onAbort);
      lease.release();
      channel.close();
      logger.info(`turn trace: ${channel.trace.join(" -> ")}`, context);
    }
  }
}

function abandoned(threadId: string, context: LogContext): TurnOutcome {
  logger.info("turn abandoned after client disconnect", context);
  return { status: "abandoned", threadId };
}
