export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

// ---------------------------------------------------------------------------
// Stream events
// ---------------------------------------------------------------------------

export interface ThreadInfoEvent {
  type: "thread_info";
  agent_name: string;
  thread_id: string;
}

export interface FunctionCallEvent {
  type: "function_call";
  function_name: string;
  arguments: JsonObject;
}

export interface FunctionResultEvent {
  type: "function_result";
  function_name: string;
  result: string;
}

export interface ContentEvent {
  type: "content";
  content: string;
}

export interface IntermediateEvent {
  type: "intermediate";
  content: string;
}

export interface ErrorEvent {
  type: "error";
  error: string;
}

export interface StreamCompleteEvent {
  type: "stream_complete";
}

export type StreamEvent =
  | ThreadInfoEvent
  | FunctionCallEvent
  | FunctionResultEvent
  | ContentEvent
  | IntermediateEvent
  | ErrorEvent
  | StreamCompleteEvent;

export type StreamEventType = StreamEvent["type"];

export interface SequencedEvent {
  seq: number;
  threadId: string;
  event: StreamEvent;
}

// ---------------------------------------------------------------------------
// Conversation state
// ---------------------------------------------------------------------------

export interface FunctionCallRecord {
  callId: string;
  name: string;
  arguments: JsonObject;
  result: string;
}

export interface ConversationTurn {
  role: "user" | "assistant";
  content: string;
  functionCalls?: FunctionCallRecord[];
}

export interface SessionState {
  threadId: string;
  history: readonly ConversationTurn[];
  createdAt: string;
  updatedAt: string;
  turnCount: number;
}

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export interface SalesAssistantRequest {
  query: string;
  threadId?: string;
  userCompany: string;
  targetAccount: string;
  demandStage?: string;
  additionalInstructions?: string;
}

// ---------------------------------------------------------------------------
// Agent runtime seam
// ---------------------------------------------------------------------------

/**
 * Receives the agent runtime's per-step notifications.
 *
 * Implementations turn every call into exactly one stream event, in call
 * order. Runtimes that execute steps concurrently must serialize their calls
 * into this interface themselves.
 */
export interface ActivityListener {
  functionCall(callId: string, name: string, args: unknown): void;
  functionResult(callId: string, name: string, result: unknown): void;
  content(text: string): void;
  intermediate(text: string): void;
}

export type FunctionParameters = {
  type: "object";
  properties: Record<string, JsonObject>;
  required: string[];
};

export interface AgentFunction {
  name: string;
  description: string;
  parameters: FunctionParameters;
  execute(args: JsonObject, signal: AbortSignal): Promise<unknown>;
}

export interface AgentInvocation {
  history: readonly ConversationTurn[];
  instructions: string;
  functions: readonly AgentFunction[];
  listener: ActivityListener;
  signal: AbortSignal;
}

export interface AgentCapability {
  readonly name: string;
  invoke(invocation: AgentInvocation): Promise<string>;
}
