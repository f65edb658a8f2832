import crypto from "node:crypto";
import type http from "node:http";
import { AppError, errorMessage, PayloadTooLargeError, RateLimitError, RequestValidationError } from "./core/errors.js";
import { parseSalesRequest } from "./core/events.js";
import { LogContext, logger } from "./core/logger.js";
import { KeyedRateLimiter } from "./core/rateLimiter.js";
import { SessionStore } from "./core/sessionStore.js";
import { collectTurn, FrameSink, StreamEncoder } from "./core/streamEncoder.js";
import { TurnHandle, TurnRunner } from "./core/turnRunner.js";

export interface AppDependencies {
  runner: TurnRunner;
  sessions: SessionStore;
  limiter: KeyedRateLimiter;
  maxRequestBytes: number;
}

/** The slice of `http.ServerResponse` the handlers write to. */
export interface ResponseLike {
  readonly writableEnded: boolean;
  readonly destroyed: boolean;
  writeHead(statusCode: number, headers: Record<string, string>): unknown;
  write(chunk: string): boolean;
  end(chunk?: string): unknown;
  on(event: "close", listener: () => void): unknown;
  flushHeaders?(): void;
}

export const STREAM_PATH = "/sales-assistant";
export const COMPLETE_PATH = "/sales-assistant/complete";
export const HEALTH_PATH = "/health";

const CORS_HEADERS: Record<string, string> = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type",
};

const SSE_HEADERS: Record<string, string> = {
  ...CORS_HEADERS,
  "Content-Type": "text/event-stream; charset=utf-8",
  "Cache-Control": "no-cache, no-transform",
  "Connection": "keep-alive",
  "X-Accel-Buffering": "no",
};

export interface StartedTurn {
  handle?: TurnHandle;
  requestId: string;
  error?: AppError;
}

/**
 * Everything that can reject a request happens here, before any event is
 * produced: rate limit, validation, busy thread.
 */
export function startTurn(
  body: string,
  allowed: boolean,
  deps: AppDependencies,
  signal: AbortSignal,
): StartedTurn {
  if (!allowed) {
    return { requestId: crypto.randomUUID(), error: new RateLimitError() };
  }

  const parsed = parseSalesRequest(body, deps.maxRequestBytes);
  const requestId = parsed.requestId ?? crypto.randomUUID();
  if (!parsed.request) {
    return { requestId, error: parsed.error ?? new RequestValidationError("Invalid request.") };
  }

  try {
    const handle = deps.runner.runTurn(parsed.request, { signal, requestId });
    return { handle, requestId };
  } catch (error) {
    if (error instanceof AppError) {
      return { requestId, error };
    }
    throw error;
  }
}

export async function handleStreamRequest(
  body: string,
  clientKey: string,
  res: ResponseLike,
  deps: AppDependencies,
): Promise<void> {
  const controller = new AbortController();
  const started = startTurn(body, deps.limiter.allow(clientKey), deps, controller.signal);
  if (!started.handle) {
    rejectRequest(res, started.requestId, started.error);
    return;
  }

  const { handle } = started;
  const context = { threadId: handle.threadId, requestId: started.requestId };
  res.writeHead(200, SSE_HEADERS);
  res.flushHeaders?.();
  abortOnDisconnect(res, controller, context);

  const encoder = new StreamEncoder(httpSink(res), "sse");
  const written = await encoder.pipe(handle.events);
  if (!encoder.completed && !controller.signal.aborted) {
    logger.info("response closed before stream_complete", context);
    controller.abort();
  }
  const outcome = await handle.done;
  logger.info(`stream closed after ${written} frames (${outcome.status})`, {
    threadId: handle.threadId,
    requestId: started.requestId,
  });
}

export async function handleCompleteRequest(
  body: string,
  clientKey: string,
  res: ResponseLike,
  deps: AppDependencies,
): Promise<void> {
  const controller = new AbortController();
  const started = startTurn(body, deps.limiter.allow(clientKey), deps, controller.signal);
  if (!started.handle) {
    rejectRequest(res, started.requestId, started.error);
    return;
  }

  abortOnDisconnect(res, controller, { threadId: started.handle.threadId, requestId: started.requestId });

  const summary = await collectTurn(started.handle.events);
  await started.handle.done;
  if (res.writableEnded || res.destroyed) {
    return;
  }

  if (summary.error) {
    sendJson(res, 502, { error: summary.error, threadId: summary.threadId });
    return;
  }
  sendJson(res, 200, {
    data: summary.answer,
    threadId: summary.threadId,
    function_calls: summary.functionCalls,
  });
}

export function createRequestHandler(
  deps: AppDependencies,
): (req: http.IncomingMessage, res: http.ServerResponse) => Promise<void> {
  return async (req, res) => {
    const path = (req.url ?? "/").split("?")[0];
    const clientKey = req.socket.remoteAddress ?? "unknown";

    try {
      if (req.method === "OPTIONS") {
        res.writeHead(204, CORS_HEADERS);
        res.end();
        return;
      }

      if (req.method === "GET" && path === HEALTH_PATH) {
        sendJson(res, 200, { status: "ok", agent: deps.runner.agentName, sessions: deps.sessions.size });
        return;
      }

      if (req.method === "POST" && (path === STREAM_PATH || path === COMPLETE_PATH)) {
        const body = await readBody(req, deps.maxRequestBytes);
        if (path === STREAM_PATH) {
          await handleStreamRequest(body, clientKey, res, deps);
        } else {
          await handleCompleteRequest(body, clientKey, res, deps);
        }
        return;
      }

      sendJson(res, 404, { error: "not_found" });
    } catch (error) {
      if (error instanceof AppError) {
        rejectRequest(res, undefined, error);
        return;
      }
      logger.error(`request failed: ${errorMessage(error)}`, { trace: `${req.method} ${path}` });
      if (!res.headersSent) {
        sendJson(res, 500, { error: "internal_error", message: "Unexpected server error." });
      } else if (!res.writableEnded) {
        res.end();
      }
    }
  };
}

export async function readBody(req: AsyncIterable<Buffer | string>, maxBytes: number): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of req) {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    size += buffer.length;
    if (size > maxBytes) {
      throw new PayloadTooLargeError(size, maxBytes);
    }
    chunks.push(buffer);
  }

  return Buffer.concat(chunks).toString("utf8");
}

export function httpSink(res: ResponseLike): FrameSink {
  return {
    get closed() {
      return res.writableEnded || res.destroyed;
    },
    write(frame: string) {
      res.write(frame);
    },
    end() {
      res.end();
    },
  };
}

/**
 * Aborts the turn when the client goes away. A response destroyed before
 * the listener was attached (for example while the body was being read)
 * never emits `close` again, so that case aborts at once.
 */
function abortOnDisconnect(res: ResponseLike, controller: AbortController, context: LogContext): void {
  const disconnect = (): void => {
    if (!res.writableEnded && !controller.signal.aborted) {
      logger.info("client disconnected mid-turn", context);
      controller.abort();
    }
  };

  if (res.destroyed) {
    disconnect();
    return;
  }
  res.on("close", disconnect);
}

function rejectRequest(res: ResponseLike, requestId: string | undefined, error: AppError | undefined): void {
  const rejection = error ?? new RequestValidationError("Invalid request.");
  logger.warn(`request rejected: ${rejection.code} ${rejection.message}`, { requestId });
  sendJson(res, rejection.statusCode, { error: rejection.code, message: rejection.message });
}

function sendJson(res: ResponseLike, statusCode: number, payload: object): void {
  res.writeHead(statusCode, { ...CORS_HEADERS, "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}
