import type http from "node:http";
import { WebSocket, WebSocketServer } from "ws";
import { AppDependencies, startTurn } from "./app.js";
import { errorMessage } from "./core/errors.js";
import { logger } from "./core/logger.js";
import { SlidingWindowRateLimiter } from "./core/rateLimiter.js";
import { FrameSink, StreamEncoder } from "./core/streamEncoder.js";

export const WEBSOCKET_PATH = "/ws";

/** One client connection; turns started on it are abandoned when it closes. */
export interface SocketConnection {
  readonly isOpen: boolean;
  readonly limiter: SlidingWindowRateLimiter;
  readonly activeTurns: Set<AbortController>;
  send(frame: string): void;
}

/**
 * Runs one inbound message as a turn and streams its events back as JSON
 * frames. Rejections are sent as a single `request_rejected` frame.
 */
export async function handleSocketMessage(
  text: string,
  connection: SocketConnection,
  deps: AppDependencies,
): Promise<void> {
  const controller = new AbortController();
  const started = startTurn(text, connection.limiter.allow(), deps, controller.signal);

  if (!started.handle) {
    const code = started.error?.code ?? "invalid_request";
    const message = started.error?.message ?? "Invalid request.";
    logger.warn(`socket request rejected: ${code} ${message}`, { requestId: started.requestId });
    connection.send(JSON.stringify({
      event: "request_rejected",
      request_id: started.requestId,
      data: { code, message },
    }));
    return;
  }

  connection.activeTurns.add(controller);
  try {
    const encoder = new StreamEncoder(socketSink(connection), "json", started.requestId);
    await encoder.pipe(started.handle.events);
    if (!encoder.completed) {
      controller.abort();
    }
    await started.handle.done;
  } finally {
    connection.activeTurns.delete(controller);
  }
}

// Messages between the request limit and this cap are rejected with a
// frame; only larger ones make `ws` drop the connection.
const PAYLOAD_CAP_FACTOR = 4;

export function attachWebSocketServer(httpServer: http.Server, deps: AppDependencies): WebSocketServer {
  const wss = new WebSocketServer({
    server: httpServer,
    path: WEBSOCKET_PATH,
    maxPayload: deps.maxRequestBytes * PAYLOAD_CAP_FACTOR,
  });

  wss.on("connection", (socket, request) => {
    const remote = request.socket.remoteAddress ?? "unknown";
    const connection: SocketConnection = {
      get isOpen() {
        return socket.readyState === WebSocket.OPEN;
      },
      limiter: deps.limiter.create(),
      activeTurns: new Set(),
      send(frame: string) {
        safeSend(socket, frame);
      },
    };

    logger.info("client connected", { trace: remote });

    socket.on("message", async (raw) => {
      const text = Buffer.isBuffer(raw) ? raw.toString("utf8") : String(raw);
      try {
        await handleSocketMessage(text, connection, deps);
      } catch (error) {
        logger.error(`socket message failed: ${errorMessage(error)}`, { trace: remote });
      }
    });

    socket.on("close", () => {
      logger.info(`client disconnected with ${connection.activeTurns.size} active turns`, { trace: remote });
      for (const controller of connection.activeTurns) {
        controller.abort();
      }
      connection.activeTurns.clear();
    });

    socket.on("error", (error) => {
      logger.warn(`socket error: ${error.message}`, { trace: remote });
    });
  });

  return wss;
}

function socketSink(connection: SocketConnection): FrameSink {
  // The socket outlives a turn, so ending a turn's stream leaves it open.
  return {
    get closed() {
      return !connection.isOpen;
    },
    write(frame: string) {
      connection.send(frame);
    },
    end() {},
  };
}

function safeSend(socket: WebSocket, frame: string): void {
  if (socket.readyState !== WebSocket.OPEN) {
    return;
  }

  try {
    socket.send(frame);
  } catch (error) {
    logger.warn(`failed to send websocket frame: ${errorMessage(error)}`);
  }
}
