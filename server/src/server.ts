import "dotenv/config";

import http from "node:http";
import { buildAgent } from "./agents/index.js";
import { createRequestHandler, STREAM_PATH } from "./app.js";
import { loadConfig } from "./config.js";
import { errorMessage } from "./core/errors.js";
import { logger } from "./core/logger.js";
import { KeyedRateLimiter } from "./core/rateLimiter.js";
import { SessionStore } from "./core/sessionStore.js";
import { TurnRunner } from "./core/turnRunner.js";
import { buildRetrievalFunctions } from "./tools/retrievalFunctions.js";
import { AzureSearchClient } from "./tools/searchClient.js";
import { attachWebSocketServer, WEBSOCKET_PATH } from "./websocket.js";

const config = loadConfig();

const searchIndex = (indexName: string) =>
  new AzureSearchClient({
    endpoint: config.search.endpoint,
    apiKey: config.search.apiKey,
    apiVersion: config.search.apiVersion,
    indexName,
    top: config.search.top,
  });

const functions = buildRetrievalFunctions({
  sales: searchIndex(config.search.indexes.sales),
  accounts: searchIndex(config.search.indexes.accounts),
  user: searchIndex(config.search.indexes.user),
});

const agent = buildAgent(config);
const sessions = new SessionStore(config.maxTurns);
const runner = new TurnRunner(agent, sessions, functions, { agentName: config.agentName });

const deps = {
  runner,
  sessions,
  limiter: new KeyedRateLimiter(config.rateLimitPerMinute, 60_000),
  maxRequestBytes: config.maxRequestBytes,
};

const requestHandler = createRequestHandler(deps);
const httpServer = http.createServer((req, res) => {
  requestHandler(req, res).catch((error: unknown) => {
    logger.error(`unhandled request error: ${errorMessage(error)}`);
  });
});

attachWebSocketServer(httpServer, deps);

httpServer.listen(config.port, () => {
  logger.info(
    `sales assistant listening on port ${config.port} (POST ${STREAM_PATH}, ws ${WEBSOCKET_PATH}) using agent=${agent.name}`,
  );
});

const shutdown = (signal: string): void => {
  logger.info(`received ${signal}, closing server`);
  httpServer.close(() => process.exit(0));
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
