import crypto from "node:crypto";
import { WebSocket } from "ws";
import { isRecord } from "../src/core/events.js";

const baseURL = process.env.SMOKE_WS_URL ?? "ws://localhost:8080/ws";
const query = process.env.SMOKE_QUERY ?? "Give me ideas to build relationships at Panda Health";
const userCompany = process.env.SMOKE_USER_COMPANY ?? "Acme";
const targetAccount = process.env.SMOKE_TARGET_ACCOUNT ?? "Panda Health";

const socket = new WebSocket(baseURL);

socket.on("open", () => {
  console.log(`connected to ${baseURL}`);

  socket.send(JSON.stringify({
    request_id: crypto.randomUUID(),
    query,
    thread_id: process.env.SMOKE_THREAD_ID ?? "",
    user_company: userCompany,
    target_account: targetAccount,
  }));
});

socket.on("message", (raw) => {
  const text = Buffer.isBuffer(raw) ? raw.toString("utf8") : String(raw);
  let frame: unknown;
  try {
    frame = JSON.parse(text);
  } catch {
    console.log(text);
    return;
  }
  if (!isRecord(frame)) {
    console.log(text);
    return;
  }

  const data = isRecord(frame.data) ? frame.data : {};
  switch (frame.event) {
    case "content":
      process.stdout.write(String(data.content ?? ""));
      return;
    case "function_call":
      console.log(`\nfunction_call ${String(data.function_name)} ${JSON.stringify(data.arguments)}`);
      return;
    case "function_result":
      console.log(`function_result ${String(data.function_name)} (${String(data.result ?? "").length} chars)`);
      return;
    case "stream_complete":
      console.log(`\nstream_complete thread=${String(frame.thread_id)}`);
      socket.close();
      return;
    default:
      console.log(`\n${String(frame.event)} ${JSON.stringify(data)}`);
  }
});

socket.on("close", () => {
  console.log("socket closed");
  process.exit(0);
});

socket.on("error", (error) => {
  console.error(`socket error: ${error.message}`);
  process.exit(1);
});

setTimeout(() => {
  socket.close();
}, Number(process.env.SMOKE_DURATION_MS ?? 60_000));
