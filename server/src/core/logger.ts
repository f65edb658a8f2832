interface LogContext {
  threadId?: string;
  requestId?: string;
  callId?: string;
  trace?: string;
}

function contextPrefix(context?: LogContext): string {
  if (!context) {
    return "";
  }

  const parts: string[] = [];
  if (context.threadId) parts.push(`thread=${context.threadId}`);
  if (context.requestId) parts.push(`request=${context.requestId}`);
  if (context.callId) parts.push(`call=${context.callId}`);
  if (context.trace) parts.push(`trace=${context.trace}`);

  return parts.length ? `[${parts.join(" ")}] ` : "";
}

export const logger = {
  debug(message: string, context?: LogContext): void {
    if ((process.env.LOG_LEVEL ?? "").toUpperCase() === "DEBUG") {
      console.debug(`${new Date().toISOString()} DEBUG ${contextPrefix(context)}${message}`);
    }
  },

  info(message: string, context?: LogContext): void {
    console.log(`${new Date().toISOString()} INFO ${contextPrefix(context)}${message}`);
  },

  warn(message: string, context?: LogContext): void {
    console.warn(`${new Date().toISOString()} WARN ${contextPrefix(context)}${message}`);
  },

  error(message: string, context?: LogContext): void {
    console.error(`${new Date().toISOString()} ERROR ${contextPrefix(context)}${message}`);
  },
};

export type { LogContext };
