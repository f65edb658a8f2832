export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = "AppError";
    this.statusCode = statusCode;
    this.code = code;
  }
}

export class RequestValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, "invalid_request");
    this.name = "RequestValidationError";
  }
}

export class ThreadBusyError extends AppError {
  readonly threadId: string;

  constructor(threadId: string) {
    super(`Thread ${threadId} already has a turn in progress.`, 409, "thread_busy");
    this.name = "ThreadBusyError";
    this.threadId = threadId;
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(size: number, limit: number) {
    super(`Request body of ${size} bytes exceeds the ${limit} byte limit.`, 413, "payload_too_large");
    this.name = "PayloadTooLargeError";
  }
}

export class RateLimitError extends AppError {
  constructor(message = "Too many requests in the last minute.") {
    super(message, 429, "rate_limited");
    this.name = "RateLimitError";
  }
}

export class AgentCapabilityError extends AppError {
  constructor(message: string) {
    super(message, 502, "agent_failed");
    this.name = "AgentCapabilityError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "An unexpected error occurred";
}
