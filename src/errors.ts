export class ApiError extends Error {
  readonly status: number;
  readonly body: unknown;
  readonly headers: Headers;

  constructor(message: string, status: number, body: unknown, headers: Headers) {
    super(message);
    this.name = "ApiError";
    this.status = status;
    this.body = body;
    this.headers = headers;
  }
}

export class AuthError extends Error {
  readonly status?: number;
  readonly body?: unknown;

  constructor(message: string, options: { status?: number; body?: unknown; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "AuthError";
    this.status = options.status;
    this.body = options.body;
  }
}

export class ProtocolError extends Error {
  readonly body?: unknown;

  constructor(message: string, body?: unknown) {
    super(message);
    this.name = "ProtocolError";
    this.body = body;
  }
}

export class UserInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UserInputError";
  }
}

export class ReportFailedError extends Error {
  readonly jobId: string;

  constructor(jobId: string) {
    super(`Report ${jobId} generation failed`);
    this.name = "ReportFailedError";
    this.jobId = jobId;
  }
}

export class ReportTimeoutError extends Error {
  readonly jobId: string;
  readonly attempts: number;

  constructor(jobId: string, attempts: number, intervalMs: number) {
    super(
      `Report ${jobId} did not complete after ${attempts} attempts (${Math.round((attempts * intervalMs) / 1000)} seconds)`,
    );
    this.name = "ReportTimeoutError";
    this.jobId = jobId;
    this.attempts = attempts;
  }
}

export function formatErrorBody(body: unknown): string {
  if (typeof body === "string") {
    return body;
  }
  try {
    return JSON.stringify(body, null, 2);
  } catch {
    return String(body);
  }
}
