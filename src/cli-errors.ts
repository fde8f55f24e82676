import { ApiError, AuthError, ProtocolError, formatErrorBody } from "./errors.js";

/** Prints a fatal error for the operator and returns the process exit code. */
export function reportCliError(error: unknown, write: (line: string) => void = console.error): number {
  if (error instanceof ApiError || (error instanceof AuthError && error.status !== undefined)) {
    write(`HTTP ${error.status}: ${error.message}`);
    write(formatErrorBody(error.body));
    return 1;
  }

  write(error instanceof Error ? error.message : String(error));

  if (error instanceof ProtocolError && error.body !== undefined) {
    write(formatErrorBody(error.body));
  }

  return 1;
}
