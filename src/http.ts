import { ApiError } from "./errors.js";

export const DEFAULT_TIMEOUT_MS = 20_000;

function tryParseBody(text: string): unknown {
  if (!text) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

async function send(input: string, init: RequestInit, timeoutMs: number): Promise<Response> {
  return fetch(input, {
    ...init,
    signal: init.signal ?? AbortSignal.timeout(timeoutMs),
  });
}

async function toApiError(input: string, response: Response): Promise<ApiError> {
  const text = await response.text();
  return new ApiError(
    `Request failed with status ${response.status} for ${input}`,
    response.status,
    tryParseBody(text),
    response.headers,
  );
}

/**
 * Sends the request and returns the decoded body. A body that is not JSON
 * comes back as the raw string so callers can reject it with their own error.
 */
export async function requestJson(
  input: string,
  init: RequestInit = {},
  timeoutMs = DEFAULT_TIMEOUT_MS,
): Promise<unknown> {
  const response = await send(input, init, timeoutMs);

  if (!response.ok) {
    throw await toApiError(input, response);
  }

  const text = await response.text();
  return tryParseBody(text);
}

export async function requestBytes(
  input: string,
  init: RequestInit = {},
  timeoutMs = DEFAULT_TIMEOUT_MS,
): Promise<Buffer> {
  const response = await send(input, init, timeoutMs);

  if (!response.ok) {
    throw await toApiError(input, response);
  }

  return Buffer.from(await response.arrayBuffer());
}

export function toFormBody(params: Record<string, string>): string {
  const body = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    body.set(key, value);
  }
  return body.toString();
}

export async function wait(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}
