import type pino from "pino";
import { z } from "zod";
import { ApiError, AuthError, ProtocolError } from "../errors.js";
import { DEFAULT_TIMEOUT_MS, requestJson, toFormBody } from "../http.js";
import type { AccessToken, Credentials } from "../types.js";

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number(),
  refresh_token: z.string().optional(),
  refresh_token_expires_in: z.number().optional(),
  token_type: z.string().optional(),
});

export interface TokenProviderOptions {
  apiBase: string;
  logger: pino.Logger;
  timeoutMs?: number;
  now?: () => number;
}

function tokenEndpoint(apiBase: string): string {
  return `${apiBase}/access_token`;
}

/** Exchanges the long-lived refresh token for an access token. Single attempt. */
export async function getWebexAccessToken(
  credentials: Credentials,
  options: TokenProviderOptions,
): Promise<AccessToken> {
  const { apiBase, logger, timeoutMs = DEFAULT_TIMEOUT_MS, now = Date.now } = options;

  let body: unknown;
  try {
    body = await requestJson(
      tokenEndpoint(apiBase),
      {
        method: "POST",
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body: toFormBody({
          grant_type: "refresh_token",
          client_id: credentials.clientId,
          client_secret: credentials.clientSecret,
          refresh_token: credentials.refreshToken,
        }),
      },
      timeoutMs,
    );
  } catch (error) {
    if (error instanceof ApiError) {
      throw new AuthError(`Webex token refresh rejected with status ${error.status}`, {
        status: error.status,
        body: error.body,
        cause: error,
      });
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new AuthError(`Webex token refresh failed: ${message}`, { cause: error });
  }

  const parsed = TokenResponseSchema.safeParse(body);
  if (!parsed.success) {
    // The body is left out: it may still carry a usable token.
    throw new ProtocolError("Webex token response is missing access_token or expires_in");
  }

  logger.info({ expiresIn: parsed.data.expires_in }, "Authenticated with Webex");

  return {
    value: parsed.data.access_token,
    expiresAt: now() + parsed.data.expires_in * 1000,
  };
}

/**
 * Returns an accessor that performs the exchange on first use and hands out
 * the same token for the rest of the run.
 */
export function createTokenProvider(
  credentials: Credentials,
  options: TokenProviderOptions,
): () => Promise<string> {
  let pending: Promise<AccessToken> | undefined;

  return async () => {
    if (!pending) {
      pending = getWebexAccessToken(credentials, options);
    }
    const token = await pending;
    return token.value;
  };
}
