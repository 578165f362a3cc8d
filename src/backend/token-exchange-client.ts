import { OnboardingError, errorMessage } from "../adapters/common/errors";
import { stripTrailingSlash } from "../core/config";
import { TokenExchangeResponseSchema } from "../core/schemas";
import type { TokenExchangeResult } from "../core/types";
import type { FetchFn } from "./registration-client";

/**
 * Pull the token id out of what the operator pasted: either the bare id or
 * a Cloud Shell URL carrying `TOKEN_ID=` in its query or fragment.
 */
export function extractTokenId(input: string): string {
  const trimmed = input.trim();
  const match = /TOKEN_ID=([^&#\s]+)/.exec(trimmed);
  if (match) {
    return decodeURIComponent(match[1]);
  }
  return /^[A-Za-z0-9._~-]+$/.test(trimmed) ? trimmed : "";
}

/**
 * Resolves a one-time token id (valid for one hour, enforced by the backend)
 * into the bearer token used for registration.
 */
export class TokenExchangeClient {
  private readonly defaultBackendUrl: string;

  constructor(defaultBackendUrl: string, private readonly fetchFn: FetchFn = fetch) {
    this.defaultBackendUrl = stripTrailingSlash(defaultBackendUrl);
  }

  async exchange(tokenId: string): Promise<TokenExchangeResult> {
    const url = `${this.defaultBackendUrl}/cloud-accounts/token/${encodeURIComponent(tokenId)}`;

    let body: string;
    try {
      const response = await this.fetchFn(url);
      body = await response.text();
    } catch (error) {
      throw new OnboardingError(`Failed to retrieve token: ${errorMessage(error)}`, "TOKEN_EXCHANGE", [
        "Check that you're connected to the internet",
      ]);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch {
      raw = undefined;
    }

    const parsed = TokenExchangeResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new OnboardingError(`Failed to retrieve token. Response: ${body}`, "TOKEN_EXCHANGE", [
        "Check that the TOKEN_ID is correct",
        "Tokens expire one hour after they are issued",
      ]);
    }

    return {
      authToken: parsed.data.token,
      backendUrl: stripTrailingSlash(parsed.data.backend_url ?? this.defaultBackendUrl),
    };
  }
}
