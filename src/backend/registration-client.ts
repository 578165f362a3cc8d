import fs from "fs-extra";
import { errorMessage } from "../adapters/common/errors";
import type { RegistrationOutcome, RegistrationPayload } from "../core/types";

export type FetchFn = typeof fetch;

export interface RegistrationTarget {
  backendUrl: string;
  /** e.g. /cloud-accounts/gcp */
  path: string;
  /** Where a non-2xx response body is written */
  failureResponsePath: string;
}

/**
 * Posts onboarding results to the backend.
 */
export class RegistrationClient {
  constructor(private readonly fetchFn: FetchFn = fetch) {}

  /**
   * POST the payload once. Any 2xx is success; any other status keeps the
   * raw response body at `failureResponsePath` for the operator. Never
   * throws: transport and log-file failures come back as outcomes.
   */
  async register(
    target: RegistrationTarget,
    payload: RegistrationPayload,
    authToken?: string
  ): Promise<RegistrationOutcome> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (authToken) {
      headers.Authorization = `Bearer ${authToken}`;
    }

    let response: Response;
    try {
      response = await this.fetchFn(`${target.backendUrl}${target.path}`, {
        method: "POST",
        headers,
        body: JSON.stringify(payload),
      });
    } catch (error) {
      return { kind: "network-error", message: errorMessage(error) };
    }

    if (response.status >= 200 && response.status < 300) {
      return { kind: "success", status: response.status };
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      return {
        kind: "network-error",
        message: `HTTP ${response.status}, body unreadable: ${errorMessage(error)}`,
      };
    }

    try {
      await fs.writeFile(target.failureResponsePath, body, "utf-8");
    } catch (error) {
      return { kind: "http-error", status: response.status, bodyPath: null, body, logError: errorMessage(error) };
    }
    return {
      kind: "http-error",
      status: response.status,
      bodyPath: target.failureResponsePath,
      body,
    };
  }
}
