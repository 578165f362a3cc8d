import { ZodError } from "zod";
import { OnboardingError } from "../adapters/common/errors";
import { OnboardingRequestSchema, splitList } from "./schemas";
import type { CloudProviderKind, OnboardingRequest } from "./types";

export const DEFAULT_BACKEND_URL = "https://api.gpubudget.com";
export const DEFAULT_SERVICE_ACCOUNT_NAME = "gpubudget-connector";
export const DEFAULT_LOCATION = "eastus";
export const DEFAULT_RESOURCE_GROUP = "gpubudget-connector-rg";

/**
 * Options as commander hands them over. Every value is optional; a missing
 * flag falls back to the environment, then to the default.
 */
export interface OnboardingFlags {
  projects?: string;
  projectIds?: string;
  resourceGroup?: string;
  location?: string;
  allowControl?: string | boolean;
  autoRun?: string | boolean;
  authToken?: string;
  backendUrl?: string;
  saName?: string;
  templateFile?: string;
}

type Env = Record<string, string | undefined>;

function firstDefined<T>(...values: (T | undefined)[]): T | undefined {
  return values.find((value) => value !== undefined && value !== "");
}

/**
 * Build the run configuration once: defaults < environment < flags.
 */
export function loadOnboardingConfig(
  provider: CloudProviderKind,
  flags: OnboardingFlags,
  env: Env = process.env
): OnboardingRequest {
  const selectionSource =
    provider === "gcp"
      ? firstDefined(flags.projects, flags.projectIds, env.PROJECT_IDS)
      : firstDefined(flags.resourceGroup, env.RESOURCE_GROUP);

  try {
    return OnboardingRequestSchema.parse({
      provider,
      backendUrl: stripTrailingSlash(
        firstDefined(flags.backendUrl, env.BACKEND_URL) ?? DEFAULT_BACKEND_URL
      ),
      allowControl: firstDefined<string | boolean>(flags.allowControl, env.ALLOW_CONTROL) ?? false,
      autoRun: firstDefined<string | boolean>(flags.autoRun, env.AUTO_RUN) ?? false,
      explicitSelection: splitList(selectionSource),
      authToken: firstDefined(flags.authToken, env.AUTH_TOKEN),
      identityName: firstDefined(flags.saName, env.SA_NAME) ?? DEFAULT_SERVICE_ACCOUNT_NAME,
      location: firstDefined(flags.location, env.LOCATION) ?? DEFAULT_LOCATION,
      templateFile: firstDefined(flags.templateFile, env.AZURE_TEMPLATE_FILE),
    });
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      );
      throw new OnboardingError(`Invalid configuration: ${details.join("; ")}`, "CONFIG");
    }
    throw error;
  }
}

export function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Web app login page matching an API backend URL
 * (https://api.example.com -> https://app.example.com/login).
 */
export function loginUrlFor(backendUrl: string): string {
  try {
    const url = new URL(backendUrl);
    if (url.hostname.startsWith("api.")) {
      url.hostname = `app.${url.hostname.slice("api.".length)}`;
    }
    return `${url.origin}/login`;
  } catch {
    return `${backendUrl}/login`;
  }
}
