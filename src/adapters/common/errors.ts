/**
 * Error types shared by the provider adapters and the onboarding flow.
 *
 * Everything that reaches the CLI boundary is printed as operator output and
 * turned into exit code 1; nothing here is meant to be caught and recovered
 * from, except where a step explicitly tolerates failure (GPU probing).
 */

/**
 * Standard error types for provider calls
 */
export enum ProviderErrorType {
  AUTHENTICATION = "AUTHENTICATION",
  AUTHORIZATION = "AUTHORIZATION",
  NOT_FOUND = "NOT_FOUND",
  COMMAND_FAILED = "COMMAND_FAILED",
  INVALID_RESPONSE = "INVALID_RESPONSE",
  UNKNOWN = "UNKNOWN",
}

/**
 * Structured error for provider operations
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly type: ProviderErrorType,
    public readonly command?: string,
    public readonly stderr?: string,
    public readonly suggestions?: string[]
  ) {
    super(message);
    this.name = "ProviderError";
  }
}

export type OnboardingErrorType =
  | "PRECONDITION"
  | "SELECTION"
  | "TOKEN_EXCHANGE"
  | "REGISTRATION"
  | "CONFIG";

/**
 * Fatal condition raised by the onboarding flow itself.
 */
export class OnboardingError extends Error {
  constructor(
    message: string,
    public readonly type: OnboardingErrorType,
    public readonly suggestions?: string[]
  ) {
    super(message);
    this.name = "OnboardingError";
  }
}

/**
 * Classify a provider CLI failure from its stderr.
 */
export function classifyStderr(stderr: string): ProviderErrorType {
  const text = stderr.toLowerCase();
  if (text.includes("az login") || text.includes("gcloud auth login") || text.includes("unauthenticated")) {
    return ProviderErrorType.AUTHENTICATION;
  }
  if (text.includes("permission") || text.includes("forbidden") || text.includes("authorizationfailed")) {
    return ProviderErrorType.AUTHORIZATION;
  }
  if (text.includes("not_found") || text.includes("not found") || text.includes("notfound")) {
    return ProviderErrorType.NOT_FOUND;
  }
  return ProviderErrorType.COMMAND_FAILED;
}

/**
 * Suggestions to show for a given error type.
 */
export function getErrorSuggestions(type: ProviderErrorType, provider: "gcp" | "azure"): string[] {
  const cli = provider === "gcp" ? "gcloud" : "az";
  switch (type) {
    case ProviderErrorType.AUTHENTICATION:
      return provider === "gcp"
        ? ["Run 'gcloud auth login' and try again"]
        : ["Run 'az login' and try again"];
    case ProviderErrorType.AUTHORIZATION:
      return [
        "Check that your account is Owner or Security Admin on the target",
        `Run '${cli}' with the same account to confirm access`,
      ];
    case ProviderErrorType.NOT_FOUND:
      return ["Check that the project, subscription or resource group exists"];
    default:
      return [];
  }
}

export function isNotFoundError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "statusCode" in error &&
    error.statusCode === 404
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
