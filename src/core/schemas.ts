import { z } from "zod";

// Backend responses and payloads

export const TokenExchangeResponseSchema = z.object({
  token: z.string().min(1),
  backend_url: z.string().url().nullish(),
});

export const GcpRegistrationPayloadSchema = z.object({
  project_id: z.string().min(1),
  allow_control: z.boolean(),
  service_account_info: z.record(z.unknown()),
});

export const AzureRegistrationPayloadSchema = z.object({
  tenant_id: z.string().min(1),
  subscription_id: z.string().min(1),
  client_id: z.string().min(1),
  allow_control: z.boolean(),
});

// Run configuration

/**
 * "true"/"false" in any case. Other strings are a validation issue, never false.
 */
export const BooleanFlagSchema = z
  .union([z.boolean(), z.string()])
  .transform((value, ctx) => {
    if (typeof value === "boolean") return value;
    const normalized = value.trim().toLowerCase();
    if (normalized === "true") return true;
    if (normalized === "false") return false;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Expected "true" or "false", got "${value}"`,
    });
    return z.NEVER;
  });

export const OnboardingRequestSchema = z.object({
  provider: z.enum(["gcp", "azure"]),
  backendUrl: z.string().url(),
  allowControl: BooleanFlagSchema,
  autoRun: BooleanFlagSchema,
  explicitSelection: z.array(z.string().min(1)),
  authToken: z.string().min(1).optional(),
  identityName: z.string().regex(/^[a-z][a-z0-9-]{4,28}[a-z0-9]$/, {
    message: "Service account name must be 6-30 lowercase letters, digits or hyphens",
  }),
  location: z.string().min(1),
  templateFile: z.string().min(1).optional(),
});

/**
 * Split a comma-separated list, trimming entries and dropping empty ones.
 */
export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}
