import type { CloudProviderKind } from "./types";

export const GCP_READ_ONLY_ROLES = [
  "roles/compute.viewer",
  "roles/billing.viewer",
] as const;

export const GCP_CONTROL_ROLES = [
  "roles/compute.instanceAdmin.v1",
  "roles/storage.admin",
] as const;

// Assigned by infra/azure-connector.json; listed here for reporting only.
export const AZURE_READ_ONLY_ROLES = ["Reader"] as const;
export const AZURE_CONTROL_ROLES = ["Virtual Machine Contributor"] as const;

/**
 * Role set granted to the onboarding identity.
 *
 * Control roles are included only when `allowControl` is exactly `true`.
 */
export function rolesFor(provider: CloudProviderKind, allowControl: boolean): string[] {
  const readOnly: readonly string[] = provider === "gcp" ? GCP_READ_ONLY_ROLES : AZURE_READ_ONLY_ROLES;
  const control: readonly string[] = provider === "gcp" ? GCP_CONTROL_ROLES : AZURE_CONTROL_ROLES;

  return allowControl === true ? [...readOnly, ...control] : [...readOnly];
}
