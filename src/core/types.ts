/**
 * Cloud providers that can be onboarded.
 */
export type CloudProviderKind = "gcp" | "azure";

/**
 * A discovered project (GCP) or resource group (Azure) eligible for onboarding.
 */
export interface CloudAccountCandidate {
  /** GCP project ID or Azure resource group name */
  readonly id: string;
  /** True when at least one GPU-backed instance was found */
  readonly hasGpu: boolean;
  /** Azure subscription the resource group belongs to */
  readonly subscriptionId?: string;
}

/**
 * Configuration captured once per run.
 */
export interface OnboardingRequest {
  provider: CloudProviderKind;
  backendUrl: string;
  allowControl: boolean;
  autoRun: boolean;
  /** Candidate IDs supplied by the caller; empty when none were given */
  explicitSelection: string[];
  /** Bearer token for backend registration; absent means registration is skipped */
  authToken?: string;
  /** Service account name (GCP) */
  identityName: string;
  /** Resource group location (Azure) */
  location: string;
  /** ARM template used for the managed identity deployment (Azure) */
  templateFile?: string;
}

/**
 * GCP service account key JSON as returned by `keys create`.
 * Opaque to this tool apart from the fields used for display.
 */
export type CredentialMaterial = Record<string, unknown>;

export interface GcpProvisionedIdentity {
  provider: "gcp";
  projectId: string;
  email: string;
  roles: readonly string[];
  credentialMaterial: CredentialMaterial;
}

export interface AzureProvisionedIdentity {
  provider: "azure";
  resourceGroup: string;
  clientId: string;
  resourceId: string;
  tenantId: string;
  subscriptionId: string;
  roles: readonly string[];
}

export type ProvisionedIdentity = GcpProvisionedIdentity | AzureProvisionedIdentity;

export interface GcpRegistrationPayload {
  project_id: string;
  allow_control: boolean;
  service_account_info: CredentialMaterial;
}

export interface AzureRegistrationPayload {
  tenant_id: string;
  subscription_id: string;
  client_id: string;
  allow_control: boolean;
}

export type RegistrationPayload = GcpRegistrationPayload | AzureRegistrationPayload;

export interface TokenExchangeResult {
  authToken: string;
  backendUrl: string;
}

export type RegistrationOutcome =
  | { kind: "success"; status: number }
  | {
      kind: "http-error";
      status: number;
      /** Where the body was kept, or null when the file could not be written */
      bodyPath: string | null;
      body: string;
      logError?: string;
    }
  | { kind: "network-error"; message: string };

/**
 * Phases of a run, entered strictly in this order.
 */
export type OnboardingPhase =
  | "Discovering"
  | "Selecting"
  | "Provisioning"
  | "Registering"
  | "Done";

export type CandidateResult =
  | { candidateId: string; status: "registered"; payload: RegistrationPayload }
  | { candidateId: string; status: "skipped"; payload: RegistrationPayload }
  | { candidateId: string; status: "registration-failed"; payload: RegistrationPayload; outcome: RegistrationOutcome }
  | { candidateId: string; status: "provisioning-failed"; error: Error };

export interface OnboardingRunResult {
  selection: string[];
  results: CandidateResult[];
}
