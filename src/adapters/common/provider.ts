import type { SelectionPolicy } from "../../core/selection";
import type {
  CloudAccountCandidate,
  CloudProviderKind,
  OnboardingRequest,
  ProvisionedIdentity,
  RegistrationPayload,
} from "../../core/types";

export interface PrerequisiteCheck {
  name: string;
  passed: boolean;
  message: string;
  fix?: string;
}

/**
 * Provider capability adapter: everything the onboarding flow needs from a
 * cloud, behind one interface. Implementations hold all provider-specific
 * parsing.
 */
export interface OnboardingProvider {
  readonly kind: CloudProviderKind;
  readonly displayName: string;
  readonly selectionPolicy: SelectionPolicy;
  /** Backend path the payload is POSTed to */
  readonly registrationPath: string;
  /** Fixed location for the body of a failed registration response */
  readonly failureResponsePath: string;

  checkPrerequisites(): Promise<PrerequisiteCheck[]>;

  /** List candidates. Throws when none are accessible. */
  discover(): Promise<CloudAccountCandidate[]>;

  /** Grant access for one candidate and collect its credential material. */
  provision(candidateId: string, request: OnboardingRequest): Promise<ProvisionedIdentity>;

  buildPayload(identity: ProvisionedIdentity, allowControl: boolean): RegistrationPayload;
}
