import fs from "fs-extra";
import os from "os";
import path from "path";
import { z } from "zod";
import { rolesFor } from "../../core/roles";
import { GcpRegistrationPayloadSchema } from "../../core/schemas";
import type { SelectionPolicy } from "../../core/selection";
import type {
  CloudAccountCandidate,
  CredentialMaterial,
  GcpProvisionedIdentity,
  GcpRegistrationPayload,
  OnboardingRequest,
  ProvisionedIdentity,
} from "../../core/types";
import type { IOutputService } from "../../interfaces/output.interface";
import type { IShellService } from "../../interfaces/shell.interface";
import { withTempFile } from "../../services/temp-file";
import { CliRunner } from "../common/cli-runner";
import { OnboardingError, ProviderError, ProviderErrorType, errorMessage } from "../common/errors";
import type { OnboardingProvider, PrerequisiteCheck } from "../common/provider";
import { ComputeService, isCredentialError } from "./compute-service";

export const REQUIRED_APIS = ["compute.googleapis.com", "cloudbilling.googleapis.com"] as const;
export const SERVICE_ACCOUNT_DISPLAY_NAME = "GpuBudget Connector";

const ProjectListSchema = z.array(
  z.object({ projectId: z.string().min(1) }).passthrough()
);

const ServiceAccountKeySchema = z
  .object({
    type: z.literal("service_account"),
    client_email: z.string(),
    private_key: z.string(),
  })
  .passthrough();

export function serviceAccountEmail(name: string, projectId: string): string {
  return `${name}@${projectId}.iam.gserviceaccount.com`;
}

/**
 * Google Cloud onboarding: service account + IAM bindings + key.
 *
 * Discovery and provisioning go through gcloud (the session is already
 * authenticated in Cloud Shell); GPU detection uses the Compute SDK.
 */
export class GcpOnboardingProvider implements OnboardingProvider {
  readonly kind = "gcp" as const;
  readonly displayName = "Google Cloud";
  readonly selectionPolicy: SelectionPolicy = { multiple: true, noun: "project" };
  readonly registrationPath = "/cloud-accounts/gcp";
  readonly failureResponsePath = path.join(os.tmpdir(), "gpubudget-onboard.log");

  private readonly gcloud: CliRunner;

  constructor(
    private readonly shell: IShellService,
    private readonly output: IOutputService,
    private readonly compute: ComputeService = new ComputeService()
  ) {
    this.gcloud = new CliRunner(shell, "gcloud", "gcp");
  }

  async checkPrerequisites(): Promise<PrerequisiteCheck[]> {
    const installed = await this.shell.commandExists("gcloud");
    if (!installed) {
      return [
        {
          name: "gcloud CLI",
          passed: false,
          message: "Missing gcloud; install it first.",
          fix: "Install the Google Cloud CLI from https://cloud.google.com/sdk/docs/install",
        },
      ];
    }
    return [
      { name: "gcloud CLI", passed: true, message: "Installed" },
      await this.checkApplicationDefaultCredentials(),
    ];
  }

  /**
   * GPU detection goes through the Compute SDK, which signs in with
   * Application Default Credentials rather than the gcloud session.
   */
  async checkApplicationDefaultCredentials(): Promise<PrerequisiteCheck> {
    const result = await this.gcloud.probe(["auth", "application-default", "print-access-token"]);
    if (result.exitCode === 0) {
      return { name: "Application Default Credentials", passed: true, message: "Available" };
    }
    return {
      name: "Application Default Credentials",
      passed: false,
      message: "No Application Default Credentials; GPU detection needs them.",
      fix: "Run 'gcloud auth application-default login'",
    };
  }

  async discover(): Promise<CloudAccountCandidate[]> {
    this.output.step("Fetching projects...");
    const projects = await this.listAccessibleProjects();
    const gpuProjects = new Set(await this.detectGpuProjects(projects));

    this.output.info("Projects with GPUs detected:");
    if (gpuProjects.size === 0) {
      this.output.dim("  (none detected; you can still proceed)");
    } else {
      for (const projectId of gpuProjects) {
        this.output.info(`  - ${projectId}`);
      }
    }

    return projects.map((id) => ({ id, hasGpu: gpuProjects.has(id) }));
  }

  async listAccessibleProjects(): Promise<string[]> {
    const projects = await this.gcloud.json(
      ["projects", "list", "--format=json"],
      ProjectListSchema
    );

    if (projects.length === 0) {
      throw new OnboardingError("No projects accessible with your account.", "PRECONDITION", [
        "Check the active account with 'gcloud auth list'",
      ]);
    }
    return projects.map((project) => project.projectId);
  }

  /**
   * Projects with at least one GPU instance. A probe that fails for a
   * project (API disabled, no permission) counts as "no GPU".
   */
  async detectGpuProjects(projectIds: readonly string[]): Promise<string[]> {
    const detected: string[] = [];
    const failures: unknown[] = [];

    for (const projectId of projectIds) {
      this.output.startSpinner(`Checking ${projectId} for GPU instances...`);
      try {
        if (await this.compute.hasGpuInstances(projectId)) {
          detected.push(projectId);
        }
      } catch (error) {
        failures.push(error);
        this.output.dim(`  ${projectId}: GPU check skipped (${errorMessage(error)})`);
      }
    }
    this.output.stopSpinner();

    if (failures.length > 0 && failures.length === projectIds.length) {
      this.output.warn("GPU detection failed for every project; GPU projects cannot be told apart.");
      if (failures.some(isCredentialError)) {
        this.output.warn(
          "The Compute API rejected the credentials. Run 'gcloud auth application-default login' and try again."
        );
      }
    }

    return detected;
  }

  async provision(projectId: string, request: OnboardingRequest): Promise<GcpProvisionedIdentity> {
    await this.ensureApisEnabled(projectId);
    const email = await this.ensureServiceAccount(projectId, request.identityName);

    const roles = rolesFor("gcp", request.allowControl);
    await this.grantRoles(projectId, email, roles);

    const credentialMaterial = await withTempFile("gpu-connect-key", "key.json", (keyPath) =>
      this.createKey(projectId, email, keyPath)
    );

    return { provider: "gcp", projectId, email, roles, credentialMaterial };
  }

  async ensureApisEnabled(projectId: string): Promise<void> {
    this.output.step(`Enabling required APIs in ${projectId}...`);
    await this.gcloud.exec(["services", "enable", ...REQUIRED_APIS, "--project", projectId, "--quiet"]);
  }

  /**
   * Reuse the service account when it already exists, otherwise create it.
   */
  async ensureServiceAccount(projectId: string, name: string): Promise<string> {
    const email = serviceAccountEmail(name, projectId);

    const existing = await this.gcloud.probe([
      "iam", "service-accounts", "describe", email,
      "--project", projectId,
      "--format=json",
    ]);
    if (existing.exitCode === 0) {
      this.output.info(`Service account ${email} exists; reusing.`);
      return email;
    }

    this.output.info(`Creating service account ${email}...`);
    await this.gcloud.exec([
      "iam", "service-accounts", "create", name,
      "--project", projectId,
      "--display-name", SERVICE_ACCOUNT_DISPLAY_NAME,
      "--quiet",
    ]);
    return email;
  }

  /**
   * Add one binding per role. Existing bindings are left untouched.
   */
  async grantRoles(projectId: string, email: string, roles: readonly string[]): Promise<void> {
    this.output.step(`Granting roles: ${roles.join(", ")}`);
    for (const role of roles) {
      await this.gcloud.exec([
        "projects", "add-iam-policy-binding", projectId,
        `--member=serviceAccount:${email}`,
        `--role=${role}`,
        "--condition=None",
        "--format=none",
        "--quiet",
      ]);
    }
  }

  /**
   * Mint a new key into `keyPath` and read it back. Every call creates a new
   * key; earlier keys are never revoked.
   */
  async createKey(projectId: string, email: string, keyPath: string): Promise<CredentialMaterial> {
    this.output.step("Creating service account key...");
    await this.gcloud.exec([
      "iam", "service-accounts", "keys", "create", keyPath,
      "--iam-account", email,
      "--project", projectId,
      "--quiet",
    ]);

    const raw = await fs.readFile(keyPath, "utf-8");
    const key = this.gcloud.parse(["iam", "service-accounts", "keys", "create"], raw, ServiceAccountKeySchema);
    this.output.dim("A new key is created on every run; earlier keys for this account are not revoked.");
    return key;
  }

  buildPayload(identity: ProvisionedIdentity, allowControl: boolean): GcpRegistrationPayload {
    if (identity.provider !== "gcp") {
      throw new ProviderError(
        `Expected a GCP identity, got ${identity.provider}`,
        ProviderErrorType.INVALID_RESPONSE
      );
    }
    return GcpRegistrationPayloadSchema.parse({
      project_id: identity.projectId,
      allow_control: allowControl,
      service_account_info: identity.credentialMaterial,
    });
  }
}
