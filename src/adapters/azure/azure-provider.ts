import fs from "fs-extra";
import os from "os";
import path from "path";
import { z } from "zod";
import { DEFAULT_RESOURCE_GROUP } from "../../core/config";
import { rolesFor } from "../../core/roles";
import { AzureRegistrationPayloadSchema } from "../../core/schemas";
import type { SelectionPolicy } from "../../core/selection";
import type {
  AzureProvisionedIdentity,
  AzureRegistrationPayload,
  CloudAccountCandidate,
  OnboardingRequest,
  ProvisionedIdentity,
} from "../../core/types";
import type { IOutputService } from "../../interfaces/output.interface";
import type { IShellService } from "../../interfaces/shell.interface";
import { CliRunner } from "../common/cli-runner";
import { OnboardingError, ProviderError, ProviderErrorType } from "../common/errors";
import type { OnboardingProvider, PrerequisiteCheck } from "../common/provider";
import { ResourceService } from "./resource-service";

// dist/adapters/azure and src/adapters/azure sit at the same depth
export const DEFAULT_TEMPLATE_FILE = path.resolve(__dirname, "../../../infra/azure-connector.json");

const AccountSchema = z.object({
  id: z.string().min(1),
  tenantId: z.string().min(1),
  name: z.string().optional(),
});

const OutputValue = z.object({ value: z.string().min(1) });

const DeploymentOutputsSchema = z.object({
  managedIdentityClientId: OutputValue,
  managedIdentityResourceId: OutputValue,
  tenantId: OutputValue,
  subscriptionId: OutputValue,
});

export interface AzureSubscription {
  subscriptionId: string;
  tenantId: string;
  name?: string;
}

export interface ManagedIdentityDeployment {
  clientId: string;
  resourceId: string;
  tenantId: string;
  subscriptionId: string;
}

export type ResourceServiceFactory = (subscriptionId: string) => ResourceService;

/**
 * Deployment names look like gpubudget-20250101-093000.
 */
export function deploymentName(now: Date = new Date()): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `gpubudget-${date}-${time}`;
}

/**
 * Azure onboarding: resource group + managed identity template deployment.
 *
 * The az session provides both the subscription context and, through
 * AzureCliCredential, the token used by the Resource Manager SDK.
 */
export class AzureOnboardingProvider implements OnboardingProvider {
  readonly kind = "azure" as const;
  readonly displayName = "Microsoft Azure";
  readonly selectionPolicy: SelectionPolicy = {
    multiple: false,
    noun: "resource group",
    defaultCandidate: DEFAULT_RESOURCE_GROUP,
  };
  readonly registrationPath = "/cloud-accounts/azure";
  readonly failureResponsePath = path.join(os.tmpdir(), "gpubudget-azure-onboard.log");

  private readonly az: CliRunner;
  private subscription: AzureSubscription | null = null;
  private resources: ResourceService | null = null;

  constructor(
    private readonly shell: IShellService,
    private readonly output: IOutputService,
    private readonly createResourceService: ResourceServiceFactory = (id) => new ResourceService(id)
  ) {
    this.az = new CliRunner(shell, "az", "azure");
  }

  async checkPrerequisites(): Promise<PrerequisiteCheck[]> {
    const installed = await this.shell.commandExists("az");
    return [
      installed
        ? { name: "Azure CLI", passed: true, message: "Installed" }
        : {
            name: "Azure CLI",
            passed: false,
            message: "Missing az; install it first.",
            fix: "Install the Azure CLI from https://learn.microsoft.com/cli/azure/install-azure-cli",
          },
    ];
  }

  /**
   * Resource groups of the current subscription. An empty list is fine: the
   * default group is created on demand.
   */
  async discover(): Promise<CloudAccountCandidate[]> {
    const subscription = await this.currentSubscription();
    const groups = await this.resourceService(subscription).listResourceGroups();

    return groups.map((id) => ({ id, hasGpu: false, subscriptionId: subscription.subscriptionId }));
  }

  /**
   * Subscription and tenant of the signed-in account. Starts `az login`
   * when nobody is signed in.
   */
  async currentSubscription(): Promise<AzureSubscription> {
    if (this.subscription) {
      return this.subscription;
    }

    this.output.step("Checking Azure login status...");
    const showArgs = ["account", "show", "--output", "json"];
    let result = await this.az.probe(showArgs);

    if (result.exitCode !== 0) {
      this.output.info("Please log in to Azure:");
      const code = await this.shell.runInteractive("az", ["login"]);
      if (code !== 0) {
        throw new ProviderError("Azure login failed", ProviderErrorType.AUTHENTICATION, "az login", undefined, [
          "Run 'az login' manually and try again",
        ]);
      }
      result = await this.az.probe(showArgs);
      if (result.exitCode !== 0) {
        throw new ProviderError(
          `az account show failed after login: ${result.stderr}`,
          ProviderErrorType.AUTHENTICATION,
          "az account show",
          result.stderr
        );
      }
    }

    const account = this.az.parse(showArgs, result.stdout, AccountSchema);
    this.subscription = { subscriptionId: account.id, tenantId: account.tenantId, name: account.name };

    this.output.info(`Using subscription: ${account.id}`);
    this.output.info(`Tenant ID: ${account.tenantId}`);
    return this.subscription;
  }

  async provision(resourceGroup: string, request: OnboardingRequest): Promise<AzureProvisionedIdentity> {
    const subscription = await this.currentSubscription();

    await this.ensureResourceGroup(subscription, resourceGroup, request.location);
    const deployment = await this.deployManagedIdentityTemplate(
      subscription,
      resourceGroup,
      request.allowControl,
      request.templateFile ?? DEFAULT_TEMPLATE_FILE
    );

    this.output.newline();
    this.output.info("Deployment outputs:");
    this.output.dim(`  Managed Identity Client ID: ${deployment.clientId}`);
    this.output.dim(`  Tenant ID: ${deployment.tenantId}`);
    this.output.dim(`  Subscription ID: ${deployment.subscriptionId}`);

    return {
      provider: "azure",
      resourceGroup,
      ...deployment,
      roles: rolesFor("azure", request.allowControl),
    };
  }

  async ensureResourceGroup(subscription: AzureSubscription, name: string, location: string): Promise<void> {
    const created = await this.resourceService(subscription).ensureResourceGroup(name, location);
    if (created) {
      this.output.info(`Created resource group '${name}' in location '${location}'`);
    } else {
      this.output.info(`Using existing resource group '${name}'`);
    }
  }

  /**
   * One deployment creating the managed identity and its role assignments.
   * Which roles are assigned is decided by the template from `allowControl`.
   */
  async deployManagedIdentityTemplate(
    subscription: AzureSubscription,
    resourceGroup: string,
    allowControl: boolean,
    templateFile: string
  ): Promise<ManagedIdentityDeployment> {
    if (!(await fs.pathExists(templateFile))) {
      throw new OnboardingError(`ARM template not found at ${templateFile}`, "PRECONDITION");
    }
    const template: Record<string, unknown> = await fs.readJson(templateFile);

    const name = deploymentName();
    this.output.startSpinner(
      allowControl
        ? "Deploying connector (Managed Identity + Reader + VM control)..."
        : "Deploying connector (Managed Identity + Reader role)..."
    );

    let outputs: unknown;
    try {
      outputs = await this.resourceService(subscription).deployTemplate(resourceGroup, name, template, {
        allowControl,
      });
    } catch (error) {
      this.output.failSpinner(`Deployment ${name} failed`);
      throw error;
    }
    this.output.succeedSpinner("Deployment completed successfully!");

    const parsed = DeploymentOutputsSchema.safeParse(outputs);
    if (!parsed.success) {
      throw new ProviderError(
        `Deployment ${name} returned unexpected outputs`,
        ProviderErrorType.INVALID_RESPONSE,
        `deployment ${name}`
      );
    }

    return {
      clientId: parsed.data.managedIdentityClientId.value,
      resourceId: parsed.data.managedIdentityResourceId.value,
      tenantId: parsed.data.tenantId.value,
      subscriptionId: parsed.data.subscriptionId.value,
    };
  }

  buildPayload(identity: ProvisionedIdentity, allowControl: boolean): AzureRegistrationPayload {
    if (identity.provider !== "azure") {
      throw new ProviderError(
        `Expected an Azure identity, got ${identity.provider}`,
        ProviderErrorType.INVALID_RESPONSE
      );
    }
    return AzureRegistrationPayloadSchema.parse({
      tenant_id: identity.tenantId,
      subscription_id: identity.subscriptionId,
      client_id: identity.clientId,
      allow_control: allowControl,
    });
  }

  private resourceService(subscription: AzureSubscription): ResourceService {
    if (!this.resources) {
      this.resources = this.createResourceService(subscription.subscriptionId);
    }
    return this.resources;
  }
}
