import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import fs from "fs-extra";
import os from "os";
import path from "path";
import type { Deployment, DeploymentExtended, ResourceGroup } from "@azure/arm-resources";
import { AzureOnboardingProvider, DEFAULT_TEMPLATE_FILE, deploymentName } from "./azure-provider";
import { ResourceService } from "./resource-service";
import type { AzureResourceClient } from "./resource-service";
import { OnboardingError } from "../common/errors";
import type { OnboardingRequest } from "../../core/types";
import { FakeShell, RecordingOutput } from "../../__tests__/utils";

const ACCOUNT = JSON.stringify({ id: "sub-1", tenantId: "tenant-1", name: "Research" });

const OUTPUTS = {
  managedIdentityClientId: { type: "String", value: "client-1" },
  managedIdentityResourceId: {
    type: "String",
    value: "/subscriptions/sub-1/resourceGroups/rg-ml/providers/Microsoft.ManagedIdentity/userAssignedIdentities/gpubudget-connector",
  },
  tenantId: { type: "String", value: "tenant-1" },
  subscriptionId: { type: "String", value: "sub-1" },
};

function createMockClient(groups: string[], outputs: Record<string, unknown> = OUTPUTS) {
  const existing = new Set(groups);
  return {
    resourceGroups: {
      get: vi.fn(async (name: string): Promise<ResourceGroup> => {
        if (!existing.has(name)) throw Object.assign(new Error("not found"), { statusCode: 404 });
        return { name, location: "eastus" };
      }),
      createOrUpdate: vi.fn(async (name: string, params: ResourceGroup): Promise<ResourceGroup> => {
        existing.add(name);
        return { ...params, name };
      }),
      list: () =>
        (async function* (): AsyncGenerator<ResourceGroup> {
          for (const name of existing) {
            yield { name, location: "eastus" };
          }
        })(),
    },
    deployments: {
      beginCreateOrUpdateAndWait: vi.fn(
        async (_rg: string, _name: string, _params: Deployment): Promise<DeploymentExtended> => ({
          properties: { outputs },
        })
      ),
    },
  } satisfies AzureResourceClient;
}

const request = (overrides: Partial<OnboardingRequest> = {}): OnboardingRequest => ({
  provider: "azure",
  backendUrl: "https://backend.test",
  allowControl: false,
  autoRun: true,
  explicitSelection: [],
  identityName: "gpubudget-connector",
  location: "westeurope",
  ...overrides,
});

function setup(groups: string[] = ["rg-ml"], outputs?: Record<string, unknown>) {
  const shell = new FakeShell().on("az account show", { stdout: ACCOUNT });
  const output = new RecordingOutput();
  const client = createMockClient(groups, outputs);
  const factory = vi.fn((subscriptionId: string) => new ResourceService(subscriptionId, client));
  const provider = new AzureOnboardingProvider(shell, output, factory);
  return { shell, output, client, factory, provider };
}

describe("AzureOnboardingProvider", () => {
  describe("discover", () => {
    it("lists resource groups of the current subscription", async () => {
      const { provider, factory } = setup(["rg-ml", "rg-web"]);

      await expect(provider.discover()).resolves.toEqual([
        { id: "rg-ml", hasGpu: false, subscriptionId: "sub-1" },
        { id: "rg-web", hasGpu: false, subscriptionId: "sub-1" },
      ]);
      expect(factory).toHaveBeenCalledWith("sub-1");
    });

    it("allows a subscription without resource groups", async () => {
      const { provider } = setup([]);

      await expect(provider.discover()).resolves.toEqual([]);
    });
  });

  describe("currentSubscription", () => {
    it("starts az login when no session is active", async () => {
      let signedIn = false;
      const shell = new FakeShell().on("az account show", () =>
        signedIn
          ? { stdout: ACCOUNT, stderr: "", exitCode: 0 }
          : { stdout: "", stderr: "Please run 'az login' to setup account.", exitCode: 1 }
      );
      shell.runInteractive = vi.fn(async (command: string, args: string[]) => {
        shell.interactiveCalls.push([command, ...args]);
        signedIn = true;
        return 0;
      });
      const provider = new AzureOnboardingProvider(shell, new RecordingOutput(), () =>
        new ResourceService("sub-1", createMockClient([]))
      );

      await expect(provider.currentSubscription()).resolves.toEqual({
        subscriptionId: "sub-1",
        tenantId: "tenant-1",
        name: "Research",
      });
      expect(shell.interactiveCalls).toEqual([["az", "login"]]);
    });

    it("fails when az login fails", async () => {
      const shell = new FakeShell().on("az account show", { exitCode: 1, stderr: "Please run 'az login'" });
      shell.interactiveExitCode = 1;
      const provider = new AzureOnboardingProvider(shell, new RecordingOutput(), () =>
        new ResourceService("sub-1", createMockClient([]))
      );

      await expect(provider.currentSubscription()).rejects.toMatchObject({
        message: "Azure login failed",
        type: "AUTHENTICATION",
      });
    });

    it("asks az only once per run", async () => {
      const { provider, shell } = setup();

      await provider.currentSubscription();
      await provider.currentSubscription();

      expect(shell.commandLines()).toEqual(["az account show --output json"]);
    });
  });

  describe("provision", () => {
    it("creates the resource group and deploys the bundled template", async () => {
      const { provider, client, output } = setup([]);

      const identity = await provider.provision("gpubudget-connector-rg", request());

      expect(identity).toEqual({
        provider: "azure",
        resourceGroup: "gpubudget-connector-rg",
        clientId: "client-1",
        resourceId: OUTPUTS.managedIdentityResourceId.value,
        tenantId: "tenant-1",
        subscriptionId: "sub-1",
        roles: ["Reader"],
      });
      expect(client.resourceGroups.createOrUpdate).toHaveBeenCalledWith("gpubudget-connector-rg", {
        location: "westeurope",
        tags: { managedBy: "gpu-connect" },
      });
      expect(output.textAt("info")).toContain(
        "Created resource group 'gpubudget-connector-rg' in location 'westeurope'"
      );

      const [rg, name, params] = client.deployments.beginCreateOrUpdateAndWait.mock.calls[0];
      expect(rg).toBe("gpubudget-connector-rg");
      expect(name).toMatch(/^gpubudget-\d{8}-\d{6}$/);
      expect(params.properties.parameters).toEqual({ allowControl: { value: false } });
      expect(params.properties.template).toEqual(await fs.readJson(DEFAULT_TEMPLATE_FILE));
    });

    it("passes allowControl to the template and reports the control role", async () => {
      const { provider, client } = setup(["rg-ml"]);

      const identity = await provider.provision("rg-ml", request({ allowControl: true }));

      expect(identity.roles).toEqual(["Reader", "Virtual Machine Contributor"]);
      expect(client.resourceGroups.createOrUpdate).not.toHaveBeenCalled();
      expect(client.deployments.beginCreateOrUpdateAndWait.mock.calls[0][2].properties.parameters).toEqual({
        allowControl: { value: true },
      });
    });

    it("rejects deployment outputs without a client id", async () => {
      const { provider } = setup(["rg-ml"], { tenantId: { value: "tenant-1" } });

      await expect(provider.provision("rg-ml", request())).rejects.toMatchObject({
        name: "ProviderError",
        type: "INVALID_RESPONSE",
      });
    });

    describe("with a custom template", () => {
      let dir: string;

      beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), "azure-template-"));
      });

      afterEach(async () => {
        await fs.remove(dir);
      });

      it("reads the template from templateFile", async () => {
        const templateFile = path.join(dir, "template.json");
        await fs.writeJson(templateFile, { resources: [], outputs: {} });
        const { provider, client } = setup(["rg-ml"]);

        await provider.provision("rg-ml", request({ templateFile }));

        expect(client.deployments.beginCreateOrUpdateAndWait.mock.calls[0][2].properties.template).toEqual({
          resources: [],
          outputs: {},
        });
      });

      it("fails before deploying when the template is missing", async () => {
        const templateFile = path.join(dir, "missing.json");
        const { provider, client } = setup(["rg-ml"]);

        const run = provider.provision("rg-ml", request({ templateFile }));
        await expect(run).rejects.toBeInstanceOf(OnboardingError);
        await expect(run).rejects.toThrow(`ARM template not found at ${templateFile}`);
        expect(client.deployments.beginCreateOrUpdateAndWait).not.toHaveBeenCalled();
      });
    });
  });

  describe("buildPayload", () => {
    it("maps the identity to the registration fields", () => {
      const { provider } = setup();

      expect(
        provider.buildPayload(
          {
            provider: "azure",
            resourceGroup: "rg-ml",
            clientId: "client-1",
            resourceId: "id-1",
            tenantId: "tenant-1",
            subscriptionId: "sub-1",
            roles: ["Reader"],
          },
          false
        )
      ).toEqual({ tenant_id: "tenant-1", subscription_id: "sub-1", client_id: "client-1", allow_control: false });
    });
  });
});

describe("deploymentName", () => {
  it("stamps local date and time", () => {
    expect(deploymentName(new Date(2025, 0, 2, 9, 5, 7))).toBe("gpubudget-20250102-090507");
  });
});
