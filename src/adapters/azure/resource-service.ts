/**
 * Azure Resource Service
 *
 * Resource group and template deployment operations on the Azure Resource
 * Manager SDK.
 */

import {
  ResourceManagementClient,
  ResourceGroup,
  Deployment,
  DeploymentExtended,
} from "@azure/arm-resources";
import { AzureCliCredential, TokenCredential } from "@azure/identity";
import { isNotFoundError } from "../common/errors";

/**
 * The subset of ResourceManagementClient this tool calls.
 */
export interface AzureResourceClient {
  resourceGroups: {
    get(resourceGroupName: string): Promise<ResourceGroup>;
    createOrUpdate(resourceGroupName: string, parameters: ResourceGroup): Promise<ResourceGroup>;
    list(): AsyncIterable<ResourceGroup>;
  };
  deployments: {
    beginCreateOrUpdateAndWait(
      resourceGroupName: string,
      deploymentName: string,
      parameters: Deployment
    ): Promise<DeploymentExtended>;
  };
}

export class ResourceService {
  private readonly resourceClient: AzureResourceClient;

  /**
   * @param subscriptionId - Azure subscription ID
   * @param client - Optional client (defaults to one authenticated through the az CLI session)
   */
  constructor(subscriptionId: string, client?: AzureResourceClient, credential?: TokenCredential) {
    this.resourceClient =
      client ?? new ResourceManagementClient(credential ?? new AzureCliCredential(), subscriptionId);
  }

  /**
   * Ensure a resource group exists, creating it if necessary.
   *
   * @returns true when the group was created by this call
   */
  async ensureResourceGroup(
    name: string,
    location: string,
    tags?: Record<string, string>
  ): Promise<boolean> {
    try {
      await this.resourceClient.resourceGroups.get(name);
      return false;
    } catch (error: unknown) {
      if (!isNotFoundError(error)) {
        throw error;
      }
    }

    await this.resourceClient.resourceGroups.createOrUpdate(name, {
      location,
      tags: {
        managedBy: "gpu-connect",
        ...tags,
      },
    });
    return true;
  }

  /**
   * Names of all resource groups in the subscription.
   */
  async listResourceGroups(): Promise<string[]> {
    const names: string[] = [];
    for await (const group of this.resourceClient.resourceGroups.list()) {
      if (group.name) {
        names.push(group.name);
      }
    }
    return names;
  }

  /**
   * Run an incremental template deployment and return its outputs.
   */
  async deployTemplate(
    resourceGroup: string,
    deploymentName: string,
    template: Record<string, unknown>,
    parameters: Record<string, unknown>
  ): Promise<unknown> {
    const wrapped: Record<string, { value: unknown }> = {};
    for (const [key, value] of Object.entries(parameters)) {
      wrapped[key] = { value };
    }

    const result = await this.resourceClient.deployments.beginCreateOrUpdateAndWait(
      resourceGroup,
      deploymentName,
      {
        properties: {
          mode: "Incremental",
          template,
          parameters: wrapped,
        },
      }
    );

    return result.properties?.outputs;
  }
}
