import { InstancesClient, protos } from "@google-cloud/compute";

type InstancesScopedList = protos.google.cloud.compute.v1.IInstancesScopedList;

/**
 * Server-side filter for instances with at least one attached accelerator.
 */
export const GPU_INSTANCE_FILTER = "guestAccelerators.acceleratorCount > 0";

// gRPC status codes as surfaced by google-gax
const INVALID_ARGUMENT = 3;
const UNAUTHENTICATED = 16;

/**
 * The part of InstancesClient used for GPU detection.
 */
export interface InstanceLister {
  aggregatedListAsync(request: {
    project: string;
    filter?: string;
    returnPartialSuccess?: boolean;
  }): AsyncIterable<[string, InstancesScopedList]>;
}

function errorCode(error: unknown): unknown {
  return typeof error === "object" && error !== null && "code" in error ? error.code : undefined;
}

/**
 * Whether a Compute call failed for lack of usable credentials (no
 * Application Default Credentials, or expired ones).
 */
export function isCredentialError(error: unknown): boolean {
  const code = errorCode(error);
  if (code === UNAUTHENTICATED || code === 401) {
    return true;
  }
  const message = error instanceof Error ? error.message : String(error);
  return /default credentials|invalid_grant|unauthenticated/i.test(message);
}

function isRejectedFilter(error: unknown): boolean {
  const code = errorCode(error);
  return code === INVALID_ARGUMENT || code === 400;
}

/**
 * Compute Engine lookups used during discovery.
 * Wraps the @google-cloud/compute SDK; credentials come from Application
 * Default Credentials (already present in Cloud Shell).
 */
export class ComputeService {
  private readonly instancesClient: InstanceLister;

  constructor(instancesClient?: InstanceLister) {
    this.instancesClient = instancesClient ?? new InstancesClient();
  }

  /**
   * Whether the project has at least one instance with guest accelerators
   * attached. The accelerator filter runs server-side; iteration stops at the
   * first match. A project whose API rejects the filter is scanned unfiltered.
   *
   * @throws when the Compute API is disabled or access is denied
   */
  async hasGpuInstances(projectId: string): Promise<boolean> {
    try {
      return await this.scan(projectId, GPU_INSTANCE_FILTER);
    } catch (error) {
      if (!isRejectedFilter(error)) {
        throw error;
      }
      return this.scan(projectId);
    }
  }

  private async scan(projectId: string, filter?: string): Promise<boolean> {
    const iterable = this.instancesClient.aggregatedListAsync({
      project: projectId,
      ...(filter ? { filter } : {}),
      returnPartialSuccess: true,
    });

    for await (const [, scopedList] of iterable) {
      const instances = scopedList.instances ?? [];
      if (instances.some((instance) => (instance.guestAccelerators?.length ?? 0) > 0)) {
        return true;
      }
    }

    return false;
  }
}
