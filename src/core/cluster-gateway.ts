import * as k8s from '@kubernetes/client-node';

import { ClusterQueryError, ClusterWriteError, ConflictError } from '../common/errors';
import { ClusterGateway, HelmReleaseRecord } from '../common/interfaces/cluster-gateway.interface';
import {
  HelmReleaseResource,
  HelmReleaseSnapshot,
  RawCondition,
} from '../common/interfaces/helmrelease.interface';
import { PodDescriptor } from '../common/interfaces/pod-app.interface';

export const HELM_RELEASE_API = {
  group: 'helm.toolkit.fluxcd.io',
  version: 'v2',
  plural: 'helmreleases',
} as const;

const HTTP_CONFLICT = 409;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function statusCodeOf(error: unknown): number | undefined {
  if (isRecord(error) && typeof error.code === 'number') return error.code;
  return undefined;
}

function parseBodyMessage(body: unknown): string | undefined {
  if (isRecord(body) && typeof body.message === 'string') return body.message;
  if (typeof body !== 'string') return undefined;
  try {
    return parseBodyMessage(JSON.parse(body));
  } catch {
    return undefined;
  }
}

/**
 * API exceptions carry the whole response in their message. Prefer the
 * Status message the API server put in the body.
 */
function toApiError(error: unknown): unknown {
  const message = isRecord(error) ? parseBodyMessage(error.body) : undefined;
  return message ? new Error(message, { cause: error }) : error;
}

export function toHelmReleaseResource(value: unknown): HelmReleaseResource | null {
  if (!isRecord(value) || !isRecord(value.metadata)) return null;

  const { name, namespace, resourceVersion } = value.metadata;
  if (typeof name !== 'string' || typeof namespace !== 'string') return null;

  const resource: HelmReleaseResource = {
    ...value,
    apiVersion: typeof value.apiVersion === 'string' ? value.apiVersion : undefined,
    kind: typeof value.kind === 'string' ? value.kind : undefined,
    metadata: {
      ...value.metadata,
      name,
      namespace,
      resourceVersion: typeof resourceVersion === 'string' ? resourceVersion : undefined,
    },
    spec: undefined,
    status: undefined,
  };

  if (isRecord(value.spec)) {
    const { suspend } = value.spec;
    resource.spec = { ...value.spec, suspend: typeof suspend === 'boolean' ? suspend : undefined };
  }
  if (isRecord(value.status)) {
    const { conditions } = value.status;
    resource.status = { ...value.status, conditions: Array.isArray(conditions) ? conditions : undefined };
  }

  return resource;
}

export function toSnapshot(resource: HelmReleaseResource): HelmReleaseSnapshot {
  const conditions: RawCondition[] = (resource.status?.conditions ?? []).filter(isRecord);
  return {
    namespace: resource.metadata.namespace,
    name: resource.metadata.name,
    conditions,
  };
}

export function toPodDescriptor(pod: k8s.V1Pod): PodDescriptor | null {
  const name = pod.metadata?.name;
  const namespace = pod.metadata?.namespace;
  if (!name || !namespace) return null;

  return {
    namespace,
    name,
    phase: pod.status?.phase || 'Unknown',
    containers: (pod.spec?.containers ?? []).map((c) => ({ name: c.name, image: c.image })),
    creationTimestamp: pod.metadata?.creationTimestamp,
  };
}

/**
 * ClusterGateway backed by the Kubernetes API: Flux HelmReleases through the
 * custom objects API, pods through core/v1.
 */
export class KubernetesClusterGateway implements ClusterGateway {
  private readonly coreV1Api: k8s.CoreV1Api;
  private readonly customObjectsApi: k8s.CustomObjectsApi;

  constructor(kubeConfig: k8s.KubeConfig) {
    this.coreV1Api = kubeConfig.makeApiClient(k8s.CoreV1Api);
    this.customObjectsApi = kubeConfig.makeApiClient(k8s.CustomObjectsApi);
  }

  async listHelmReleases(): Promise<HelmReleaseSnapshot[]> {
    let response: unknown;
    try {
      response = await this.customObjectsApi.listClusterCustomObject({ ...HELM_RELEASE_API });
    } catch (error) {
      throw new ClusterQueryError('list helmreleases', toApiError(error));
    }

    if (!isRecord(response) || !Array.isArray(response.items)) {
      throw new ClusterQueryError('list helmreleases', new Error('Unexpected response from Kubernetes API'));
    }

    const snapshots: HelmReleaseSnapshot[] = [];
    for (const item of response.items) {
      const resource = toHelmReleaseResource(item);
      if (!resource) {
        console.warn('⚠️ Ignoring HelmRelease without metadata.name/namespace');
        continue;
      }
      snapshots.push(toSnapshot(resource));
    }
    return snapshots;
  }

  async getHelmRelease(namespace: string, name: string): Promise<HelmReleaseRecord> {
    try {
      const resource = await this.readHelmRelease(namespace, name);
      return { snapshot: toSnapshot(resource), resource };
    } catch (error) {
      throw new ClusterQueryError(`get helmrelease ${namespace}/${name}`, error);
    }
  }

  /**
   * Read-modify-write of `spec.suspend`. The object goes back with the
   * resourceVersion it was read at, so a concurrent writer makes the API
   * server answer 409 instead of being overwritten.
   */
  async patchHelmReleaseSuspend(namespace: string, name: string, suspend: boolean): Promise<void> {
    const operation = `${suspend ? 'suspend' : 'resume'} helmrelease ${namespace}/${name}`;

    let resource: HelmReleaseResource;
    try {
      resource = await this.readHelmRelease(namespace, name);
    } catch (error) {
      throw new ClusterWriteError(operation, error);
    }

    const body: HelmReleaseResource = {
      ...resource,
      spec: { ...resource.spec, suspend },
    };

    try {
      await this.customObjectsApi.replaceNamespacedCustomObject({
        ...HELM_RELEASE_API,
        namespace,
        name,
        body,
      });
    } catch (error) {
      if (statusCodeOf(error) === HTTP_CONFLICT) {
        throw new ConflictError(namespace, name, toApiError(error));
      }
      throw new ClusterWriteError(operation, toApiError(error));
    }
  }

  async listLabeledPods(labelSelector: string): Promise<PodDescriptor[]> {
    let podList: k8s.V1PodList;
    try {
      podList = await this.coreV1Api.listPodForAllNamespaces({ labelSelector });
    } catch (error) {
      throw new ClusterQueryError(`list pods (${labelSelector})`, toApiError(error));
    }

    return podList.items
      .map(toPodDescriptor)
      .filter((pod): pod is PodDescriptor => pod !== null);
  }

  private async readHelmRelease(namespace: string, name: string): Promise<HelmReleaseResource> {
    let response: unknown;
    try {
      response = await this.customObjectsApi.getNamespacedCustomObject({ ...HELM_RELEASE_API, namespace, name });
    } catch (error) {
      throw toApiError(error);
    }

    const resource = toHelmReleaseResource(response);
    if (!resource) {
      throw new Error(`HelmRelease ${namespace}/${name} has no metadata`);
    }
    return resource;
  }
}
