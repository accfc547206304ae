import { HelmReleaseResource, HelmReleaseSnapshot } from './helmrelease.interface';
import { PodDescriptor } from './pod-app.interface';

export interface HelmReleaseRecord {
  snapshot: HelmReleaseSnapshot;
  resource: HelmReleaseResource;
}

/**
 * Everything the bot needs from the cluster.
 *
 * Reads reject with `ClusterQueryError`. `patchHelmReleaseSuspend` rejects with
 * `ConflictError` when the object changed between its read and write, and with
 * `ClusterWriteError` for any other failure.
 */
export interface ClusterGateway {
  listHelmReleases(): Promise<HelmReleaseSnapshot[]>;
  getHelmRelease(namespace: string, name: string): Promise<HelmReleaseRecord>;
  patchHelmReleaseSuspend(namespace: string, name: string, suspend: boolean): Promise<void>;
  listLabeledPods(labelSelector: string): Promise<PodDescriptor[]>;
}
