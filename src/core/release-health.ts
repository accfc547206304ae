import { ClusterQueryError } from '../common/errors';
import { ClusterGateway } from '../common/interfaces/cluster-gateway.interface';
import {
  HelmReleaseSnapshot,
  ReleaseHealth,
  UnhealthyReleaseInfo,
} from '../common/interfaces/helmrelease.interface';
import { classify, deriveStatusCategory } from './condition-classifier';

function asQueryError(operation: string, error: unknown): ClusterQueryError {
  return error instanceof ClusterQueryError ? error : new ClusterQueryError(operation, error);
}

/**
 * Reads HelmReleases from the cluster and reports the ones that need attention.
 * Nothing is cached: every call goes back to the API server.
 */
export class ReleaseHealthAggregator {
  constructor(private readonly gateway: ClusterGateway) {}

  /**
   * All releases with an explicit non-True Ready condition, in the order the
   * API server listed them.
   *
   * @throws {ClusterQueryError} When the listing fails; no partial result is returned
   */
  async listUnhealthy(): Promise<UnhealthyReleaseInfo[]> {
    let releases: HelmReleaseSnapshot[];
    try {
      releases = await this.gateway.listHelmReleases();
    } catch (error) {
      console.error(`❌ Error fetching HelmReleases: ${error}`);
      throw asQueryError('list helmreleases', error);
    }

    const unhealthy: UnhealthyReleaseInfo[] = [];
    for (const release of releases) {
      const verdict = classify(release.conditions);
      if (verdict.ready) continue;

      unhealthy.push({
        namespace: release.namespace,
        name: release.name,
        errorMessage: verdict.readyMessage,
        isStalled: verdict.stalled,
        isReconciling: verdict.reconciling,
        lastTransitionTime: verdict.lastTransitionTime,
        category: deriveStatusCategory(verdict),
      });
    }

    return unhealthy;
  }

  /**
   * Fresh health of a single release, used to gate reconciliation requests
   * coming back from an earlier listing.
   *
   * @throws {ClusterQueryError} When the release cannot be read
   */
  async describe(namespace: string, name: string): Promise<ReleaseHealth> {
    try {
      const { snapshot } = await this.gateway.getHelmRelease(namespace, name);
      const verdict = classify(snapshot.conditions);
      return { namespace, name, verdict, category: deriveStatusCategory(verdict) };
    } catch (error) {
      throw asQueryError(`get helmrelease ${namespace}/${name}`, error);
    }
  }
}
