import { ClusterQueryError } from '../common/errors';
import { ClusterGateway } from '../common/interfaces/cluster-gateway.interface';
import {
  ContainerDescriptor,
  PodAppInfo,
  PodDescriptor,
  PodStatusCategory,
} from '../common/interfaces/pod-app.interface';
import { calculateAge, extractImageTag, extractVersion } from '../utils/utils';

export interface AppStatusReporterOptions {
  /** Label selector identifying application pods, e.g. `tgops=true` */
  labelSelector: string;
  /** Name prefix of the container whose image is reported */
  mainContainerPrefix: string;
  now?: () => Date;
}

export function podStatusCategory(phase: string): PodStatusCategory {
  if (phase === 'Running') return 'running';
  if (phase === 'Failed') return 'failed';
  return 'other';
}

export function findMainContainer(
  containers: readonly ContainerDescriptor[],
  prefix: string,
): ContainerDescriptor | undefined {
  return containers.find((container) => container.name.startsWith(prefix));
}

/**
 * Reports image tag, version and age of every labeled application pod
 */
export class AppStatusReporter {
  private readonly now: () => Date;

  constructor(
    private readonly gateway: ClusterGateway,
    private readonly options: AppStatusReporterOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  get labelSelector(): string {
    return this.options.labelSelector;
  }

  /**
   * @throws {ClusterQueryError} When the pod listing fails
   */
  async listApps(): Promise<PodAppInfo[]> {
    let pods: PodDescriptor[];
    try {
      pods = await this.gateway.listLabeledPods(this.options.labelSelector);
    } catch (error) {
      throw error instanceof ClusterQueryError ? error : new ClusterQueryError('list pods', error);
    }

    const now = this.now();
    const apps: PodAppInfo[] = [];

    for (const pod of pods) {
      const main = findMainContainer(pod.containers, this.options.mainContainerPrefix);
      if (!main) continue;

      const imageTag = extractImageTag(main.image);
      apps.push({
        namespace: pod.namespace,
        podName: pod.name,
        phase: pod.phase,
        statusCategory: podStatusCategory(pod.phase),
        imageTag,
        version: extractVersion(imageTag),
        ageDisplay: calculateAge(pod.creationTimestamp, now),
      });
    }

    return apps;
  }
}
