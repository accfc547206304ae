export interface ContainerDescriptor {
  name: string;
  image?: string;
}

/**
 * The slice of a V1Pod the app reporter needs
 */
export interface PodDescriptor {
  namespace: string;
  name: string;
  phase: string;
  containers: ContainerDescriptor[];
  creationTimestamp?: Date;
}

export type PodStatusCategory = 'running' | 'failed' | 'other';

export interface PodAppInfo {
  namespace: string;
  podName: string;
  phase: string;
  statusCategory: PodStatusCategory;
  imageTag: string;
  version: string;
  ageDisplay: string;
}
