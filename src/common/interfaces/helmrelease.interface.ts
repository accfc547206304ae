export type ConditionStatus = 'True' | 'False' | 'Unknown';

/**
 * One status fact reported by the Flux helm-controller.
 */
export interface Condition {
  type: string;
  status: ConditionStatus;
  reason?: string;
  message?: string;
  lastTransitionTime?: string;
}

/**
 * A condition as it arrives from the API server. Nothing about its shape is
 * trusted until the classifier has checked it.
 */
export type RawCondition = { [K in keyof Condition]?: unknown };

export interface HelmReleaseSnapshot {
  namespace: string;
  name: string;
  conditions: readonly RawCondition[];
}

/**
 * The HelmRelease object as read from `helm.toolkit.fluxcd.io/v2`, reduced to
 * the fields the bot touches. Everything else is carried through untouched on
 * writes.
 */
export interface HelmReleaseResource {
  apiVersion?: string;
  kind?: string;
  metadata: {
    name: string;
    namespace: string;
    resourceVersion?: string;
    [key: string]: unknown;
  };
  spec?: {
    suspend?: boolean;
    [key: string]: unknown;
  };
  status?: {
    conditions?: unknown[];
    [key: string]: unknown;
  };
  [key: string]: unknown;
}

export interface HealthVerdict {
  /** Whether a well-formed Ready condition was reported at all */
  present: boolean;
  ready: boolean;
  readyMessage: string;
  stalled: boolean;
  reconciling: boolean;
  lastTransitionTime: string;
}

export type ReleaseStatusCategory = 'healthy' | 'reconciling' | 'stalled' | 'not-ready';

export interface UnhealthyReleaseInfo {
  namespace: string;
  name: string;
  errorMessage: string;
  isStalled: boolean;
  isReconciling: boolean;
  lastTransitionTime: string;
  category: ReleaseStatusCategory;
}

export interface ReleaseHealth {
  namespace: string;
  name: string;
  verdict: HealthVerdict;
  category: ReleaseStatusCategory;
}
