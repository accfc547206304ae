import {
  Condition,
  ConditionStatus,
  HealthVerdict,
  RawCondition,
  ReleaseStatusCategory,
} from '../common/interfaces/helmrelease.interface';

export const DEFAULT_READY_MESSAGE = 'No error message provided';
export const UNKNOWN_TRANSITION_TIME = 'Unknown';

const CONDITION_STATUSES: readonly ConditionStatus[] = ['True', 'False', 'Unknown'];

function isConditionStatus(value: unknown): value is ConditionStatus {
  return typeof value === 'string' && CONDITION_STATUSES.some((status) => status === value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Narrows a raw condition to a well-formed one. Entries without a string
 * `type` or a recognised `status` are dropped, as if never reported.
 */
export function toCondition(raw: RawCondition | null | undefined): Condition | null {
  if (!raw || typeof raw !== 'object') return null;
  if (typeof raw.type !== 'string' || !isConditionStatus(raw.status)) return null;

  return {
    type: raw.type,
    status: raw.status,
    reason: optionalString(raw.reason),
    message: optionalString(raw.message),
    lastTransitionTime: optionalString(raw.lastTransitionTime),
  };
}

/**
 * Classifies a HelmRelease from its status conditions.
 *
 * Only an explicit Ready=False/Unknown counts as not ready: a release that has
 * not reported Ready at all is treated as healthy. `reconciling` is evaluated
 * independently of `ready`, so a release can be both not ready and in the
 * middle of a reconciliation.
 */
export function classify(conditions: readonly RawCondition[] | null | undefined): HealthVerdict {
  const wellFormed = (conditions ?? [])
    .map(toCondition)
    .filter((condition): condition is Condition => condition !== null);

  const readyCondition = wellFormed.find((c) => c.type === 'Ready');
  const stalled = wellFormed.some((c) => c.type === 'Stalled' && c.status === 'True');
  const reconciling = wellFormed.some(
    (c) => c.type === 'Reconciling' && c.status === 'True' && c.reason === 'Progressing',
  );

  return {
    present: readyCondition !== undefined,
    ready: readyCondition ? readyCondition.status === 'True' : true,
    readyMessage: readyCondition?.message ?? DEFAULT_READY_MESSAGE,
    stalled,
    reconciling,
    lastTransitionTime: readyCondition?.lastTransitionTime ?? UNKNOWN_TRANSITION_TIME,
  };
}

/**
 * Reconciling takes precedence over stalled: a remediation already in flight
 * is what the operator needs to see first.
 */
export function deriveStatusCategory(verdict: HealthVerdict): ReleaseStatusCategory {
  if (verdict.ready) return 'healthy';
  if (verdict.reconciling) return 'reconciling';
  if (verdict.stalled) return 'stalled';
  return 'not-ready';
}
