/**
 * Classified failures raised or returned by the release and pod services.
 *
 * Every error carries a `kind` discriminator so the chat layer can pick the
 * wording without inspecting messages, and a `detail` string that is safe to
 * show to the operator verbatim.
 */
export type OpsBotErrorKind =
  | 'ClusterQueryError'
  | 'ClusterWriteError'
  | 'ConflictError'
  | 'SuspendFailed'
  | 'UnsuspendFailed'
  | 'AlreadyReconciling'
  | 'ActionTokenDecodeError'
  | 'ActionTokenEncodeError';

export abstract class OpsBotError extends Error {
  abstract readonly kind: OpsBotErrorKind;

  constructor(
    message: string,
    readonly detail: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof OpsBotError) return error.detail;
  return error instanceof Error ? error.message : String(error);
}

/**
 * A read against the cluster API failed (listing, getting, timeouts).
 */
export class ClusterQueryError extends OpsBotError {
  readonly kind = 'ClusterQueryError';

  constructor(readonly operation: string, cause: unknown) {
    const detail = describeError(cause);
    super(`Cluster query '${operation}' failed: ${detail}`, detail, { cause });
  }
}

/**
 * A write against the cluster API failed for a reason other than a conflict.
 */
export class ClusterWriteError extends OpsBotError {
  readonly kind = 'ClusterWriteError';

  constructor(readonly operation: string, cause: unknown) {
    const detail = describeError(cause);
    super(`Cluster write '${operation}' failed: ${detail}`, detail, { cause });
  }
}

/**
 * The resource changed between read and write (HTTP 409). Never retried here.
 */
export class ConflictError extends OpsBotError {
  readonly kind = 'ConflictError';

  constructor(readonly namespace: string, readonly releaseName: string, cause: unknown) {
    const detail = `${namespace}/${releaseName} was modified concurrently: ${describeError(cause)}`;
    super(`Conflicting update of ${namespace}/${releaseName}`, detail, { cause });
  }
}

export type WriteFailure = ClusterWriteError | ConflictError;

function asWriteFailure(operation: string, cause: unknown): WriteFailure {
  if (cause instanceof ClusterWriteError || cause instanceof ConflictError) return cause;
  return new ClusterWriteError(operation, cause);
}

export class SuspendFailedError extends OpsBotError {
  readonly kind = 'SuspendFailed';
  declare readonly cause: WriteFailure;

  constructor(readonly namespace: string, readonly releaseName: string, cause: unknown) {
    const failure = asWriteFailure(`suspend ${namespace}/${releaseName}`, cause);
    super(`Failed to suspend release ${namespace}/${releaseName}`, failure.detail, { cause: failure });
  }
}

/**
 * The release was suspended but could not be resumed. It stays suspended
 * until someone resumes it by hand.
 */
export class UnsuspendFailedError extends OpsBotError {
  readonly kind = 'UnsuspendFailed';
  readonly requiresManualCleanup = true;
  declare readonly cause: WriteFailure;

  constructor(readonly namespace: string, readonly releaseName: string, cause: unknown) {
    const failure = asWriteFailure(`unsuspend ${namespace}/${releaseName}`, cause);
    super(`Failed to unsuspend release ${namespace}/${releaseName}`, failure.detail, { cause: failure });
  }
}

export class AlreadyReconcilingError extends OpsBotError {
  readonly kind = 'AlreadyReconciling';

  constructor(readonly namespace: string, readonly releaseName: string) {
    super(
      `Release ${namespace}/${releaseName} is already reconciling`,
      `${namespace}/${releaseName} is already reconciling`,
    );
  }
}

export class ActionTokenDecodeError extends OpsBotError {
  readonly kind = 'ActionTokenDecodeError';

  constructor(readonly token: string, reason: string) {
    super(`Invalid action token '${token}': ${reason}`, reason);
  }
}

export class ActionTokenEncodeError extends OpsBotError {
  readonly kind = 'ActionTokenEncodeError';

  constructor(reason: string) {
    super(`Cannot encode action token: ${reason}`, reason);
  }
}

export type ReconcileError = AlreadyReconcilingError | SuspendFailedError | UnsuspendFailedError;
