import chalk from 'chalk';

import {
  AlreadyReconcilingError,
  ReconcileError,
  SuspendFailedError,
  UnsuspendFailedError,
  describeError,
} from '../common/errors';
import { ClusterGateway } from '../common/interfaces/cluster-gateway.interface';

export type ReconcileStep = 'suspending' | 'unsuspending';

export type ReconcileProgressListener = (step: ReconcileStep) => Promise<void> | void;

export interface ReconcileOptions {
  /** The caller saw the release as already reconciling; refuse without touching the cluster */
  reconciling?: boolean;
  onProgress?: ReconcileProgressListener;
}

export interface ReconcileOutcome {
  suspended: boolean;
  unsuspended: boolean;
  error?: ReconcileError;
}

/**
 * Forces Flux to re-evaluate a HelmRelease by suspending it and resuming it
 * straight away. The helm-controller has no "reconcile now" verb in the API,
 * so the suspend/resume toggle is the trigger.
 *
 * There is no retry. A failed resume leaves the release suspended and is
 * reported as `UnsuspendFailed` so an operator can clean up.
 */
export class ReconciliationDriver {
  constructor(private readonly gateway: ClusterGateway) {}

  async reconcile(namespace: string, name: string, options: ReconcileOptions = {}): Promise<ReconcileOutcome> {
    const release = `${namespace}/${name}`;

    if (options.reconciling) {
      console.log(`♻️  Skipping ${release}: already reconciling`);
      return { suspended: false, unsuspended: false, error: new AlreadyReconcilingError(namespace, name) };
    }

    await this.notify(options.onProgress, 'suspending', release);
    try {
      await this.gateway.patchHelmReleaseSuspend(namespace, name, true);
    } catch (error) {
      console.error(`❌ Error suspending release ${release}: ${describeError(error)}`);
      return { suspended: false, unsuspended: false, error: new SuspendFailedError(namespace, name, error) };
    }

    await this.notify(options.onProgress, 'unsuspending', release);
    try {
      await this.gateway.patchHelmReleaseSuspend(namespace, name, false);
    } catch (error) {
      console.error(
        `${chalk.red('🚨 Release left suspended:')} ${release} could not be resumed: ${describeError(error)}`,
      );
      return { suspended: true, unsuspended: false, error: new UnsuspendFailedError(namespace, name, error) };
    }

    console.log(`✅ Triggered reconciliation of ${release}`);
    return { suspended: true, unsuspended: true };
  }

  // Progress goes to the chat UI; a failed update never stops the protocol.
  private async notify(
    listener: ReconcileProgressListener | undefined,
    step: ReconcileStep,
    release: string,
  ): Promise<void> {
    if (!listener) return;
    try {
      await listener(step);
    } catch (error) {
      console.warn(`⚠️ Progress update '${step}' for ${release} failed: ${describeError(error)}`);
    }
  }
}
