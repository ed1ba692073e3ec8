import type { DecisionAction } from './decision.interface';
import type { LifecycleError } from '../lifecycle.errors';

/**
 * Phases of a run, in the order they can be entered.
 */
export enum RunPhase {
  IDLE = 'Idle',
  CREDENTIALS_ACQUIRED = 'CredentialsAcquired',
  STATE_READ = 'StateRead',
  DECIDED = 'Decided',
  SKIPPED = 'Skipped',
  ISSUING = 'Issuing',
  DELIVERING = 'Delivering',
  STATE_WRITTEN = 'StateWritten',
  CREDENTIALS_RELEASED = 'CredentialsReleased',
  TERMINAL = 'Terminal',
}

/**
 * `busy` means another run for the same hostname held the lock; nothing was done.
 */
export type RunStatus = 'success' | 'skipped' | 'busy' | 'failure';

export interface RunResult {
  status: RunStatus;
  action?: DecisionAction;
  phases: RunPhase[];
  exitCode: number;
  error?: LifecycleError;
}
