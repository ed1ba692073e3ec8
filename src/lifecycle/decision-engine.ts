import type { CertificateRecord } from '../certificate/interfaces';
import type { StateRecord } from '../state/interfaces';
import type { Decision, RunParameters } from './interfaces';

/**
 * A certificate with fewer whole days than this left is renewed.
 * Exactly this many days still counts as valid for one more cycle.
 */
export const RENEWAL_THRESHOLD_DAYS = 30;

/**
 * Classifies a run. Pure: reads its arguments only.
 *
 * Rules are evaluated in order and the first match wins:
 * 1. a different hostname in the prior state forces a new request;
 * 2. so does a switch between staging and production, which renewal cannot satisfy;
 * 3. `forceRenew` renews an existing certificate, or requests one when none exists;
 * 4. no usable certificate means a request;
 * 5. fewer than {@link RENEWAL_THRESHOLD_DAYS} days left means a renewal;
 * 6. otherwise nothing to do.
 */
export function decide(
  params: Pick<RunParameters, 'hostname' | 'useProductionEnvironment' | 'forceRenew'>,
  priorState: StateRecord | null,
  certInfo: CertificateRecord,
): Decision {
  if (priorState && priorState.hostname !== params.hostname) {
    return { action: 'request', reason: 'hostname-changed' };
  }

  if (priorState && priorState.isStagingEnvironment !== !params.useProductionEnvironment) {
    return { action: 'request', reason: 'environment-changed' };
  }

  if (params.forceRenew) {
    return { action: certInfo.exists ? 'renew' : 'request', reason: 'forced' };
  }

  if (!certInfo.exists) {
    return { action: 'request', reason: 'missing' };
  }

  // A present certificate without an expiry cannot be trusted to be current.
  if (certInfo.daysRemaining === undefined || certInfo.daysRemaining < RENEWAL_THRESHOLD_DAYS) {
    return { action: 'renew', reason: 'expiring' };
  }

  return { action: 'skip', reason: 'valid' };
}
