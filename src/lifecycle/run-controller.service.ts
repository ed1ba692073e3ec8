import { Inject, Injectable, Logger } from '@nestjs/common';
import { CredentialScopeService } from '../credentials/credential-scope.service';
import { CertificateInspectorService } from '../certificate/certificate-inspector.service';
import { DeliveryService } from '../delivery/delivery.service';
import { RunLockService } from '../system/run-lock.service';
import { STATE_STORE } from '../state/state.tokens';
import { ISSUANCE_CLIENT } from '../issuance/issuance.tokens';
import { TARGET_SERVER_ADMIN } from '../delivery/delivery.tokens';
import { decide } from './decision-engine';
import {
  DeliveryError,
  IssuanceError,
  LifecycleError,
  PrerequisiteMissingError,
} from './lifecycle.errors';
import { EXIT_FAILURE, EXIT_SUCCESS } from '../config/config.constants';
import { getErrorMessage } from '../shared/error.utils';
import { RunPhase, issuanceEnvironmentOf } from './interfaces';
import type { DecisionAction, RunParameters, RunResult, RunStatus } from './interfaces';
import type { RunStage } from './lifecycle.errors';
import type { StateStore } from '../state/interfaces';
import type { IssuanceClient } from '../issuance/interfaces';
import type { TargetServerAdmin } from '../delivery/interfaces';
import type { CredentialScope } from '../credentials/interfaces';

interface ScopedOutcome {
  status: Extract<RunStatus, 'success' | 'skipped'>;
  action: DecisionAction;
}

/**
 * Runs `fn`, attributing any error that is not already a LifecycleError to `stage`.
 */
async function atStage<T>(stage: RunStage, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof LifecycleError) {
      throw error;
    }
    throw new LifecycleError(stage, getErrorMessage(error), { cause: error });
  }
}

/**
 * One invocation, start to finish, for one hostname.
 *
 * Sequence: prerequisites, hostname lock, credentials file, prior state and
 * certificate inspection, decision, then either a state refresh (skip) or
 * issuance, delivery and the state write. The credentials file and the lock are
 * released on every path. Nothing is retried here; the scheduler's next
 * invocation is the retry.
 */
@Injectable()
export class RunControllerService {
  private readonly logger = new Logger(RunControllerService.name);

  constructor(
    private readonly runLock: RunLockService,
    private readonly credentialScope: CredentialScopeService,
    private readonly inspector: CertificateInspectorService,
    private readonly delivery: DeliveryService,
    @Inject(STATE_STORE) private readonly stateStore: StateStore,
    @Inject(ISSUANCE_CLIENT) private readonly issuanceClient: IssuanceClient,
    @Inject(TARGET_SERVER_ADMIN) private readonly targetAdmin: TargetServerAdmin,
  ) {}

  async run(params: RunParameters): Promise<RunResult> {
    const phases: RunPhase[] = [RunPhase.IDLE];
    const { hostname } = params;
    let action: DecisionAction | undefined;

    this.logger.log(`Starting run for ${hostname}`, {
      environment: issuanceEnvironmentOf(params),
      provider: params.dnsProvider,
      forceRenew: params.forceRenew,
      importCertificate: params.importCertificate,
      restartAfterImport: params.restartAfterImport,
    });

    try {
      await atStage('prerequisites', () => this.verifyPrerequisites(params));

      const locked = await atStage('lock', () => this.runLock.acquire(hostname));
      if (!locked) {
        phases.push(RunPhase.TERMINAL);
        return { status: 'busy', phases, exitCode: EXIT_SUCCESS };
      }

      let outcome: ScopedOutcome;
      try {
        outcome = await this.credentialScope.withScope(
          hostname,
          params.dnsProvider,
          params.dnsCredentials,
          async (scope) => {
            phases.push(RunPhase.CREDENTIALS_ACQUIRED);
            return this.runScoped(params, scope, phases, (decided) => {
              action = decided;
            });
          },
        );
      } catch (error) {
        this.markCredentialsReleased(phases);
        await this.releaseLockAfterFailure(hostname);
        throw error;
      }

      this.markCredentialsReleased(phases);
      await atStage('lock', () => this.runLock.release(hostname));

      phases.push(RunPhase.TERMINAL);
      this.logger.log(
        outcome.status === 'skipped'
          ? `Certificate for ${hostname} is current; nothing to do`
          : `Certificate for ${hostname} issued and delivered`,
        { action: outcome.action },
      );
      return { status: outcome.status, action: outcome.action, phases, exitCode: EXIT_SUCCESS };
    } catch (error) {
      const lifecycleError =
        error instanceof LifecycleError
          ? error
          : new LifecycleError('credentials', getErrorMessage(error), { cause: error });

      this.logger.error(`Run for ${hostname} failed during ${lifecycleError.stage}: ${lifecycleError.message}`);
      phases.push(RunPhase.TERMINAL);
      return { status: 'failure', action, phases, exitCode: EXIT_FAILURE, error: lifecycleError };
    }
  }

  private markCredentialsReleased(phases: RunPhase[]): void {
    if (phases.includes(RunPhase.CREDENTIALS_ACQUIRED)) {
      phases.push(RunPhase.CREDENTIALS_RELEASED);
    }
  }

  /**
   * Releases the lock on a failing run without letting a release error mask the failure.
   */
  private async releaseLockAfterFailure(hostname: string): Promise<void> {
    try {
      await this.runLock.release(hostname);
    } catch (releaseError) {
      this.logger.error(`Could not release the run lock for ${hostname}: ${getErrorMessage(releaseError)}`);
    }
  }

  private async verifyPrerequisites(params: RunParameters): Promise<void> {
    const issuance = await this.issuanceClient.verifyPrerequisites(params.dnsProvider);
    if (!issuance.ok) {
      throw new PrerequisiteMissingError(issuance.reason);
    }

    if (params.importCertificate) {
      const target = await this.targetAdmin.verifyPrerequisites(params.restartAfterImport);
      if (!target.ok) {
        throw new PrerequisiteMissingError(target.reason);
      }
    }
  }

  private async runScoped(
    params: RunParameters,
    scope: CredentialScope,
    phases: RunPhase[],
    onDecided: (action: DecisionAction) => void,
  ): Promise<ScopedOutcome> {
    const { hostname } = params;
    const environment = issuanceEnvironmentOf(params);

    const priorState = await atStage('state-read', () => this.stateStore.read(hostname));
    phases.push(RunPhase.STATE_READ);

    const certificate = await atStage('state-read', () => this.inspector.inspect(hostname));
    const decision = decide(params, priorState, certificate);
    phases.push(RunPhase.DECIDED);
    onDecided(decision.action);
    this.logger.log(`Decision for ${hostname}: ${decision.action} (${decision.reason})`, {
      daysRemaining: certificate.daysRemaining,
    });

    if (decision.action === 'skip') {
      phases.push(RunPhase.SKIPPED);
      await this.writeState(params);
      phases.push(RunPhase.STATE_WRITTEN);
      return { status: 'skipped', action: decision.action };
    }

    phases.push(RunPhase.ISSUING);
    const issued = await atStage('issuance', () =>
      decision.action === 'request'
        ? this.issuanceClient.request(hostname, params.email, environment, scope)
        : this.issuanceClient.renew(hostname, environment, params.forceRenew, scope),
    );
    if (!issued.ok) {
      throw new IssuanceError(issued.reason);
    }

    const reissued = await atStage('issuance', () => this.inspector.inspect(hostname));
    if (!reissued.exists) {
      throw new IssuanceError(`Issuance reported success but no usable certificate was found for ${hostname}`);
    }

    phases.push(RunPhase.DELIVERING);
    const delivered = await atStage('delivery', () =>
      this.delivery.deliver(hostname, {
        importCertificate: params.importCertificate,
        restartAfterImport: params.restartAfterImport,
        adminCredentials: params.adminCredentials,
      }),
    );
    if (!delivered.ok) {
      throw new DeliveryError(delivered.reason);
    }

    await this.writeState(params);
    phases.push(RunPhase.STATE_WRITTEN);
    return { status: 'success', action: decision.action };
  }

  private async writeState(params: RunParameters): Promise<void> {
    await atStage('state-write', () =>
      this.stateStore.write({
        hostname: params.hostname,
        email: params.email,
        isStagingEnvironment: !params.useProductionEnvironment,
        lastRunTimestamp: new Date().toISOString(),
        certificateConfirmedPresent: true,
      }),
    );
  }
}
