import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CommandRunnerService, describeFailure } from './command-runner.service';
import { failed, succeeded } from '../shared/outcome';
import type { Outcome } from '../shared/outcome';
import type { TargetConfig } from '../config/config.types';

/**
 * Hands files to the target service's runtime account.
 */
@Injectable()
export class OwnershipService {
  private readonly logger = new Logger(OwnershipService.name);
  private readonly target: TargetConfig;
  private accountPresent?: boolean;

  constructor(
    configService: ConfigService,
    private readonly commandRunner: CommandRunnerService,
  ) {
    this.target = configService.getOrThrow<TargetConfig>('clm.target');
  }

  /**
   * Whether the service user exists on this host. Looked up once per process.
   */
  async serviceAccountExists(): Promise<boolean> {
    if (this.accountPresent === undefined) {
      const result = await this.commandRunner.run('id', ['-u', this.target.serviceUser]);
      this.accountPresent = result.exitCode === 0;
    }
    return this.accountPresent;
  }

  /**
   * Changes ownership of the given paths to `serviceUser:serviceGroup`.
   * Succeeds without doing anything when the service account does not exist.
   */
  async transferToServiceAccount(paths: readonly string[]): Promise<Outcome> {
    if (!(await this.serviceAccountExists())) {
      this.logger.warn(`Service account ${this.target.serviceUser} not found; leaving ownership unchanged`);
      return succeeded();
    }

    const owner = `${this.target.serviceUser}:${this.target.serviceGroup}`;
    const result = await this.commandRunner.run('chown', [owner, ...paths]);

    if (result.exitCode !== 0) {
      return failed(`chown ${owner} failed (${describeFailure(result)})`);
    }

    return succeeded();
  }
}
