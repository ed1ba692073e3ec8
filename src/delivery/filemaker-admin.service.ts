import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CommandRunnerService, describeFailure } from '../system/command-runner.service';
import { failed, succeeded } from '../shared/outcome';
import type { Outcome } from '../shared/outcome';
import type { TargetConfig } from '../config/config.types';
import type { AdminCredentials } from '../lifecycle/interfaces/run-parameters.interface';
import type { TargetServerAdmin } from './interfaces';

/**
 * FileMaker Server: certificates go in through `fmsadmin certificate import`
 * and take effect once the helper service is restarted.
 */
@Injectable()
export class FileMakerAdminService implements TargetServerAdmin {
  private readonly logger = new Logger(FileMakerAdminService.name);
  private readonly target: TargetConfig;

  constructor(
    configService: ConfigService,
    private readonly commandRunner: CommandRunnerService,
  ) {
    this.target = configService.getOrThrow<TargetConfig>('clm.target');
  }

  async verifyPrerequisites(restart: boolean): Promise<Outcome> {
    const admin = await this.commandRunner.run(this.target.adminCommand, ['-v']);
    if (admin.exitCode !== 0) {
      return failed(`${this.target.adminCommand} is not available (${describeFailure(admin)})`);
    }

    if (restart) {
      const serviceControl = await this.commandRunner.run(this.target.serviceControlCommand, ['--version']);
      if (serviceControl.exitCode !== 0) {
        return failed(`${this.target.serviceControlCommand} is not available (${describeFailure(serviceControl)})`);
      }
    }

    return succeeded();
  }

  async importCertificate(
    certificatePath: string,
    privateKeyPath: string,
    credentials: AdminCredentials,
  ): Promise<Outcome> {
    const secrets = [credentials.password];
    const result = await this.commandRunner.run(
      this.target.adminCommand,
      [
        'certificate',
        'import',
        certificatePath,
        '--keyfile',
        privateKeyPath,
        '-y',
        '-u',
        credentials.username,
        '-p',
        credentials.password,
      ],
      { secrets },
    );

    if (result.exitCode !== 0) {
      return failed(`Certificate import failed (${describeFailure(result, secrets)})`);
    }

    this.logger.log('Certificate imported into FileMaker Server');
    return succeeded();
  }

  async stopService(): Promise<Outcome> {
    return this.controlService('stop');
  }

  async startService(): Promise<Outcome> {
    return this.controlService('start');
  }

  private async controlService(action: 'stop' | 'start'): Promise<Outcome> {
    const result = await this.commandRunner.run(this.target.serviceControlCommand, [action, this.target.serviceName]);

    if (result.exitCode !== 0) {
      return failed(`Could not ${action} ${this.target.serviceName} (${describeFailure(result)})`);
    }

    this.logger.log(`${action === 'stop' ? 'Stopped' : 'Started'} ${this.target.serviceName}`);
    return succeeded();
  }
}
