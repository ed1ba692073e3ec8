import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CommandRunnerService, describeFailure } from '../system/command-runner.service';
import { getDnsProvider } from '../credentials/dns-providers';
import { failed, succeeded } from '../shared/outcome';
import type { Outcome } from '../shared/outcome';
import type { CertbotConfig, PathsConfig } from '../config/config.types';
import type { CredentialScope, DnsProviderKind } from '../credentials/interfaces';
import type { IssuanceEnvironment } from '../lifecycle/interfaces/run-parameters.interface';
import type { IssuanceClient } from './interfaces';

/**
 * Drives certbot with a DNS-01 plugin.
 *
 * Every invocation carries `--no-autorenew` so certbot never schedules renewals of its
 * own, and explicit config/work/logs directories so nothing lands in /etc/letsencrypt.
 */
@Injectable()
export class CertbotClientService implements IssuanceClient {
  private readonly logger = new Logger(CertbotClientService.name);
  private readonly certbot: CertbotConfig;
  private readonly paths: PathsConfig;

  constructor(
    configService: ConfigService,
    private readonly commandRunner: CommandRunnerService,
  ) {
    this.certbot = configService.getOrThrow<CertbotConfig>('clm.certbot');
    this.paths = configService.getOrThrow<PathsConfig>('clm.paths');
  }

  async verifyPrerequisites(provider: DnsProviderKind): Promise<Outcome> {
    const version = await this.commandRunner.run(this.certbot.command, ['--version']);
    if (version.exitCode !== 0) {
      return failed(`${this.certbot.command} is not available (${describeFailure(version)})`);
    }
    this.logger.debug(`Using ${(version.stdout || version.stderr).trim()}`);

    const { plugin } = getDnsProvider(provider);
    const plugins = await this.commandRunner.run(this.certbot.command, ['plugins', ...this.directoryArgs()]);
    if (plugins.exitCode !== 0) {
      return failed(`Could not list ${this.certbot.command} plugins (${describeFailure(plugins)})`);
    }

    const installed = plugins.stdout.split('\n').some((line) => line.replace(/^\*/, '').trim() === plugin);
    if (!installed) {
      return failed(`${this.certbot.command} plugin ${plugin} is not installed`);
    }

    return succeeded();
  }

  async request(
    hostname: string,
    email: string,
    environment: IssuanceEnvironment,
    scope: CredentialScope,
  ): Promise<Outcome> {
    // --force-renewal: an existing lineage (e.g. a staging one) is replaced rather than reused.
    const args = [
      'certonly',
      '--non-interactive',
      '--agree-tos',
      '--no-autorenew',
      '--email',
      email,
      '-d',
      hostname,
      '--cert-name',
      hostname,
      '--force-renewal',
      ...this.pluginArgs(scope),
      ...this.directoryArgs(),
      ...this.environmentArgs(environment),
    ];

    this.logger.log(`Requesting ${environment} certificate for ${hostname}`, { provider: scope.provider });
    return this.execute(args, scope, `Certificate request for ${hostname}`);
  }

  async renew(
    hostname: string,
    environment: IssuanceEnvironment,
    force: boolean,
    scope: CredentialScope,
  ): Promise<Outcome> {
    const args = [
      'renew',
      '--non-interactive',
      '--no-autorenew',
      '--cert-name',
      hostname,
      ...this.pluginArgs(scope),
      ...this.directoryArgs(),
      ...(force ? ['--force-renewal'] : []),
      ...this.environmentArgs(environment),
    ];

    this.logger.log(`Renewing ${environment} certificate for ${hostname}`, { provider: scope.provider, force });
    return this.execute(args, scope, `Certificate renewal for ${hostname}`);
  }

  private async execute(args: string[], scope: CredentialScope, description: string): Promise<Outcome> {
    const result = await this.commandRunner.run(this.certbot.command, args, { env: { ...scope.environment } });

    if (result.exitCode !== 0) {
      return failed(`${description} failed (${describeFailure(result)})`);
    }

    return succeeded();
  }

  private pluginArgs(scope: CredentialScope): string[] {
    const definition = getDnsProvider(scope.provider);
    const args = [...scope.certbotArgs];

    if (this.certbot.propagationSeconds !== undefined && definition.supportsPropagationSeconds) {
      args.push(`--${definition.plugin}-propagation-seconds`, String(this.certbot.propagationSeconds));
    }

    return args;
  }

  private directoryArgs(): string[] {
    return [
      '--config-dir',
      this.paths.certbotDir,
      '--work-dir',
      this.paths.certbotDir,
      '--logs-dir',
      this.paths.logDir,
    ];
  }

  private environmentArgs(environment: IssuanceEnvironment): string[] {
    return environment === 'staging' ? ['--staging'] : [];
  }
}
