import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomBytes } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { getDnsProvider, missingCredentialFields } from './dns-providers';
import { CommandRunnerService } from '../system/command-runner.service';
import { assertSafeHostname } from '../config/config.validators';
import { CredentialSetupError } from '../lifecycle/lifecycle.errors';
import { getErrorMessage } from '../shared/error.utils';
import type { CredentialScope, DnsProviderCredentials, DnsProviderKind } from './interfaces';
import type { PathsConfig } from '../config/config.types';

/**
 * Owns the DNS provider credentials file for the duration of a run.
 *
 * The file is created with owner-only permissions right before issuance and
 * removed as soon as the run is done with it, whatever the outcome.
 */
@Injectable()
export class CredentialScopeService implements OnApplicationShutdown {
  private readonly logger = new Logger(CredentialScopeService.name);
  private readonly credentialsDir: string;
  private readonly active = new Map<string, CredentialScope>();

  constructor(
    configService: ConfigService,
    private readonly commandRunner: CommandRunnerService,
  ) {
    this.credentialsDir = configService.getOrThrow<PathsConfig>('clm.paths').credentialsDir;
  }

  async acquire(
    hostname: string,
    provider: DnsProviderKind,
    credentials: DnsProviderCredentials,
  ): Promise<CredentialScope> {
    const definition = getDnsProvider(provider);
    const missing = missingCredentialFields(provider, credentials);
    if (missing.length > 0) {
      throw new CredentialSetupError(`Missing ${provider} credentials: ${missing.join(', ')}`);
    }

    const fileName = `${assertSafeHostname(hostname)}-${provider}-${randomBytes(6).toString('hex')}.ini`;
    const credentialsPath = path.join(this.credentialsDir, fileName);

    try {
      await fs.promises.mkdir(this.credentialsDir, { recursive: true, mode: 0o700 });
    } catch (error) {
      throw new CredentialSetupError(
        `Could not create credentials directory ${this.credentialsDir}: ${getErrorMessage(error)}`,
        { cause: error },
      );
    }

    try {
      await fs.promises.writeFile(credentialsPath, definition.renderCredentialsFile(credentials), {
        flag: 'wx',
        mode: 0o600,
      });
    } catch (error) {
      // A partial write may have left the file behind.
      await fs.promises.rm(credentialsPath, { force: true });
      throw new CredentialSetupError(`Could not write ${provider} credentials file: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    const scope: CredentialScope = {
      hostname,
      provider,
      path: credentialsPath,
      certbotArgs: definition.certbotArgs(credentialsPath),
      environment: definition.environment(credentialsPath),
    };
    this.active.set(credentialsPath, scope);
    this.logger.debug('Credentials file created', { provider, path: credentialsPath });

    return scope;
  }

  async release(scope: CredentialScope): Promise<void> {
    await fs.promises.rm(scope.path, { force: true });
    this.active.delete(scope.path);
    this.logger.debug('Credentials file removed', { path: scope.path });
  }

  /**
   * Runs `fn` with a credentials file that exists only for the duration of the call.
   * When `fn` fails, that failure is what propagates even if the cleanup fails too.
   */
  async withScope<T>(
    hostname: string,
    provider: DnsProviderKind,
    credentials: DnsProviderCredentials,
    fn: (scope: CredentialScope) => Promise<T>,
  ): Promise<T> {
    const scope = await this.acquire(hostname, provider, credentials);

    let result: T;
    try {
      result = await fn(scope);
    } catch (error) {
      try {
        await this.release(scope);
      } catch (releaseError) {
        this.logger.error(`Could not remove credentials file ${scope.path}: ${getErrorMessage(releaseError)}`);
      }
      throw error;
    }

    await this.release(scope);
    return result;
  }

  getActiveScopes(): CredentialScope[] {
    return [...this.active.values()];
  }

  /**
   * Removes credentials files of an interrupted run once the tools reading them have exited.
   */
  async onApplicationShutdown(): Promise<void> {
    await this.commandRunner.terminateAll();
    for (const credentialsPath of this.active.keys()) {
      await fs.promises.rm(credentialsPath, { force: true });
      this.logger.warn('Removed credentials file of an interrupted run', { path: credentialsPath });
    }
    this.active.clear();
  }
}
