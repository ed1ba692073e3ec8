import yargs from 'yargs';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import type { ValidationError } from 'class-validator';
import { RunParametersDto } from './dto/run-parameters.dto';
import { ParameterValidationError } from '../lifecycle/lifecycle.errors';
import { DNS_PROVIDER_KINDS } from '../credentials/interfaces';
import type { RunParameters } from '../lifecycle/interfaces';

/**
 * Flag definitions. Each flag can also be set through `CLM_<FLAG>` in the environment,
 * e.g. `CLM_DNS_TOKEN`, which keeps secrets out of the process list.
 */
export function buildCli(args: readonly string[]) {
  return yargs([...args])
    .scriptName('cert-lifecycle')
    .usage('$0 --hostname <fqdn> --email <address> [options]')
    .env('CLM')
    .options({
      hostname: { type: 'string', describe: 'Fully qualified domain name the certificate is issued for' },
      email: { type: 'string', describe: 'ACME account contact address' },
      'dns-provider': {
        type: 'string',
        choices: DNS_PROVIDER_KINDS,
        default: 'digitalocean',
        describe: 'DNS provider hosting the zone',
      },
      'dns-token': { type: 'string', alias: 'do-token', describe: 'API token (digitalocean, linode, cloudflare)' },
      'dns-access-key-id': { type: 'string', describe: 'Access key id (route53)' },
      'dns-secret-access-key': { type: 'string', describe: 'Secret access key (route53)' },
      live: {
        type: 'boolean',
        alias: 'use-production-environment',
        default: false,
        describe: 'Issue trusted certificates from the production environment instead of staging',
      },
      'force-renew': { type: 'boolean', default: false, describe: 'Renew even when the certificate is still valid' },
      'import-certificate': {
        type: 'boolean',
        alias: 'import-cert',
        default: false,
        describe: 'Import the certificate into the target server',
      },
      'restart-after-import': {
        type: 'boolean',
        alias: 'restart-fms',
        default: false,
        describe: 'Restart the target server after a successful import',
      },
      'admin-username': { type: 'string', alias: 'fms-username', describe: 'Target server admin user' },
      'admin-password': { type: 'string', alias: 'fms-password', describe: 'Target server admin password' },
      debug: { type: 'boolean', default: false, describe: 'Verbose logging' },
    })
    .version()
    .help()
    .wrap(null);
}

/**
 * Parsed flags in camelCase, before validation.
 */
export interface CliArguments {
  hostname?: string;
  email?: string;
  dnsProvider?: string;
  dnsToken?: string;
  dnsAccessKeyId?: string;
  dnsSecretAccessKey?: string;
  live?: boolean;
  forceRenew?: boolean;
  importCertificate?: boolean;
  restartAfterImport?: boolean;
  adminUsername?: string;
  adminPassword?: string;
  debug?: boolean;
}

function collectMessages(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...collectMessages(error.children ?? []),
  ]);
}

/**
 * Validates parsed flags and converts them into the parameters of a run.
 *
 * @throws {ParameterValidationError} listing every problem found
 */
export function toRunParameters(args: CliArguments): RunParameters {
  const dto = plainToInstance(RunParametersDto, {
    hostname: args.hostname?.toLowerCase(),
    email: args.email,
    dnsProvider: args.dnsProvider,
    dnsToken: args.dnsToken,
    dnsAccessKeyId: args.dnsAccessKeyId,
    dnsSecretAccessKey: args.dnsSecretAccessKey,
    live: args.live,
    forceRenew: args.forceRenew,
    importCertificate: args.importCertificate,
    restartAfterImport: args.restartAfterImport,
    adminUsername: args.adminUsername,
    adminPassword: args.adminPassword,
    debug: args.debug,
  });

  const issues = collectMessages(validateSync(dto));
  if (issues.length > 0) {
    throw new ParameterValidationError(issues);
  }

  return {
    hostname: dto.hostname,
    email: dto.email,
    dnsProvider: dto.dnsProvider,
    dnsCredentials: {
      token: dto.dnsToken,
      accessKeyId: dto.dnsAccessKeyId,
      secretAccessKey: dto.dnsSecretAccessKey,
    },
    useProductionEnvironment: dto.live,
    forceRenew: dto.forceRenew,
    importCertificate: dto.importCertificate,
    restartAfterImport: dto.restartAfterImport,
    adminCredentials:
      dto.importCertificate && dto.adminUsername && dto.adminPassword
        ? { username: dto.adminUsername, password: dto.adminPassword }
        : undefined,
    debug: dto.debug ?? false,
  };
}

/**
 * Parses `argv` (without the node and script entries).
 * `--help` and `--version` print and exit inside yargs.
 */
export function parseCommandLine(args: readonly string[]): RunParameters {
  return toRunParameters(buildCli(args).parseSync());
}
