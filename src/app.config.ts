import { registerAs } from '@nestjs/config';
import * as process from 'process';
import { join } from 'path';
import {
  DEFAULT_ADMIN_COMMAND,
  DEFAULT_CERTBOT_COMMAND,
  DEFAULT_CERTBOT_DIR,
  DEFAULT_CREDENTIALS_DIR,
  DEFAULT_RESTART_GRACE_MS,
  DEFAULT_SERVICE_CONTROL_COMMAND,
  DEFAULT_SERVICE_GROUP,
  DEFAULT_SERVICE_NAME,
  DEFAULT_SERVICE_USER,
} from './config/config.constants';
import { parseNumberWithDefault, parseOptionalNumber, parseStringWithDefault } from './config/config.parsers';
import type { CertbotConfig, ClmConfiguration, PathsConfig, TargetConfig } from './config/config.types';

/**
 * Builds the filesystem layout from environment variables.
 *
 * Optional environment variables:
 * - CLM_CERTBOT_DIR: certbot config/work directory (default: FileMaker Server's CStore/Certbot)
 * - CLM_LOG_DIR: certbot logs directory (default: `${CLM_CERTBOT_DIR}/logs`)
 * - CLM_STATE_DIR: state file directory (default: CLM_CERTBOT_DIR)
 * - CLM_LOCK_DIR: single-flight lock directory (default: CLM_STATE_DIR)
 * - CLM_CREDENTIALS_DIR: transient DNS credentials directory (default: /etc/certbot)
 */
export function buildPathsConfig(): PathsConfig {
  const certbotDir = parseStringWithDefault(process.env.CLM_CERTBOT_DIR, DEFAULT_CERTBOT_DIR);
  const stateDir = parseStringWithDefault(process.env.CLM_STATE_DIR, certbotDir);

  return {
    certbotDir,
    logDir: parseStringWithDefault(process.env.CLM_LOG_DIR, join(certbotDir, 'logs')),
    stateDir,
    lockDir: parseStringWithDefault(process.env.CLM_LOCK_DIR, stateDir),
    credentialsDir: parseStringWithDefault(process.env.CLM_CREDENTIALS_DIR, DEFAULT_CREDENTIALS_DIR),
  };
}

/**
 * Optional environment variables:
 * - CLM_CERTBOT_COMMAND: certbot executable (default: certbot)
 * - CLM_DNS_PROPAGATION_SECONDS: DNS propagation wait passed to the plugin (default: plugin's own)
 */
export function buildCertbotConfig(): CertbotConfig {
  return {
    command: parseStringWithDefault(process.env.CLM_CERTBOT_COMMAND, DEFAULT_CERTBOT_COMMAND),
    propagationSeconds: parseOptionalNumber(process.env.CLM_DNS_PROPAGATION_SECONDS),
  };
}

/**
 * Optional environment variables:
 * - CLM_ADMIN_COMMAND: admin CLI used for certificate import (default: fmsadmin)
 * - CLM_SERVICE_CONTROL_COMMAND: service manager (default: systemctl)
 * - CLM_SERVICE_NAME: service restarted after import (default: fmshelper)
 * - CLM_SERVICE_USER / CLM_SERVICE_GROUP: runtime account (default: fmserver / fmsadmin)
 * - CLM_RESTART_GRACE_MS: wait between stop and start (default: 10000)
 */
export function buildTargetConfig(): TargetConfig {
  return {
    adminCommand: parseStringWithDefault(process.env.CLM_ADMIN_COMMAND, DEFAULT_ADMIN_COMMAND),
    serviceControlCommand: parseStringWithDefault(
      process.env.CLM_SERVICE_CONTROL_COMMAND,
      DEFAULT_SERVICE_CONTROL_COMMAND,
    ),
    serviceName: parseStringWithDefault(process.env.CLM_SERVICE_NAME, DEFAULT_SERVICE_NAME),
    serviceUser: parseStringWithDefault(process.env.CLM_SERVICE_USER, DEFAULT_SERVICE_USER),
    serviceGroup: parseStringWithDefault(process.env.CLM_SERVICE_GROUP, DEFAULT_SERVICE_GROUP),
    restartGraceMs: parseNumberWithDefault(process.env.CLM_RESTART_GRACE_MS, DEFAULT_RESTART_GRACE_MS),
  };
}

/**
 * Register Config CLM
 */
export default registerAs(
  'clm',
  (): ClmConfiguration => ({
    paths: buildPathsConfig(),
    certbot: buildCertbotConfig(),
    target: buildTargetConfig(),
  }),
);
