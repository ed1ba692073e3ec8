/**
 * Filesystem locations used by a run.
 */
export interface PathsConfig {
  /** certbot --config-dir and --work-dir; certificates live under `live/<hostname>/`. */
  certbotDir: string;
  /** certbot --logs-dir. */
  logDir: string;
  /** Directory holding `state_<hostname>.json`. */
  stateDir: string;
  /** Directory holding `<hostname>.lock`. */
  lockDir: string;
  /** Directory where transient DNS credential files are created. */
  credentialsDir: string;
}

export interface CertbotConfig {
  command: string;
  /** Forwarded as `--dns-<plugin>-propagation-seconds` when set. */
  propagationSeconds?: number;
}

/**
 * The application server that receives certificates, and the account it runs as.
 */
export interface TargetConfig {
  adminCommand: string;
  serviceControlCommand: string;
  serviceName: string;
  serviceUser: string;
  serviceGroup: string;
  restartGraceMs: number;
}

/**
 * Configuration type definition for type-safe access
 */
export interface ClmConfiguration {
  paths: PathsConfig;
  certbot: CertbotConfig;
  target: TargetConfig;
}
