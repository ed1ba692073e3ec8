import type { DnsProviderCredentials, DnsProviderKind } from '../../credentials/interfaces';

/**
 * Staging issues untrusted certificates without rate limits; production issues trusted ones.
 */
export type IssuanceEnvironment = 'staging' | 'production';

export interface AdminCredentials {
  username: string;
  password: string;
}

/**
 * Everything one invocation was asked to do. Never persisted.
 */
export interface RunParameters {
  hostname: string;
  email: string;
  dnsProvider: DnsProviderKind;
  dnsCredentials: DnsProviderCredentials;
  useProductionEnvironment: boolean;
  forceRenew: boolean;
  importCertificate: boolean;
  /** Only takes effect when the import ran and succeeded. */
  restartAfterImport: boolean;
  /** Required when `importCertificate` is set. */
  adminCredentials?: AdminCredentials;
  debug: boolean;
}

export function issuanceEnvironmentOf(params: Pick<RunParameters, 'useProductionEnvironment'>): IssuanceEnvironment {
  return params.useProductionEnvironment ? 'production' : 'staging';
}
