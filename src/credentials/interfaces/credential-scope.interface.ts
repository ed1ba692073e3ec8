import type { DnsProviderKind } from './dns-provider.interface';

/**
 * A transient credentials file for one run, plus what the issuance client needs to use it.
 * Exists on disk only between acquire and release.
 */
export interface CredentialScope {
  readonly hostname: string;
  readonly provider: DnsProviderKind;
  readonly path: string;
  readonly certbotArgs: readonly string[];
  readonly environment: Readonly<Record<string, string>>;
}
