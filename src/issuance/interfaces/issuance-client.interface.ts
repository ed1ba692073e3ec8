import type { Outcome } from '../../shared/outcome';
import type { CredentialScope, DnsProviderKind } from '../../credentials/interfaces';
import type { IssuanceEnvironment } from '../../lifecycle/interfaces/run-parameters.interface';

/**
 * The external ACME client that proves control over a hostname through DNS-01
 * and writes the resulting certificate under the certificate directory.
 */
export interface IssuanceClient {
  /** Checks the client and the provider's DNS plugin are installed. */
  verifyPrerequisites(provider: DnsProviderKind): Promise<Outcome>;
  /** Issues a new certificate for the hostname, replacing any existing one. */
  request(hostname: string, email: string, environment: IssuanceEnvironment, scope: CredentialScope): Promise<Outcome>;
  /** Renews the hostname's existing certificate; `force` renews even when the client considers it current. */
  renew(hostname: string, environment: IssuanceEnvironment, force: boolean, scope: CredentialScope): Promise<Outcome>;
}
