export const DNS_PROVIDER_KINDS = ['digitalocean', 'linode', 'cloudflare', 'route53'] as const;

export type DnsProviderKind = (typeof DNS_PROVIDER_KINDS)[number];

/**
 * Secrets for the DNS provider plugin. Token providers use `token`;
 * key-pair providers use `accessKeyId` and `secretAccessKey`.
 */
export interface DnsProviderCredentials {
  token?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
}

export type CredentialField = keyof DnsProviderCredentials;

/**
 * How one certbot DNS plugin is driven.
 */
export interface DnsProviderDefinition {
  /** certbot plugin name as listed by `certbot plugins`. */
  plugin: string;
  /** Credential fields that must be present and non-empty. */
  requiredFields: readonly CredentialField[];
  /** Whether the plugin accepts `--<plugin>-propagation-seconds`. */
  supportsPropagationSeconds: boolean;
  /** Contents of the transient credentials file. */
  renderCredentialsFile(credentials: DnsProviderCredentials): string;
  /** certbot flags selecting the plugin and pointing it at the credentials file. */
  certbotArgs(credentialsPath: string): string[];
  /** Environment the plugin needs in addition to the flags. */
  environment(credentialsPath: string): Record<string, string>;
}
