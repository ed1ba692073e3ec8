import type { CredentialField, DnsProviderCredentials, DnsProviderDefinition, DnsProviderKind } from './interfaces';

/**
 * certbot's `--<plugin>-credentials` file format: one `key = value` per line.
 */
function renderIni(entries: Array<[string, string | number]>): string {
  return entries.map(([key, value]) => `${key} = ${value}`).join('\n') + '\n';
}

function credentialsFileArgs(plugin: string): (credentialsPath: string) => string[] {
  return (credentialsPath) => [`--${plugin}`, `--${plugin}-credentials`, credentialsPath];
}

const noEnvironment = (): Record<string, string> => ({});

export const DNS_PROVIDERS: Readonly<Record<DnsProviderKind, DnsProviderDefinition>> = {
  digitalocean: {
    plugin: 'dns-digitalocean',
    requiredFields: ['token'],
    supportsPropagationSeconds: true,
    renderCredentialsFile: (credentials) => renderIni([['dns_digitalocean_token', credentials.token ?? '']]),
    certbotArgs: credentialsFileArgs('dns-digitalocean'),
    environment: noEnvironment,
  },
  linode: {
    plugin: 'dns-linode',
    requiredFields: ['token'],
    supportsPropagationSeconds: true,
    renderCredentialsFile: (credentials) =>
      renderIni([
        ['dns_linode_key', credentials.token ?? ''],
        ['dns_linode_version', 4],
      ]),
    certbotArgs: credentialsFileArgs('dns-linode'),
    environment: noEnvironment,
  },
  cloudflare: {
    plugin: 'dns-cloudflare',
    requiredFields: ['token'],
    supportsPropagationSeconds: true,
    renderCredentialsFile: (credentials) => renderIni([['dns_cloudflare_api_token', credentials.token ?? '']]),
    certbotArgs: credentialsFileArgs('dns-cloudflare'),
    environment: noEnvironment,
  },
  // The route53 plugin reads the standard AWS credential chain instead of a credentials flag.
  route53: {
    plugin: 'dns-route53',
    requiredFields: ['accessKeyId', 'secretAccessKey'],
    supportsPropagationSeconds: false,
    renderCredentialsFile: (credentials) =>
      '[default]\n' +
      renderIni([
        ['aws_access_key_id', credentials.accessKeyId ?? ''],
        ['aws_secret_access_key', credentials.secretAccessKey ?? ''],
      ]),
    certbotArgs: () => ['--dns-route53'],
    environment: (credentialsPath) => ({ AWS_SHARED_CREDENTIALS_FILE: credentialsPath }),
  },
};

export function getDnsProvider(kind: DnsProviderKind): DnsProviderDefinition {
  return DNS_PROVIDERS[kind];
}

/**
 * Names of required credential fields that are missing or blank.
 */
export function missingCredentialFields(kind: DnsProviderKind, credentials: DnsProviderCredentials): CredentialField[] {
  return DNS_PROVIDERS[kind].requiredFields.filter((field) => !credentials[field]?.trim());
}
