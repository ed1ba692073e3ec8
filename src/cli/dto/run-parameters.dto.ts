import { IsBoolean, IsEmail, IsIn, IsNotEmpty, IsOptional, Matches, ValidateIf } from 'class-validator';
import { DNS_PROVIDER_KINDS } from '../../credentials/interfaces';
import { DNS_PROVIDERS } from '../../credentials/dns-providers';
import { DOMAIN_PATTERN } from '../../config/config.validators';
import type { CredentialField, DnsProviderKind } from '../../credentials/interfaces';

const requires = (field: CredentialField) => (dto: RunParametersDto) =>
  DNS_PROVIDERS[dto.dnsProvider]?.requiredFields.includes(field) ?? false;

/**
 * Flags of one invocation, as parsed from the command line and `CLM_*` environment variables.
 */
export class RunParametersDto {
  // Same rule as the file names derived from the hostname.
  @Matches(DOMAIN_PATTERN, { message: 'hostname must be a fully qualified domain name' })
  hostname!: string;

  @IsEmail({}, { message: 'email must be a valid email address' })
  email!: string;

  @IsIn(DNS_PROVIDER_KINDS, { message: `dns-provider must be one of: ${DNS_PROVIDER_KINDS.join(', ')}` })
  dnsProvider!: DnsProviderKind;

  @ValidateIf(requires('token'))
  @IsNotEmpty({ message: 'dns-token is required for this DNS provider' })
  dnsToken?: string;

  @ValidateIf(requires('accessKeyId'))
  @IsNotEmpty({ message: 'dns-access-key-id is required for this DNS provider' })
  dnsAccessKeyId?: string;

  @ValidateIf(requires('secretAccessKey'))
  @IsNotEmpty({ message: 'dns-secret-access-key is required for this DNS provider' })
  dnsSecretAccessKey?: string;

  @IsBoolean()
  live!: boolean;

  @IsBoolean()
  forceRenew!: boolean;

  @IsBoolean()
  importCertificate!: boolean;

  @IsBoolean()
  restartAfterImport!: boolean;

  @ValidateIf((dto: RunParametersDto) => dto.importCertificate)
  @IsNotEmpty({ message: 'admin-username is required with --import-certificate' })
  adminUsername?: string;

  @ValidateIf((dto: RunParametersDto) => dto.importCertificate)
  @IsNotEmpty({ message: 'admin-password is required with --import-certificate' })
  adminPassword?: string;

  @IsOptional()
  @IsBoolean()
  debug?: boolean;
}
