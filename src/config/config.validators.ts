/**
 * Fully qualified domain name: one or more labels, then an alphabetic or punycode TLD.
 * Matches: example.com, fms.example.com, sub.domain.example.org, example.xn--p1ai
 */
export const DOMAIN_PATTERN = /^(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+(?:[a-zA-Z]{2,63}|xn--[a-zA-Z0-9-]{1,59})$/;

/**
 * Validates domain format using basic domain regex.
 *
 * Checks if a domain follows basic DNS naming rules.
 * Allows subdomains, TLDs with 2+ characters and punycode TLDs.
 *
 * @param domain - Domain name to validate
 * @returns True if domain format is valid
 */
export function isValidDomain(domain: string): boolean {
  return DOMAIN_PATTERN.test(domain);
}

/**
 * Rejects anything that could escape the directory a hostname-derived file name is joined to.
 *
 * @throws {Error} If the hostname is not a plain domain name
 */
export function assertSafeHostname(hostname: string): string {
  if (!isValidDomain(hostname)) {
    throw new Error(`Invalid hostname "${hostname}"`);
  }
  return hostname.toLowerCase();
}
