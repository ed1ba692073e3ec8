/**
 * What is on disk for a hostname right now. Computed fresh every run.
 */
export interface CertificateRecord {
  /** Both artifacts present and the certificate parses. */
  exists: boolean;
  /** Artifacts present but unreadable; reported as `exists: false`. */
  corrupt: boolean;
  notAfter?: Date;
  /** Whole days until `notAfter`, negative once expired. */
  daysRemaining?: number;
}

/**
 * Paths of the full-chain certificate and private key for a hostname.
 */
export interface CertificateArtifactPaths {
  directory: string;
  fullchain: string;
  privateKey: string;
}
