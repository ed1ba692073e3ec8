import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import * as acme from 'acme-client';
import type { CertificateInfo } from 'acme-client';
import { assertSafeHostname } from '../config/config.validators';
import { getErrorCode, getErrorMessage } from '../shared/error.utils';
import type { PathsConfig } from '../config/config.types';
import type { CertificateArtifactPaths, CertificateRecord } from './interfaces';

const MS_PER_DAY = 1000 * 60 * 60 * 24;

/**
 * Whole days from `now` until `notAfter`, rounded down. Negative once expired.
 */
export function computeDaysRemaining(notAfter: Date, now: Date = new Date()): number {
  const diffMs = notAfter.getTime() - now.getTime();
  return Math.floor(diffMs / MS_PER_DAY);
}

/**
 * Reads the certificate the issuance client left under `<certbotDir>/live/<hostname>/`.
 */
@Injectable()
export class CertificateInspectorService {
  private readonly logger = new Logger(CertificateInspectorService.name);
  private readonly certbotDir: string;

  constructor(configService: ConfigService) {
    this.certbotDir = configService.getOrThrow<PathsConfig>('clm.paths').certbotDir;
  }

  getArtifactPaths(hostname: string): CertificateArtifactPaths {
    const directory = path.join(this.certbotDir, 'live', assertSafeHostname(hostname));
    return {
      directory,
      fullchain: path.join(directory, 'fullchain.pem'),
      privateKey: path.join(directory, 'privkey.pem'),
    };
  }

  async inspect(hostname: string): Promise<CertificateRecord> {
    const paths = this.getArtifactPaths(hostname);

    const fullchain = await this.readArtifact(paths.fullchain);
    const privateKey = await this.readArtifact(paths.privateKey);
    if (fullchain === null || privateKey === null) {
      this.logger.debug('No certificate on disk', { hostname, directory: paths.directory });
      return { exists: false, corrupt: false };
    }

    if (privateKey.trim().length === 0) {
      this.logger.warn('Private key is empty; treating certificate as missing', { hostname, path: paths.privateKey });
      return { exists: false, corrupt: true };
    }

    let info: CertificateInfo;
    try {
      info = await acme.forge.readCertificateInfo(fullchain);
    } catch (error) {
      this.logger.warn('Certificate could not be parsed; treating it as missing', {
        hostname,
        path: paths.fullchain,
        error: getErrorMessage(error),
      });
      return { exists: false, corrupt: true };
    }

    const daysRemaining = computeDaysRemaining(info.notAfter);
    this.logger.log(`Certificate for ${hostname} expires in ${daysRemaining} days`, {
      expiresAt: info.notAfter.toISOString(),
    });

    return { exists: true, corrupt: false, notAfter: info.notAfter, daysRemaining };
  }

  /**
   * File contents, or null when the file does not exist.
   */
  private async readArtifact(filePath: string): Promise<string | null> {
    try {
      return await fs.promises.readFile(filePath, 'utf-8');
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }
}
