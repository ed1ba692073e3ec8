import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import { CertificateInspectorService } from '../certificate/certificate-inspector.service';
import { OwnershipService } from '../system/ownership.service';
import { TARGET_SERVER_ADMIN } from './delivery.tokens';
import { getErrorMessage } from '../shared/error.utils';
import { failed, succeeded } from '../shared/outcome';
import type { Outcome } from '../shared/outcome';
import type { TargetConfig } from '../config/config.types';
import type { DeliveryOptions, TargetServerAdmin } from './interfaces';

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Makes a freshly issued certificate usable by the target server.
 *
 * Steps run in order and stop at the first failure: artifact check, ownership,
 * optional import, and a restart that only follows a successful import.
 */
@Injectable()
export class DeliveryService {
  private readonly logger = new Logger(DeliveryService.name);
  private readonly target: TargetConfig;

  constructor(
    configService: ConfigService,
    private readonly inspector: CertificateInspectorService,
    private readonly ownershipService: OwnershipService,
    @Inject(TARGET_SERVER_ADMIN) private readonly admin: TargetServerAdmin,
  ) {
    this.target = configService.getOrThrow<TargetConfig>('clm.target');
  }

  async deliver(hostname: string, options: DeliveryOptions): Promise<Outcome> {
    const paths = this.inspector.getArtifactPaths(hostname);

    for (const artifact of [paths.fullchain, paths.privateKey]) {
      const problem = await this.checkArtifact(artifact);
      if (problem) {
        return failed(problem);
      }
    }

    const ownership = await this.ownershipService.transferToServiceAccount([
      paths.directory,
      paths.fullchain,
      paths.privateKey,
    ]);
    if (!ownership.ok) {
      return ownership;
    }

    if (!options.importCertificate) {
      this.logger.log('Certificate import not requested; leaving installation to the operator', { hostname });
      return succeeded();
    }

    if (!options.adminCredentials) {
      return failed('Certificate import requested without admin credentials');
    }

    const imported = await this.admin.importCertificate(paths.fullchain, paths.privateKey, options.adminCredentials);
    if (!imported.ok) {
      return imported;
    }

    if (!options.restartAfterImport) {
      this.logger.log('Restart not requested; the certificate takes effect on the next service restart', {
        hostname,
      });
      return succeeded();
    }

    return this.restart();
  }

  private async restart(): Promise<Outcome> {
    const stopped = await this.admin.stopService();
    if (!stopped.ok) {
      return stopped;
    }

    this.logger.debug(`Waiting ${this.target.restartGraceMs}ms before starting ${this.target.serviceName}`);
    await sleep(this.target.restartGraceMs);

    return this.admin.startService();
  }

  /**
   * @returns a description of what is wrong with the artifact, or undefined when it is usable
   */
  private async checkArtifact(filePath: string): Promise<string | undefined> {
    try {
      const stats = await fs.promises.stat(filePath);
      return stats.size > 0 ? undefined : `${filePath} is empty`;
    } catch (error) {
      return `${filePath} is not readable: ${getErrorMessage(error)}`;
    }
  }
}
