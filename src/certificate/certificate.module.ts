import { Module } from '@nestjs/common';
import { CertificateInspectorService } from './certificate-inspector.service';

/**
 * Certificate Module
 *
 * Read-only view of the certificate artifacts on disk.
 */
@Module({
  providers: [CertificateInspectorService],
  exports: [CertificateInspectorService],
})
export class CertificateModule {}
