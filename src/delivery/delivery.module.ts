import { Module } from '@nestjs/common';
import { SystemModule } from '../system/system.module';
import { CertificateModule } from '../certificate/certificate.module';
import { DeliveryService } from './delivery.service';
import { FileMakerAdminService } from './filemaker-admin.service';
import { TARGET_SERVER_ADMIN } from './delivery.tokens';

@Module({
  imports: [SystemModule, CertificateModule],
  providers: [
    DeliveryService,
    FileMakerAdminService,
    {
      provide: TARGET_SERVER_ADMIN,
      useExisting: FileMakerAdminService,
    },
  ],
  exports: [DeliveryService, TARGET_SERVER_ADMIN],
})
export class DeliveryModule {}
