import { Module } from '@nestjs/common';
import { SystemModule } from '../system/system.module';
import { CredentialsModule } from '../credentials/credentials.module';
import { CertificateModule } from '../certificate/certificate.module';
import { StateModule } from '../state/state.module';
import { IssuanceModule } from '../issuance/issuance.module';
import { DeliveryModule } from '../delivery/delivery.module';
import { RunControllerService } from './run-controller.service';

@Module({
  imports: [SystemModule, CredentialsModule, CertificateModule, StateModule, IssuanceModule, DeliveryModule],
  providers: [RunControllerService],
  exports: [RunControllerService],
})
export class LifecycleModule {}
