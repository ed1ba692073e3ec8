import { Module } from '@nestjs/common';
import { SystemModule } from '../system/system.module';
import { CertbotClientService } from './certbot-client.service';
import { ISSUANCE_CLIENT } from './issuance.tokens';

@Module({
  imports: [SystemModule],
  providers: [
    CertbotClientService,
    {
      provide: ISSUANCE_CLIENT,
      useExisting: CertbotClientService,
    },
  ],
  exports: [ISSUANCE_CLIENT],
})
export class IssuanceModule {}
