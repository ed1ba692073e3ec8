import { Module } from '@nestjs/common';
import { SystemModule } from '../system/system.module';
import { CredentialScopeService } from './credential-scope.service';

@Module({
  imports: [SystemModule],
  providers: [CredentialScopeService],
  exports: [CredentialScopeService],
})
export class CredentialsModule {}
