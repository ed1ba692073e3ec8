import { Module } from '@nestjs/common';
import { SystemModule } from '../system/system.module';
import { FileStateStoreService } from './file-state-store.service';
import { STATE_STORE } from './state.tokens';

@Module({
  imports: [SystemModule],
  providers: [
    FileStateStoreService,
    {
      provide: STATE_STORE,
      useExisting: FileStateStoreService,
    },
  ],
  exports: [STATE_STORE],
})
export class StateModule {}
