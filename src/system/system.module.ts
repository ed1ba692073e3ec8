import { Module } from '@nestjs/common';
import { CommandRunnerService } from './command-runner.service';
import { OwnershipService } from './ownership.service';
import { RunLockService } from './run-lock.service';

/**
 * Host-level plumbing shared by the lifecycle modules: running external tools,
 * file ownership, and the per-hostname run lock.
 */
@Module({
  providers: [CommandRunnerService, OwnershipService, RunLockService],
  exports: [CommandRunnerService, OwnershipService, RunLockService],
})
export class SystemModule {}
