import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash, randomBytes } from 'crypto';
import * as fs from 'fs';
import type { FileHandle } from 'fs/promises';
import * as path from 'path';
import { CommandRunnerService } from './command-runner.service';
import { assertSafeHostname } from '../config/config.validators';
import { getErrorCode } from '../shared/error.utils';
import type { PathsConfig } from '../config/config.types';

interface LockOwner {
  pid: number;
  hostname: string;
  acquiredAt: string;
  token: string;
}

/** What a lock file held at the moment it was read. */
interface LockSnapshot {
  fingerprint: string;
  modifiedAtMs: number;
  ownerPid: number | null;
}

/** A lock file without a readable owner older than this is treated as abandoned. */
const UNREADABLE_LOCK_GRACE_MS = 60_000;

const MAX_ACQUIRE_ATTEMPTS = 3;

/** Reclaim guards tried for one abandoned lock before giving up. */
const MAX_RECLAIM_GENERATIONS = 5;

function hasOwnerPid(value: unknown): value is Pick<LockOwner, 'pid'> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'pid' in value &&
    typeof value.pid === 'number' &&
    Number.isInteger(value.pid) &&
    value.pid > 0
  );
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else.
    return getErrorCode(error) === 'EPERM';
  }
}

/**
 * Identifies one particular lock file: same inode, same modification time, same content.
 */
export function lockFingerprint(raw: string, stats: Pick<fs.Stats, 'ino' | 'mtimeMs'>): string {
  return createHash('sha256').update(`${stats.ino}:${stats.mtimeMs}:${raw}`).digest('hex').slice(0, 16);
}

/**
 * Single-flight guard: at most one run per hostname holds `<lockDir>/<hostname>.lock`.
 *
 * The lock file records the owner's pid. A lock whose owner is no longer running is
 * reclaimed, so a killed run does not block every later one. Reclaiming goes through a
 * guard file named after the abandoned lock's fingerprint, created exclusively, so only
 * one contender removes that lock and nobody removes a lock taken after it.
 */
@Injectable()
export class RunLockService implements OnApplicationShutdown {
  private readonly logger = new Logger(RunLockService.name);
  private readonly paths: PathsConfig;
  private readonly held = new Set<string>();

  constructor(
    configService: ConfigService,
    private readonly commandRunner: CommandRunnerService,
  ) {
    this.paths = configService.getOrThrow<PathsConfig>('clm.paths');
  }

  getLockPath(hostname: string): string {
    return path.join(this.paths.lockDir, `${assertSafeHostname(hostname)}.lock`);
  }

  /**
   * Attempts to take the hostname's lock.
   * @returns true when acquired, false when another live run holds it
   */
  async acquire(hostname: string): Promise<boolean> {
    const lockPath = this.getLockPath(hostname);
    await fs.promises.mkdir(this.paths.lockDir, { recursive: true, mode: 0o700 });

    for (let attempt = 0; attempt < MAX_ACQUIRE_ATTEMPTS; attempt++) {
      if (await this.createExclusive(lockPath, hostname)) {
        this.held.add(lockPath);
        this.logger.debug('Run lock acquired', { lockPath });
        return true;
      }

      const snapshot = await this.readSnapshot(lockPath);
      if (snapshot === null) {
        // Released between our create and read.
        continue;
      }

      if (!this.isAbandoned(snapshot) || !(await this.reclaim(lockPath, hostname, snapshot))) {
        this.logger.warn(`Another run for ${hostname} is in progress`, { lockPath });
        return false;
      }
    }

    this.logger.warn(`Could not take the run lock for ${hostname}`, { lockPath });
    return false;
  }

  async release(hostname: string): Promise<void> {
    const lockPath = this.getLockPath(hostname);
    if (!this.held.has(lockPath)) {
      return;
    }

    await fs.promises.rm(lockPath, { force: true });
    this.held.delete(lockPath);
    this.logger.debug('Run lock released', { lockPath });
  }

  /**
   * Releases locks still held when the process is asked to stop, once the tools
   * started under them have exited.
   */
  async onApplicationShutdown(): Promise<void> {
    await this.commandRunner.terminateAll();
    for (const lockPath of this.held) {
      await fs.promises.rm(lockPath, { force: true });
    }
    this.held.clear();
  }

  /**
   * Removes the abandoned lock described by `snapshot`, if it is still in place.
   * @returns false when another live run is already reclaiming it
   */
  private async reclaim(lockPath: string, hostname: string, snapshot: LockSnapshot): Promise<boolean> {
    const guardPathFor = (generation: number) => `${lockPath}.reclaim-${snapshot.fingerprint}-${generation}`;

    for (let generation = 0; generation < MAX_RECLAIM_GENERATIONS; generation++) {
      if (await this.createExclusive(guardPathFor(generation), hostname)) {
        const current = await this.readSnapshot(lockPath);
        if (current?.fingerprint === snapshot.fingerprint) {
          this.logger.warn('Reclaiming abandoned run lock', { lockPath, ownerPid: snapshot.ownerPid });
          await fs.promises.rm(lockPath, { force: true });
        }

        // The abandoned lock is gone for good, so its guards protect nothing any more.
        for (let stale = 0; stale <= generation; stale++) {
          await fs.promises.rm(guardPathFor(stale), { force: true });
        }
        return true;
      }

      const guard = await this.readSnapshot(guardPathFor(generation));
      if (guard === null) {
        // Guards are only removed once the abandoned lock is gone.
        return true;
      }
      if (!this.isAbandoned(guard)) {
        return false;
      }
      // The reclaimer holding this guard died; the next generation takes over.
    }

    return false;
  }

  private async createExclusive(filePath: string, hostname: string): Promise<boolean> {
    let handle: FileHandle;
    try {
      handle = await fs.promises.open(filePath, 'wx', 0o600);
    } catch (error) {
      if (getErrorCode(error) === 'EEXIST') {
        return false;
      }
      throw error;
    }

    try {
      const owner: LockOwner = {
        pid: process.pid,
        hostname,
        acquiredAt: new Date().toISOString(),
        token: randomBytes(8).toString('hex'),
      };
      await handle.writeFile(JSON.stringify(owner));
    } finally {
      await handle.close();
    }
    return true;
  }

  private async readSnapshot(filePath: string): Promise<LockSnapshot | null> {
    let handle: FileHandle;
    try {
      handle = await fs.promises.open(filePath, 'r');
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') {
        return null;
      }
      throw error;
    }

    let raw: string;
    let stats: fs.Stats;
    try {
      raw = await handle.readFile('utf-8');
      stats = await handle.stat();
    } finally {
      await handle.close();
    }

    let owner: unknown;
    try {
      owner = JSON.parse(raw);
    } catch {
      owner = undefined;
    }

    return {
      fingerprint: lockFingerprint(raw, stats),
      modifiedAtMs: stats.mtimeMs,
      ownerPid: hasOwnerPid(owner) ? owner.pid : null,
    };
  }

  private isAbandoned(snapshot: LockSnapshot): boolean {
    if (snapshot.ownerPid !== null) {
      return !isProcessAlive(snapshot.ownerPid);
    }

    // The owner may still be writing its pid.
    return Date.now() - snapshot.modifiedAtMs > UNREADABLE_LOCK_GRACE_MS;
  }
}
