import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import { OwnershipService } from '../system/ownership.service';
import { assertSafeHostname } from '../config/config.validators';
import { StatePersistenceError } from '../lifecycle/lifecycle.errors';
import { getErrorCode, getErrorMessage } from '../shared/error.utils';
import type { PathsConfig } from '../config/config.types';
import type { StateRecord, StateStore } from './interfaces';

/**
 * Reads a boolean written either as a JSON boolean or as the strings "true"/"false".
 */
function readFlag(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === 'true' || value === 'false') {
    return value === 'true';
  }
  return undefined;
}

function readString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Accepts the current record layout and the snake_case layout with string
 * booleans written by earlier versions of the tool.
 *
 * @returns the normalised record, or a description of what is missing
 */
export function normaliseStateRecord(raw: unknown): StateRecord | string {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return 'not a JSON object';
  }

  const fields = new Map<string, unknown>(Object.entries(raw));
  const hostname = readString(fields.get('hostname'));
  const email = readString(fields.get('email'));
  const isStagingEnvironment = readFlag(fields.get('isStagingEnvironment') ?? fields.get('sandbox'));
  const lastRunTimestamp = readString(fields.get('lastRunTimestamp') ?? fields.get('last_run'));
  const certificateConfirmedPresent = readFlag(
    fields.get('certificateConfirmedPresent') ?? fields.get('cert_exists'),
  );

  if (
    hostname === undefined ||
    email === undefined ||
    isStagingEnvironment === undefined ||
    lastRunTimestamp === undefined ||
    certificateConfirmedPresent === undefined
  ) {
    const missing = Object.entries({
      hostname,
      email,
      isStagingEnvironment,
      lastRunTimestamp,
      certificateConfirmedPresent,
    })
      .filter(([, value]) => value === undefined)
      .map(([field]) => field);
    return `missing or invalid ${missing.join(', ')}`;
  }

  return { hostname, email, isStagingEnvironment, lastRunTimestamp, certificateConfirmedPresent };
}

/**
 * One JSON file per hostname: `<stateDir>/state_<hostname>.json`.
 */
@Injectable()
export class FileStateStoreService implements StateStore {
  private readonly logger = new Logger(FileStateStoreService.name);
  private readonly stateDir: string;

  constructor(
    configService: ConfigService,
    private readonly ownershipService: OwnershipService,
  ) {
    this.stateDir = configService.getOrThrow<PathsConfig>('clm.paths').stateDir;
  }

  getStatePath(hostname: string): string {
    return path.join(this.stateDir, `state_${assertSafeHostname(hostname)}.json`);
  }

  /**
   * An unreadable or malformed file is reported and treated as no prior state,
   * so the next run starts over instead of failing forever.
   */
  async read(hostname: string): Promise<StateRecord | null> {
    const statePath = this.getStatePath(hostname);

    let contents: string;
    try {
      contents = await fs.promises.readFile(statePath, 'utf-8');
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') {
        this.logger.log(`No previous state for ${hostname}`);
        return null;
      }
      this.logger.warn('State file could not be read; ignoring it', { path: statePath, error: getErrorMessage(error) });
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(contents);
    } catch (error) {
      this.logger.warn('State file is not valid JSON; ignoring it', { path: statePath, error: getErrorMessage(error) });
      return null;
    }

    const record = normaliseStateRecord(parsed);
    if (typeof record === 'string') {
      this.logger.warn(`State file is incomplete (${record}); ignoring it`, { path: statePath });
      return null;
    }

    this.logger.debug('Previous state loaded', { ...record });
    return record;
  }

  /**
   * Writes to a temporary file beside the target and renames it into place.
   */
  async write(record: StateRecord): Promise<void> {
    const statePath = this.getStatePath(record.hostname);
    const tempPath = `${statePath}.tmp-${process.pid}-${Date.now()}`;

    let directoryReady = false;
    try {
      await fs.promises.mkdir(this.stateDir, { recursive: true, mode: 0o700 });
      directoryReady = true;
      await fs.promises.writeFile(tempPath, JSON.stringify(record, null, 2) + '\n', { mode: 0o600 });

      const ownership = await this.ownershipService.transferToServiceAccount([tempPath]);
      if (!ownership.ok) {
        this.logger.warn(`State file ownership unchanged: ${ownership.reason}`, { path: statePath });
      }

      await fs.promises.rename(tempPath, statePath);
    } catch (error) {
      if (directoryReady) {
        await fs.promises.rm(tempPath, { force: true });
      }
      throw new StatePersistenceError(`Could not write ${statePath}: ${getErrorMessage(error)}`, { cause: error });
    }

    this.logger.debug('State written', { path: statePath });
  }
}
