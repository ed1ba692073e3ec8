import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RunControllerService } from '../run-controller.service';
import { RunPhase } from '../interfaces';
import { StatePersistenceError } from '../lifecycle.errors';
import { CredentialScopeService } from '../../credentials/credential-scope.service';
import { CertificateInspectorService } from '../../certificate/certificate-inspector.service';
import { DeliveryService } from '../../delivery/delivery.service';
import { RunLockService } from '../../system/run-lock.service';
import { CommandRunnerService } from '../../system/command-runner.service';
import { STATE_STORE } from '../../state/state.tokens';
import { ISSUANCE_CLIENT } from '../../issuance/issuance.tokens';
import { TARGET_SERVER_ADMIN } from '../../delivery/delivery.tokens';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';
import type { RunParameters } from '../interfaces';
import type { StateRecord, StateStore } from '../../state/interfaces';
import type { CertificateRecord } from '../../certificate/interfaces';

class InMemoryStateStore implements StateStore {
  readonly records = new Map<string, StateRecord>();
  failWrites = false;

  async read(hostname: string): Promise<StateRecord | null> {
    return this.records.get(hostname) ?? null;
  }

  async write(record: StateRecord): Promise<void> {
    if (this.failWrites) {
      throw new StatePersistenceError('Could not write state_example.com.json: EROFS');
    }
    this.records.set(record.hostname, { ...record });
  }
}

describe('RunControllerService', () => {
  let controller: RunControllerService;
  let rootDir: string;
  let credentialsDir: string;
  let stateStore: InMemoryStateStore;
  let runLock: { acquire: jest.Mock; release: jest.Mock };
  let inspector: { inspect: jest.Mock };
  let delivery: { deliver: jest.Mock };
  let issuanceClient: { verifyPrerequisites: jest.Mock; request: jest.Mock; renew: jest.Mock };
  let targetAdmin: { verifyPrerequisites: jest.Mock };
  let restoreLogger: () => void;

  const missing: CertificateRecord = { exists: false, corrupt: false };
  const valid = (daysRemaining: number): CertificateRecord => ({
    exists: true,
    corrupt: false,
    notAfter: new Date(Date.now() + daysRemaining * 86_400_000),
    daysRemaining,
  });

  const params: RunParameters = {
    hostname: 'example.com',
    email: 'admin@example.com',
    dnsProvider: 'digitalocean',
    dnsCredentials: { token: 'test-token' },
    useProductionEnvironment: false,
    forceRenew: false,
    importCertificate: true,
    restartAfterImport: true,
    adminCredentials: { username: 'admin', password: 'test-password' },
    debug: false,
  };

  const priorState = (overrides: Partial<StateRecord> = {}): StateRecord => ({
    hostname: 'example.com',
    email: 'admin@example.com',
    isStagingEnvironment: true,
    lastRunTimestamp: '2026-01-01T00:00:00.000Z',
    certificateConfirmedPresent: true,
    ...overrides,
  });

  beforeEach(async () => {
    restoreLogger = silenceNestLogger();
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'clm-run-'));
    credentialsDir = path.join(rootDir, 'credentials');
    stateStore = new InMemoryStateStore();
    runLock = { acquire: jest.fn().mockResolvedValue(true), release: jest.fn().mockResolvedValue(undefined) };
    inspector = { inspect: jest.fn() };
    delivery = { deliver: jest.fn().mockResolvedValue({ ok: true }) };
    issuanceClient = {
      verifyPrerequisites: jest.fn().mockResolvedValue({ ok: true }),
      request: jest.fn().mockResolvedValue({ ok: true }),
      renew: jest.fn().mockResolvedValue({ ok: true }),
    };
    targetAdmin = { verifyPrerequisites: jest.fn().mockResolvedValue({ ok: true }) };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RunControllerService,
        CredentialScopeService,
        { provide: ConfigService, useValue: new ConfigService({ clm: { paths: { credentialsDir } } }) },
        { provide: RunLockService, useValue: runLock },
        { provide: CommandRunnerService, useValue: { terminateAll: jest.fn().mockResolvedValue(undefined) } },
        { provide: CertificateInspectorService, useValue: inspector },
        { provide: DeliveryService, useValue: delivery },
        { provide: STATE_STORE, useValue: stateStore },
        { provide: ISSUANCE_CLIENT, useValue: issuanceClient },
        { provide: TARGET_SERVER_ADMIN, useValue: targetAdmin },
      ],
    }).compile();
    controller = module.get<RunControllerService>(RunControllerService);
  });

  afterEach(() => {
    restoreLogger();
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  const credentialFilesLeft = (): string[] => (fs.existsSync(credentialsDir) ? fs.readdirSync(credentialsDir) : []);

  it('should request, deliver and record a first certificate', async () => {
    inspector.inspect.mockResolvedValueOnce(missing).mockResolvedValueOnce(valid(89));

    const result = await controller.run(params);

    expect(result).toEqual({
      status: 'success',
      action: 'request',
      exitCode: 0,
      phases: [
        RunPhase.IDLE,
        RunPhase.CREDENTIALS_ACQUIRED,
        RunPhase.STATE_READ,
        RunPhase.DECIDED,
        RunPhase.ISSUING,
        RunPhase.DELIVERING,
        RunPhase.STATE_WRITTEN,
        RunPhase.CREDENTIALS_RELEASED,
        RunPhase.TERMINAL,
      ],
    });
    expect(issuanceClient.request).toHaveBeenCalledWith(
      'example.com',
      'admin@example.com',
      'staging',
      expect.objectContaining({ provider: 'digitalocean' }),
    );
    expect(delivery.deliver).toHaveBeenCalledWith('example.com', {
      importCertificate: true,
      restartAfterImport: true,
      adminCredentials: { username: 'admin', password: 'test-password' },
    });
    expect(stateStore.records.get('example.com')).toMatchObject({
      hostname: 'example.com',
      email: 'admin@example.com',
      isStagingEnvironment: true,
      certificateConfirmedPresent: true,
    });
    expect(credentialFilesLeft()).toEqual([]);
    expect(runLock.release).toHaveBeenCalledWith('example.com');
  });

  it('should request a new certificate when switching from staging to production', async () => {
    stateStore.records.set('example.com', priorState({ isStagingEnvironment: true }));
    inspector.inspect.mockResolvedValue(valid(80));

    const result = await controller.run({ ...params, useProductionEnvironment: true });

    expect(result.action).toBe('request');
    expect(issuanceClient.request).toHaveBeenCalledWith(
      'example.com',
      'admin@example.com',
      'production',
      expect.anything(),
    );
    expect(stateStore.records.get('example.com')?.isStagingEnvironment).toBe(false);
  });

  it('should skip a valid certificate and refresh the state timestamp', async () => {
    stateStore.records.set('example.com', priorState());
    inspector.inspect.mockResolvedValue(valid(83));

    const result = await controller.run(params);

    expect(result).toEqual({
      status: 'skipped',
      action: 'skip',
      exitCode: 0,
      phases: [
        RunPhase.IDLE,
        RunPhase.CREDENTIALS_ACQUIRED,
        RunPhase.STATE_READ,
        RunPhase.DECIDED,
        RunPhase.SKIPPED,
        RunPhase.STATE_WRITTEN,
        RunPhase.CREDENTIALS_RELEASED,
        RunPhase.TERMINAL,
      ],
    });
    const record = stateStore.records.get('example.com');
    expect(record?.certificateConfirmedPresent).toBe(true);
    expect(record?.lastRunTimestamp).not.toBe('2026-01-01T00:00:00.000Z');
    expect(issuanceClient.request).not.toHaveBeenCalled();
    expect(issuanceClient.renew).not.toHaveBeenCalled();
    expect(delivery.deliver).not.toHaveBeenCalled();
    expect(credentialFilesLeft()).toEqual([]);
    expect(runLock.release).toHaveBeenCalledWith('example.com');
  });

  it('should renew an expiring certificate without forcing', async () => {
    stateStore.records.set('example.com', priorState());
    inspector.inspect.mockResolvedValue(valid(12));

    const result = await controller.run(params);

    expect(result.status).toBe('success');
    expect(issuanceClient.renew).toHaveBeenCalledWith('example.com', 'staging', false, expect.anything());
  });

  it('should fail without writing state when the import fails, then evaluate expiry normally next time', async () => {
    inspector.inspect.mockResolvedValueOnce(missing).mockResolvedValue(valid(89));
    delivery.deliver.mockResolvedValue({ ok: false, reason: 'Certificate import failed (exit code 9)' });

    const failedRun = await controller.run(params);

    expect(failedRun.status).toBe('failure');
    expect(failedRun.exitCode).toBe(1);
    expect(failedRun.error?.stage).toBe('delivery');
    expect(failedRun.error?.message).toBe('Certificate import failed (exit code 9)');
    expect(failedRun.phases).toEqual([
      RunPhase.IDLE,
      RunPhase.CREDENTIALS_ACQUIRED,
      RunPhase.STATE_READ,
      RunPhase.DECIDED,
      RunPhase.ISSUING,
      RunPhase.DELIVERING,
      RunPhase.CREDENTIALS_RELEASED,
      RunPhase.TERMINAL,
    ]);
    expect(stateStore.records.size).toBe(0);
    expect(credentialFilesLeft()).toEqual([]);

    const nextRun = await controller.run(params);

    expect(nextRun.action).toBe('skip');
    expect(issuanceClient.request).toHaveBeenCalledTimes(1);
  });

  it('should fail with an issuance error and remove the credentials file', async () => {
    inspector.inspect.mockResolvedValue(missing);
    issuanceClient.request.mockResolvedValue({ ok: false, reason: 'Certificate request for example.com failed' });

    const result = await controller.run(params);

    expect(result.status).toBe('failure');
    expect(result.error?.stage).toBe('issuance');
    expect(delivery.deliver).not.toHaveBeenCalled();
    expect(stateStore.records.size).toBe(0);
    expect(credentialFilesLeft()).toEqual([]);
    expect(runLock.release).toHaveBeenCalledWith('example.com');
  });

  it('should report the issuance failure even when releasing the lock also fails', async () => {
    inspector.inspect.mockResolvedValue(missing);
    issuanceClient.request.mockResolvedValue({ ok: false, reason: 'Certificate request for example.com failed' });
    runLock.release.mockRejectedValue(new Error('EISDIR: illegal operation on a directory'));

    const result = await controller.run(params);

    expect(result.error?.stage).toBe('issuance');
    expect(result.error?.message).toBe('Certificate request for example.com failed');
    expect(credentialFilesLeft()).toEqual([]);
  });

  it('should fail at the lock stage when the lock cannot be released after a successful run', async () => {
    stateStore.records.set('example.com', priorState());
    inspector.inspect.mockResolvedValue(valid(83));
    runLock.release.mockRejectedValue(new Error('EACCES: permission denied'));

    const result = await controller.run(params);

    expect(result.status).toBe('failure');
    expect(result.error?.stage).toBe('lock');
    expect(result.error?.message).toBe('EACCES: permission denied');
  });

  it('should fail when issuance succeeds without leaving a certificate', async () => {
    inspector.inspect.mockResolvedValue(missing);

    const result = await controller.run(params);

    expect(result.error?.stage).toBe('issuance');
    expect(result.error?.message).toBe(
      'Issuance reported success but no usable certificate was found for example.com',
    );
    expect(delivery.deliver).not.toHaveBeenCalled();
  });

  it('should exit non-zero when the state cannot be written', async () => {
    stateStore.records.set('example.com', priorState());
    stateStore.failWrites = true;
    inspector.inspect.mockResolvedValue(valid(12));

    const result = await controller.run(params);

    expect(result.status).toBe('failure');
    expect(result.exitCode).toBe(1);
    expect(result.error?.stage).toBe('state-write');
    expect(delivery.deliver).toHaveBeenCalled();
  });

  it('should exit successfully without acting when another run holds the lock', async () => {
    runLock.acquire.mockResolvedValue(false);

    const result = await controller.run(params);

    expect(result).toEqual({ status: 'busy', phases: [RunPhase.IDLE, RunPhase.TERMINAL], exitCode: 0 });
    expect(inspector.inspect).not.toHaveBeenCalled();
    expect(issuanceClient.request).not.toHaveBeenCalled();
    expect(fs.existsSync(credentialsDir)).toBe(false);
    expect(runLock.release).not.toHaveBeenCalled();
  });

  it('should stop before creating credentials when a prerequisite is missing', async () => {
    targetAdmin.verifyPrerequisites.mockResolvedValue({
      ok: false,
      reason: 'fmsadmin is not available (fmsadmin: spawn fmsadmin ENOENT)',
    });

    const result = await controller.run(params);

    expect(result.status).toBe('failure');
    expect(result.error?.stage).toBe('prerequisites');
    expect(result.phases).toEqual([RunPhase.IDLE, RunPhase.TERMINAL]);
    expect(targetAdmin.verifyPrerequisites).toHaveBeenCalledWith(true);
    expect(runLock.acquire).not.toHaveBeenCalled();
    expect(fs.existsSync(credentialsDir)).toBe(false);
  });

  it('should not check the admin tool when import is not requested', async () => {
    stateStore.records.set('example.com', priorState());
    inspector.inspect.mockResolvedValue(valid(60));

    await controller.run({ ...params, importCertificate: false, adminCredentials: undefined });

    expect(issuanceClient.verifyPrerequisites).toHaveBeenCalledWith('digitalocean');
    expect(targetAdmin.verifyPrerequisites).not.toHaveBeenCalled();
  });

  it('should attribute unexpected inspection errors to the state-read stage', async () => {
    inspector.inspect.mockRejectedValue(new Error('EACCES: permission denied'));

    const result = await controller.run(params);

    expect(result.error?.stage).toBe('state-read');
    expect(result.error?.message).toBe('EACCES: permission denied');
    expect(credentialFilesLeft()).toEqual([]);
  });
});
