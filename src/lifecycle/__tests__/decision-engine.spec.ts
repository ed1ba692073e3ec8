import { decide, RENEWAL_THRESHOLD_DAYS } from '../decision-engine';
import type { CertificateRecord } from '../../certificate/interfaces';
import type { StateRecord } from '../../state/interfaces';
import type { RunParameters } from '../interfaces';

type DecisionParams = Pick<RunParameters, 'hostname' | 'useProductionEnvironment' | 'forceRenew'>;

describe('decide', () => {
  const createParams = (overrides: Partial<DecisionParams> = {}): DecisionParams => ({
    hostname: 'example.com',
    useProductionEnvironment: true,
    forceRenew: false,
    ...overrides,
  });

  const createState = (overrides: Partial<StateRecord> = {}): StateRecord => ({
    hostname: 'example.com',
    email: 'admin@example.com',
    isStagingEnvironment: false,
    lastRunTimestamp: '2026-01-01T00:00:00.000Z',
    certificateConfirmedPresent: true,
    ...overrides,
  });

  const present = (daysRemaining: number): CertificateRecord => ({
    exists: true,
    corrupt: false,
    notAfter: new Date(Date.now() + daysRemaining * 86_400_000),
    daysRemaining,
  });

  const missing: CertificateRecord = { exists: false, corrupt: false };
  const corrupt: CertificateRecord = { exists: false, corrupt: true };

  it('should use a 30 day threshold', () => {
    expect(RENEWAL_THRESHOLD_DAYS).toBe(30);
  });

  describe('first run', () => {
    it('should request when there is no prior state and no certificate', () => {
      expect(decide(createParams(), null, missing)).toEqual({ action: 'request', reason: 'missing' });
    });

    it('should skip a valid certificate even without prior state', () => {
      expect(decide(createParams(), null, present(60))).toEqual({ action: 'skip', reason: 'valid' });
    });
  });

  describe('expiry boundary', () => {
    it('should skip with exactly 30 days remaining', () => {
      expect(decide(createParams(), createState(), present(30)).action).toBe('skip');
    });

    it('should renew with 29 days remaining', () => {
      expect(decide(createParams(), createState(), present(29))).toEqual({ action: 'renew', reason: 'expiring' });
    });

    it('should renew an already expired certificate', () => {
      expect(decide(createParams(), createState(), present(-3)).action).toBe('renew');
    });

    it('should renew a present certificate whose expiry is unknown', () => {
      expect(decide(createParams(), createState(), { exists: true, corrupt: false }).action).toBe('renew');
    });
  });

  describe('hostname change', () => {
    it.each([
      ['a valid certificate', present(80)],
      ['an expiring certificate', present(5)],
      ['no certificate', missing],
    ])('should request regardless of %s', (_label, certInfo) => {
      const decision = decide(
        createParams({ hostname: 'b.example.com' }),
        createState({ hostname: 'a.example.com' }),
        certInfo,
      );

      expect(decision).toEqual({ action: 'request', reason: 'hostname-changed' });
    });

    it('should take precedence over forceRenew', () => {
      const decision = decide(
        createParams({ hostname: 'b.example.com', forceRenew: true }),
        createState({ hostname: 'a.example.com' }),
        present(80),
      );

      expect(decision.action).toBe('request');
    });
  });

  describe('environment change', () => {
    it('should request when switching from staging to production', () => {
      const decision = decide(
        createParams({ useProductionEnvironment: true }),
        createState({ isStagingEnvironment: true }),
        present(85),
      );

      expect(decision).toEqual({ action: 'request', reason: 'environment-changed' });
    });

    it('should request when switching from production to staging', () => {
      const decision = decide(
        createParams({ useProductionEnvironment: false }),
        createState({ isStagingEnvironment: false }),
        present(85),
      );

      expect(decision).toEqual({ action: 'request', reason: 'environment-changed' });
    });

    it('should request on an environment switch even when forced', () => {
      const decision = decide(
        createParams({ useProductionEnvironment: true, forceRenew: true }),
        createState({ isStagingEnvironment: true }),
        present(10),
      );

      expect(decision.reason).toBe('environment-changed');
    });

    it('should not treat an unchanged staging environment as a switch', () => {
      const decision = decide(
        createParams({ useProductionEnvironment: false }),
        createState({ isStagingEnvironment: true }),
        present(85),
      );

      expect(decision.action).toBe('skip');
    });
  });

  describe('forceRenew', () => {
    it('should renew an existing certificate', () => {
      expect(decide(createParams({ forceRenew: true }), createState(), present(85))).toEqual({
        action: 'renew',
        reason: 'forced',
      });
    });

    it('should request when no certificate exists', () => {
      expect(decide(createParams({ forceRenew: true }), createState(), missing)).toEqual({
        action: 'request',
        reason: 'forced',
      });
    });
  });

  describe('corrupt certificate', () => {
    it('should request as if no certificate existed', () => {
      expect(decide(createParams(), createState(), corrupt)).toEqual({ action: 'request', reason: 'missing' });
    });
  });

  it('should be idempotent for unchanged inputs', () => {
    const params = createParams();
    const state = createState();
    const certInfo = present(83);

    expect(decide(params, state, certInfo).action).toBe('skip');
    expect(decide(params, state, certInfo).action).toBe('skip');
  });
});
