import { Test, TestingModule } from '@nestjs/testing';
import { GATEWAY_CONFIG } from '../src/config/environment.config';
import { NonceService } from '../src/services/nonce.service';
import { testConfig } from './helpers/test-config';

describe('NonceService', () => {
  let service: NonceService;
  const config = testConfig({ CHALLENGE_TTL_MS: '1000', NONCE_LENGTH: '16' });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [NonceService, { provide: GATEWAY_CONFIG, useValue: config }],
    }).compile();
    service = module.get<NonceService>(NonceService);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should issue hex nonces of twice the configured byte length', () => {
    const nonce = service.issue();
    expect(nonce).toMatch(/^[0-9a-f]{32}$/);
    expect(service.isPending(nonce)).toBe(true);
  });

  it('should issue distinct nonces', () => {
    const nonces = new Set(Array.from({ length: 50 }, () => service.issue()));
    expect(nonces.size).toBe(50);
  });

  it('should consume a nonce exactly once', () => {
    const nonce = service.issue();
    expect(service.consume(nonce)).toBe(true);
    expect(service.consume(nonce)).toBe(false);
    expect(service.isPending(nonce)).toBe(false);
  });

  it('should reject unknown nonces', () => {
    expect(service.consume('deadbeef')).toBe(false);
  });

  it('should reject an expired nonce and forget it', () => {
    jest.useFakeTimers().setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const nonce = service.issue();

    jest.setSystemTime(new Date('2026-01-01T00:00:01.001Z'));
    expect(service.isPending(nonce)).toBe(false);
    expect(service.consume(nonce)).toBe(false);
    expect(service.pendingCount).toBe(0);
  });

  it('should accept a nonce right at its expiry', () => {
    jest.useFakeTimers().setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const nonce = service.issue();

    jest.setSystemTime(new Date('2026-01-01T00:00:01Z'));
    expect(service.consume(nonce)).toBe(true);
  });

  it('should sweep only expired nonces', () => {
    jest.useFakeTimers().setSystemTime(new Date('2026-01-01T00:00:00Z'));
    service.issue();
    service.issue();
    jest.setSystemTime(new Date('2026-01-01T00:00:00.500Z'));
    const fresh = service.issue();

    jest.setSystemTime(new Date('2026-01-01T00:00:01.200Z'));
    expect(service.sweepExpired()).toBe(2);
    expect(service.pendingCount).toBe(1);
    expect(service.isPending(fresh)).toBe(true);
  });
});
