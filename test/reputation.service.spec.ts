import { CacheModule } from '@nestjs/cache-manager';
import { Test, TestingModule } from '@nestjs/testing';
import { GATEWAY_CONFIG } from '../src/config/environment.config';
import { CacheService } from '../src/services/cache.service';
import { ReputationService } from '../src/services/reputation.service';
import { ErrorType } from '../src/utils/error-handling.util';
import { testConfig } from './helpers/test-config';
import { alice } from './helpers/wallets';

describe('ReputationService', () => {
  let service: ReputationService;
  let fetchMock: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;

  async function build(overrides: Record<string, string> = {}): Promise<void> {
    const module: TestingModule = await Test.createTestingModule({
      imports: [CacheModule.register()],
      providers: [
        ReputationService,
        CacheService,
        {
          provide: GATEWAY_CONFIG,
          useValue: testConfig({ REP_API_URL: 'https://rep.test/api/', REP_MIN: '100', ...overrides }),
        },
      ],
    }).compile();
    service = module.get<ReputationService>(ReputationService);
  }

  function reply(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
  }

  beforeEach(async () => {
    fetchMock = jest.spyOn(global, 'fetch');
    await build();
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  describe('getRating', () => {
    it('should query the rating endpoint for the lowercased wallet', async () => {
      fetchMock.mockResolvedValue(reply({ rating: 250 }));

      await expect(service.getRating(alice.address, 'Node Operator')).resolves.toBe(250);
      expect(fetchMock.mock.calls[0][0]).toBe(
        `https://rep.test/api/profiles/${alice.address.toLowerCase()}/rep/rating?category=Node%20Operator`,
      );
    });

    it('should cache ratings per wallet and category', async () => {
      fetchMock.mockImplementation(async () => reply({ rating: 5 }));

      await service.getRating(alice.address, 'Node Operator');
      await service.getRating(alice.address, 'Node Operator');
      await service.getRating(alice.address, 'Tunnel User');

      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('should turn a non-200 answer into an upstream error', async () => {
      fetchMock.mockResolvedValue(reply({ error: 'nope' }, 503));

      await expect(service.getRating(alice.address, 'Node Operator')).rejects.toMatchObject({
        type: ErrorType.UPSTREAM_ERROR,
        message: 'reputation API returned 503',
      });
    });

    it('should reject an answer without a numeric rating', async () => {
      fetchMock.mockResolvedValue(reply({ rating: 'high' }));

      await expect(service.getRating(alice.address, 'Node Operator')).rejects.toMatchObject({
        message: 'reputation API returned no rating',
      });
    });

    it('should wrap transport failures', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      await expect(service.getRating(alice.address, 'Node Operator')).rejects.toMatchObject({
        type: ErrorType.UPSTREAM_ERROR,
        message: 'reputation lookup failed: fetch failed',
      });
    });

    it('should refuse when no API is configured', async () => {
      await build({ REP_API_URL: '' });

      expect(service.isConfigured).toBe(false);
      await expect(service.getRating(alice.address, 'Node Operator')).rejects.toMatchObject({
        type: ErrorType.NOT_CONFIGURED,
      });
    });
  });

  describe('checkOperator', () => {
    it.each([
      [99, false],
      [100, true],
      [5000, true],
    ])('should treat rating %d as eligible=%s against a minimum of 100', async (rating, eligible) => {
      fetchMock.mockResolvedValue(reply({ rating }));

      await expect(service.checkOperator(alice.address)).resolves.toEqual({
        wallet: alice.address,
        category: 'Node Operator',
        rating,
        eligible,
      });
    });
  });

  describe('isUserBanned', () => {
    it('should not look anything up unless the ban check is on', async () => {
      await expect(service.isUserBanned(alice.address)).resolves.toBe(false);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should ban a negative rating in the user category', async () => {
      await build({ USER_BAN_CHECK: 'true' });
      fetchMock.mockResolvedValue(reply({ rating: -3 }));

      await expect(service.isUserBanned(alice.address)).resolves.toBe(true);
      expect(String(fetchMock.mock.calls[0][0])).toContain('category=Tunnel%20User');
    });

    it('should allow the user when the lookup fails', async () => {
      await build({ USER_BAN_CHECK: 'true' });
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      await expect(service.isUserBanned(alice.address)).resolves.toBe(false);
    });
  });
});
