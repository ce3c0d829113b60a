import { Test, TestingModule } from '@nestjs/testing';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { CacheService } from '../src/services/cache.service';

describe('CacheService', () => {
  let service: CacheService;

  const mockCacheManager = {
    get: jest.fn(),
    set: jest.fn(),
    del: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [CacheService, { provide: CACHE_MANAGER, useValue: mockCacheManager }],
    }).compile();

    service = module.get<CacheService>(CacheService);
    jest.resetAllMocks();
  });

  describe('KEYS', () => {
    it('should build lowercase wallet keys', () => {
      expect(CacheService.KEYS.tier('0xABCdef')).toBe('tier:0xabcdef');
      expect(CacheService.KEYS.vaults('0xABCdef')).toBe('vaults:0xabcdef');
      expect(CacheService.KEYS.rep('0xABCdef', 'Node Operator')).toBe('rep:Node Operator:0xabcdef');
      expect(CacheService.KEYS.nodes()).toBe('nodes:active');
    });
  });

  describe('get', () => {
    it('should return cached values, including falsy ones', async () => {
      mockCacheManager.get.mockResolvedValueOnce(0).mockResolvedValueOnce(false);

      await expect(service.get('a')).resolves.toBe(0);
      await expect(service.get('b')).resolves.toBe(false);
    });

    it('should treat a miss as null', async () => {
      mockCacheManager.get.mockResolvedValue(undefined);
      await expect(service.get('missing')).resolves.toBeNull();
    });

    it('should treat a cache error as a miss', async () => {
      mockCacheManager.get.mockRejectedValue(new Error('store down'));
      await expect(service.get('key')).resolves.toBeNull();
    });
  });

  describe('set and del', () => {
    it('should pass the TTL through in milliseconds', async () => {
      await service.set('key', { tier: 2 }, 5000);
      expect(mockCacheManager.set).toHaveBeenCalledWith('key', { tier: 2 }, 5000);
    });

    it('should swallow store errors on write', async () => {
      mockCacheManager.set.mockRejectedValue(new Error('store down'));
      mockCacheManager.del.mockRejectedValue(new Error('store down'));

      await expect(service.set('key', 1, 1000)).resolves.toBeUndefined();
      await expect(service.del('key')).resolves.toBeUndefined();
    });
  });

  describe('getOrSet', () => {
    it('should return the cached value without calling the fallback', async () => {
      mockCacheManager.get.mockResolvedValue('cached');
      const fallback = jest.fn();

      await expect(service.getOrSet('key', fallback, 1000)).resolves.toBe('cached');
      expect(fallback).not.toHaveBeenCalled();
    });

    it('should compute and store on a miss', async () => {
      mockCacheManager.get.mockResolvedValue(undefined);
      mockCacheManager.set.mockResolvedValue(undefined);

      await expect(service.getOrSet('key', async () => 42, 1000)).resolves.toBe(42);
      expect(mockCacheManager.set).toHaveBeenCalledWith('key', 42, 1000);
    });

    it('should propagate fallback errors and store nothing', async () => {
      mockCacheManager.get.mockResolvedValue(undefined);

      await expect(service.getOrSet('key', async () => Promise.reject(new Error('rpc down')), 1000)).rejects.toThrow(
        'rpc down',
      );
      expect(mockCacheManager.set).not.toHaveBeenCalled();
    });
  });
});
