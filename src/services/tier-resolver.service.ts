import { Inject, Injectable, Logger } from '@nestjs/common';
import { Address } from 'viem';
import { GATEWAY_CONFIG, GatewayConfig } from '../config/environment.config';
import { AccessTier, maxTier, tierName } from '../models/access-tier';
import { TierCacheEntry, TierResult } from '../models/app.interface';
import { ErrorType, errorMessage, isApplicationError } from '../utils/error-handling.util';
import { SecurityUtil } from '../utils/security.util';
import { ACCESS_CHECKER, AccessChecker } from './access-checkers/access-checker.interface';
import { CacheService } from './cache.service';
import { DelegationService } from './delegation.service';

/**
 * TierResolverService
 *
 * Cache-or-ledger resolution of a wallet's access tier.
 *
 * On a miss the wallet is checked directly. A wallet denied on its own is
 * re-checked through every vault that delegated to it, keeping the highest
 * tier found; the scan stops at {@link AccessTier.Free}, the ceiling.
 *
 * A resolved tier is cached for `tierCacheTtlMs`. Until then it is returned
 * unchanged unless {@link invalidate} is called, and an entry past its expiry
 * is never served.
 */
@Injectable()
export class TierResolverService {
  private readonly logger = new Logger(TierResolverService.name);

  /** Resolutions in progress; invalidate() removes a wallet's marker. */
  private readonly inFlight = new Map<string, symbol>();

  constructor(
    @Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig,
    @Inject(ACCESS_CHECKER) private readonly checker: AccessChecker,
    private readonly delegation: DelegationService,
    private readonly cache: CacheService,
  ) {}

  /**
   * @throws upstream error when the direct ledger check fails; nothing is cached then
   */
  async resolve(wallet: Address, signal?: AbortSignal): Promise<TierResult> {
    const key = CacheService.KEYS.tier(wallet);
    const cached = await this.cache.get<TierCacheEntry>(key);
    if (cached && cached.expiresAt > Date.now()) {
      return { tier: cached.tier, checkedAt: new Date(cached.computedAt) };
    }

    const marker = Symbol(key);
    this.inFlight.set(key, marker);
    try {
      let tier = await this.checker.checkTier(wallet, signal);
      if (tier === AccessTier.Denied && this.delegation.enabled) {
        tier = await this.bestOfVaults(wallet, signal);
      }

      const computedAt = Date.now();
      // an invalidation during the lookup makes this result stale
      if (this.inFlight.get(key) === marker) {
        const ttl = this.config.sessions.tierCacheTtlMs;
        const entry: TierCacheEntry = { wallet, tier, computedAt, expiresAt: computedAt + ttl };
        await this.cache.set(key, entry, ttl);
      }

      this.logger.debug(`Resolved ${SecurityUtil.mask(wallet)} to ${tierName(tier)}`);
      return { tier, checkedAt: new Date(computedAt) };
    } finally {
      if (this.inFlight.get(key) === marker) {
        this.inFlight.delete(key);
      }
    }
  }

  async invalidate(wallet: Address): Promise<void> {
    const key = CacheService.KEYS.tier(wallet);
    this.inFlight.delete(key);
    await this.cache.del(key);
  }

  private async bestOfVaults(wallet: Address, signal?: AbortSignal): Promise<AccessTier> {
    const vaults = await this.delegation.findVaults(wallet, signal);

    let best = AccessTier.Denied;
    for (const vault of vaults) {
      try {
        best = maxTier(best, await this.checker.checkTier(vault, signal));
      } catch (error) {
        if (isApplicationError(error, ErrorType.CANCELLED)) throw error;
        this.logger.warn(
          `Vault check failed for ${SecurityUtil.mask(vault)} (delegate ${SecurityUtil.mask(wallet)}): ${errorMessage(error)}`,
        );
        continue;
      }
      if (best === AccessTier.Free) break;
    }
    return best;
  }
}
