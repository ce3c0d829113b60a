import { Inject, Injectable, Logger } from '@nestjs/common';
import { Address } from 'viem';
import { GATEWAY_CONFIG, GatewayConfig } from '../config/environment.config';
import { ErrorFactory, errorMessage, isApplicationError } from '../utils/error-handling.util';
import { SecurityUtil } from '../utils/security.util';
import { withTimeout } from '../utils/timeout.util';
import { CacheService } from './cache.service';

export interface ReputationResult {
  wallet: Address;
  category: string;
  rating: number;
  eligible: boolean;
}

/**
 * ReputationService
 *
 * Client for the community reputation API:
 * `GET {base}/profiles/{wallet}/rep/rating?category={category}` answers
 * `{ rating }`. Used to filter node operators and, optionally, to refuse
 * sign-in to users with a negative rating.
 */
@Injectable()
export class ReputationService {
  private readonly logger = new Logger(ReputationService.name);

  constructor(
    @Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig,
    private readonly cache: CacheService,
  ) {}

  get isConfigured(): boolean {
    return this.config.reputation.apiUrl !== null;
  }

  get banCheckEnabled(): boolean {
    return this.isConfigured && this.config.reputation.userBanCheck;
  }

  /**
   * Rating of `wallet` in `category`, cached for `repCacheTtlMs`.
   * @throws upstream error on transport failure or a non-200 answer
   */
  async getRating(wallet: Address, category: string, signal?: AbortSignal): Promise<number> {
    const base = this.config.reputation.apiUrl;
    if (!base) {
      throw ErrorFactory.notConfigured('reputation API');
    }

    return this.cache.getOrSet(
      CacheService.KEYS.rep(wallet, category),
      () => this.fetchRating(base, wallet, category, signal),
      this.config.reputation.cacheTtlMs,
    );
  }

  /**
   * Node operator eligibility: rating at or above the configured minimum.
   */
  async checkOperator(wallet: Address, signal?: AbortSignal): Promise<ReputationResult> {
    const { category, minRep } = this.config.reputation;
    const rating = await this.getRating(wallet, category, signal);
    return { wallet, category, rating, eligible: rating >= minRep };
  }

  /**
   * Whether the user is banned (negative rating in the user category).
   * Lookup failures other than cancellation are logged and count as not banned.
   */
  async isUserBanned(wallet: Address, signal?: AbortSignal): Promise<boolean> {
    if (!this.banCheckEnabled) {
      return false;
    }
    try {
      const rating = await this.getRating(wallet, this.config.reputation.userBanCategory, signal);
      return rating < 0;
    } catch (error) {
      if (signal?.aborted) throw error;
      this.logger.warn(`Ban check failed for ${SecurityUtil.mask(wallet)}, allowing: ${errorMessage(error)}`);
      return false;
    }
  }

  private async fetchRating(base: string, wallet: Address, category: string, signal?: AbortSignal): Promise<number> {
    const url = `${base.replace(/\/+$/, '')}/profiles/${wallet.toLowerCase()}/rep/rating?category=${encodeURIComponent(category)}`;
    const timeoutMs = this.config.reputation.timeoutMs;

    try {
      return await withTimeout(
        'reputation lookup',
        async () => {
          const response = await fetch(url, {
            headers: { Accept: 'application/json' },
            signal: AbortSignal.timeout(timeoutMs),
          });
          if (!response.ok) {
            throw ErrorFactory.upstream(`reputation API returned ${response.status}`);
          }
          const body: unknown = await response.json();
          return ReputationService.parseRating(body);
        },
        timeoutMs,
        signal,
      );
    } catch (error) {
      if (isApplicationError(error)) throw error;
      throw ErrorFactory.upstream(`reputation lookup failed: ${errorMessage(error)}`);
    }
  }

  private static parseRating(body: unknown): number {
    if (typeof body === 'object' && body !== null && 'rating' in body) {
      const rating = Number(body.rating);
      if (Number.isFinite(rating)) {
        return rating;
      }
    }
    throw ErrorFactory.upstream('reputation API returned no rating');
  }
}
