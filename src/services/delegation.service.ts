import { Inject, Injectable, Logger } from '@nestjs/common';
import { Address, getAddress } from 'viem';
import { GATEWAY_CONFIG, GatewayConfig } from '../config/environment.config';
import { DelegationCacheEntry } from '../models/app.interface';
import { ErrorFactory, errorMessage } from '../utils/error-handling.util';
import { SecurityUtil } from '../utils/security.util';
import { CacheService } from './cache.service';
import { DELEGATION_REGISTRIES, DelegationRegistry } from './delegation-registries';

/**
 * DelegationService
 *
 * Resolves the vault wallets that delegated the gated collection to a hot
 * wallet, across every configured registry.
 *
 * Registries are queried independently. One failing registry is logged and
 * contributes no vaults; the lookup itself only fails when the caller
 * cancels it.
 */
@Injectable()
export class DelegationService {
  private readonly logger = new Logger(DelegationService.name);

  constructor(
    @Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig,
    @Inject(DELEGATION_REGISTRIES) private readonly registries: DelegationRegistry[],
    private readonly cache: CacheService,
  ) {}

  get enabled(): boolean {
    return this.registries.length > 0;
  }

  /**
   * Union of vaults across registries, de-duplicated case-insensitively in
   * order of first appearance. Cached per hot wallet when every registry
   * answered.
   */
  async findVaults(hotWallet: Address, signal?: AbortSignal): Promise<Address[]> {
    const key = CacheService.KEYS.vaults(hotWallet);
    const cached = await this.cache.get<DelegationCacheEntry>(key);
    if (cached && cached.expiresAt > Date.now()) {
      return cached.vaults;
    }

    const results = await Promise.all(
      this.registries.map((registry) => this.queryRegistry(registry, hotWallet, signal)),
    );
    if (signal?.aborted) {
      throw ErrorFactory.cancelled('delegation lookup');
    }

    const seen = new Set<string>();
    const vaults: Address[] = [];
    for (const vault of results.flatMap((result) => result ?? [])) {
      const normalized = vault.toLowerCase();
      if (!seen.has(normalized) && normalized !== hotWallet.toLowerCase()) {
        seen.add(normalized);
        vaults.push(getAddress(vault));
      }
    }

    // partial answers are served but never cached
    if (results.every((result) => result !== null)) {
      const ttl = this.config.delegation.cacheTtlMs;
      const entry: DelegationCacheEntry = { hotWallet, vaults, expiresAt: Date.now() + ttl };
      await this.cache.set(key, entry, ttl);
    }

    if (vaults.length > 0) {
      this.logger.debug(`${SecurityUtil.mask(hotWallet)} has ${vaults.length} delegating vault(s)`);
    }
    return vaults;
  }

  async invalidate(hotWallet: Address): Promise<void> {
    await this.cache.del(CacheService.KEYS.vaults(hotWallet));
  }

  private async queryRegistry(
    registry: DelegationRegistry,
    hotWallet: Address,
    signal?: AbortSignal,
  ): Promise<Address[] | null> {
    try {
      return await registry.findVaults(hotWallet, signal);
    } catch (error) {
      this.logger.warn(
        `Delegation registry ${registry.name} failed for ${SecurityUtil.mask(hotWallet)}: ${errorMessage(error)}`,
      );
      return null;
    }
  }
}
