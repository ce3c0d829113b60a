import { Inject, Injectable } from '@nestjs/common';
import { Interval } from '@nestjs/schedule';
import { randomBytes } from 'crypto';
import { EnvironmentConfig, GATEWAY_CONFIG, GatewayConfig } from '../config/environment.config';
import { AppLogger } from '../utils/app-logger.util';

/**
 * NonceService
 *
 * Issues and consumes the single-use nonces embedded in sign-in challenges.
 * This store is the gateway's only replay defence.
 *
 * Nonces live in a plain in-process map rather than the async cache layer:
 * {@link consume} checks and deletes within one synchronous call, so two
 * verifications racing on the same nonce cannot both observe it as pending.
 *
 * Expired nonces are never accepted. They are reclaimed lazily on access and
 * by a periodic sweep.
 */
@Injectable()
export class NonceService {
  private readonly pending = new Map<string, number>();

  constructor(@Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig) {}

  /**
   * Creates a cryptographically random nonce and marks it pending.
   *
   * @returns hex nonce of `2 * nonceLength` characters
   *
   * @example
   * ```typescript
   * const nonce = nonceService.issue();
   * // "9f2c41d07ab3e6f58812c4d9e0a7b3c1"
   * ```
   */
  issue(): string {
    const nonce = randomBytes(this.config.siwe.nonceLength).toString('hex');
    this.pending.set(nonce, Date.now() + this.config.siwe.challengeTtlMs);
    return nonce;
  }

  /**
   * Atomically consumes a pending nonce.
   *
   * Returns `true` exactly once per issued nonce, and only before its
   * expiry. Unknown, already consumed and expired nonces return `false`.
   */
  consume(nonce: string): boolean {
    const expiresAt = this.pending.get(nonce);
    if (expiresAt === undefined) {
      return false;
    }
    this.pending.delete(nonce);
    return Date.now() <= expiresAt;
  }

  /**
   * Whether a nonce is pending and unexpired, without consuming it.
   */
  isPending(nonce: string): boolean {
    const expiresAt = this.pending.get(nonce);
    return expiresAt !== undefined && Date.now() <= expiresAt;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Drops every expired nonce.
   * @returns number of nonces removed
   */
  @Interval('nonce-sweep', EnvironmentConfig.NONCE_SWEEP_INTERVAL_MS)
  sweepExpired(): number {
    const now = Date.now();
    let removed = 0;
    for (const [nonce, expiresAt] of this.pending) {
      if (now > expiresAt) {
        this.pending.delete(nonce);
        removed++;
      }
    }
    if (removed > 0) {
      AppLogger.debug(`Swept ${removed} expired nonces`, NonceService.name);
    }
    return removed;
  }
}
