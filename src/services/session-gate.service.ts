import { Inject, Injectable, Logger } from '@nestjs/common';
import { Interval } from '@nestjs/schedule';
import { Address } from 'viem';
import { EnvironmentConfig, GATEWAY_CONFIG, GatewayConfig } from '../config/environment.config';
import { AccessTier, tierName } from '../models/access-tier';
import { Session } from '../models/app.interface';
import { ErrorFactory, ErrorType, errorMessage, isApplicationError } from '../utils/error-handling.util';
import { SecurityUtil } from '../utils/security.util';
import { PeerManagerService } from './peer-manager.service';

/**
 * SessionGateService
 *
 * One live session per wallet. Sessions expire lazily on read and are
 * reclaimed by a periodic sweep. Revoking a session tears down the tunnel
 * peer attached to it.
 */
@Injectable()
export class SessionGateService {
  private readonly logger = new Logger(SessionGateService.name);
  private readonly sessions = new Map<string, Session>();

  constructor(
    @Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig,
    private readonly peers: PeerManagerService,
  ) {}

  /**
   * Starts a session of `credentialTtlMs`, replacing any previous one for
   * the wallet. A peer attached to the previous session stays attached.
   */
  createSession(wallet: Address, tier: AccessTier): Session {
    if (tier === AccessTier.Denied) {
      throw ErrorFactory.accessDenied(wallet);
    }

    const previous = this.getSession(wallet);
    const now = new Date();
    const session: Session = {
      address: wallet,
      tier,
      createdAt: now,
      expiresAt: new Date(now.getTime() + this.config.sessions.credentialTtlMs),
      peerPublicKey: previous?.peerPublicKey,
    };
    this.sessions.set(SessionGateService.key(wallet), session);

    this.logger.log(
      `Session for ${SecurityUtil.mask(wallet)}: ${tierName(tier)} until ${session.expiresAt.toISOString()}`,
    );
    return session;
  }

  /**
   * The wallet's live session, or `null`. An expired entry is deleted on read.
   */
  getSession(wallet: string): Session | null {
    const key = SessionGateService.key(wallet);
    const session = this.sessions.get(key);
    if (!session) {
      return null;
    }
    if (Date.now() > session.expiresAt.getTime()) {
      this.sessions.delete(key);
      return null;
    }
    return session;
  }

  /**
   * Records the tunnel key provisioned for the wallet's session. A different
   * key attached earlier is torn down.
   */
  async attachPeer(wallet: Address, publicKey: string): Promise<void> {
    const session = this.getSession(wallet);
    if (!session) {
      throw ErrorFactory.noSession();
    }
    const previousKey = session.peerPublicKey;
    session.peerPublicKey = publicKey;
    if (previousKey && previousKey !== publicKey) {
      await this.teardownPeer(wallet, previousKey);
    }
  }

  detachPeer(wallet: string, publicKey: string): void {
    const session = this.getSession(wallet);
    if (session?.peerPublicKey === publicKey) {
      session.peerPublicKey = undefined;
    }
  }

  /**
   * Deletes the wallet's session unconditionally and removes every peer
   * provisioned for the wallet. A paid peer can outlive the session it was
   * attached to, so peers are found by owner as well as by attachment.
   * @returns whether a session existed
   */
  async revoke(wallet: Address): Promise<boolean> {
    const key = SessionGateService.key(wallet);
    const session = this.sessions.get(key);
    this.sessions.delete(key);

    const keys = new Set(this.peers.keysOwnedBy(wallet));
    if (session?.peerPublicKey) {
      keys.add(session.peerPublicKey);
    }
    for (const publicKey of keys) {
      await this.teardownPeer(wallet, publicKey);
    }

    if (session) {
      this.logger.log(`Revoked session for ${SecurityUtil.mask(wallet)}`);
    }
    return session !== undefined;
  }

  activeSessionCount(): number {
    const now = Date.now();
    let count = 0;
    for (const session of this.sessions.values()) {
      if (now <= session.expiresAt.getTime()) count++;
    }
    return count;
  }

  /**
   * @returns number of expired sessions removed
   */
  @Interval('session-sweep', EnvironmentConfig.SESSION_SWEEP_INTERVAL_MS)
  sweepExpired(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, session] of this.sessions) {
      if (now > session.expiresAt.getTime()) {
        this.sessions.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.debug(`Swept ${removed} expired session(s)`);
    }
    return removed;
  }

  private async teardownPeer(wallet: Address, publicKey: string): Promise<void> {
    try {
      await this.peers.removePeer(publicKey, wallet);
    } catch (error) {
      if (isApplicationError(error, ErrorType.NOT_FOUND)) {
        return;
      }
      this.logger.warn(
        `Peer teardown failed for ${SecurityUtil.mask(wallet)} (${SecurityUtil.mask(publicKey)}): ${errorMessage(error)}`,
      );
    }
  }

  private static key(wallet: string): string {
    return wallet.toLowerCase();
  }
}
