import { Inject, Injectable, Logger } from '@nestjs/common';
import { Interval } from '@nestjs/schedule';
import { Address, isAddressEqual } from 'viem';
import { EnvironmentConfig, GATEWAY_CONFIG, GatewayConfig } from '../config/environment.config';
import { Peer, PeerConfig } from '../models/app.interface';
import { AsyncLock } from '../utils/async-lock.util';
import { ErrorFactory, errorMessage } from '../utils/error-handling.util';
import { SecurityUtil } from '../utils/security.util';
import { AddressPool } from './address-pool';
import { TUNNEL_ENDPOINT, TunnelEndpoint } from './tunnel/tunnel-endpoint.interface';

/**
 * PeerManagerService
 *
 * Owns the tunnel address pool and the peer table. Every allocation and
 * release goes through this service's lock, so the set of allocated pool
 * addresses always equals the set of addresses held by recorded peers.
 */
@Injectable()
export class PeerManagerService {
  private readonly logger = new Logger(PeerManagerService.name);
  private readonly pool: AddressPool;
  private readonly peers = new Map<string, Peer>();
  private readonly lock = new AsyncLock();

  constructor(
    @Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig,
    @Inject(TUNNEL_ENDPOINT) private readonly endpoint: TunnelEndpoint,
  ) {
    this.pool = new AddressPool(config.tunnel.subnet);
  }

  /**
   * Provisions `publicKey` for `ttlMs`.
   *
   * A key that is already provisioned keeps its address and has its expiry
   * moved. If the tunnel endpoint rejects a new peer, the address just
   * allocated for it goes back to the pool before the error propagates.
   *
   * @throws pool-exhausted error when no address is free
   * @throws conflict error when the key is live for a different wallet
   */
  addPeer(publicKey: string, ttlMs: number, owner?: Address): Promise<PeerConfig> {
    return this.lock.run(async () => {
      const now = new Date();
      const existing = this.peers.get(publicKey);
      if (
        existing?.owner &&
        owner &&
        existing.expiresAt > now &&
        !isAddressEqual(existing.owner, owner)
      ) {
        throw ErrorFactory.conflict('public key is in use by another session');
      }

      const address = existing?.address ?? this.pool.allocate();
      try {
        await this.endpoint.configurePeer(publicKey, `${address}/32`);
      } catch (error) {
        if (!existing) {
          this.pool.release(address);
        }
        throw error;
      }

      const peer: Peer = {
        publicKey,
        address,
        owner: owner ?? existing?.owner,
        assignedAt: existing?.assignedAt ?? now,
        expiresAt: new Date(now.getTime() + ttlMs),
        bytesReceived: existing?.bytesReceived ?? 0n,
        bytesSent: existing?.bytesSent ?? 0n,
      };
      this.peers.set(publicKey, peer);

      this.logger.log(
        `${existing ? 'Refreshed' : 'Added'} peer ${SecurityUtil.mask(publicKey)} at ${address} until ${peer.expiresAt.toISOString()}`,
      );
      return this.toConfig(peer);
    });
  }

  /**
   * Deconfigures and forgets a peer, returning its address to the pool.
   *
   * When `owner` is given, a peer provisioned for another wallet is treated
   * as unknown. If the endpoint refuses the removal the peer is kept but
   * marked expired, so the next sweep retries and releases it.
   *
   * @throws not-found error for an unknown key
   */
  removePeer(publicKey: string, owner?: Address): Promise<void> {
    return this.lock.run(async () => {
      const peer = this.peers.get(publicKey);
      if (!peer || (owner && (!peer.owner || !isAddressEqual(peer.owner, owner)))) {
        throw ErrorFactory.notFound('peer not found');
      }

      try {
        await this.endpoint.removePeer(publicKey);
      } catch (error) {
        peer.expiresAt = new Date();
        throw error;
      }
      this.forget(peer);
      this.logger.log(`Removed peer ${SecurityUtil.mask(publicKey)}, released ${peer.address}`);
    });
  }

  /**
   * Removes every peer past its expiry. A peer the endpoint fails to
   * deconfigure is logged and still released.
   *
   * @returns number of peers removed
   */
  @Interval('peer-sweep', EnvironmentConfig.PEER_SWEEP_INTERVAL_MS)
  sweepExpired(): Promise<number> {
    return this.lock.run(async () => {
      const now = Date.now();
      let removed = 0;
      for (const peer of [...this.peers.values()]) {
        if (now <= peer.expiresAt.getTime()) continue;
        try {
          await this.endpoint.removePeer(peer.publicKey);
        } catch (error) {
          this.logger.warn(`Failed to deconfigure expired peer ${SecurityUtil.mask(peer.publicKey)}: ${errorMessage(error)}`);
        }
        this.forget(peer);
        removed++;
      }
      if (removed > 0) {
        this.logger.log(`Swept ${removed} expired peer(s)`);
      }
      return removed;
    });
  }

  getPeer(publicKey: string): Peer | undefined {
    return this.peers.get(publicKey);
  }

  /** Keys of every peer provisioned for `owner`, live or awaiting sweep. */
  keysOwnedBy(owner: Address): string[] {
    return [...this.peers.values()]
      .filter((peer) => peer.owner !== undefined && isAddressEqual(peer.owner, owner))
      .map((peer) => peer.publicKey);
  }

  get peerCount(): number {
    return this.peers.size;
  }

  get poolCapacity(): number {
    return this.pool.capacity;
  }

  allocatedAddresses(): string[] {
    return this.pool.allocatedAddresses();
  }

  peerAddresses(): string[] {
    return [...this.peers.values()].map((peer) => peer.address);
  }

  private forget(peer: Peer): void {
    this.pool.release(peer.address);
    this.peers.delete(peer.publicKey);
  }

  private toConfig(peer: Peer): PeerConfig {
    return {
      serverPublicKey: this.config.tunnel.serverPublicKey,
      serverEndpoint: this.config.tunnel.serverEndpoint,
      clientAddress: `${peer.address}/${this.pool.prefixLength}`,
      dns: this.config.tunnel.dns,
      allowedIps: this.config.tunnel.allowedIps,
      expiresAt: peer.expiresAt,
    };
  }
}
