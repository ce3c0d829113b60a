import { Inject, Injectable, Logger } from '@nestjs/common';
import { Address, getAddress } from 'viem';
import { GATEWAY_CONFIG, GatewayConfig } from '../config/environment.config';
import { AccessTier, tierName } from '../models/access-tier';
import {
  ChallengeResponse,
  ConnectResponse,
  DisconnectResponse,
  NodeView,
  NodesResponse,
  SessionInfoResponse,
  StatusResponse,
  SubscriptionTiersResponse,
  VerifyResponse,
} from '../models/api.interface';
import { ListedNode, PaymentConfirmation, Session } from '../models/app.interface';
import { ErrorFactory, ErrorType, errorMessage, isApplicationError } from '../utils/error-handling.util';
import { SecurityUtil } from '../utils/security.util';
import { NodeDirectoryService } from './node-directory.service';
import { PeerManagerService } from './peer-manager.service';
import { ReputationService } from './reputation.service';
import { SessionGateService } from './session-gate.service';
import { SessionLedgerService } from './session-ledger.service';
import { SiweService } from './siwe.service';
import { SubscriptionLedgerService } from './subscription-ledger.service';
import { TierResolverService } from './tier-resolver.service';

/**
 * GatewayService
 *
 * Request orchestration for the HTTP API. Sign-in runs
 * challenge → signature → ban check → tier → session; tunnel provisioning
 * runs session → payment (paid tier) → peer.
 */
@Injectable()
export class GatewayService {
  private readonly logger = new Logger(GatewayService.name);

  constructor(
    @Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig,
    private readonly siwe: SiweService,
    private readonly tiers: TierResolverService,
    private readonly sessions: SessionGateService,
    private readonly peers: PeerManagerService,
    private readonly sessionLedger: SessionLedgerService,
    private readonly subscriptions: SubscriptionLedgerService,
    private readonly reputation: ReputationService,
    private readonly nodes: NodeDirectoryService,
  ) {}

  issueChallenge(address: string): ChallengeResponse {
    const { challenge, message } = this.siwe.issueChallenge(address);
    return { message, nonce: challenge.nonce };
  }

  /**
   * Verifies a signed challenge and opens a session at the wallet's tier.
   * Free-tier sessions are also recorded on the session contract when the
   * gateway holds an operator key; that write is queued, not awaited.
   */
  async verify(message: string, signature: string, signal?: AbortSignal): Promise<VerifyResponse> {
    const { address } = await this.siwe.verifySignedMessage(message, signature);

    const { tier } = await this.tiers.resolve(address, signal);
    if (tier === AccessTier.Denied) {
      throw ErrorFactory.accessDenied(address, 'access denied: wallet holds no qualifying token');
    }
    if (await this.reputation.isUserBanned(address, signal)) {
      throw ErrorFactory.accessDenied(address, 'access denied: wallet is banned');
    }

    const session = this.sessions.createSession(address, tier);
    if (tier === AccessTier.Free) {
      this.sessionLedger.recordFreeSession(address);
    }

    return {
      address,
      tier: tierName(tier),
      expires_at: session.expiresAt.toISOString(),
    };
  }

  /**
   * Provisions (or refreshes) the tunnel peer for the session's wallet.
   */
  async connect(sessionToken: string, publicKey: string, signal?: AbortSignal): Promise<ConnectResponse> {
    const wallet = getAddress(sessionToken);
    const session = this.sessions.getSession(wallet);
    if (!session) {
      throw ErrorFactory.noSession();
    }

    const sessionRemainingMs = session.expiresAt.getTime() - Date.now();
    let ttlMs = sessionRemainingMs;
    if (session.tier === AccessTier.Paid) {
      const payment = await this.confirmPaidAccess(wallet, sessionRemainingMs, signal);
      if (!payment.confirmed) {
        throw ErrorFactory.paymentRequired(payment.reason);
      }
      ttlMs = payment.ttlMs;
    }

    const peer = await this.peers.addPeer(publicKey, ttlMs, wallet);
    try {
      await this.sessions.attachPeer(wallet, publicKey);
    } catch (error) {
      // session revoked while the peer was being configured
      await this.discardPeer(wallet, publicKey);
      throw error;
    }

    this.logger.log(`Connected ${SecurityUtil.mask(wallet)} as ${peer.clientAddress}`);
    return {
      server_public_key: peer.serverPublicKey,
      server_endpoint: peer.serverEndpoint,
      client_address: peer.clientAddress,
      dns: peer.dns,
      allowed_ips: peer.allowedIps,
      expires_at: peer.expiresAt.toISOString(),
      tier: tierName(session.tier),
    };
  }

  /**
   * Removes the wallet's peer and queues closing its on-chain session.
   * The gateway session itself stays valid.
   */
  async disconnect(sessionToken: string, publicKey: string): Promise<DisconnectResponse> {
    const wallet = getAddress(sessionToken);
    await this.peers.removePeer(publicKey, wallet);
    this.sessions.detachPeer(wallet, publicKey);
    this.sessionLedger.closeSessionFor(wallet);
    return { status: 'disconnected' };
  }

  status(sessionToken: string): StatusResponse {
    const session: Session | null = this.sessions.getSession(sessionToken);
    if (!session) {
      return { connected: false, reason: 'no active session' };
    }
    return {
      connected: true,
      tier: tierName(session.tier),
      expires_at: session.expiresAt.toISOString(),
    };
  }

  /**
   * Paid-tier payment check, in order:
   * 1. an active paid session on the session contract (TTL: time left on it)
   * 2. an active subscription (TTL: its remaining time)
   * 3. neither contract configured: the gateway session's remaining time
   */
  async confirmPaidAccess(
    wallet: Address,
    sessionRemainingMs: number,
    signal?: AbortSignal,
  ): Promise<PaymentConfirmation> {
    if (!this.sessionLedger.isConfigured && !this.subscriptions.isConfigured) {
      return { confirmed: true, ttlMs: sessionRemainingMs, source: 'none' };
    }

    if (this.sessionLedger.isConfigured) {
      const active = await this.sessionLedger.getActiveSession(wallet, signal);
      if (active && active.active && active.payment > 0n) {
        const endsAtMs = Number(active.startedAt + active.duration) * 1000;
        const ttlMs = endsAtMs - Date.now();
        if (ttlMs > 0) {
          return { confirmed: true, ttlMs, source: 'session' };
        }
      }
    }

    if (this.subscriptions.isConfigured && (await this.subscriptions.hasActiveSubscription(wallet, signal))) {
      const remaining = await this.subscriptions.remainingTime(wallet, signal);
      if (remaining > 0n) {
        return { confirmed: true, ttlMs: Number(remaining) * 1000, source: 'subscription' };
      }
    }

    return { confirmed: false, reason: 'payment required: no paid session or subscription on-chain' };
  }

  async sessionInfo(signal?: AbortSignal): Promise<SessionInfoResponse> {
    const info = await this.sessionLedger.getSessionInfo(signal);
    return {
      contract: info.contract,
      chain_id: info.chainId,
      node_operator: info.nodeOperator,
      price_per_hour_wei: info.pricePerHour.toString(),
      duration_seconds: Number(info.maxDurationSeconds),
      cost_wei: info.cost.toString(),
    };
  }

  async subscriptionTiers(signal?: AbortSignal): Promise<SubscriptionTiersResponse> {
    const contract = this.config.subscriptionManager.contract;
    if (!contract) {
      throw ErrorFactory.notConfigured('subscription manager');
    }
    const tiers = await this.subscriptions.getTiers(signal);
    return {
      contract,
      chain_id: this.config.ledger.chainId,
      tiers: tiers.map((tier) => ({
        id: tier.id,
        price_wei: tier.price.toString(),
        duration_seconds: Number(tier.duration),
        active: tier.active,
      })),
    };
  }

  async listNodes(signal?: AbortSignal): Promise<NodesResponse> {
    return this.nodesResponse(await this.nodes.listNodes(signal));
  }

  async listNodesByRegion(region: string, signal?: AbortSignal): Promise<NodesResponse> {
    return { ...this.nodesResponse(await this.nodes.listNodesByRegion(region, signal)), region };
  }

  private nodesResponse(nodes: ListedNode[]): NodesResponse {
    const views: NodeView[] = nodes.map((node) => ({
      operator: node.operator,
      endpoint: node.endpoint,
      wg_pub_key: node.wgPubKey,
      region: node.region,
      staked_amount_wei: node.stakedAmount.toString(),
      registered_at: Number(node.registeredAt),
      last_heartbeat: Number(node.lastHeartbeat),
      active: node.active,
      rep: node.rep,
      rep_eligible: node.repEligible,
    }));
    const filtered = this.reputation.isConfigured;
    return {
      nodes: views,
      count: views.length,
      min_rep: filtered ? this.config.reputation.minRep : null,
      rep_category: filtered ? this.config.reputation.category : null,
    };
  }

  private async discardPeer(wallet: Address, publicKey: string): Promise<void> {
    try {
      await this.peers.removePeer(publicKey, wallet);
    } catch (error) {
      if (!isApplicationError(error, ErrorType.NOT_FOUND)) {
        this.logger.warn(`Could not discard peer for ${SecurityUtil.mask(wallet)}: ${errorMessage(error)}`);
      }
    }
  }
}
