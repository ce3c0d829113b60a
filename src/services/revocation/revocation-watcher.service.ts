import { Inject, Injectable, Logger, OnApplicationBootstrap, OnModuleDestroy } from '@nestjs/common';
import { GATEWAY_CONFIG, GatewayConfig } from '../../config/environment.config';
import { CONSTANTS } from '../../constants';
import { TransferEvent } from '../../models/ledger.interface';
import { errorMessage, errorStack } from '../../utils/error-handling.util';
import { SecurityUtil } from '../../utils/security.util';
import { DelegationService } from '../delegation.service';
import { SessionGateService } from '../session-gate.service';
import { TierResolverService } from '../tier-resolver.service';
import {
  TRANSFER_EVENT_SOURCE,
  TransferEventSource,
  TransferSubscription,
} from './transfer-event-source.interface';

export type WatcherState = 'disconnected' | 'subscribed' | 'stopped';

/**
 * RevocationWatcherService
 *
 * Follows transfers of the gated asset and revokes access as soon as a
 * wallet sends a token away:
 *
 * - sender: tier and delegation caches invalidated, session revoked (which
 *   tears down its tunnel peer)
 * - receiver: caches invalidated only, so its next sign-in re-reads the ledger
 *
 * `disconnected → subscribed`, back to `disconnected` on a subscription
 * error, and `subscribed` again after `revocationBackoffMs`. Retries
 * continue until the module is destroyed.
 */
@Injectable()
export class RevocationWatcherService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(RevocationWatcherService.name);
  private state: WatcherState = 'disconnected';
  private subscription: TransferSubscription | null = null;
  private retryTimer: NodeJS.Timeout | null = null;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    @Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig,
    @Inject(TRANSFER_EVENT_SOURCE) private readonly source: TransferEventSource,
    private readonly tiers: TierResolverService,
    private readonly delegation: DelegationService,
    private readonly sessions: SessionGateService,
  ) {}

  get currentState(): WatcherState {
    return this.state;
  }

  onApplicationBootstrap(): void {
    this.start();
  }

  onModuleDestroy(): void {
    this.stop();
  }

  start(): void {
    if (!this.source.available) {
      this.logger.warn('No ledger WebSocket endpoint configured; transfer-driven revocation disabled');
      return;
    }
    if (this.state !== 'disconnected' || this.retryTimer) {
      return;
    }
    this.subscribe();
  }

  stop(): void {
    this.state = 'stopped';
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
    this.subscription?.unsubscribe();
    this.subscription = null;
  }

  /**
   * Applies one transfer. Exposed so callers and tests can feed events
   * without a live subscription.
   */
  async handleTransfer(event: TransferEvent): Promise<void> {
    const { from, to } = event;

    if (from !== CONSTANTS.ZERO_ADDRESS) {
      await Promise.all([this.tiers.invalidate(from), this.delegation.invalidate(from)]);
      if (await this.sessions.revoke(from)) {
        this.logger.log(`Transfer out of ${SecurityUtil.mask(from)} revoked its session`);
      }
    }

    if (to !== CONSTANTS.ZERO_ADDRESS) {
      await Promise.all([this.tiers.invalidate(to), this.delegation.invalidate(to)]);
    }
  }

  /** Resolves once every event received so far has been applied. */
  async settle(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  private subscribe(): void {
    this.retryTimer = null;
    if (this.state === 'stopped') {
      return;
    }

    try {
      const subscription = this.source.subscribe({
        onTransfer: (event) => this.dispatch(event),
        onError: (error) => this.onSubscriptionError(error),
      });
      // failed while subscribing; a retry is already scheduled
      if (this.retryTimer) {
        subscription.unsubscribe();
        return;
      }
      this.subscription = subscription;
      this.state = 'subscribed';
      this.logger.log(`Watching transfers on ${SecurityUtil.mask(this.config.access.assetContract)}`);
    } catch (error) {
      this.onSubscriptionError(error);
    }
  }

  private onSubscriptionError(error: unknown): void {
    if (this.state === 'stopped' || this.retryTimer) {
      return;
    }
    this.logger.warn(
      `Transfer subscription failed, retrying in ${this.config.revocation.backoffMs}ms: ${errorMessage(error)}`,
    );

    this.subscription?.unsubscribe();
    this.subscription = null;
    this.state = 'disconnected';
    this.retryTimer = setTimeout(() => this.subscribe(), this.config.revocation.backoffMs);
  }

  private dispatch(event: TransferEvent): void {
    const task: Promise<void> = this.handleTransfer(event).then(
      () => {
        this.inFlight.delete(task);
      },
      (error: unknown) => {
        this.inFlight.delete(task);
        this.logger.error(
          `Failed to apply transfer ${event.transactionHash ?? ''} from ${SecurityUtil.mask(event.from)}: ${errorMessage(error)}`,
          errorStack(error),
        );
      },
    );
    this.inFlight.add(task);
  }
}
