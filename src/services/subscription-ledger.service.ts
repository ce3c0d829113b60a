import { Inject, Injectable } from '@nestjs/common';
import { Address, PublicClient } from 'viem';
import { GATEWAY_CONFIG, GatewayConfig } from '../config/environment.config';
import { SUBSCRIPTION_MANAGER_ABI } from '../constants/abis';
import { OnChainSubscription, SubscriptionTier } from '../models/ledger.interface';
import { ErrorFactory } from '../utils/error-handling.util';
import { ledgerCall } from '../utils/ledger-call.util';
import { PUBLIC_CLIENT } from './ledger-client.provider';

/**
 * Read-only access to the subscription contract, the second source of
 * paid-tier payment confirmation.
 */
@Injectable()
export class SubscriptionLedgerService {
  constructor(
    @Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig,
    @Inject(PUBLIC_CLIENT) private readonly client: PublicClient,
  ) {}

  get isConfigured(): boolean {
    return this.config.subscriptionManager.contract !== null;
  }

  hasActiveSubscription(user: Address, signal?: AbortSignal): Promise<boolean> {
    const address = this.contract();
    return this.ledger('hasActiveSubscription', signal, () =>
      this.client.readContract({
        address,
        abi: SUBSCRIPTION_MANAGER_ABI,
        functionName: 'hasActiveSubscription',
        args: [user],
      }),
    );
  }

  getSubscription(user: Address, signal?: AbortSignal): Promise<OnChainSubscription> {
    const address = this.contract();
    return this.ledger('getSubscription', signal, () =>
      this.client.readContract({
        address,
        abi: SUBSCRIPTION_MANAGER_ABI,
        functionName: 'getSubscription',
        args: [user],
      }),
    );
  }

  /** Seconds left on the user's subscription. */
  remainingTime(user: Address, signal?: AbortSignal): Promise<bigint> {
    const address = this.contract();
    return this.ledger('remainingTime', signal, () =>
      this.client.readContract({
        address,
        abi: SUBSCRIPTION_MANAGER_ABI,
        functionName: 'remainingTime',
        args: [user],
      }),
    );
  }

  async getTiers(signal?: AbortSignal): Promise<SubscriptionTier[]> {
    const address = this.contract();
    const ids = await this.ledger('getActiveTierIds', signal, () =>
      this.client.readContract({
        address,
        abi: SUBSCRIPTION_MANAGER_ABI,
        functionName: 'getActiveTierIds',
      }),
    );

    return Promise.all(
      ids.map(async (id) => {
        const [price, duration, active] = await this.ledger('tiers', signal, () =>
          this.client.readContract({
            address,
            abi: SUBSCRIPTION_MANAGER_ABI,
            functionName: 'tiers',
            args: [id],
          }),
        );
        return { id, price, duration, active };
      }),
    );
  }

  private contract(): Address {
    const contract = this.config.subscriptionManager.contract;
    if (!contract) {
      throw ErrorFactory.notConfigured('subscription manager');
    }
    return contract;
  }

  private ledger<T>(method: string, signal: AbortSignal | undefined, call: () => Promise<T>): Promise<T> {
    return ledgerCall('subscription manager', method, this.config.ledger.callTimeoutMs, signal, call);
  }
}
