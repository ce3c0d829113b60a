import { Inject, Injectable } from '@nestjs/common';
import { Address, PublicClient } from 'viem';
import { GATEWAY_CONFIG, GatewayConfig } from '../../config/environment.config';
import { CONSTANTS } from '../../constants';
import { ERC1155_ABI } from '../../constants/abis';
import { AccessTier } from '../../models/access-tier';
import { ledgerCall } from '../../utils/ledger-call.util';
import { PUBLIC_CLIENT } from '../ledger-client.provider';
import { AccessChecker } from './access-checker.interface';

/**
 * Reads ERC-1155 balances directly, without an access-policy contract.
 *
 * Token ids `1..maxTokenId` are scanned in batches. Holding the configured
 * free token grants {@link AccessTier.Free} and stops the scan; holding any
 * other id grants {@link AccessTier.Paid}.
 */
@Injectable()
export class DirectBalanceChecker implements AccessChecker {
  readonly mode = 'direct' as const;

  constructor(
    @Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig,
    @Inject(PUBLIC_CLIENT) private readonly client: PublicClient,
  ) {}

  async checkTier(wallet: Address, signal?: AbortSignal): Promise<AccessTier> {
    const { freeTokenId, maxTokenId } = this.config.access;

    if (freeTokenId > 0n && (await this.balanceOf(wallet, freeTokenId, signal)) > 0n) {
      return AccessTier.Free;
    }

    const batchSize = BigInt(CONSTANTS.BALANCE_BATCH_SIZE);
    for (let start = 1n; start <= maxTokenId; start += batchSize) {
      const end = start + batchSize - 1n < maxTokenId ? start + batchSize - 1n : maxTokenId;
      const ids: bigint[] = [];
      for (let id = start; id <= end; id++) ids.push(id);

      const balances = await this.balanceOfBatch(wallet, ids, signal);
      if (balances.some((balance) => balance > 0n)) {
        return AccessTier.Paid;
      }
    }
    return AccessTier.Denied;
  }

  private balanceOf(wallet: Address, id: bigint, signal?: AbortSignal): Promise<bigint> {
    return this.read('balanceOf', signal, () =>
      this.client.readContract({
        address: this.config.access.assetContract,
        abi: ERC1155_ABI,
        functionName: 'balanceOf',
        args: [wallet, id],
      }),
    );
  }

  private async balanceOfBatch(wallet: Address, ids: bigint[], signal?: AbortSignal): Promise<readonly bigint[]> {
    return this.read('balanceOfBatch', signal, () =>
      this.client.readContract({
        address: this.config.access.assetContract,
        abi: ERC1155_ABI,
        functionName: 'balanceOfBatch',
        args: [ids.map(() => wallet), ids],
      }),
    );
  }

  private read<T>(method: string, signal: AbortSignal | undefined, call: () => Promise<T>): Promise<T> {
    return ledgerCall('asset', method, this.config.ledger.callTimeoutMs, signal, call);
  }
}
