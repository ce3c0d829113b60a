import { Address, PublicClient } from 'viem';
import { GatewayConfig } from '../../config/environment.config';
import { CONSTANTS } from '../../constants';
import { COLLECTION_DELEGATION_ABI } from '../../constants/abis';
import { ledgerCall } from '../../utils/ledger-call.util';
import { DelegationRegistry } from './delegation-registry.interface';

/**
 * Reader for the collection delegation registry, queried with the
 * "all use cases" id for the gated collection.
 */
export class CollectionDelegationReader implements DelegationRegistry {
  readonly name = 'collection-delegation';

  constructor(
    private readonly client: PublicClient,
    private readonly registry: Address,
    private readonly config: GatewayConfig,
  ) {}

  async findVaults(hotWallet: Address, signal?: AbortSignal): Promise<Address[]> {
    const vaults = await ledgerCall('collection delegation registry', 'retrieveDelegationAddresses', this.config.ledger.callTimeoutMs, signal, () =>
      this.client.readContract({
        address: this.registry,
        abi: COLLECTION_DELEGATION_ABI,
        functionName: 'retrieveDelegationAddresses',
        args: [hotWallet, this.config.access.assetContract, CONSTANTS.COLLECTION_DELEGATION_USE_CASE],
      }),
    );

    return vaults.filter((vault) => vault !== CONSTANTS.ZERO_ADDRESS);
  }
}
