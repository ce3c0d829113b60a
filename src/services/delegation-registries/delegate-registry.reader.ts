import { Address, PublicClient, isAddressEqual } from 'viem';
import { GatewayConfig } from '../../config/environment.config';
import { CONSTANTS } from '../../constants';
import { DELEGATE_REGISTRY_ABI } from '../../constants/abis';
import { ledgerCall } from '../../utils/ledger-call.util';
import { DelegationRegistry } from './delegation-registry.interface';

/**
 * Reader for the v2 delegate registry.
 *
 * Keeps wallet-wide delegations and contract delegations scoped to the gated
 * asset. Token-level and ERC-20 delegations are ignored.
 */
export class DelegateRegistryReader implements DelegationRegistry {
  readonly name = 'delegate-registry';

  constructor(
    private readonly client: PublicClient,
    private readonly registry: Address,
    private readonly config: GatewayConfig,
  ) {}

  async findVaults(hotWallet: Address, signal?: AbortSignal): Promise<Address[]> {
    const delegations = await ledgerCall('delegate registry', 'getIncomingDelegations', this.config.ledger.callTimeoutMs, signal, () =>
      this.client.readContract({
        address: this.registry,
        abi: DELEGATE_REGISTRY_ABI,
        functionName: 'getIncomingDelegations',
        args: [hotWallet],
      }),
    );

    const asset = this.config.access.assetContract;
    return delegations
      .filter((d) => d.from !== CONSTANTS.ZERO_ADDRESS)
      .filter(
        (d) =>
          d.type_ === CONSTANTS.DELEGATION_TYPE.ALL ||
          (d.type_ === CONSTANTS.DELEGATION_TYPE.CONTRACT && isAddressEqual(d.contract_, asset)),
      )
      .map((d) => d.from);
  }
}
