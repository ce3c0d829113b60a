import { Inject, Injectable } from '@nestjs/common';
import { Address, PublicClient } from 'viem';
import { GATEWAY_CONFIG, GatewayConfig } from '../../config/environment.config';
import { ACCESS_POLICY_ABI } from '../../constants/abis';
import { AccessTier } from '../../models/access-tier';
import { ErrorFactory } from '../../utils/error-handling.util';
import { ledgerCall } from '../../utils/ledger-call.util';
import { PUBLIC_CLIENT } from '../ledger-client.provider';
import { AccessChecker } from './access-checker.interface';

/**
 * Asks the access-policy contract: `free` wins over `access`.
 */
@Injectable()
export class PolicyAccessChecker implements AccessChecker {
  readonly mode = 'policy' as const;

  constructor(
    @Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig,
    @Inject(PUBLIC_CLIENT) private readonly client: PublicClient,
  ) {}

  async checkTier(wallet: Address, signal?: AbortSignal): Promise<AccessTier> {
    const contract = this.config.access.policyContract;
    if (!contract) {
      throw ErrorFactory.notConfigured('access policy contract');
    }

    const [access, free] = await ledgerCall('access policy', 'checkAccess', this.config.ledger.callTimeoutMs, signal, () =>
      this.client.readContract({
        address: contract,
        abi: ACCESS_POLICY_ABI,
        functionName: 'checkAccess',
        args: [wallet],
      }),
    );

    if (free) return AccessTier.Free;
    if (access) return AccessTier.Paid;
    return AccessTier.Denied;
  }
}
