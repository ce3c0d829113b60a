import { Address } from 'viem';
import { AccessCheckMode } from '../../config/environment.config';
import { AccessTier } from '../../models/access-tier';

/** Injection token for the configured {@link AccessChecker}. */
export const ACCESS_CHECKER = 'ACCESS_CHECKER';

/**
 * Direct ledger lookup of the tier one wallet holds on its own,
 * without delegation.
 */
export interface AccessChecker {
  readonly mode: AccessCheckMode;
  checkTier(wallet: Address, signal?: AbortSignal): Promise<AccessTier>;
}
