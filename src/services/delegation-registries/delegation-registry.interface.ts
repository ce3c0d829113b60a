import { Address } from 'viem';

/** Injection token for the list of enabled {@link DelegationRegistry} readers. */
export const DELEGATION_REGISTRIES = 'DELEGATION_REGISTRIES';

/**
 * One on-ledger delegation registry. Returns the vault (cold) wallets that
 * delegated the gated collection to `hotWallet`.
 */
export interface DelegationRegistry {
  readonly name: string;
  findVaults(hotWallet: Address, signal?: AbortSignal): Promise<Address[]>;
}
