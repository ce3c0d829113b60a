import { Address } from 'viem';

export interface OnChainSession {
  id: bigint;
  user: Address;
  node: Address;
  payment: bigint;
  startedAt: bigint;
  duration: bigint;
  active: boolean;
  settled: boolean;
}

export interface OnChainSubscription {
  user: Address;
  node: Address;
  payment: bigint;
  startedAt: bigint;
  expiresAt: bigint;
  tier: number;
}

export interface SubscriptionTier {
  id: number;
  price: bigint;
  duration: bigint;
  active: boolean;
}

export interface SessionContractInfo {
  contract: Address;
  chainId: number;
  nodeOperator: Address | null;
  pricePerHour: bigint;
  maxDurationSeconds: bigint;
  cost: bigint;
}

export interface RegistryNode {
  operator: Address;
  endpoint: string;
  wgPubKey: string;
  region: string;
  stakedAmount: bigint;
  registeredAt: bigint;
  lastHeartbeat: bigint;
  active: boolean;
  slashed: boolean;
}

/**
 * Asset transfer observed on the gated contract. Zero-address parties
 * (mints and burns) are passed through unchanged.
 */
export interface TransferEvent {
  kind: 'single' | 'batch';
  operator: Address;
  from: Address;
  to: Address;
  tokenIds: readonly bigint[];
  blockNumber: bigint | null;
  transactionHash: string | null;
}
