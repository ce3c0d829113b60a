import { Address } from 'viem';
import { AccessTier } from './access-tier';
import { RegistryNode } from './ledger.interface';

/**
 * EIP-4361 challenge fields. Immutable once issued.
 */
export interface Challenge {
  domain: string;
  address: Address;
  statement: string;
  uri: string;
  version: '1';
  chainId: number;
  nonce: string;
  issuedAt: string;
}

export interface IssuedChallenge {
  challenge: Challenge;
  message: string;
}

export interface VerifiedIdentity {
  address: Address;
}

export interface TierResult {
  tier: AccessTier;
  checkedAt: Date;
}

export interface TierCacheEntry {
  wallet: Address;
  tier: AccessTier;
  computedAt: number;
  expiresAt: number;
}

export interface DelegationCacheEntry {
  hotWallet: Address;
  vaults: Address[];
  expiresAt: number;
}

export interface Session {
  address: Address;
  tier: AccessTier;
  createdAt: Date;
  expiresAt: Date;
  /** Tunnel key currently provisioned for this wallet, if any. */
  peerPublicKey?: string;
}

export interface Peer {
  publicKey: string;
  address: string;
  /** Wallet the peer was provisioned for. */
  owner?: Address;
  assignedAt: Date;
  expiresAt: Date;
  bytesReceived: bigint;
  bytesSent: bigint;
}

export interface PeerConfig {
  serverPublicKey: string;
  serverEndpoint: string;
  /** `<ip>/<prefix>` inside the tunnel subnet. */
  clientAddress: string;
  dns: string;
  allowedIps: string;
  expiresAt: Date;
}

/**
 * Outcome of a paid-tier payment check: how long the peer may live.
 */
export type PaymentConfirmation =
  | { confirmed: true; ttlMs: number; source: 'session' | 'subscription' | 'none' }
  | { confirmed: false; reason: string };

/**
 * A registry node as listed to clients. `rep` is null when no reputation
 * API is configured, in which case every node counts as eligible.
 */
export interface ListedNode extends RegistryNode {
  rep: number | null;
  repEligible: boolean;
}
