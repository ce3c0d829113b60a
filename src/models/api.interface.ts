import { AccessTierName } from './access-tier';

/**
 * Wire shapes of the HTTP API. Amounts are decimal strings so that
 * 256-bit ledger values survive JSON.
 */

export interface ChallengeResponse {
  message: string;
  nonce: string;
}

export interface VerifyResponse {
  address: string;
  tier: AccessTierName;
  expires_at: string;
}

export interface ConnectResponse {
  server_public_key: string;
  server_endpoint: string;
  client_address: string;
  dns: string;
  allowed_ips: string;
  expires_at: string;
  tier: AccessTierName;
}

export interface DisconnectResponse {
  status: 'disconnected';
}

export interface StatusResponse {
  connected: boolean;
  tier?: AccessTierName;
  expires_at?: string;
  reason?: string;
}

export interface HealthResponse {
  status: 'ok';
  time: string;
  active_sessions: number;
  active_peers: number;
}

export interface SessionInfoResponse {
  contract: string;
  chain_id: number;
  node_operator: string | null;
  price_per_hour_wei: string;
  duration_seconds: number;
  cost_wei: string;
}

export interface SubscriptionTiersResponse {
  contract: string;
  chain_id: number;
  tiers: Array<{
    id: number;
    price_wei: string;
    duration_seconds: number;
    active: boolean;
  }>;
}

export interface NodeView {
  operator: string;
  endpoint: string;
  wg_pub_key: string;
  region: string;
  staked_amount_wei: string;
  registered_at: number;
  last_heartbeat: number;
  active: boolean;
  rep: number | null;
  rep_eligible: boolean;
}

export interface NodesResponse {
  nodes: NodeView[];
  count: number;
  region?: string;
  min_rep: number | null;
  rep_category: string | null;
}
