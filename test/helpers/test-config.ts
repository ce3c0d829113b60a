import { Address } from 'viem';
import { EnvironmentConfig, GatewayConfig } from '../../src/config/environment.config';

export const ASSET: Address = '0x00000000000000000000000000000000000a55e7';
export const POLICY: Address = '0x000000000000000000000000000000000000a11c';
export const SESSION_MANAGER: Address = '0x0000000000000000000000000000000000005e55';
export const SUBSCRIPTION_MANAGER: Address = '0x0000000000000000000000000000000000005ab5';
export const NODE_REGISTRY: Address = '0x000000000000000000000000000000000000beef';
export const DELEGATE_REGISTRY: Address = '0x000000000000000000000000000000000000de1e';
export const COLLECTION_REGISTRY: Address = '0x000000000000000000000000000000000000c011';

/** Deterministic 32-byte WireGuard public key built from one repeated byte. */
export function wgKey(byte: number): string {
  return Buffer.alloc(32, byte).toString('base64');
}

export const SERVER_KEY = wgKey(200);

export const BASE_ENV: Record<string, string> = {
  NODE_ENV: 'test',
  LEDGER_RPC_URL: 'http://ledger.test',
  ASSET_CONTRACT: ASSET,
  ACCESS_POLICY_CONTRACT: POLICY,
  SIWE_DOMAIN: 'gateway.test',
  SIWE_URI: 'https://gateway.test',
  WG_SERVER_PUBLIC_KEY: SERVER_KEY,
  WG_SERVER_ENDPOINT: 'vpn.gateway.test:51820',
  WG_SUBNET: '10.8.0.0/24',
  RATE_LIMIT_PER_MINUTE: '10000',
  LEDGER_CALL_TIMEOUT_MS: '2000',
  LEDGER_WRITE_RETRY_DELAY_MS: '1',
};

export function testConfig(overrides: Record<string, string> = {}): GatewayConfig {
  return EnvironmentConfig.validate(EnvironmentConfig.load({ ...BASE_ENV, ...overrides }));
}
