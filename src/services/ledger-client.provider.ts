import { Provider } from '@nestjs/common';
import {
  Account,
  Chain,
  Transport,
  WalletClient,
  createPublicClient,
  createWalletClient,
  defineChain,
  http,
} from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import { GATEWAY_CONFIG, GatewayConfig } from '../config/environment.config';

/** Read-only ledger client (HTTP transport). */
export const PUBLIC_CLIENT = 'PUBLIC_CLIENT';

/** Operator wallet client, or `null` when no operator key is configured. */
export const WALLET_CLIENT = 'WALLET_CLIENT';

export type OperatorWalletClient = WalletClient<Transport, Chain, Account>;

export function gatewayChain(config: GatewayConfig): Chain {
  return defineChain({
    id: config.ledger.chainId,
    name: `chain-${config.ledger.chainId}`,
    nativeCurrency: { name: 'Ether', symbol: 'ETH', decimals: 18 },
    rpcUrls: { default: { http: [config.ledger.rpcUrl] } },
  });
}

export const publicClientProvider: Provider = {
  provide: PUBLIC_CLIENT,
  inject: [GATEWAY_CONFIG],
  useFactory: (config: GatewayConfig) =>
    createPublicClient({
      chain: gatewayChain(config),
      transport: http(config.ledger.rpcUrl, { timeout: config.ledger.callTimeoutMs }),
    }),
};

export const walletClientProvider: Provider = {
  provide: WALLET_CLIENT,
  inject: [GATEWAY_CONFIG],
  useFactory: (config: GatewayConfig): OperatorWalletClient | null => {
    const key = config.sessionManager.operatorPrivateKey;
    if (!key) {
      return null;
    }
    return createWalletClient({
      account: privateKeyToAccount(key),
      chain: gatewayChain(config),
      transport: http(config.ledger.rpcUrl, { timeout: config.ledger.callTimeoutMs }),
    });
  },
};
