import { Inject, Injectable } from '@nestjs/common';
import { PublicClient, createPublicClient, webSocket } from 'viem';
import { GATEWAY_CONFIG, GatewayConfig } from '../../config/environment.config';
import { ERC1155_ABI } from '../../constants/abis';
import { ErrorFactory } from '../../utils/error-handling.util';
import { gatewayChain } from '../ledger-client.provider';
import { TransferEventSource, TransferHandlers, TransferSubscription } from './transfer-event-source.interface';

/**
 * Streams `TransferSingle` and `TransferBatch` logs of the gated contract
 * over the WebSocket endpoint.
 */
@Injectable()
export class ViemTransferSource implements TransferEventSource {
  private client: PublicClient | null = null;

  constructor(@Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig) {}

  get available(): boolean {
    return this.config.ledger.wsUrl !== null;
  }

  subscribe(handlers: TransferHandlers): TransferSubscription {
    const client = this.getClient();
    const address = this.config.access.assetContract;
    let closed = false;
    const fail = (error: Error) => {
      if (!closed) handlers.onError(error);
    };

    const unwatchers = [
      client.watchContractEvent({
        address,
        abi: ERC1155_ABI,
        eventName: 'TransferSingle',
        strict: true,
        onError: fail,
        onLogs: (logs) => {
          for (const log of logs) {
            handlers.onTransfer({
              kind: 'single',
              operator: log.args.operator,
              from: log.args.from,
              to: log.args.to,
              tokenIds: [log.args.id],
              blockNumber: log.blockNumber,
              transactionHash: log.transactionHash,
            });
          }
        },
      }),
      client.watchContractEvent({
        address,
        abi: ERC1155_ABI,
        eventName: 'TransferBatch',
        strict: true,
        onError: fail,
        onLogs: (logs) => {
          for (const log of logs) {
            handlers.onTransfer({
              kind: 'batch',
              operator: log.args.operator,
              from: log.args.from,
              to: log.args.to,
              tokenIds: log.args.ids,
              blockNumber: log.blockNumber,
              transactionHash: log.transactionHash,
            });
          }
        },
      }),
    ];

    return {
      unsubscribe: () => {
        closed = true;
        for (const unwatch of unwatchers) unwatch();
      },
    };
  }

  private getClient(): PublicClient {
    const wsUrl = this.config.ledger.wsUrl;
    if (!wsUrl) {
      throw ErrorFactory.notConfigured('ledger WebSocket endpoint');
    }
    if (!this.client) {
      this.client = createPublicClient({
        chain: gatewayChain(this.config),
        transport: webSocket(wsUrl, { reconnect: false }),
      });
    }
    return this.client;
  }
}
