import { Inject, Injectable, Logger } from '@nestjs/common';
import { Address, PublicClient } from 'viem';
import { GATEWAY_CONFIG, GatewayConfig } from '../config/environment.config';
import { NODE_REGISTRY_ABI } from '../constants/abis';
import { ListedNode } from '../models/app.interface';
import { RegistryNode } from '../models/ledger.interface';
import { ErrorFactory, errorMessage } from '../utils/error-handling.util';
import { SecurityUtil } from '../utils/security.util';
import { ledgerCall } from '../utils/ledger-call.util';
import { CacheService } from './cache.service';
import { PUBLIC_CLIENT } from './ledger-client.provider';
import { ReputationService } from './reputation.service';

/**
 * NodeDirectoryService
 *
 * Lists active tunnel nodes from the node registry contract. When the
 * reputation API is configured, only operators meeting the minimum rating
 * are listed, each carrying its rating; an operator whose rating cannot be
 * fetched is left out.
 */
@Injectable()
export class NodeDirectoryService {
  private readonly logger = new Logger(NodeDirectoryService.name);

  constructor(
    @Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig,
    @Inject(PUBLIC_CLIENT) private readonly client: PublicClient,
    private readonly cache: CacheService,
    private readonly reputation: ReputationService,
  ) {}

  get isConfigured(): boolean {
    return this.config.nodes.registryContract !== null;
  }

  /** Active nodes, cached for `nodeCacheTtlMs`. */
  async listNodes(signal?: AbortSignal): Promise<ListedNode[]> {
    const registry = this.registry();
    const nodes = await this.cache.getOrSet(
      CacheService.KEYS.nodes(),
      () =>
        this.ledger('getActiveNodes', signal, () =>
          this.client.readContract({ address: registry, abi: NODE_REGISTRY_ABI, functionName: 'getActiveNodes' }),
        ),
      this.config.nodes.cacheTtlMs,
    );
    return this.filterByReputation([...nodes], signal);
  }

  /** Active nodes in one region; not cached. */
  async listNodesByRegion(region: string, signal?: AbortSignal): Promise<ListedNode[]> {
    const registry = this.registry();
    const nodes = await this.ledger('getActiveNodesByRegion', signal, () =>
      this.client.readContract({
        address: registry,
        abi: NODE_REGISTRY_ABI,
        functionName: 'getActiveNodesByRegion',
        args: [region],
      }),
    );
    return this.filterByReputation([...nodes], signal);
  }

  async invalidate(): Promise<void> {
    await this.cache.del(CacheService.KEYS.nodes());
  }

  private async filterByReputation(nodes: RegistryNode[], signal?: AbortSignal): Promise<ListedNode[]> {
    if (!this.reputation.isConfigured) {
      return nodes.map((node) => ({ ...node, rep: null, repEligible: true }));
    }

    const rated = await Promise.all(
      nodes.map(async (node): Promise<ListedNode> => {
        try {
          const { rating, eligible } = await this.reputation.checkOperator(node.operator, signal);
          return { ...node, rep: rating, repEligible: eligible };
        } catch (error) {
          if (signal?.aborted) throw error;
          this.logger.warn(`Reputation check failed for operator ${SecurityUtil.mask(node.operator)}: ${errorMessage(error)}`);
          return { ...node, rep: 0, repEligible: false };
        }
      }),
    );
    return rated.filter((node) => node.repEligible);
  }

  private registry(): Address {
    const registry = this.config.nodes.registryContract;
    if (!registry) {
      throw ErrorFactory.notConfigured('node registry');
    }
    return registry;
  }

  private ledger<T>(method: string, signal: AbortSignal | undefined, call: () => Promise<T>): Promise<T> {
    return ledgerCall('node registry', method, this.config.ledger.callTimeoutMs, signal, call);
  }
}
