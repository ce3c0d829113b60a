import { Inject, Injectable, Logger } from '@nestjs/common';
import { Address, PublicClient } from 'viem';
import { GATEWAY_CONFIG, GatewayConfig } from '../config/environment.config';
import { SESSION_MANAGER_ABI } from '../constants/abis';
import { OnChainSession, SessionContractInfo } from '../models/ledger.interface';
import { ErrorFactory } from '../utils/error-handling.util';
import { SecurityUtil } from '../utils/security.util';
import { ledgerCall } from '../utils/ledger-call.util';
import { LedgerTask, LedgerTaskQueueService } from './ledger-task-queue.service';
import { OperatorWalletClient, PUBLIC_CLIENT, WALLET_CLIENT } from './ledger-client.provider';

/**
 * SessionLedgerService
 *
 * Reads and writes the on-chain session contract. Reads back paid-tier
 * payment checks; writes record free sessions and close sessions on
 * disconnect, and go through the ledger task queue.
 */
@Injectable()
export class SessionLedgerService {
  private readonly logger = new Logger(SessionLedgerService.name);

  constructor(
    @Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig,
    @Inject(PUBLIC_CLIENT) private readonly client: PublicClient,
    @Inject(WALLET_CLIENT) private readonly wallet: OperatorWalletClient | null,
    private readonly tasks: LedgerTaskQueueService,
  ) {}

  get isConfigured(): boolean {
    return this.config.sessionManager.contract !== null;
  }

  get canWrite(): boolean {
    return this.isConfigured && this.wallet !== null;
  }

  /** Node address recorded on sessions this gateway opens. */
  get nodeOperator(): Address | null {
    return this.config.sessionManager.nodeOperator ?? this.wallet?.account.address ?? null;
  }

  /**
   * The user's active on-chain session, or `null` when there is none.
   */
  async getActiveSession(user: Address, signal?: AbortSignal): Promise<OnChainSession | null> {
    const contract = this.contract();
    const id = await this.ledger('getActiveSessionId', signal, () =>
      this.client.readContract({
        address: contract,
        abi: SESSION_MANAGER_ABI,
        functionName: 'getActiveSessionId',
        args: [user],
      }),
    );
    if (id === 0n) {
      return null;
    }

    const session = await this.ledger('getSession', signal, () =>
      this.client.readContract({
        address: contract,
        abi: SESSION_MANAGER_ABI,
        functionName: 'getSession',
        args: [id],
      }),
    );
    return { id, ...session };
  }

  async getSessionInfo(signal?: AbortSignal): Promise<SessionContractInfo> {
    const contract = this.contract();
    const [pricePerHour, maxDurationSeconds] = await Promise.all([
      this.ledger('pricePerHour', signal, () =>
        this.client.readContract({ address: contract, abi: SESSION_MANAGER_ABI, functionName: 'pricePerHour' }),
      ),
      this.ledger('maxSessionDuration', signal, () =>
        this.client.readContract({ address: contract, abi: SESSION_MANAGER_ABI, functionName: 'maxSessionDuration' }),
      ),
    ]);
    const cost = await this.ledger('calculatePrice', signal, () =>
      this.client.readContract({
        address: contract,
        abi: SESSION_MANAGER_ABI,
        functionName: 'calculatePrice',
        args: [maxDurationSeconds],
      }),
    );

    return {
      contract,
      chainId: this.config.ledger.chainId,
      nodeOperator: this.nodeOperator,
      pricePerHour,
      maxDurationSeconds,
      cost,
    };
  }

  /**
   * Queues `openFreeSession` for a free-tier sign-in.
   * @returns the queued task, or `null` when writes are not configured
   */
  recordFreeSession(user: Address): LedgerTask | null {
    const wallet = this.wallet;
    const contract = this.config.sessionManager.contract;
    const node = this.nodeOperator;
    if (!wallet || !contract || !node) {
      return null;
    }
    const duration = BigInt(this.config.sessionManager.freeSessionDurationSeconds);

    return this.tasks.enqueue(`openFreeSession:${SecurityUtil.mask(user)}`, async () => {
      const hash = await wallet.writeContract({
        address: contract,
        abi: SESSION_MANAGER_ABI,
        functionName: 'openFreeSession',
        args: [user, node, duration],
      });
      await this.confirm(hash, 'openFreeSession');
    });
  }

  /**
   * Queues `closeSession` for the user's active on-chain session, if any.
   * @returns the queued task, or `null` when writes are not configured
   */
  closeSessionFor(user: Address): LedgerTask | null {
    const wallet = this.wallet;
    const contract = this.config.sessionManager.contract;
    if (!wallet || !contract) {
      return null;
    }

    return this.tasks.enqueue(`closeSession:${SecurityUtil.mask(user)}`, async () => {
      const active = await this.getActiveSession(user);
      if (!active) {
        this.logger.debug(`No on-chain session to close for ${SecurityUtil.mask(user)}`);
        return;
      }
      const hash = await wallet.writeContract({
        address: contract,
        abi: SESSION_MANAGER_ABI,
        functionName: 'closeSession',
        args: [active.id],
      });
      await this.confirm(hash, 'closeSession');
    });
  }

  private async confirm(hash: `0x${string}`, method: string): Promise<void> {
    const receipt = await this.client.waitForTransactionReceipt({
      hash,
      timeout: this.config.ledger.callTimeoutMs * 6,
    });
    if (receipt.status !== 'success') {
      throw ErrorFactory.upstream(`${method} transaction ${hash} reverted`);
    }
  }

  private contract(): Address {
    const contract = this.config.sessionManager.contract;
    if (!contract) {
      throw ErrorFactory.notConfigured('session manager');
    }
    return contract;
  }

  private ledger<T>(method: string, signal: AbortSignal | undefined, call: () => Promise<T>): Promise<T> {
    return ledgerCall('session manager', method, this.config.ledger.callTimeoutMs, signal, call);
  }
}
