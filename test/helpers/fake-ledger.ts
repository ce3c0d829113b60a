import {
  Abi,
  AbiFunction,
  Address,
  Hex,
  PublicClient,
  createPublicClient,
  custom,
  decodeFunctionData,
  encodeAbiParameters,
  isHex,
} from 'viem';

export type CallHandler = (args: readonly unknown[]) => unknown;

export interface RecordedCall {
  address: string;
  functionName: string;
  args: readonly unknown[];
}

interface FakeContract {
  abi: Abi;
  handlers: Map<string, CallHandler>;
}

/**
 * In-process JSON-RPC ledger for tests. Answers `eth_call` by decoding the
 * calldata against the ABI registered at the target address and encoding
 * whatever the registered handler returns.
 */
export class FakeLedger {
  readonly calls: RecordedCall[] = [];
  readonly client: PublicClient;
  private readonly contracts = new Map<string, FakeContract>();

  constructor(readonly chainId = 11155111) {
    this.client = createPublicClient({
      transport: custom(
        { request: ({ method, params }: { method: string; params?: unknown }) => this.request(method, params) },
        { retryCount: 0 },
      ),
    });
  }

  on(address: Address, abi: Abi, functionName: string, handler: CallHandler): this {
    const key = address.toLowerCase();
    const contract = this.contracts.get(key) ?? { abi, handlers: new Map<string, CallHandler>() };
    contract.handlers.set(functionName, handler);
    this.contracts.set(key, contract);
    return this;
  }

  callsTo(functionName: string): RecordedCall[] {
    return this.calls.filter((call) => call.functionName === functionName);
  }

  private async request(method: string, params: unknown): Promise<unknown> {
    if (method === 'eth_chainId') {
      return `0x${this.chainId.toString(16)}`;
    }
    if (method === 'eth_call') {
      return this.call(params);
    }
    throw new Error(`fake ledger does not answer ${method}`);
  }

  private async call(params: unknown): Promise<Hex> {
    const request: unknown = Array.isArray(params) ? params[0] : undefined;
    if (typeof request !== 'object' || request === null || !('to' in request) || !('data' in request)) {
      throw new Error('malformed eth_call');
    }
    const to = String(request.to);
    const data = request.data;
    if (!isHex(data)) {
      throw new Error('malformed eth_call data');
    }

    const contract = this.contracts.get(to.toLowerCase());
    if (!contract) {
      throw new Error(`execution reverted: no contract at ${to}`);
    }
    const { functionName, args } = decodeFunctionData({ abi: contract.abi, data });
    const handler = contract.handlers.get(functionName);
    const fn = contract.abi.find(
      (item): item is AbiFunction => item.type === 'function' && item.name === functionName,
    );
    if (!handler || !fn) {
      throw new Error(`execution reverted: ${functionName} not stubbed`);
    }

    const decodedArgs: readonly unknown[] = args ?? [];
    this.calls.push({ address: to, functionName, args: decodedArgs });

    const result = await handler(decodedArgs);
    if (fn.outputs.length === 1) {
      return encodeAbiParameters(fn.outputs, [result]);
    }
    if (!Array.isArray(result)) {
      throw new Error(`${functionName} handler must return ${fn.outputs.length} values`);
    }
    return encodeAbiParameters(fn.outputs, result);
  }
}
