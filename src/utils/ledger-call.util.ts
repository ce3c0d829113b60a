import { AppLogger } from './app-logger.util';
import { ErrorFactory, errorMessage, isApplicationError } from './error-handling.util';
import { withTimeout } from './timeout.util';

/**
 * Runs one ledger read under the call timeout and the caller's signal.
 * Transport and contract failures surface as upstream errors; timeout and
 * cancellation errors pass through unchanged.
 */
export async function ledgerCall<T>(
  contract: string,
  method: string,
  timeoutMs: number,
  signal: AbortSignal | undefined,
  call: () => Promise<T>,
): Promise<T> {
  const startTime = Date.now();
  try {
    const result = await withTimeout(method, call, timeoutMs, signal);
    AppLogger.logLedgerCall(contract, method, Date.now() - startTime);
    return result;
  } catch (error) {
    if (isApplicationError(error)) throw error;
    throw ErrorFactory.upstream(`${contract} ${method} failed: ${errorMessage(error)}`);
  }
}
