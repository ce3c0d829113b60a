import { TransferEvent } from '../../models/ledger.interface';

/** Injection token for the {@link TransferEventSource}. */
export const TRANSFER_EVENT_SOURCE = 'TRANSFER_EVENT_SOURCE';

export interface TransferHandlers {
  onTransfer(event: TransferEvent): void;
  /** The subscription is dead after this fires; the caller resubscribes. */
  onError(error: Error): void;
}

export interface TransferSubscription {
  unsubscribe(): void;
}

/**
 * Live feed of transfer events on the gated asset contract.
 */
export interface TransferEventSource {
  /** False when no streaming endpoint is configured. */
  readonly available: boolean;
  subscribe(handlers: TransferHandlers): TransferSubscription;
}
