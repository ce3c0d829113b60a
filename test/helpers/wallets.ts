import { Address, Hex, getAddress } from 'viem';
import { PrivateKeyAccount, privateKeyToAccount } from 'viem/accounts';
import { TransferEvent } from '../../src/models/ledger.interface';
import { CONSTANTS } from '../../src/constants';

function placeholderKey(byte: string): Hex {
  return `0x${byte.repeat(32)}`;
}

export const alice: PrivateKeyAccount = privateKeyToAccount(placeholderKey('11'));
export const bob: PrivateKeyAccount = privateKeyToAccount(placeholderKey('22'));
export const carol: PrivateKeyAccount = privateKeyToAccount(placeholderKey('33'));

/** Addresses that never sign anything. */
export const VAULT_A: Address = getAddress('0x000000000000000000000000000000000000aaaa');
export const VAULT_B: Address = getAddress('0x000000000000000000000000000000000000bbbb');

export function transfer(from: Address, to: Address, tokenIds: bigint[] = [1n]): TransferEvent {
  return {
    kind: tokenIds.length === 1 ? 'single' : 'batch',
    operator: from,
    from,
    to,
    tokenIds,
    blockNumber: 1n,
    transactionHash: null,
  };
}

export const ZERO: Address = CONSTANTS.ZERO_ADDRESS;
