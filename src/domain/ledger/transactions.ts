import { Money } from './money.js';

/**
 * Typed transactions replayed against the ledger.
 * Built once at the input boundary; the core only switches on `type`.
 */

/** Unsigned 16-bit client identifier. */
export type ClientId = number;

/** Unsigned 32-bit transaction identifier. */
export type TxId = number;

export const CLIENT_ID_MAX = 0xffff;
export const TX_ID_MAX = 0xffff_ffff;

export type Tx = Deposit | Withdrawal | Dispute | Resolve | Chargeback;

export type TxType = Tx['type'];

export interface Deposit {
  readonly type: 'deposit';
  readonly client: ClientId;
  readonly id: TxId;
  readonly amount: Money;
}

export interface Withdrawal {
  readonly type: 'withdrawal';
  readonly client: ClientId;
  readonly id: TxId;
  readonly amount: Money;
}

export interface Dispute {
  readonly type: 'dispute';
  readonly client: ClientId;
  readonly id: TxId;
}

export interface Resolve {
  readonly type: 'resolve';
  readonly client: ClientId;
  readonly id: TxId;
}

export interface Chargeback {
  readonly type: 'chargeback';
  readonly client: ClientId;
  readonly id: TxId;
}

export const TX_TYPES = [
  'deposit',
  'withdrawal',
  'dispute',
  'resolve',
  'chargeback',
] as const satisfies readonly TxType[];
