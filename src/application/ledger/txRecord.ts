import { z } from 'zod';
import { Money } from '../../domain/ledger/money.js';
import {
  CLIENT_ID_MAX,
  TX_ID_MAX,
  TX_TYPES,
  Tx,
} from '../../domain/ledger/transactions.js';
import { MissingAmountError } from '../../domain/ledger/errors.js';
import { RecordFormatError } from '../errors.js';

/**
 * One input row keyed by header name. Absent trailing columns are undefined.
 */
export type RawTxRecord = Readonly<Record<string, string | undefined>>;

const AMOUNT_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?$/;

function isDecimal(text: string): boolean {
  const match = AMOUNT_PATTERN.exec(text);
  return match !== null && `${match[2]}${match[3] ?? ''}`.length > 0;
}

function unsignedInt(field: string, max: number) {
  return z
    .string({ required_error: `${field} is required` })
    .regex(/^\d+$/, `${field} must be an unsigned integer`)
    .transform((value) => Number(value))
    .refine((value) => value <= max, `${field} must be at most ${max}`);
}

export const txRecordSchema = z.object({
  type: z.enum(TX_TYPES),
  client: unsignedInt('client', CLIENT_ID_MAX),
  tx: unsignedInt('tx', TX_ID_MAX),
  amount: z
    .string()
    .optional()
    .transform((value) => (value ? value : undefined))
    .refine(
      (value) => value === undefined || isDecimal(value),
      'amount must be a decimal number'
    ),
});

export type TxRecord = z.infer<typeof txRecordSchema>;

/**
 * Validate the shape of a raw row. Shape errors are fatal for the run.
 */
export function parseTxRecord(raw: RawTxRecord, recordNumber: number): TxRecord {
  const result = txRecordSchema.safeParse(raw);
  if (!result.success) {
    throw new RecordFormatError(
      `Invalid transaction record ${recordNumber}`,
      recordNumber,
      result.error.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      }))
    );
  }
  return result.data;
}

/**
 * Parse decimal text straight into Money units, without going through a
 * float. Digits past the fourth decimal are rounded half away from zero.
 */
export function parseAmount(text: string): Money {
  const match = AMOUNT_PATTERN.exec(text);
  if (!match || !isDecimal(text)) {
    throw new TypeError(`Not a decimal amount: ${text}`);
  }

  const [, sign, whole, fraction = ''] = match;
  const digits = Money.FRACTION_DIGITS;

  let units =
    BigInt(whole || '0') * Money.SCALE +
    BigInt(fraction.slice(0, digits).padEnd(digits, '0'));
  if (fraction.charAt(digits) >= '5') {
    units += 1n;
  }

  return Money.fromUnits(sign === '-' ? -units : units);
}

/**
 * Turn a validated record into a typed transaction.
 * Deposits and withdrawals need an amount; the other kinds ignore it.
 */
export function toTx(record: TxRecord): Tx {
  const { type, client, tx: id, amount } = record;

  switch (type) {
    case 'deposit':
    case 'withdrawal':
      if (amount === undefined) {
        throw new MissingAmountError();
      }
      return { type, client, id, amount: parseAmount(amount) };
    case 'dispute':
    case 'resolve':
    case 'chargeback':
      return { type, client, id };
  }
}
