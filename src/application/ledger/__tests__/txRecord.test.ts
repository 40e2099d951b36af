import { describe, it, expect } from 'vitest';
import { parseAmount, parseTxRecord, toTx } from '../txRecord.js';
import { RecordFormatError } from '../../errors.js';
import { MissingAmountError, OverflowError } from '../../../domain/ledger/errors.js';

describe('parseAmount', () => {
  it('should parse decimal text into scaled units', () => {
    expect(parseAmount('5.0').units).toBe(50_000n);
    expect(parseAmount('1.2345').units).toBe(12_345n);
    expect(parseAmount('3').units).toBe(30_000n);
    expect(parseAmount('0.0001').units).toBe(1n);
  });

  it('should accept a leading or trailing decimal point', () => {
    expect(parseAmount('.5').units).toBe(5_000n);
    expect(parseAmount('2.').units).toBe(20_000n);
  });

  it('should keep the sign', () => {
    expect(parseAmount('-1.5').units).toBe(-15_000n);
    expect(parseAmount('+1.5').units).toBe(15_000n);
    expect(parseAmount('-0').units).toBe(0n);
  });

  it('should round past four decimals half away from zero', () => {
    expect(parseAmount('0.00005').units).toBe(1n);
    expect(parseAmount('0.00004999').units).toBe(0n);
    expect(parseAmount('1.99995').units).toBe(20_000n);
    expect(parseAmount('-0.00005').units).toBe(-1n);
  });

  it('should not lose precision on large amounts', () => {
    expect(parseAmount('922337203685477.5807').units).toBe(2n ** 63n - 1n);
  });

  it('should throw OverflowError outside the Money range', () => {
    expect(() => parseAmount('922337203685477.5808')).toThrow(OverflowError);
  });

  it('should reject text that is not a decimal', () => {
    expect(() => parseAmount('.')).toThrow(TypeError);
    expect(() => parseAmount('1e5')).toThrow(TypeError);
  });
});

describe('parseTxRecord', () => {
  it('should validate and convert fields', () => {
    const record = parseTxRecord(
      { type: 'deposit', client: '1', tx: '42', amount: '5.0' },
      1
    );

    expect(record).toEqual({ type: 'deposit', client: 1, tx: 42, amount: '5.0' });
  });

  it('should treat an empty amount as absent', () => {
    const record = parseTxRecord(
      { type: 'dispute', client: '1', tx: '42', amount: '' },
      1
    );

    expect(record.amount).toBeUndefined();
  });

  it('should accept the largest client and transaction ids', () => {
    const record = parseTxRecord(
      { type: 'resolve', client: '65535', tx: '4294967295' },
      1
    );

    expect(record.client).toBe(65_535);
    expect(record.tx).toBe(4_294_967_295);
  });

  it('should reject an unknown type', () => {
    expect(() =>
      parseTxRecord({ type: 'transfer', client: '1', tx: '1', amount: '1' }, 3)
    ).toThrow(RecordFormatError);
  });

  it('should reject a client id out of range', () => {
    try {
      parseTxRecord({ type: 'deposit', client: '65536', tx: '1', amount: '1' }, 2);
      expect.fail('expected RecordFormatError');
    } catch (error) {
      expect(error).toBeInstanceOf(RecordFormatError);
      if (error instanceof RecordFormatError) {
        expect(error.recordNumber).toBe(2);
        expect(error.message).toBe('Invalid transaction record 2');
        expect(error.issues).toEqual([
          { path: 'client', message: 'client must be at most 65535' },
        ]);
      }
    }
  });

  it('should reject a non-numeric transaction id', () => {
    expect(() =>
      parseTxRecord({ type: 'deposit', client: '1', tx: 'abc', amount: '1' }, 1)
    ).toThrow(RecordFormatError);
  });

  it('should reject a missing transaction id', () => {
    expect(() => parseTxRecord({ type: 'deposit', client: '1' }, 1)).toThrow(
      RecordFormatError
    );
  });

  it('should reject an amount that is not a decimal', () => {
    expect(() =>
      parseTxRecord({ type: 'deposit', client: '1', tx: '1', amount: 'five' }, 1)
    ).toThrow(RecordFormatError);
  });
});

describe('toTx', () => {
  it('should build a deposit with its amount', () => {
    const tx = toTx({ type: 'deposit', client: 1, tx: 2, amount: '1.5' });

    expect(tx.type).toBe('deposit');
    expect(tx.client).toBe(1);
    expect(tx.id).toBe(2);
    if (tx.type === 'deposit') {
      expect(tx.amount.toString()).toBe('1.5000');
    }
  });

  it('should build a withdrawal with its amount', () => {
    const tx = toTx({ type: 'withdrawal', client: 1, tx: 3, amount: '0.25' });

    expect(tx.type).toBe('withdrawal');
    if (tx.type === 'withdrawal') {
      expect(tx.amount.units).toBe(2_500n);
    }
  });

  it.each(['deposit', 'withdrawal'] as const)(
    'should throw MissingAmountError for a %s without amount',
    (type) => {
      expect(() => toTx({ type, client: 1, tx: 1, amount: undefined })).toThrow(
        MissingAmountError
      );
    }
  );

  it.each(['dispute', 'resolve', 'chargeback'] as const)(
    'should ignore any amount on a %s',
    (type) => {
      expect(toTx({ type, client: 5, tx: 8, amount: '9.99' })).toEqual({
        type,
        client: 5,
        id: 8,
      });
    }
  );
});
