import { Bank, AccountRecord } from '../../domain/ledger/bank.js';
import { DomainError, DomainErrorCode } from '../../domain/ledger/errors.js';
import { RawTxRecord, parseTxRecord, toTx } from './txRecord.js';

export interface ReplayCommand {
  records: Iterable<RawTxRecord>;
  // Called as each warning occurs, before any later record can abort the run
  onWarning?: (warning: ReplayWarning) => void;
}

/**
 * A transaction that was rejected without stopping the replay.
 */
export interface ReplayWarning {
  record: number;
  code: DomainErrorCode;
  message: string;
}

export interface ReplayResult {
  accounts: AccountRecord[];
  warnings: ReplayWarning[];
}

export function formatWarning(warning: ReplayWarning): string {
  return `warning: transaction ${warning.record} failed: ${warning.message}`;
}

/**
 * Replays a transaction log in order against a fresh Bank.
 *
 * Domain failures (overflow, insufficient funds, locked account, unknown
 * transaction, missing amount) become warnings and the replay moves on.
 * Malformed records throw RecordFormatError and end the run.
 */
export class ReplayLedgerUseCase {
  execute(command: ReplayCommand): ReplayResult {
    const bank = new Bank();
    const warnings: ReplayWarning[] = [];

    let recordNumber = 0;
    for (const raw of command.records) {
      recordNumber++;
      const record = parseTxRecord(raw, recordNumber);

      try {
        bank.process(toTx(record));
      } catch (error) {
        if (!(error instanceof DomainError)) {
          throw error;
        }
        const warning: ReplayWarning = {
          record: recordNumber,
          code: error.code,
          message: error.message,
        };
        warnings.push(warning);
        command.onWarning?.(warning);
      }
    }

    return {
      accounts: bank.toRecords(),
      warnings,
    };
  }
}
