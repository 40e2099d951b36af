import { AccountRecord } from '../../domain/ledger/bank.js';

const ACCOUNT_COLUMNS = ['client', 'available', 'held', 'total', 'locked'] as const;

/**
 * Render final account states as CSV, one row per account.
 * Nothing is written, not even a header, when there are no accounts.
 */
export function writeAccountsCsv(accounts: readonly AccountRecord[]): string {
  if (accounts.length === 0) {
    return '';
  }

  const csvHeader = ACCOUNT_COLUMNS.join(',');
  const csvRows = accounts.map((account) =>
    ACCOUNT_COLUMNS.map((column) => String(account[column])).join(',')
  );

  return [csvHeader, ...csvRows].join('\n') + '\n';
}
