import { readFile } from 'fs/promises';
import { ReplayLedgerUseCase, formatWarning } from '../../application/ledger/replay.js';
import { RecordFormatError, UsageError } from '../../application/errors.js';
import { readCsv } from '../csv/csvReader.js';
import { writeAccountsCsv } from '../csv/csvWriter.js';

export const USAGE = 'Usage: ledger-replay <transactions.csv>';

/**
 * Replay the CSV file named by the single argument and print the final
 * accounts to stdout. Rejected transactions are reported on stderr.
 */
export async function replayFile(args: readonly string[]): Promise<void> {
  if (args.length !== 1) {
    throw new UsageError();
  }

  const [path] = args;
  const text = await readFile(path, 'utf-8');
  const { records } = readCsv(text);

  const result = new ReplayLedgerUseCase().execute({
    records,
    onWarning: (warning) => console.warn(formatWarning(warning)),
  });

  process.stdout.write(writeAccountsCsv(result.accounts));
}

/**
 * Run the command and map the outcome to an exit code.
 */
export async function main(args: readonly string[]): Promise<number> {
  try {
    await replayFile(args);
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n${USAGE}`);
    } else if (error instanceof RecordFormatError) {
      console.error(`error: ${error.message}`);
      for (const issue of error.issues) {
        console.error(`  ${issue.path}: ${issue.message}`);
      }
    } else if (error instanceof Error) {
      console.error(`error: ${error.message}`);
    } else {
      console.error('error:', error);
    }
    return 1;
  }
}
