import { RecordFormatError } from '../../application/errors.js';

export type CsvRecord = Readonly<Record<string, string | undefined>>;

export interface CsvDocument {
  readonly header: readonly string[];
  readonly records: readonly CsvRecord[];
}

/**
 * Split CSV text into rows of raw fields.
 * Handles double-quoted fields ("" escapes a quote) and \n / \r\n endings.
 */
function splitRows(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') {
        i++;
      }
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += char;
    }
  }

  if (inQuotes) {
    throw new RecordFormatError('Unterminated quoted field');
  }
  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows;
}

function isBlank(row: string[]): boolean {
  return row.length === 1 && row[0] === '';
}

/**
 * Read a CSV document whose first non-blank row is the header.
 *
 * Fields are trimmed and blank lines skipped. A record may be shorter than
 * the header (its trailing columns are then undefined) but not longer.
 */
export function readCsv(text: string): CsvDocument {
  const rows = splitRows(text)
    .map((row) => row.map((field) => field.trim()))
    .filter((row) => !isBlank(row));

  const [header = [], ...dataRows] = rows;

  const records = dataRows.map((row, index) => {
    if (row.length > header.length) {
      throw new RecordFormatError(
        `Record ${index + 1} has ${row.length} fields but the header has ${header.length}`,
        index + 1
      );
    }

    const record: Record<string, string | undefined> = {};
    header.forEach((column, position) => {
      record[column] = row[position];
    });
    return record;
  });

  return { header, records };
}
