import { promises as fs } from 'node:fs';
import path from 'node:path';
import { formatDate } from './coerce.js';

export type CsvValue = string | number | boolean | Date | null | undefined;

/**
 * Parse delimited text into rows. Handles quoted fields, doubled quotes, CRLF
 * and a leading BOM. Blank lines are skipped.
 * Returns [headers, ...dataRows].
 */
export function parseCsv(text: string, delimiter = ','): string[][] {
  const clean = text.replace(/^\uFEFF/, '');
  const rows: string[][] = [];
  let current: string[] = [];
  let field = '';
  let inQuotes = false;

  const endRow = () => {
    current.push(field.trim());
    field = '';
    if (current.length > 1 || current[0] !== '') {
      rows.push(current);
    }
    current = [];
  };

  for (let i = 0; i < clean.length; i++) {
    const ch = clean[i];
    const next = clean[i + 1];

    if (inQuotes) {
      if (ch === '"' && next === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        field += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === delimiter) {
      current.push(field.trim());
      field = '';
    } else if (ch === '\n') {
      endRow();
    } else if (ch === '\r' && next === '\n') {
      endRow();
      i++;
    } else {
      field += ch;
    }
  }
  endRow();

  return rows;
}

/** Turn [headers, ...rows] into one object per row keyed by header. */
export function rowsToRecords(rows: string[][]): Array<Record<string, string>> {
  const [headers, ...data] = rows;
  if (!headers) return [];
  return data.map((row) => {
    const record: Record<string, string> = {};
    headers.forEach((header, index) => {
      record[header] = row[index] ?? '';
    });
    return record;
  });
}

function formatCell(value: CsvValue): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return formatDate(value);
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv<T extends object, K extends keyof T & string>(
  rows: readonly T[],
  columns: readonly K[],
): string {
  const lines = [columns.map((column) => formatCell(column)).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => formatCell(toCsvValue(row[column]))).join(','));
  }
  return `${lines.join('\n')}\n`;
}

function toCsvValue(value: unknown): CsvValue {
  if (
    value === null ||
    value === undefined ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  return JSON.stringify(value);
}

export function sessionsCsvFilename(fromYear: number, toYear: number): string {
  return fromYear === toYear
    ? `sessions_${fromYear}.csv`
    : `sessions_${fromYear}_${toYear}.csv`;
}

export async function writeCsvFile(file: string, contents: string): Promise<string> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, contents, 'utf-8');
  return file;
}

export async function readCsvRecords(
  file: string,
  delimiter = ',',
): Promise<Array<Record<string, string>>> {
  const text = await fs.readFile(file, 'utf-8');
  return rowsToRecords(parseCsv(text, delimiter));
}
