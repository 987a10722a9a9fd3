/**
 * Flat CSV files: parsing, serialisation and whole-file replacement
 */

import { promises as fs } from 'fs';
import path from 'path';

export type CsvRow = Record<string, string>;

export interface CsvTable {
  header: string[];
  rows: CsvRow[];
}

export type CsvValue = string | number | undefined;

/**
 * Split CSV text into records. Quoted fields may contain commas, newlines and
 * doubled quotes.
 */
export function parseCSVRecords(csvText: string): string[][] {
  const records: string[][] = [];
  let values: string[] = [];
  let current = '';
  let inQuotes = false;

  const text = csvText.charCodeAt(0) === 0xfeff ? csvText.slice(1) : csvText;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      values.push(current);
      current = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') i++;
      values.push(current);
      records.push(values);
      values = [];
      current = '';
    } else {
      current += char;
    }
  }

  if (current || values.length > 0) {
    values.push(current);
    records.push(values);
  }

  // Blank lines carry no data
  return records.filter((record) => record.length > 1 || record[0] !== '');
}

export function parseCSV(csvText: string): CsvTable {
  const records = parseCSVRecords(csvText);
  if (records.length === 0) return { header: [], rows: [] };

  const header = records[0].map((h) => h.trim());
  const rows = records.slice(1).map((values) => {
    const row: CsvRow = {};
    header.forEach((column, idx) => {
      row[column] = values[idx] ?? '';
    });
    return row;
  });

  return { header, rows };
}

function escapeField(value: CsvValue): string {
  if (value === undefined) return '';
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function toCsvLine(values: CsvValue[]): string {
  return values.map(escapeField).join(',');
}

export function toCsv(header: string[], rows: Array<Record<string, CsvValue>>): string {
  const lines = [toCsvLine(header)];
  for (const row of rows) {
    lines.push(toCsvLine(header.map((column) => row[column])));
  }
  return lines.join('\n') + '\n';
}

/** Same columns, order ignored */
export function headerMatches(actual: string[], expected: readonly string[]): boolean {
  if (actual.length !== expected.length) return false;
  const wanted = new Set(expected);
  return actual.every((column) => wanted.has(column));
}

/**
 * Read a CSV file. A missing file reads as undefined.
 */
export async function readTable(filepath: string): Promise<CsvTable | undefined> {
  let text: string;
  try {
    text = await fs.readFile(filepath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw error;
  }
  return parseCSV(text);
}

/**
 * Replace a file's contents as a whole: write a sibling temp file, then rename over
 * the target. The temp file does not outlive a failed write.
 */
export async function writeFileAtomic(filepath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(filepath), { recursive: true });
  const tmpPath = `${filepath}.${process.pid}.tmp`;
  try {
    await fs.writeFile(tmpPath, contents, 'utf-8');
    await fs.rename(tmpPath, filepath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
}

export async function writeTable(
  filepath: string,
  header: string[],
  rows: Array<Record<string, CsvValue>>
): Promise<void> {
  await writeFileAtomic(filepath, toCsv(header, rows));
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
