/**
 * Byte-level decoding and field splitting for the government CSV/TXT exports.
 * Sources differ in encoding (UTF-8 vs Latin-1), delimiter (tab, semicolon,
 * comma) and may start with a byte-order mark or carry stray NUL bytes.
 */

import { parse } from 'csv-parse/sync';

export type TextEncoding = 'utf-8' | 'latin1';

export interface TableFormat {
  encoding: TextEncoding;
  delimiter: string;
}

export type RawRow = Record<string, string>;

export interface RawTable {
  header: string[];
  rows: RawRow[];
  /** Data lines whose field count differs from the header */
  badColumnCount: number;
}

const UTF8_BOM = [0xef, 0xbb, 0xbf];

export function hasUtf8Bom(buf: Uint8Array): boolean {
  return buf.length >= 3 && UTF8_BOM.every((b, i) => buf[i] === b);
}

export function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Decodes with the declared encoding; a UTF-8 BOM overrides the declaration.
 * Latin-1 exports are read as Windows-1252, which they are in practice (’ and œ
 * live in 0x80-0x9F).
 * The returned text never starts with a BOM and holds no NUL characters.
 */
export function decodeText(buf: Buffer, encoding: TextEncoding): string {
  const effective: TextEncoding = hasUtf8Bom(buf) ? 'utf-8' : encoding;
  const text = effective === 'utf-8' ? new TextDecoder('utf-8').decode(buf) : new TextDecoder('windows-1252').decode(buf);
  return stripBom(text).replace(/\u0000/g, '');
}

function toMatrix(parsed: unknown): string[][] {
  if (!Array.isArray(parsed)) throw new Error('csv-parse returned a non-array result');
  return parsed.map((line: unknown) => {
    if (!Array.isArray(line)) throw new Error('csv-parse returned a non-array record');
    return line.map((cell: unknown) => (typeof cell === 'string' ? cell : String(cell ?? '')).trim());
  });
}

/** Splits delimited text into header-keyed rows. Field values are trimmed. */
export function parseTable(text: string, delimiter: string): RawTable {
  const matrix = toMatrix(
    parse(stripBom(text), {
      delimiter,
      bom: true,
      relax_quotes: true,
      relax_column_count: true,
      skip_empty_lines: true,
    })
  );
  const [headerLine, ...lines] = matrix;
  if (!headerLine) return { header: [], rows: [], badColumnCount: 0 };
  const header = headerLine;
  const rows: RawRow[] = [];
  let badColumnCount = 0;
  for (const line of lines) {
    if (line.length !== header.length) {
      badColumnCount++;
      continue;
    }
    const row: RawRow = {};
    header.forEach((h, i) => {
      row[h] = line[i] ?? '';
    });
    rows.push(row);
  }
  return { header, rows, badColumnCount };
}

export function readTable(buf: Buffer, format: TableFormat): RawTable {
  return parseTable(decodeText(buf, format.encoding), format.delimiter);
}

/** First non-empty value among the candidate column names (case-insensitive fallback). */
export function getCol(row: RawRow, ...names: string[]): string | undefined {
  for (const n of names) {
    const v = row[n];
    if (v != null && v.trim()) return v.trim();
  }
  const keys = Object.keys(row);
  for (const n of names) {
    const hit = keys.find((k) => k.toLowerCase() === n.toLowerCase());
    if (hit && row[hit]?.trim()) return row[hit].trim();
  }
  return undefined;
}
