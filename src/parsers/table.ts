/**
 * Delimited-text tables shared by the source parsers and reference loaders
 */

import { z } from 'zod';
import { EmptyResultError, MalformedIdentityError, SchemaError } from '../domain/errors.js';
import type { ParseResult, SkippedRow, SourceFile } from '../domain/types.js';
import { createLogger } from '../utils/log.js';

const logger = createLogger('table');

export interface TableRow {
  /** 1-based line number in the file */
  line: number;
  values: Record<string, string>;
}

export interface Table {
  file_name: string;
  columns: string[];
  rows: TableRow[];
}

/** A single field could not be read; the row is skipped, the file is not. */
export class RowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RowError';
  }
}

const NumberSchema = z.string().trim().min(1).pipe(z.coerce.number().finite());
const MISSING = new Set(['', '.', 'NA', 'N/A']);

export function readTable(file: SourceFile, delimiter: string = '\t'): Table {
  const [header, ...records] = splitRecords(file.content, delimiter);
  if (!header) {
    return { file_name: file.name, columns: [], rows: [] };
  }

  const columns = header.fields.map((f) => f.trim());
  const rows = records.map((record): TableRow => {
    const values: Record<string, string> = {};
    columns.forEach((column, i) => {
      values[column] = record.fields[i] ?? '';
    });
    return { line: record.line, values };
  });

  return { file_name: file.name, columns, rows };
}

export interface DelimitedRecord {
  /** 1-based line the record starts on */
  line: number;
  fields: string[];
}

/**
 * Split text into records and fields. A field that opens with a double quote
 * runs to the closing quote and may hold the delimiter or line breaks; `""`
 * inside it is a literal quote. Blank lines are skipped.
 */
export function splitRecords(content: string, delimiter: string): DelimitedRecord[] {
  const records: DelimitedRecord[] = [];
  let fields: string[] = [];
  let field = '';
  let field_start = true;
  let quoted = false;
  let line = 1;
  let record_line = 1;
  let record_begin = 0;
  let i = 0;

  const endRecord = (end: number) => {
    fields.push(field);
    if (content.slice(record_begin, end).trim() !== '') {
      records.push({ line: record_line, fields });
    }
    fields = [];
    field = '';
    field_start = true;
  };

  while (i < content.length) {
    const char = content[i];

    if (quoted) {
      if (char === '"') {
        if (content[i + 1] === '"') {
          field += '"';
          i += 2;
        } else {
          quoted = false;
          i++;
        }
        continue;
      }
      if (char === '\n') line++;
      // CRLF inside a quoted field becomes LF
      if (!(char === '\r' && content[i + 1] === '\n')) field += char;
      i++;
      continue;
    }

    if (char === '"' && field_start) {
      quoted = true;
      field_start = false;
      i++;
    } else if (content.startsWith(delimiter, i)) {
      fields.push(field);
      field = '';
      field_start = true;
      i += delimiter.length;
    } else if (char === '\n' || (char === '\r' && content[i + 1] === '\n')) {
      endRecord(i);
      i += char === '\r' ? 2 : 1;
      line++;
      record_line = line;
      record_begin = i;
    } else {
      field += char;
      field_start = false;
      i++;
    }
  }

  if (record_begin < content.length) endRecord(content.length);
  return records;
}

export function requireColumns(table: Table, columns: readonly string[], source: string): void {
  for (const column of columns) {
    if (!table.columns.includes(column)) {
      throw new SchemaError(column, source, table.file_name);
    }
  }
}

/**
 * First of the candidate column names present in the table.
 */
export function pickColumn(table: Table, candidates: readonly string[], source: string): string {
  const found = candidates.find((c) => table.columns.includes(c));
  if (!found) {
    throw new SchemaError(candidates.join(' | '), source, table.file_name);
  }
  return found;
}

export function readRequiredNumber(row: TableRow, column: string): number {
  const raw = row.values[column] ?? '';
  const parsed = NumberSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RowError(`${column} is not numeric: "${raw}"`);
  }
  return parsed.data;
}

export function readOptionalNumber(row: TableRow, column: string): number | null {
  const raw = (row.values[column] ?? '').trim();
  if (MISSING.has(raw)) return null;
  return readRequiredNumber(row, column);
}

export function readOptionalText(row: TableRow, column: string): string | null {
  const raw = (row.values[column] ?? '').trim();
  return MISSING.has(raw) ? null : raw;
}

/**
 * Run `parseRow` over every row. Rows that fail with a row-level problem are
 * skipped and reported; a table with no usable row fails as a whole.
 */
export function parseRows<T>(
  table: Table,
  source: string,
  parseRow: (row: TableRow) => T
): ParseResult<T> {
  const records: T[] = [];
  const skipped: SkippedRow[] = [];

  for (const row of table.rows) {
    try {
      records.push(parseRow(row));
    } catch (error) {
      if (!(error instanceof RowError || error instanceof MalformedIdentityError)) {
        throw error;
      }
      const entry: SkippedRow = {
        source,
        file_name: table.file_name,
        row_number: row.line,
        reason: error.message,
      };
      skipped.push(entry);
      logger.warn(entry, 'Skipped row');
    }
  }

  if (records.length === 0) {
    throw new EmptyResultError(source, table.file_name, skipped.length);
  }

  return { records, skipped };
}

/**
 * Parse files independently and concatenate in the order supplied.
 */
export function parseFiles<T>(
  files: readonly SourceFile[],
  parseFile: (file: SourceFile) => ParseResult<T>
): ParseResult<T> {
  const result: ParseResult<T> = { records: [], skipped: [] };
  for (const file of files) {
    const parsed = parseFile(file);
    result.records.push(...parsed.records);
    result.skipped.push(...parsed.skipped);
  }
  return result;
}
