/**
 * CSV import of entity lists and export of result records.
 */

import { readFile, writeFile } from 'node:fs/promises';
import Papa from 'papaparse';
import type { ParseResult } from 'papaparse';
import {
  RECORD_COLUMNS,
  isFailedRecord,
  type EntityRecord,
  type RecordColumn,
} from '@profilescout/schemas';
import { InputError } from './errors.js';

/** Where finished result sets go. */
export interface RecordSink {
  write(records: readonly EntityRecord[]): Promise<void>;
}

function parseRows(csvText: string): ParseResult<Record<string, string>> {
  return Papa.parse<Record<string, string>>(csvText.replace(/^\uFEFF/, ''), {
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: (header) => header.trim(),
  });
}

export function listColumns(csvText: string): string[] {
  return parseRows(csvText).meta.fields ?? [];
}

/**
 * Values of one column, trimmed, one per data row. A blank cell stays as ''
 * so positions line up with the input; only fully empty lines are skipped.
 */
export function readEntityColumn(csvText: string, column: string): string[] {
  const result = parseRows(csvText);
  const fields = result.meta.fields ?? [];
  if (!fields.includes(column)) {
    throw new InputError(
      `Column "${column}" not found. Available columns: ${fields.join(', ') || '(none)'}`,
    );
  }
  return result.data.map((row) => (row[column] ?? '').trim());
}

export async function readEntityCsvFile(path: string, column: string): Promise<string[]> {
  const content = await readFile(path, 'utf-8');
  return readEntityColumn(content, column);
}

function cell(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}

function recordToRow(record: EntityRecord): string[] {
  if (isFailedRecord(record)) {
    return RECORD_COLUMNS.map((column) =>
      column === 'Entity' ? record.Entity : column === 'error' ? record.error : '',
    );
  }
  const values: Record<RecordColumn, unknown> = {
    Entity: record.Entity,
    email: record.email,
    location: record.location,
    website: record.website,
    phone: record.phone,
    description: record.description,
    social_media: record.social_media,
    additional_info: record.additional_info,
    confidence_scores: record.confidence_scores,
    error: undefined,
  };
  return RECORD_COLUMNS.map((column) => cell(values[column]));
}

/** Every field quoted; mappings serialised as JSON. */
export function recordsToCsv(records: readonly EntityRecord[]): string {
  return Papa.unparse(
    { fields: [...RECORD_COLUMNS], data: records.map(recordToRow) },
    { quotes: true },
  );
}

export class CsvFileSink implements RecordSink {
  constructor(private readonly path: string) {}

  async write(records: readonly EntityRecord[]): Promise<void> {
    await writeFile(this.path, recordsToCsv(records), 'utf-8');
  }
}
