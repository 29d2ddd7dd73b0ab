/**
 * CSV Module
 * Reads company lists and writes enriched results in a fixed column order
 */

import Papa from 'papaparse';
import type { CompanyRecord } from '../types/company';
import { InvalidCsvError } from './errors';
import { logger } from './monitoring';
import { companyRecordSchema } from './schemas/company';

// ============ Column Layout ============

export const OUTPUT_COLUMNS = [
  'name',
  'street_address',
  'city',
  'state',
  'zip_code',
  'phone',
  'website',
  'emails',
  'contact_form',
  'facebook_page',
  'rating',
  'reviews',
  'hours',
  'logo_url',
] as const;

export interface ParsedCompanies {
  records: CompanyRecord[];
  skipped: number;
}

// ============ Parsing ============

/**
 * Parse an uploaded company list. Rows without a name are skipped; a file
 * without a name column is rejected.
 */
export function parseCompaniesCsv(text: string): ParsedCompanies {
  const result = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  const fields = result.meta.fields ?? [];
  if (!fields.includes('name')) {
    throw new InvalidCsvError("missing required 'name' column");
  }

  if (result.errors.length > 0) {
    logger.warn('CSV parsing errors', {
      count: result.errors.length,
      first: result.errors[0].message,
    });
  }

  const records: CompanyRecord[] = [];
  let skipped = 0;

  result.data.forEach((row, index) => {
    const record: CompanyRecord = {};
    for (const field of fields) {
      const value = row[field];
      record[field] = typeof value === 'string' ? value : '';
    }

    const parsed = companyRecordSchema.safeParse(record);
    if (!parsed.success) {
      skipped++;
      logger.warn('Skipping invalid CSV row', {
        row: index + 2,
        reason: parsed.error.issues[0]?.message,
      });
      return;
    }

    records.push(parsed.data);
  });

  return { records, skipped };
}

// ============ Writing ============

function escapeCsvField(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Fixed columns first, then any other field in the order it first appears
 */
export function resultColumns(rows: readonly CompanyRecord[]): string[] {
  const columns: string[] = [...OUTPUT_COLUMNS];
  const seen = new Set<string>(columns);

  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }

  return columns;
}

export function generateResultsCsv(rows: readonly CompanyRecord[]): string {
  const columns = resultColumns(rows);
  const lines: string[] = [columns.map(escapeCsvField).join(',')];

  for (const row of rows) {
    const values = columns.map(col => row[col] ?? '');
    lines.push(values.map(escapeCsvField).join(','));
  }

  return lines.join('\n');
}
