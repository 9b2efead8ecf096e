// Reshapes a parsed NPP worksheet into tidy observations
import { ParseError } from '../lib/errors';
import { MAX_AGE, TERMINAL_AGE_LABELS } from '../lib/npp';
import type { Gender, Observation } from '../types';

export interface StackedRecord {
  gender: Gender;
  ageLabel: string;
  year: number;
  value: number;
}

const SEX_LABELS: Record<string, Gender> = {
  '1': 1,
  '2': 2,
  male: 1,
  males: 1,
  female: 2,
  females: 2,
};

function parseGender(label: string, rowIndex: number): Gender {
  const gender = SEX_LABELS[label.trim().toLowerCase()];
  if (gender === undefined) {
    throw new ParseError(`Unrecognised sex "${label}" in row ${rowIndex}`);
  }
  return gender;
}

function parseNumber(text: string, what: string): number {
  const value = Number(text.trim());
  if (text.trim() === '' || !Number.isFinite(value)) {
    throw new ParseError(`Non-numeric ${what}: "${text}"`);
  }
  return value;
}

/**
 * Wide to long: one record per (sex, age, year) cell, in row then column order.
 * Row 0 must be the header `Sex, Age, <year>...`.
 */
export function stackWorksheet(rows: string[][]): StackedRecord[] {
  if (rows.length === 0) {
    throw new ParseError('Worksheet is empty or missing');
  }

  const header = rows[0].map((h) => h.trim());
  if (header[0] !== 'Sex' || header[1] !== 'Age') {
    throw new ParseError(`Unexpected header: ${header.slice(0, 3).join(', ')}`);
  }
  const years = header.slice(2).map((h) => parseNumber(h, 'year'));

  const records: StackedRecord[] = [];
  for (let i = 1; i < rows.length; i++) {
    const row = rows[i];
    if (row.length === 0) continue;
    if (row.length !== header.length) {
      throw new ParseError(`Row ${i} has ${row.length} cells, expected ${header.length}`);
    }

    const gender = parseGender(row[0], i);
    const ageLabel = row[1].trim();
    years.forEach((year, j) => {
      records.push({ gender, ageLabel, year, value: parseNumber(row[j + 2], `value in row ${i}`) });
    });
  }
  return records;
}

/**
 * Folds every terminal age label into a single age-90 record per group,
 * by default (gender, year). The total per group is unchanged.
 */
export function collapseTerminalAges<T extends StackedRecord>(
  records: readonly T[],
  groupKey: (record: T) => string = (record) => `${record.gender}|${record.year}`
): T[] {
  const kept: T[] = [];
  const sums = new Map<string, T>();

  for (const record of records) {
    if (!TERMINAL_AGE_LABELS.has(record.ageLabel)) {
      kept.push({ ...record });
      continue;
    }
    const key = groupKey(record);
    const bucket = sums.get(key);
    if (bucket) {
      bucket.value += record.value;
    } else {
      sums.set(key, { ...record, ageLabel: String(MAX_AGE) });
    }
  }

  return [...kept, ...sums.values()];
}

export function parseAge(label: string): number {
  if (!/^\d+$/.test(label)) {
    throw new ParseError(`Unrecognised age "${label}"`);
  }
  const age = Number(label);
  if (age > MAX_AGE) {
    throw new ParseError(`Age ${age} left after terminal aggregation`);
  }
  return age;
}

/**
 * Stack, collapse and label one geography's worksheet.
 */
export function normalizeWorksheet(rows: string[][], geographyCode: string): Observation[] {
  return collapseTerminalAges(stackWorksheet(rows)).map((record) => ({
    geography_code: geographyCode,
    year: record.year,
    gender: record.gender,
    age: parseAge(record.ageLabel),
    value: record.value,
  }));
}
