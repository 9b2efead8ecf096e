// NPP Variant Projections - zipped spreadsheet XML per country
// Source: ONS tables z3 (England), z4 (Wales), z5 (Scotland), z6 (Northern Ireland), 2016 based
//
// [4 country zips] -> [xml per country and variant] -> [tidy table per variant]

import { BaseIngestor, extractDocument, fetchArchive, fetchUrl, parseCsv, readWorksheet, toCsv } from '../lib/ingest';
import { CacheStore, documentKey, tableKey } from '../lib/cache';
import { ParseError } from '../lib/errors';
import { ARCHIVE_URLS, GEOGRAPHY_CODES, UK, WORKSHEET_NAME, isGender } from '../lib/npp';
import { normalizeWorksheet } from './normalize';
import type { GeographyKey, Observation, ObservationCsvRow, Transport, VariantCode } from '../types';

export const CSV_COLUMNS: (keyof ObservationCsvRow)[] = [
  'GENDER',
  'C_AGE',
  'PROJECTED_YEAR_NAME',
  'OBS_VALUE',
  'GEOGRAPHY_CODE',
];

interface CountrySheet {
  geography: GeographyKey;
  rows: string[][];
}

export function toCsvRow(observation: Observation): ObservationCsvRow {
  return {
    GENDER: observation.gender,
    C_AGE: observation.age,
    PROJECTED_YEAR_NAME: observation.year,
    OBS_VALUE: observation.value,
    GEOGRAPHY_CODE: observation.geography_code,
  };
}

export function fromCsvRow(row: Record<string, string>, line: number): Observation {
  const num = (column: keyof ObservationCsvRow): number => {
    const text = row[column] ?? '';
    const value = Number(text);
    if (text.trim() === '' || !Number.isFinite(value)) {
      throw new ParseError(`Bad ${column} "${text}" on line ${line}`);
    }
    return value;
  };

  const gender = num('GENDER');
  if (!isGender(gender)) {
    throw new ParseError(`Bad GENDER ${gender} on line ${line}`);
  }

  return {
    geography_code: row.GEOGRAPHY_CODE ?? '',
    year: num('PROJECTED_YEAR_NAME'),
    gender,
    age: num('C_AGE'),
    value: num('OBS_VALUE'),
  };
}

export class VariantIngestor extends BaseIngestor<GeographyKey[], CountrySheet[]> {
  constructor(
    private readonly variant: VariantCode,
    cache: CacheStore,
    private readonly transport: Transport = (url) => fetchUrl(url),
    private readonly urls: Record<GeographyKey, string> = ARCHIVE_URLS,
    private readonly geographies: readonly GeographyKey[] = UK
  ) {
    super(`NPP_${variant.toUpperCase()}`, cache);
  }

  protected async restore(): Promise<Observation[] | null> {
    const key = tableKey(this.variant);
    if (!(await this.cache.exists(key))) return null;

    // Header is line 1
    return parseCsv(await this.cache.readText(key)).map((row, i) => fromCsvRow(row, i + 2));
  }

  /**
   * Makes sure every country's document for this variant is in the cache.
   * A country whose document is already extracted needs no archive at all.
   */
  protected async fetch(): Promise<GeographyKey[]> {
    for (const geography of this.geographies) {
      if (await this.cache.exists(documentKey(geography, this.variant))) continue;
      await fetchArchive(this.cache, geography, this.transport, this.urls[geography]);
      await extractDocument(this.cache, geography, this.variant);
    }
    return [...this.geographies];
  }

  protected async parse(geographies: GeographyKey[]): Promise<CountrySheet[]> {
    const sheets: CountrySheet[] = [];
    for (const geography of geographies) {
      const key = documentKey(geography, this.variant);
      const rows = readWorksheet(await this.cache.readText(key), WORKSHEET_NAME);
      if (rows.length === 0) {
        throw new ParseError(`Worksheet ${WORKSHEET_NAME} not found in ${key}`);
      }
      sheets.push({ geography, rows });
    }
    return sheets;
  }

  protected async transform(sheets: CountrySheet[]): Promise<Observation[]> {
    return sheets.flatMap(({ geography, rows }) => normalizeWorksheet(rows, GEOGRAPHY_CODES[geography]));
  }

  protected async save(observations: Observation[]): Promise<void> {
    await this.cache.write(tableKey(this.variant), toCsv(observations.map(toCsvRow), CSV_COLUMNS));
  }
}
