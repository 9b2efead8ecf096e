// Builders for test data: SpreadsheetML documents, zip archives and tables
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import AdmZip from 'adm-zip';
import { CacheStore } from '../lib/cache';
import { GEOGRAPHY_CODES, UK, range } from '../lib/npp';
import type { Gender, GeographyKey, Observation, VariantCode, VariantLoader } from '../types';

export const RAW_AGE_LABELS: readonly string[] = [...range(0, 105).map(String), '105 - 109', '110 and over'];

export type CellValue = (gender: Gender, ageIndex: number, year: number) => number;

export const defaultCellValue: CellValue = (gender, ageIndex, year) =>
  gender * 1000 + ageIndex + (year - 2016) * 0.5;

/**
 * Worksheet rows as the parser returns them: header, then one row per sex and
 * raw age label. Single-digit ages carry padding like the published files.
 */
export function populationRows(years: readonly number[], value: CellValue = defaultCellValue): string[][] {
  const rows: string[][] = [['Sex', 'Age', ...years.map(String)]];
  for (const gender of [1, 2] as const) {
    RAW_AGE_LABELS.forEach((label, ageIndex) => {
      const padded = label.length === 1 ? ` ${label} ` : label;
      rows.push([String(gender), padded, ...years.map((y) => String(value(gender, ageIndex, y)))]);
    });
  }
  return rows;
}

function escapeXml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function spreadsheetXml(sheets: Record<string, string[][]>): string {
  const worksheets = Object.entries(sheets).map(([name, rows]) => {
    const body = rows
      .map((row) => {
        const cells = row
          .map((cell) => {
            const type = cell.trim() !== '' && Number.isFinite(Number(cell)) ? 'Number' : 'String';
            return `<Cell><Data ss:Type="${type}">${escapeXml(cell)}</Data></Cell>`;
          })
          .join('');
        return `<Row>${cells}</Row>`;
      })
      .join('\n');
    return `<Worksheet ss:Name="${name}"><Table>\n${body}\n</Table></Worksheet>`;
  });

  return [
    '<?xml version="1.0"?>',
    '<Workbook xmlns="urn:schemas-microsoft-com:office:spreadsheet"',
    ' xmlns:ss="urn:schemas-microsoft-com:office:spreadsheet">',
    ...worksheets,
    '</Workbook>',
  ].join('\n');
}

export function zipOf(files: Record<string, string>): Buffer {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(files)) {
    zip.addFile(name, Buffer.from(content, 'utf-8'));
  }
  return zip.toBuffer();
}

/**
 * A country archive holding a Population sheet for each listed variant.
 */
export function countryArchive(
  geography: GeographyKey,
  variants: readonly VariantCode[],
  years: readonly number[],
  value: CellValue = defaultCellValue
): Buffer {
  const files: Record<string, string> = {};
  for (const variant of variants) {
    files[`${geography}_${variant}_opendata2016.xml`] = spreadsheetXml({
      Metadata: [['Title'], ['2016-based projections']],
      Population: populationRows(years, value),
    });
  }
  return zipOf(files);
}

export async function tempCache(): Promise<CacheStore> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'npp-cache-'));
  return new CacheStore(dir);
}

export async function removeCache(cache: CacheStore): Promise<void> {
  await fs.rm(cache.cacheDir, { recursive: true, force: true });
}

export type ObservationValue = (geography: GeographyKey, year: number, gender: Gender, age: number) => number;

export const tableValue: ObservationValue = (geography, year, gender, age) =>
  gender * 100000 + UK.indexOf(geography) * 10000 + (year - 2016) * 100 + age;

/** A complete tidy table: every geography, year, gender and age 0..90. */
export function tidyTable(years: readonly number[], value: ObservationValue = tableValue): Observation[] {
  const table: Observation[] = [];
  for (const geography of UK) {
    for (const year of years) {
      for (const gender of [1, 2] as const) {
        for (const age of range(0, 91)) {
          table.push({ geography_code: GEOGRAPHY_CODES[geography], year, gender, age, value: value(geography, year, gender, age) });
        }
      }
    }
  }
  return table;
}

export interface FakeLoader extends VariantLoader {
  calls: string[];
}

/**
 * Principal from `tidyTable`, every other variant scaled by `scale[variant]`
 * (default 1.1). Variants listed in `failures` reject with the given error.
 */
export function fakeLoader(
  years: readonly number[],
  options: { scale?: Partial<Record<VariantCode, number>>; failures?: Partial<Record<VariantCode, Error>> } = {}
): FakeLoader {
  const calls: string[] = [];
  const principal = tidyTable(years);
  return {
    calls,
    loadPrincipal: async () => {
      calls.push('ppp');
      return principal.map((o) => ({ ...o }));
    },
    loadVariant: async (variant) => {
      calls.push(variant);
      const failure = options.failures?.[variant];
      if (failure) throw failure;
      const scale = options.scale?.[variant] ?? 1.1;
      return principal.map((o) => ({ ...o, value: o.value * scale }));
    },
  };
}
