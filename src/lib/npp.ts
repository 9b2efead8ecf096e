// Reference data for the 2016-based National Population Projections
import type { Gender, GeographyKey, VariantCode } from '../types';

export const GEOGRAPHY_CODES: Record<GeographyKey, string> = {
  en: 'E92000001',
  wa: 'W92000004',
  sc: 'S92000003',
  ni: 'N92000002',
};

export const EW: readonly GeographyKey[] = ['en', 'wa'];
export const GB: readonly GeographyKey[] = ['en', 'wa', 'sc'];
export const UK: readonly GeographyKey[] = ['en', 'wa', 'sc', 'ni'];

export const GEOGRAPHY_GROUPS: Record<'EW' | 'GB' | 'UK', readonly GeographyKey[]> = { EW, GB, UK };

export const VARIANTS: Record<VariantCode, string> = {
  hhh: 'High population',
  hpp: 'High fertility',
  lll: 'Low population',
  lpp: 'Low fertility',
  php: 'High life expectancy',
  pjp: 'Moderately high life expectancy',
  pkp: 'Moderately low life expectancy',
  plp: 'Low life expectancy',
  pph: 'High migration',
  ppl: 'Low migration',
  ppp: 'Principal',
  ppq: '0% future EU migration (non-ONS)',
  ppr: '50% future EU migration (non-ONS)',
  pps: '150% future EU migration (non-ONS)',
  ppz: 'Zero net migration',
};

export const PRINCIPAL: VariantCode = 'ppp';

// Country-level bundles, each holding one spreadsheet-XML document per variant
export const ARCHIVE_URLS: Record<GeographyKey, string> = {
  en: 'https://www.ons.gov.uk/file?uri=/peoplepopulationandcommunity/populationandmigration/populationprojections/datasets/z3zippedpopulationprojectionsdatafilesengland/2016based/tablez3opendata16england.zip',
  wa: 'https://www.ons.gov.uk/file?uri=/peoplepopulationandcommunity/populationandmigration/populationprojections/datasets/z4zippedpopulationprojectionsdatafileswales/2016based/tablez4opendata16wales.zip',
  sc: 'https://www.ons.gov.uk/file?uri=/peoplepopulationandcommunity/populationandmigration/populationprojections/datasets/z5zippedpopulationprojectionsdatafilesscotland/2016based/tablez5opendata16scotland.zip',
  ni: 'https://www.ons.gov.uk/file?uri=/peoplepopulationandcommunity/populationandmigration/populationprojections/datasets/z6zippedpopulationprojectionsdatafilesnorthernireland/2016based/tablez6opendata16northernireland.zip',
};

export const WORKSHEET_NAME = 'Population';

export const MAX_AGE = 90;
export const GENDERS: readonly Gender[] = [1, 2];
export const DEFAULT_AGES: readonly number[] = range(0, MAX_AGE + 1);

/** Raw age labels folded into the terminal "90 and over" bucket. */
export const TERMINAL_AGE_LABELS: ReadonlySet<string> = new Set([
  ...range(MAX_AGE, 105).map(String),
  '105 - 109',
  '110 and over',
]);

export function isVariantCode(value: string): value is VariantCode {
  return Object.prototype.hasOwnProperty.call(VARIANTS, value);
}

export function isGeographyKey(value: string): value is GeographyKey {
  return Object.prototype.hasOwnProperty.call(GEOGRAPHY_CODES, value);
}

export function isGender(value: number): value is Gender {
  return value === 1 || value === 2;
}

/** Half-open integer range [start, end). */
export function range(start: number, end: number): number[] {
  const values: number[] = [];
  for (let i = start; i < end; i++) values.push(i);
  return values;
}
