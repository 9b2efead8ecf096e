// National Population Projections - TypeScript Types
// Mirrors the processed CSV and npp_observations table

// =============================================================================
// ENUMS
// =============================================================================

export type GeographyKey = 'en' | 'wa' | 'sc' | 'ni';
export type Gender = 1 | 2;
export type VariantCode =
  | 'hhh' | 'hpp' | 'lll' | 'lpp' | 'php'
  | 'pjp' | 'pkp' | 'plp' | 'pph' | 'ppl'
  | 'ppp' | 'ppq' | 'ppr' | 'pps' | 'ppz';
export type LogLevel = 'info' | 'warn' | 'error';
export type NppErrorKind = 'invalid_variant' | 'invalid_query' | 'fetch' | 'extract' | 'parse';

// =============================================================================
// CORE RECORDS
// =============================================================================

export interface Observation {
  geography_code: string;
  year: number;
  gender: Gender;
  age: number;
  value: number;
}

export type VariantTable = readonly Observation[];

export type ObservationField = Exclude<keyof Observation, 'value'>;

export type AggregateRow = { [K in ObservationField]?: Observation[K] } & { value: number };

// Column names used by the processed CSV and by the statistical API
export type ObservationCsvRow = {
  GENDER: number;
  C_AGE: number;
  PROJECTED_YEAR_NAME: number;
  OBS_VALUE: number;
  GEOGRAPHY_CODE: string;
};

// =============================================================================
// SOURCES
// =============================================================================

export type ApiRow = Record<string, string>;
export type ApiParams = Record<string, string>;

/** Anything that turns a table id and query parameters into tidy rows. */
export interface StatisticalApi {
  getData(table: string, params: ApiParams): Promise<ApiRow[]>;
}

export type Transport = (url: string) => Promise<Buffer>;

export interface VariantLoader {
  loadPrincipal(): Promise<Observation[]>;
  loadVariant(variant: VariantCode): Promise<Observation[]>;
}

// =============================================================================
// QUERIES
// =============================================================================

export interface WarmResult {
  variant: VariantCode;
  status: 'loaded' | 'failed';
  records: number;
  published: number;
  error?: string;
}
