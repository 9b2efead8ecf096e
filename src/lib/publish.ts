// Publishes variant tables to Postgres (schema: db/schema.sql)
import { bulkUpsert, log } from './db';
import type { VariantCode, VariantTable } from '../types';

export const OBSERVATIONS_TABLE = 'npp_observations';

const KEY_COLUMNS = ['variant', 'geography_code', 'year', 'gender', 'age'];

/**
 * Upserts every observation of a variant. Returns the number of rows written.
 */
export async function publishVariant(variant: VariantCode, table: VariantTable): Promise<number> {
  const rows = table.map((o) => ({
    variant,
    geography_code: o.geography_code,
    year: o.year,
    gender: o.gender,
    age: o.age,
    value: o.value,
  }));

  const written = await bulkUpsert(OBSERVATIONS_TABLE, rows, KEY_COLUMNS, { updateColumns: ['value'] });
  log('info', `Published ${variant}`, { rows: written });
  return written;
}
