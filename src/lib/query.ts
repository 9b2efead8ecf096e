// Filtering, aggregation and ratio queries over variant tables
import { log } from './db';
import { InvalidQueryError, InvalidVariantError } from './errors';
import { DEFAULT_AGES, GENDERS, GEOGRAPHY_CODES, PRINCIPAL, isVariantCode, range } from './npp';
import { VariantStore } from './variant-store';
import type { AggregateRow, Gender, GeographyKey, Observation, ObservationField } from '../types';

const GROUP_FIELDS: readonly ObservationField[] = ['geography_code', 'year', 'gender', 'age'];

// Grouping fields by their own name or by the processed CSV column name
const FIELD_ALIASES = new Map<string, ObservationField>([
  ['geography_code', 'geography_code'],
  ['GEOGRAPHY_CODE', 'geography_code'],
  ['year', 'year'],
  ['PROJECTED_YEAR_NAME', 'year'],
  ['gender', 'gender'],
  ['GENDER', 'gender'],
  ['age', 'age'],
  ['C_AGE', 'age'],
]);

export function resolveField(name: string): ObservationField {
  const field = FIELD_ALIASES.get(name);
  if (!field) {
    throw new InvalidQueryError(`Cannot group by ${name}`);
  }
  return field;
}

function joinKey(o: Observation, fields: readonly ObservationField[]): string {
  return fields.map((f) => o[f]).join('|');
}

function compareValues(a: string | number | undefined, b: string | number | undefined): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return String(a ?? '').localeCompare(String(b ?? ''));
}

/**
 * Divides each numerator row by the denominator row with the same key.
 * Rows without a partner are dropped.
 */
function ratio(
  numerator: readonly Observation[],
  denominator: readonly Observation[],
  keyFields: readonly ObservationField[]
): Observation[] {
  const lookup = new Map<string, number>();
  for (const o of denominator) lookup.set(joinKey(o, keyFields), o.value);

  const result: Observation[] = [];
  for (const o of numerator) {
    const ref = lookup.get(joinKey(o, keyFields));
    if (ref === undefined) continue;
    result.push({ ...o, value: o.value / ref });
  }
  return result;
}

export class ProjectionQuery {
  private yearBounds: [number, number] | null = null;

  constructor(private readonly store: VariantStore) {}

  /**
   * Builds a query engine over a store whose principal variant is loaded.
   */
  static async create(store: VariantStore): Promise<ProjectionQuery> {
    await store.init();
    return new ProjectionQuery(store);
  }

  /** First year in the projection. */
  minYear(): number {
    return this.yearRange()[0];
  }

  /** Final year in the projection. */
  maxYear(): number {
    return this.yearRange()[1];
  }

  /**
   * Rows of a variant matching every filter. Without `years` the range is
   * [minYear, maxYear): the final projection year is left out.
   */
  async detail(
    variant: string,
    geographies: readonly GeographyKey[],
    years?: readonly number[],
    ages: readonly number[] = DEFAULT_AGES,
    genders: readonly Gender[] = GENDERS
  ): Promise<Observation[]> {
    if (!isVariantCode(variant)) {
      throw new InvalidVariantError(variant);
    }
    const yearSet = new Set(years ?? range(this.minYear(), this.maxYear()));

    const table = await this.store.get(variant);

    const codes = new Set(geographies.map((g) => GEOGRAPHY_CODES[g]));
    const ageSet = new Set(ages);
    const genderSet = new Set<number>(genders);

    return table
      .filter((o) =>
        codes.has(o.geography_code) &&
        yearSet.has(o.year) &&
        ageSet.has(o.age) &&
        genderSet.has(o.gender))
      .map((o) => ({ ...o }));
  }

  /**
   * Sums values grouped by the given fields. Summing across years is not
   * meaningful here, so `year` is always part of the grouping.
   */
  async aggregate(
    groupBy: string | readonly string[],
    variant: string,
    geographies: readonly GeographyKey[],
    years: readonly number[],
    ages: readonly number[] = DEFAULT_AGES,
    genders: readonly Gender[] = GENDERS
  ): Promise<AggregateRow[]> {
    const names: readonly string[] = typeof groupBy === 'string' ? [groupBy] : groupBy;
    const fields = names.map(resolveField);
    if (!fields.includes('year')) {
      log('warn', 'Not aggregating over year as it makes no sense', { groupBy: fields });
      fields.push('year');
    }

    const data = await this.detail(variant, geographies, years, ages, genders);

    const groups = new Map<string, AggregateRow>();
    for (const o of data) {
      const key = joinKey(o, fields);
      let row = groups.get(key);
      if (!row) {
        row = { value: 0 };
        for (const field of fields) {
          setField(row, o, field);
        }
        groups.set(key, row);
      }
      row.value += o.value;
    }

    return [...groups.values()].sort((a, b) => {
      for (const field of fields) {
        const diff = compareValues(a[field], b[field]);
        if (diff !== 0) return diff;
      }
      return 0;
    });
  }

  /**
   * Ratio of `year` to `refYear` for each (geography, age, gender).
   */
  async yearRatio(
    variant: string,
    geographies: readonly GeographyKey[],
    refYear: number,
    year: number,
    ages: readonly number[] = DEFAULT_AGES,
    genders: readonly Gender[] = GENDERS
  ): Promise<Observation[]> {
    const ref = await this.detail(variant, geographies, [refYear], ages, genders);
    const num = await this.detail(variant, geographies, [year], ages, genders);
    return ratio(num, ref, ['geography_code', 'age', 'gender']);
  }

  /**
   * Ratio of a variant to the principal projection for matching rows.
   */
  async variantRatio(
    variant: string,
    geographies: readonly GeographyKey[],
    years: readonly number[],
    ages: readonly number[] = DEFAULT_AGES,
    genders: readonly Gender[] = GENDERS
  ): Promise<Observation[]> {
    const num = await this.detail(variant, geographies, years, ages, genders);
    const ref = await this.detail(PRINCIPAL, geographies, years, ages, genders);
    return ratio(num, ref, GROUP_FIELDS);
  }

  private yearRange(): [number, number] {
    if (!this.yearBounds) {
      const table = this.store.principal;
      if (table.length === 0) {
        throw new InvalidQueryError('Principal projection is empty');
      }
      let min = Infinity;
      let max = -Infinity;
      for (const o of table) {
        min = Math.min(min, o.year);
        max = Math.max(max, o.year);
      }
      this.yearBounds = [min, max];
    }
    return this.yearBounds;
  }
}

function setField(row: AggregateRow, o: Observation, field: ObservationField): void {
  switch (field) {
    case 'geography_code':
      row.geography_code = o.geography_code;
      break;
    case 'year':
      row.year = o.year;
      break;
    case 'gender':
      row.gender = o.gender;
      break;
    case 'age':
      row.age = o.age;
      break;
  }
}
