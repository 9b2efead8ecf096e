// NPP Principal Variant - Nomisweb API
// Source: NM_2009_1, 2016-based national population projections (principal only)

import { BaseIngestor } from '../lib/ingest';
import { CacheStore } from '../lib/cache';
import { ParseError } from '../lib/errors';
import { isGender } from '../lib/npp';
import { collapseTerminalAges, parseAge, type StackedRecord } from './normalize';
import type { ApiParams, ApiRow, Observation, StatisticalApi } from '../types';

export const PRINCIPAL_TABLE = 'NM_2009_1';

export const PRINCIPAL_QUERY: ApiParams = {
  gender: '1,2',
  c_age: '1...105',
  MEASURES: '20100',
  date: 'latest',
  projected_year: '2016...2116',
  select: 'geography_code,projected_year_name,gender,c_age,obs_value',
  geography: '2092957699...2092957702',
};

interface PrincipalRecord extends StackedRecord {
  geography_code: string;
}

function numberColumn(row: ApiRow, column: string): number {
  const text = row[column];
  const value = Number(text);
  if (text === undefined || text.trim() === '' || !Number.isFinite(value)) {
    throw new ParseError(`Bad ${column} "${text ?? ''}" in ${PRINCIPAL_TABLE} response`);
  }
  return value;
}

export class PrincipalIngestor extends BaseIngestor<ApiRow[], PrincipalRecord[]> {
  constructor(cache: CacheStore, private readonly api: StatisticalApi) {
    super('NPP_PPP', cache);
  }

  protected async fetch(): Promise<ApiRow[]> {
    return this.api.getData(PRINCIPAL_TABLE, PRINCIPAL_QUERY);
  }

  protected async parse(rows: ApiRow[]): Promise<PrincipalRecord[]> {
    return rows.map((row) => {
      const geographyCode = (row.GEOGRAPHY_CODE ?? '').trim();
      if (!geographyCode) {
        throw new ParseError(`Missing GEOGRAPHY_CODE in ${PRINCIPAL_TABLE} response`);
      }
      const gender = numberColumn(row, 'GENDER');
      if (!isGender(gender)) {
        throw new ParseError(`Bad GENDER ${gender} in ${PRINCIPAL_TABLE} response`);
      }

      return {
        geography_code: geographyCode,
        year: numberColumn(row, 'PROJECTED_YEAR_NAME'),
        gender,
        // C_AGE is a 1-based category index
        ageLabel: String(numberColumn(row, 'C_AGE') - 1),
        value: numberColumn(row, 'OBS_VALUE'),
      };
    });
  }

  protected async transform(records: PrincipalRecord[]): Promise<Observation[]> {
    const collapsed = collapseTerminalAges(records, (r) => `${r.geography_code}|${r.gender}|${r.year}`);
    return collapsed.map((r) => ({
      geography_code: r.geography_code,
      year: r.year,
      gender: r.gender,
      age: parseAge(r.ageLabel),
      value: r.value,
    }));
  }
}
