import request from 'supertest';
import { beforeAll, describe, expect, it } from 'vitest';

import { createApp, parseGeographies, parseIntegers } from './app';
import { FetchError } from './lib/errors';
import { ProjectionQuery } from './lib/query';
import { VariantStore } from './lib/variant-store';
import { fakeLoader, tableValue } from './testing/fixtures';

const YEARS = [2016, 2017, 2018];

describe('API', () => {
  let app: ReturnType<typeof createApp>;

  beforeAll(async () => {
    const loader = fakeLoader(YEARS, {
      failures: { lll: new FetchError('https://example.test/en.zip', { cause: new Error('HTTP 503') }) },
    });
    app = createApp(await ProjectionQuery.create(new VariantStore(loader)));
  });

  it('reports health', async () => {
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
  });

  it('lists every variant', async () => {
    const res = await request(app).get('/api/variants');
    expect(res.status).toBe(200);
    expect(res.body).toHaveLength(15);
    expect(res.body).toContainEqual({ code: 'ppp', name: 'Principal' });
  });

  it('gives the year range', async () => {
    const res = await request(app).get('/api/years');
    expect(res.body).toEqual({ min_year: 2016, max_year: 2018 });
  });

  it('returns detail rows', async () => {
    const res = await request(app).get('/api/detail').query({
      variant: 'ppp',
      geog: 'en',
      years: '2017',
      ages: '30',
      genders: '1',
    });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      count: 1,
      rows: [{ geography_code: 'E92000001', year: 2017, gender: 1, age: 30, value: tableValue('en', 2017, 1, 30) }],
    });
  });

  it('rejects an unknown variant with 400', async () => {
    const res = await request(app).get('/api/detail').query({ variant: 'zzz', geog: 'EW' });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'invalid variant name: zzz', kind: 'invalid_variant' });
  });

  it('rejects a missing geography with 400', async () => {
    const res = await request(app).get('/api/detail').query({ variant: 'ppp' });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Missing parameter: geog', kind: 'invalid_query' });
  });

  it('aggregates by CSV column names', async () => {
    const res = await request(app).get('/api/aggregate').query({
      by: 'GEOGRAPHY_CODE,PROJECTED_YEAR_NAME',
      variant: 'ppp',
      geog: 'EW',
      years: '2016',
      ages: '0',
    });

    expect(res.status).toBe(200);
    expect(res.body.rows).toEqual([
      { geography_code: 'E92000001', year: 2016, value: tableValue('en', 2016, 1, 0) + tableValue('en', 2016, 2, 0) },
      { geography_code: 'W92000004', year: 2016, value: tableValue('wa', 2016, 1, 0) + tableValue('wa', 2016, 2, 0) },
    ]);
  });

  it('computes a year ratio', async () => {
    const res = await request(app).get('/api/year-ratio').query({
      variant: 'ppp',
      geog: 'sc',
      ref_year: '2016',
      year: '2018',
      ages: '10',
      genders: '2',
    });

    expect(res.status).toBe(200);
    expect(res.body.rows).toEqual([
      {
        geography_code: 'S92000003',
        year: 2018,
        gender: 2,
        age: 10,
        value: tableValue('sc', 2018, 2, 10) / tableValue('sc', 2016, 2, 10),
      },
    ]);
  });

  it('computes a variant ratio', async () => {
    const res = await request(app).get('/api/variant-ratio').query({
      variant: 'hhh',
      geog: 'ni',
      years: '2016-2017',
      ages: '0',
      genders: '1',
    });

    expect(res.status).toBe(200);
    expect(res.body.count).toBe(2);
    for (const row of res.body.rows) {
      expect(row.value).toBeCloseTo(1.1, 12);
    }
  });

  it('rejects integers too large to enumerate with 400', async () => {
    const res = await request(app).get('/api/detail').query({ variant: 'ppp', geog: 'en', years: '9007199254740992' });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Bad years: 9007199254740992', kind: 'invalid_query' });
  });

  it('rejects an unknown grouping field with 400', async () => {
    const res = await request(app).get('/api/aggregate').query({ by: 'OBS_VALUE', variant: 'ppp', geog: 'en', years: '2016' });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Cannot group by OBS_VALUE', kind: 'invalid_query' });
  });

  it('maps a download failure to 502', async () => {
    const res = await request(app).get('/api/detail').query({ variant: 'lll', geog: 'en' });
    expect(res.status).toBe(502);
    expect(res.body.kind).toBe('fetch');
  });

  it('returns 404 for unknown routes', async () => {
    const res = await request(app).get('/api/nope');
    expect(res.status).toBe(404);
  });
});

describe('parameter parsing', () => {
  it('expands groups and removes duplicates', () => {
    expect(parseGeographies('EW, en, NI')).toEqual(['en', 'wa', 'ni']);
  });

  it('rejects unknown geographies', () => {
    expect(() => parseGeographies('fr')).toThrow('Unknown geography: fr');
  });

  it('expands inclusive ranges', () => {
    expect(parseIntegers('2016-2018,2030', 'years')).toEqual([2016, 2017, 2018, 2030]);
  });

  it('rejects numbers longer than six digits', () => {
    expect(() => parseIntegers('9007199254740992', 'ages')).toThrow('Bad ages: 9007199254740992');
    expect(() => parseIntegers('2016-9007199254740993', 'years')).toThrow('Bad years: 2016-9007199254740993');
  });

  it('rejects reversed ranges and junk', () => {
    expect(() => parseIntegers('2020-2016', 'years')).toThrow('Bad years range: 2020-2016');
    expect(() => parseIntegers('abc', 'ages')).toThrow('Bad ages: abc');
  });
});
