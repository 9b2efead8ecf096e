import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { CacheStore, archiveKey, documentKey, tableKey } from '../lib/cache';
import { ExtractError, FetchError, ParseError } from '../lib/errors';
import { GEOGRAPHY_CODES, UK, range } from '../lib/npp';
import { countryArchive, removeCache, spreadsheetXml, tempCache, zipOf } from '../testing/fixtures';
import type { GeographyKey, Transport } from '../types';
import { VariantIngestor, fromCsvRow } from './npp-variant';

const YEARS = [2016, 2017];

const URLS: Record<GeographyKey, string> = {
  en: 'https://example.test/en.zip',
  wa: 'https://example.test/wa.zip',
  sc: 'https://example.test/sc.zip',
  ni: 'https://example.test/ni.zip',
};

function archiveTransport(archives: Record<string, Buffer>) {
  return vi.fn<Parameters<Transport>, ReturnType<Transport>>(async (url) => {
    const archive = archives[url];
    if (!archive) throw new Error(`HTTP 404: ${url}`);
    return archive;
  });
}

function allArchives(): Record<string, Buffer> {
  const archives: Record<string, Buffer> = {};
  for (const geography of UK) {
    archives[URLS[geography]] = countryArchive(geography, ['hhh', 'ppl'], YEARS);
  }
  return archives;
}

describe('VariantIngestor', () => {
  let cache: CacheStore;

  beforeEach(async () => {
    cache = await tempCache();
  });

  afterEach(async () => {
    await removeCache(cache);
  });

  it('builds one tidy table from the four country archives', async () => {
    const transport = archiveTransport(allArchives());
    const table = await new VariantIngestor('hhh', cache, transport, URLS).run();

    expect(table).toHaveLength(UK.length * YEARS.length * 2 * 91);
    expect([...new Set(table.map((o) => o.geography_code))]).toEqual(UK.map((g) => GEOGRAPHY_CODES[g]));

    for (const geography of UK) {
      for (const year of YEARS) {
        for (const gender of [1, 2]) {
          const ages = table
            .filter((o) => o.geography_code === GEOGRAPHY_CODES[geography] && o.year === year && o.gender === gender)
            .map((o) => o.age)
            .sort((a, b) => a - b);
          expect(ages).toEqual(range(0, 91));
        }
      }
    }

    expect(await cache.exists(tableKey('hhh'))).toBe(true);
    for (const geography of UK) {
      expect(await cache.exists(archiveKey(geography))).toBe(true);
      expect(await cache.exists(documentKey(geography, 'hhh'))).toBe(true);
    }
  });

  it('writes the processed table with the published column order', async () => {
    await new VariantIngestor('hhh', cache, archiveTransport(allArchives()), URLS).run();

    const csv = await cache.readText(tableKey('hhh'));
    const [header, first] = csv.split('\n');
    expect(header).toBe('GENDER,C_AGE,PROJECTED_YEAR_NAME,OBS_VALUE,GEOGRAPHY_CODE');
    expect(first).toBe('1,0,2016,1000,E92000001');
  });

  it('does no network or extraction work once the table is cached', async () => {
    const transport = archiveTransport(allArchives());
    const first = await new VariantIngestor('hhh', cache, transport, URLS).run();
    const bytes = await cache.read(tableKey('hhh'));

    // any stage other than the cached table would now fail
    for (const geography of UK) {
      await cache.write(archiveKey(geography), 'corrupt');
    }

    const second = await new VariantIngestor('hhh', cache, transport, URLS).run();

    expect(transport).toHaveBeenCalledTimes(UK.length);
    expect(second).toEqual(first);
    expect(await cache.read(tableKey('hhh'))).toEqual(bytes);
  });

  it('reuses downloaded archives for another variant', async () => {
    const transport = archiveTransport(allArchives());
    await new VariantIngestor('hhh', cache, transport, URLS).run();
    const table = await new VariantIngestor('ppl', cache, transport, URLS).run();

    expect(transport).toHaveBeenCalledTimes(UK.length);
    expect(table).toHaveLength(UK.length * YEARS.length * 2 * 91);
  });

  it('resumes after a failed download without refetching finished archives', async () => {
    const archives = allArchives();
    const partial = { ...archives };
    delete partial[URLS.sc];

    const failing = archiveTransport(partial);
    await expect(new VariantIngestor('hhh', cache, failing, URLS).run()).rejects.toBeInstanceOf(FetchError);
    expect(failing.mock.calls.map(([url]) => url)).toEqual([URLS.en, URLS.wa, URLS.sc]);
    expect(await cache.exists(tableKey('hhh'))).toBe(false);

    const retry = archiveTransport(archives);
    await new VariantIngestor('hhh', cache, retry, URLS).run();
    expect(retry.mock.calls.map(([url]) => url)).toEqual([URLS.sc, URLS.ni]);
  });

  it('fails with ExtractError when an archive lacks the variant', async () => {
    const transport = archiveTransport(allArchives());
    await expect(new VariantIngestor('lll', cache, transport, URLS).run()).rejects.toBeInstanceOf(ExtractError);
  });

  it('fails with ParseError when the Population worksheet is missing', async () => {
    const archives = allArchives();
    archives[URLS.en] = zipOf({ 'en_hhh_opendata2016.xml': spreadsheetXml({ Metadata: [['x']] }) });

    await expect(new VariantIngestor('hhh', cache, archiveTransport(archives), URLS).run()).rejects.toThrow(
      'Worksheet Population not found in en_hhh_opendata2016.xml'
    );
    await expect(new VariantIngestor('hhh', cache, archiveTransport(archives), URLS).run()).rejects.toBeInstanceOf(
      ParseError
    );
  });
});

describe('fromCsvRow', () => {
  it('reads a processed table row', () => {
    expect(
      fromCsvRow({ GENDER: '2', C_AGE: '90', PROJECTED_YEAR_NAME: '2040', OBS_VALUE: '812.25', GEOGRAPHY_CODE: 'S92000003' }, 2)
    ).toEqual({ geography_code: 'S92000003', year: 2040, gender: 2, age: 90, value: 812.25 });
  });

  it('rejects bad numbers', () => {
    expect(() =>
      fromCsvRow({ GENDER: '1', C_AGE: 'x', PROJECTED_YEAR_NAME: '2040', OBS_VALUE: '1', GEOGRAPHY_CODE: 'S92000003' }, 7)
    ).toThrow('Bad C_AGE "x" on line 7');
  });
});
