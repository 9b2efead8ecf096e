// Nomisweb statistical API client
// Docs: https://www.nomisweb.co.uk/api/v01/help

import { log, hashContent } from './db';
import { CacheStore, apiKey } from './cache';
import { FetchError, ParseError } from './errors';
import { fetchUrl, parseCsv, toCsv } from './ingest';
import type { ApiParams, ApiRow, StatisticalApi, Transport } from '../types';

export const NOMIS_BASE_URL = 'https://www.nomisweb.co.uk/api/v01/dataset';

// Unregistered callers are capped at 25k cells per request
const ANONYMOUS_PAGE_SIZE = 25000;
const REGISTERED_PAGE_SIZE = 1000000;

export interface NomisOptions {
  apiKey?: string;
  transport?: Transport;
  pageSize?: number;
}

export class NomisClient implements StatisticalApi {
  private readonly apiKey?: string;
  private readonly transport: Transport;
  private readonly pageSize: number;

  constructor(private readonly cache: CacheStore, options: NomisOptions = {}) {
    this.apiKey = options.apiKey;
    this.transport = options.transport ?? ((url) => fetchUrl(url));
    this.pageSize = options.pageSize ?? (options.apiKey ? REGISTERED_PAGE_SIZE : ANONYMOUS_PAGE_SIZE);
  }

  /**
   * Fetches every row for the query, reusing a cached response when the same
   * table and parameters were requested before.
   */
  async getData(table: string, params: ApiParams): Promise<ApiRow[]> {
    const key = apiKey(table, hashContent(this.queryString(params)).slice(0, 16));

    if (await this.cache.exists(key)) {
      log('info', `Using cached ${table} query`, { key });
      return parseCsv(await this.cache.readText(key));
    }

    const rows: ApiRow[] = [];
    for (let offset = 0; ; offset += this.pageSize) {
      const page = await this.fetchPage(table, params, offset);
      for (const row of page) rows.push(row);
      if (page.length < this.pageSize) break;
    }

    if (rows.length === 0) {
      throw new ParseError(`Empty response for ${table}`);
    }

    await this.cache.write(key, toCsv(rows, Object.keys(rows[0])));
    log('info', `Fetched ${table}`, { rows: rows.length });
    return rows;
  }

  url(table: string, params: ApiParams, offset = 0): string {
    const search = new URLSearchParams(params);
    search.set('recordoffset', String(offset));
    search.set('recordlimit', String(this.pageSize));
    if (this.apiKey) search.set('uid', this.apiKey);
    return `${NOMIS_BASE_URL}/${table}.data.csv?${search.toString()}`;
  }

  private queryString(params: ApiParams): string {
    return new URLSearchParams(Object.entries(params).sort(([a], [b]) => a.localeCompare(b))).toString();
  }

  private async fetchPage(table: string, params: ApiParams, offset: number): Promise<ApiRow[]> {
    const url = this.url(table, params, offset);
    let body: Buffer;
    try {
      body = await this.transport(url);
    } catch (error) {
      throw new FetchError(url.replace(/uid=[^&]+/, 'uid=***'), { cause: error });
    }

    const text = body.toString('utf-8');
    if (text.trimStart().startsWith('<')) {
      throw new ParseError(`Unexpected non-CSV response for ${table}`);
    }
    return parseCsv(text);
  }
}
