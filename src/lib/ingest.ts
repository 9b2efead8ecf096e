// Core ingestion framework
import * as https from 'https';
import * as http from 'http';
import * as path from 'path';
import * as cheerio from 'cheerio';
import * as xlsx from 'xlsx';
import AdmZip from 'adm-zip';
import { log } from './db';
import { CacheStore, archiveKey, documentKey } from './cache';
import { ExtractError, FetchError, describeCause } from './errors';
import { ARCHIVE_URLS } from './npp';
import type { GeographyKey, Observation, Transport, VariantCode } from '../types';

// =============================================================================
// INGESTION BASE CLASS
// =============================================================================

export abstract class BaseIngestor<TRaw, TParsed> {
  protected recordsProcessed = 0;

  constructor(
    protected readonly sourceCode: string,
    protected readonly cache: CacheStore
  ) {}

  /**
   * Main entry point - a finished artifact short-circuits the whole pipeline,
   * otherwise fetch, parse, transform and save run in order.
   */
  async run(): Promise<Observation[]> {
    const cached = await this.restore();
    if (cached) {
      log('info', `Using cached data for ${this.sourceCode}`, { records: cached.length });
      return cached;
    }

    try {
      log('info', `Fetching data for ${this.sourceCode}`);
      const rawData = await this.fetch();

      log('info', `Parsing data for ${this.sourceCode}`);
      const parsedData = await this.parse(rawData);

      const observations = await this.transform(parsedData);
      this.recordsProcessed = observations.length;

      log('info', `Saving data for ${this.sourceCode}`, { records: this.recordsProcessed });
      await this.save(observations);

      log('info', `Ingestion completed for ${this.sourceCode}`, { records: this.recordsProcessed });
      return observations;
    } catch (error) {
      log('error', `Ingestion failed for ${this.sourceCode}`, { error: describeCause(error) });
      throw error;
    }
  }

  /**
   * Returns the finished table when a previous run already produced it
   */
  protected async restore(): Promise<Observation[] | null> {
    return null;
  }

  protected abstract fetch(): Promise<TRaw>;

  protected abstract parse(rawData: TRaw): Promise<TParsed>;

  protected abstract transform(parsedData: TParsed): Promise<Observation[]>;

  /**
   * Persist the finished table - a no-op unless overridden
   */
  protected async save(_observations: Observation[]): Promise<void> {}
}

// =============================================================================
// HTTP TRANSPORT
// =============================================================================

const MAX_REDIRECTS = 5;
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export async function fetchUrl(url: string, redirects = 0): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const protocol = url.startsWith('https') ? https : http;

    protocol.get(url, {
      headers: {
        'User-Agent': 'NPP-Projections/1.0 (Research)',
        'Accept': '*/*'
      }
    }, (res) => {
      // Handle redirects
      if (res.statusCode && REDIRECT_STATUSES.has(res.statusCode) && res.headers.location) {
        res.resume();
        if (redirects >= MAX_REDIRECTS) {
          reject(new Error(`Too many redirects: ${url}`));
          return;
        }
        const next = new URL(res.headers.location, url).toString();
        fetchUrl(next, redirects + 1).then(resolve, reject);
        return;
      }

      if (res.statusCode !== 200) {
        res.resume();
        reject(new Error(`HTTP ${res.statusCode}: ${url}`));
        return;
      }

      const chunks: Buffer[] = [];
      res.on('data', (chunk: Buffer) => chunks.push(chunk));
      res.on('end', () => resolve(Buffer.concat(chunks)));
      res.on('error', reject);
    }).on('error', reject);
  });
}

// =============================================================================
// ARCHIVE STAGES
// =============================================================================

/**
 * Downloads a country archive into the cache unless it is already there.
 * Resolves to true when a download happened.
 */
export async function fetchArchive(
  cache: CacheStore,
  geography: GeographyKey,
  transport: Transport = fetchUrl,
  url: string = ARCHIVE_URLS[geography]
): Promise<boolean> {
  const key = archiveKey(geography);
  if (await cache.exists(key)) {
    log('info', `Using ${key}`);
    return false;
  }

  log('info', `Downloading ${key}`, { url });
  let payload: Buffer;
  try {
    payload = await transport(url);
  } catch (error) {
    throw new FetchError(url, { cause: error });
  }

  await cache.write(key, payload);
  return true;
}

/**
 * Copies one variant document out of the cached country archive.
 * Resolves to true when an extraction happened.
 */
export async function extractDocument(
  cache: CacheStore,
  geography: GeographyKey,
  variant: VariantCode
): Promise<boolean> {
  const name = documentKey(geography, variant);
  if (await cache.exists(name)) {
    return false;
  }

  const zipKey = archiveKey(geography);
  log('info', `Extracting ${name}`, { archive: zipKey });

  let data: Buffer;
  try {
    const zip = new AdmZip(await cache.read(zipKey));
    const entry = zip.getEntry(name)
      ?? zip.getEntries().find((e) => path.posix.basename(e.entryName) === name);
    if (!entry) {
      throw new ExtractError(`${name} not found in ${zipKey}`);
    }
    data = entry.getData();
  } catch (error) {
    if (error instanceof ExtractError) throw error;
    throw new ExtractError(`Unreadable archive ${zipKey}: ${describeCause(error)}`, { cause: error });
  }

  await cache.write(name, data);
  return true;
}

// =============================================================================
// SPREADSHEET XML PARSER
// =============================================================================

// SpreadsheetML may or may not prefix its elements (Row vs ss:Row)
function hasLocalName(node: object, name: string): boolean {
  return 'name' in node && typeof node.name === 'string' && node.name.split(':').pop() === name;
}

/**
 * Rows of the named worksheet in an Excel 2003 XML document. Each row holds
 * the text of its non-empty cells only, so rows need not align by position.
 * An absent worksheet yields no rows.
 */
export function readWorksheet(xml: string, sheetName: string): string[][] {
  const $ = cheerio.load(xml, { xml: true });
  const rows: string[][] = [];

  $('*')
    .filter((_, el) => hasLocalName(el, 'Worksheet'))
    .each((_, sheet) => {
      const $sheet = $(sheet);
      if (($sheet.attr('ss:Name') ?? $sheet.attr('Name')) !== sheetName) return;

      $sheet
        .find('*')
        .filter((_, el) => hasLocalName(el, 'Row'))
        .each((_, row) => {
          const cells: string[] = [];
          $(row)
            .children()
            .filter((_, el) => hasLocalName(el, 'Cell'))
            .each((_, cell) => {
              const data = $(cell).children().filter((_, el) => hasLocalName(el, 'Data')).first();
              const text = data.text();
              if (data.length > 0 && text !== '') cells.push(text);
            });
          rows.push(cells);
        });
    });

  return rows;
}

// =============================================================================
// CSV HELPERS
// =============================================================================

export type CsvValue = string | number;

export function toCsv<T extends Record<string, CsvValue>>(rows: T[], header: (keyof T & string)[]): string {
  const sheet = xlsx.utils.json_to_sheet(rows, { header });
  return `${xlsx.utils.sheet_to_csv(sheet, { rawNumbers: true })}\n`;
}

/**
 * Parses CSV text into records keyed by the header row. Values stay as text.
 */
export function parseCsv(text: string): Record<string, string>[] {
  const workbook = xlsx.read(text.replace(/^\uFEFF/, ''), { type: 'string', raw: true });
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) return [];

  const rows = xlsx.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets[sheetName], {
    raw: true,
    defval: '',
  });

  return rows.map((row) => {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(row)) {
      record[key] = String(value);
    }
    return record;
  });
}
