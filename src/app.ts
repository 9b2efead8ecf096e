// National Population Projections - Express API
import express, { type Request, type Response } from 'express';
import cors from 'cors';
import { log } from './lib/db';
import { InvalidQueryError, isNppError } from './lib/errors';
import { GEOGRAPHY_CODES, GEOGRAPHY_GROUPS, VARIANTS, isGender, isGeographyKey } from './lib/npp';
import { ProjectionQuery } from './lib/query';
import type { Gender, GeographyKey, NppErrorKind } from './types';

// =============================================================================
// PARAMETER PARSING
// =============================================================================

const STATUS_BY_KIND: Record<NppErrorKind, number> = {
  invalid_variant: 400,
  invalid_query: 400,
  fetch: 502,
  extract: 500,
  parse: 500,
};

const MAX_RANGE = 1000;

function param(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function requireParam(req: Request, name: string): string {
  const value = param(req, name);
  if (value === undefined) {
    throw new InvalidQueryError(`Missing parameter: ${name}`);
  }
  return value;
}

function splitList(text: string): string[] {
  return text.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

export function parseGeographies(text: string): GeographyKey[] {
  const keys: GeographyKey[] = [];
  for (const item of splitList(text)) {
    const group = item.toUpperCase();
    if (group === 'EW' || group === 'GB' || group === 'UK') {
      keys.push(...GEOGRAPHY_GROUPS[group]);
    } else {
      const key = item.toLowerCase();
      if (!isGeographyKey(key)) {
        throw new InvalidQueryError(`Unknown geography: ${item}`);
      }
      keys.push(key);
    }
  }
  return [...new Set(keys)];
}

/**
 * Integers from a list such as `2016-2020,2030`. Ranges are inclusive.
 */
export function parseIntegers(text: string, name: string): number[] {
  const values: number[] = [];
  for (const item of splitList(text)) {
    const match = /^(\d{1,6})(?:\s*-\s*(\d{1,6}))?$/.exec(item);
    if (!match) {
      throw new InvalidQueryError(`Bad ${name}: ${item}`);
    }
    const start = Number(match[1]);
    const end = match[2] === undefined ? start : Number(match[2]);
    if (end < start || end - start > MAX_RANGE) {
      throw new InvalidQueryError(`Bad ${name} range: ${item}`);
    }
    for (let v = start; v <= end; v++) values.push(v);
  }
  return values;
}

function parseYear(text: string, name: string): number {
  const values = parseIntegers(text, name);
  if (values.length !== 1) {
    throw new InvalidQueryError(`Expected a single ${name}: ${text}`);
  }
  return values[0];
}

function parseGenders(text: string): Gender[] {
  return parseIntegers(text, 'genders').map((g) => {
    if (!isGender(g)) throw new InvalidQueryError(`Bad gender: ${g}`);
    return g;
  });
}

function optional<T>(req: Request, name: string, parse: (text: string) => T): T | undefined {
  const value = param(req, name);
  return value === undefined ? undefined : parse(value);
}

function sendError(res: Response, error: unknown, context: string): void {
  if (isNppError(error)) {
    const status = STATUS_BY_KIND[error.kind];
    log(status >= 500 ? 'error' : 'warn', context, { kind: error.kind, error: error.message });
    res.status(status).json({ error: error.message, kind: error.kind });
    return;
  }
  log('error', context, { error: String(error) });
  res.status(500).json({ error: context });
}

// =============================================================================
// APP
// =============================================================================

export function createApp(projections: ProjectionQuery): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Request logging
  app.use((req, _res, next) => {
    log('info', `${req.method} ${req.path}`, { query: req.query });
    next();
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // ===========================================================================
  // REFERENCE DATA
  // ===========================================================================

  app.get('/api/variants', (_req: Request, res: Response) => {
    res.json(Object.entries(VARIANTS).map(([code, name]) => ({ code, name })));
  });

  app.get('/api/geographies', (_req: Request, res: Response) => {
    res.json({ codes: GEOGRAPHY_CODES, groups: GEOGRAPHY_GROUPS });
  });

  app.get('/api/years', (_req: Request, res: Response) => {
    try {
      res.json({ min_year: projections.minYear(), max_year: projections.maxYear() });
    } catch (error) {
      sendError(res, error, 'Failed to get projection years');
    }
  });

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  app.get('/api/detail', async (req: Request, res: Response) => {
    try {
      const rows = await projections.detail(
        requireParam(req, 'variant'),
        parseGeographies(requireParam(req, 'geog')),
        optional(req, 'years', (t) => parseIntegers(t, 'years')),
        optional(req, 'ages', (t) => parseIntegers(t, 'ages')),
        optional(req, 'genders', parseGenders)
      );
      res.json({ count: rows.length, rows });
    } catch (error) {
      sendError(res, error, 'Failed to get detail');
    }
  });

  app.get('/api/aggregate', async (req: Request, res: Response) => {
    try {
      const rows = await projections.aggregate(
        splitList(requireParam(req, 'by')),
        requireParam(req, 'variant'),
        parseGeographies(requireParam(req, 'geog')),
        parseIntegers(requireParam(req, 'years'), 'years'),
        optional(req, 'ages', (t) => parseIntegers(t, 'ages')),
        optional(req, 'genders', parseGenders)
      );
      res.json({ count: rows.length, rows });
    } catch (error) {
      sendError(res, error, 'Failed to aggregate');
    }
  });

  app.get('/api/year-ratio', async (req: Request, res: Response) => {
    try {
      const rows = await projections.yearRatio(
        requireParam(req, 'variant'),
        parseGeographies(requireParam(req, 'geog')),
        parseYear(requireParam(req, 'ref_year'), 'ref_year'),
        parseYear(requireParam(req, 'year'), 'year'),
        optional(req, 'ages', (t) => parseIntegers(t, 'ages')),
        optional(req, 'genders', parseGenders)
      );
      res.json({ count: rows.length, rows });
    } catch (error) {
      sendError(res, error, 'Failed to compute year ratio');
    }
  });

  app.get('/api/variant-ratio', async (req: Request, res: Response) => {
    try {
      const rows = await projections.variantRatio(
        requireParam(req, 'variant'),
        parseGeographies(requireParam(req, 'geog')),
        parseIntegers(requireParam(req, 'years'), 'years'),
        optional(req, 'ages', (t) => parseIntegers(t, 'ages')),
        optional(req, 'genders', parseGenders)
      );
      res.json({ count: rows.length, rows });
    } catch (error) {
      sendError(res, error, 'Failed to compute variant ratio');
    }
  });

  // ===========================================================================
  // ERROR HANDLING
  // ===========================================================================

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
