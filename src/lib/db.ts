// Database connection, query helpers and logging
import { Pool, type QueryResult, type QueryResultRow } from 'pg';
import { createHash } from 'crypto';
import { config } from './config';
import type { LogLevel } from '../types';

// =============================================================================
// DATABASE POOL
// =============================================================================

let pool: Pool | null = null;

// Created on first use so that cache-only runs never need DATABASE_URL
export function getPool(): Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: config.databaseUrl,
      ssl: process.env.NODE_ENV === 'production' ? { rejectUnauthorized: false } : false,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    pool.on('error', (err) => {
      log('error', 'Unexpected error on idle client', { error: err.message });
    });
  }
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    const current = pool;
    pool = null;
    await current.end();
  }
}

// =============================================================================
// QUERY HELPERS
// =============================================================================

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  const start = Date.now();
  const res = await getPool().query<T>(text, params);
  const duration = Date.now() - start;

  if (config.logQueries) {
    log('info', 'Executed query', { text: text.substring(0, 100), duration, rows: res.rowCount });
  }

  return res;
}

// =============================================================================
// UPSERT HELPERS
// =============================================================================

export type SqlValue = string | number | boolean | null;

export async function bulkUpsert(
  table: string,
  rows: Record<string, SqlValue>[],
  conflictColumns: string[],
  options: { updateColumns?: string[]; chunkSize?: number } = {}
): Promise<number> {
  if (rows.length === 0) return 0;

  const columns = Object.keys(rows[0]);
  const updates = options.updateColumns || columns.filter(c => !conflictColumns.includes(c));
  const chunkSize = options.chunkSize ?? 500;

  let affected = 0;

  for (let i = 0; i < rows.length; i += chunkSize) {
    const chunk = rows.slice(i, i + chunkSize);

    // Build multi-row VALUES clause
    const valuesClauses: string[] = [];
    const allValues: SqlValue[] = [];
    let paramIndex = 1;

    for (const row of chunk) {
      const rowPlaceholders = columns.map(() => `$${paramIndex++}`);
      valuesClauses.push(`(${rowPlaceholders.join(', ')})`);
      columns.forEach(col => allValues.push(row[col] ?? null));
    }

    const conflictAction = updates.length > 0
      ? `DO UPDATE SET ${updates.map(c => `${c} = EXCLUDED.${c}`).join(', ')}`
      : 'DO NOTHING';

    const sql = `INSERT INTO ${table} (${columns.join(', ')}) VALUES ${valuesClauses.join(', ')} ` +
      `ON CONFLICT (${conflictColumns.join(', ')}) ${conflictAction}`;

    const res = await query(sql, allValues);
    affected += res.rowCount || 0;
  }

  return affected;
}

// =============================================================================
// HASH HELPERS
// =============================================================================

export function hashContent(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

// =============================================================================
// LOGGING
// =============================================================================

const LEVEL_ORDER: Record<LogLevel, number> = { info: 0, warn: 1, error: 2 };

export function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[config.logLevel]) return;

  const timestamp = new Date().toISOString();
  const logObj = { timestamp, level, message, ...meta };

  if (level === 'error') {
    console.error(JSON.stringify(logObj));
  } else {
    console.log(JSON.stringify(logObj));
  }
}
