// File-backed cache of pipeline artifacts
// Presence of a key is the only "done" signal: nothing here tracks staleness.

import { promises as fs } from 'fs';
import * as path from 'path';
import type { GeographyKey, VariantCode } from '../types';

export function archiveKey(geography: GeographyKey): string {
  return `npp_${geography}.zip`;
}

export function documentKey(geography: GeographyKey, variant: VariantCode): string {
  return `${geography}_${variant}_opendata2016.xml`;
}

export function tableKey(variant: VariantCode): string {
  return `npp_${variant}.csv`;
}

export function apiKey(table: string, queryHash: string): string {
  return `${table}_${queryHash}.csv`;
}

export class CacheStore {
  constructor(readonly cacheDir: string) {}

  path(key: string): string {
    return path.join(this.cacheDir, key);
  }

  async exists(key: string): Promise<boolean> {
    try {
      const stat = await fs.stat(this.path(key));
      return stat.isFile();
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }

  async read(key: string): Promise<Buffer> {
    return fs.readFile(this.path(key));
  }

  async readText(key: string): Promise<string> {
    return fs.readFile(this.path(key), 'utf-8');
  }

  /** Writes to a temporary file, then renames it onto the key. */
  async write(key: string, payload: Buffer | string): Promise<void> {
    const target = this.path(key);
    const temp = `${target}.${process.pid}.tmp`;
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(temp, payload);
    await fs.rename(temp, target);
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
