// In-memory tables keyed by variant code
import { log } from './db';
import { InvalidVariantError } from './errors';
import { PRINCIPAL, isVariantCode } from './npp';
import type { VariantCode, VariantLoader, VariantTable } from '../types';

export class VariantStore {
  private readonly tables = new Map<VariantCode, Promise<VariantTable>>();
  private principalTable: VariantTable | null = null;

  constructor(private readonly loader: VariantLoader) {}

  /**
   * Loads the principal variant. Everything that needs the year range or a
   * ratio denominator depends on it, so it is not deferred.
   */
  async init(): Promise<void> {
    log('info', 'Loading NPP principal (ppp) data for England, Wales, Scotland & Northern Ireland');
    this.principalTable = await this.get(PRINCIPAL);
  }

  get principal(): VariantTable {
    if (!this.principalTable) {
      throw new Error('VariantStore.init() has not completed');
    }
    return this.principalTable;
  }

  /**
   * Table for a variant, loading it on first request. Concurrent callers share
   * one load; a failed load is dropped so the next call starts again.
   */
  async get(variant: string): Promise<VariantTable> {
    if (!isVariantCode(variant)) {
      throw new InvalidVariantError(variant);
    }

    const existing = this.tables.get(variant);
    if (existing) return existing;

    const pending = this.load(variant);
    this.tables.set(variant, pending);
    try {
      return await pending;
    } catch (error) {
      if (this.tables.get(variant) === pending) this.tables.delete(variant);
      throw error;
    }
  }

  has(variant: VariantCode): boolean {
    return this.tables.has(variant);
  }

  loaded(): VariantCode[] {
    return [...this.tables.keys()];
  }

  clear(): void {
    this.tables.clear();
    this.principalTable = null;
  }

  private async load(variant: VariantCode): Promise<VariantTable> {
    const records = variant === PRINCIPAL
      ? await this.loader.loadPrincipal()
      : await this.loader.loadVariant(variant);
    return Object.freeze(records);
  }
}
