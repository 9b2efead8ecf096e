// Pre-builds variant caches outside of request handling
import { log } from './db';
import { describeCause } from './errors';
import { VariantStore } from './variant-store';
import type { VariantCode, VariantTable, WarmResult } from '../types';

export type Publisher = (variant: VariantCode, table: VariantTable) => Promise<number>;

/**
 * Loads each variant in turn. A failure is recorded and the next variant
 * still runs.
 */
export async function warmVariants(
  store: VariantStore,
  variants: readonly VariantCode[],
  publish?: Publisher
): Promise<WarmResult[]> {
  const results: WarmResult[] = [];

  for (const variant of variants) {
    try {
      const table = await store.get(variant);
      const published = publish ? await publish(variant, table) : 0;
      results.push({ variant, status: 'loaded', records: table.length, published });
    } catch (error) {
      const message = describeCause(error);
      log('error', `Failed to warm variant: ${variant}`, { error: message });
      results.push({ variant, status: 'failed', records: 0, published: 0, error: message });
    }
  }

  log('info', 'Warm run finished', {
    loaded: results.filter((r) => r.status === 'loaded').length,
    failed: results.filter((r) => r.status === 'failed').length,
  });
  return results;
}
