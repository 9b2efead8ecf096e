// Assembles cache, loaders, store and query engine from configuration
import { config } from './lib/config';
import { CacheStore } from './lib/cache';
import { ProjectionQuery } from './lib/query';
import { VariantStore } from './lib/variant-store';
import { createNppLoader, type LoaderOptions } from './ingestion/loader';

export interface Projections {
  store: VariantStore;
  query: ProjectionQuery;
}

export function createStore(options: LoaderOptions & { cacheDir?: string } = {}): VariantStore {
  const cache = new CacheStore(options.cacheDir ?? config.cacheDir);
  return new VariantStore(createNppLoader(cache, { nomisApiKey: config.nomisApiKey, ...options }));
}

export async function createProjections(options: LoaderOptions & { cacheDir?: string } = {}): Promise<Projections> {
  const store = createStore(options);
  const query = await ProjectionQuery.create(store);
  return { store, query };
}
