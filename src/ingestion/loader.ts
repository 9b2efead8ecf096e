// Wires the two acquisition paths behind one VariantLoader
import { CacheStore } from '../lib/cache';
import { fetchUrl } from '../lib/ingest';
import { NomisClient } from '../lib/nomis';
import { PrincipalIngestor } from './npp-principal';
import { VariantIngestor } from './npp-variant';
import type { StatisticalApi, Transport, VariantCode, VariantLoader } from '../types';

export interface LoaderOptions {
  api?: StatisticalApi;
  transport?: Transport;
  nomisApiKey?: string;
}

export function createNppLoader(cache: CacheStore, options: LoaderOptions = {}): VariantLoader {
  const transport = options.transport ?? ((url: string) => fetchUrl(url));
  const api = options.api ?? new NomisClient(cache, { apiKey: options.nomisApiKey, transport });

  return {
    loadPrincipal: () => new PrincipalIngestor(cache, api).run(),
    loadVariant: (variant: VariantCode) => new VariantIngestor(variant, cache, transport).run(),
  };
}
