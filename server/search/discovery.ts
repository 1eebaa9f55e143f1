import type { SearchHit } from '../../shared/types';
import type { Logger } from '../obs/logger';
import type { AlternateDiscovery } from './duckDuckGo';
import type { SearchProvider } from './types';

export interface SeedDiscoveryDeps {
  provider: SearchProvider;
  fallback?: AlternateDiscovery | null;
  logger: Logger;
}

export type SeedDiscovery = (query: string, numResults: number, signal?: AbortSignal) => Promise<SearchHit[]>;

export const createSeedDiscovery =
  ({ provider, fallback, logger }: SeedDiscoveryDeps): SeedDiscovery =>
  async (query, numResults, signal) => {
    const hits = await provider.fetchResults(query, numResults, signal);
    if (hits.length || !fallback) {
      return hits;
    }
    logger.info('Primary search empty, using fallback discovery', { query });
    return fallback.discover(query, numResults, signal);
  };
