import type { ArtifactStore } from '../../shared/artifacts';
import type { AppConfig } from '../../shared/config';
import { createHttpPageFetcher } from '../crawl/pageFetcher';
import { createPageLoader } from '../crawl/traversal';
import type { Logger } from '../obs/logger';
import { createSeedDiscovery } from '../search/discovery';
import { createDuckDuckGoDiscovery } from '../search/duckDuckGo';
import { createGoogleCseApi } from '../search/googleCse';
import { createPaginatedSearchProvider } from '../search/provider';
import { createImageApi, createTextGenerator } from '../services/providers';
import type { ArticlePipelineDeps } from './articlePipeline';
import { ImageGenerator } from './imageGeneration';
import { ContentSynthesizer } from './synthesis';

/** Wires the production collaborators for one request or CLI run. */
export const createArticlePipelineDeps = (
  config: AppConfig,
  logger: Logger,
  store: ArtifactStore,
  options: { image?: boolean } = {},
): ArticlePipelineDeps => {
  const provider = createPaginatedSearchProvider({
    api: createGoogleCseApi(config.search.googleCse),
    logger,
    pageDelayMs: config.search.pageDelayMs,
  });
  const fallback = config.search.fallbackEnabled
    ? createDuckDuckGoDiscovery({ logger, userAgent: config.crawl.userAgent })
    : null;

  return {
    discoverSeeds: createSeedDiscovery({ provider, fallback, logger }),
    loadPage: createPageLoader(createHttpPageFetcher({ config: config.crawl, logger })),
    synthesizer: new ContentSynthesizer({ generator: createTextGenerator(config.llm), config: config.llm, logger }),
    imageGenerator: options.image
      ? new ImageGenerator({ api: createImageApi(config), config: config.image, logger })
      : null,
    store,
    logger,
    bfsSeedLimit: config.crawl.bfsSeedLimit,
  };
};
