import type { ArtifactStore } from '../../shared/artifacts';
import { randomId } from '../../shared/crypto';
import type { CrawlStrategy, EnrichedResult, SearchHit, TokenUsage } from '../../shared/types';
import { crawlHits } from '../crawl/standardCrawl';
import { CrawlTraversal, type PageLoader } from '../crawl/traversal';
import type { Logger } from '../obs/logger';
import type { SeedDiscovery } from '../search/discovery';
import { zeroTokenUsage } from '../services/pricing';
import type { ImageGenerator } from './imageGeneration';
import { makeStageEmitter, type StageEventSender } from './stageEmitter';
import type { ContentSynthesizer } from './synthesis';

export interface ArticleRunRequest {
  query: string;
  strategy: CrawlStrategy;
  /** Search hits to crawl with the standard strategy. */
  numResults: number;
  maxPages: number;
  maxDepth: number;
  customPrompt?: string | null;
  includeImage?: boolean;
  runId?: string;
}

export type ArticleRunStatus = 'success' | 'empty' | 'failed';

export interface ArticleRunResult {
  runId: string;
  query: string;
  strategy: CrawlStrategy;
  status: ArticleRunStatus;
  hits: SearchHit[];
  results: EnrichedResult[];
  article: string | null;
  usage: TokenUsage;
  imageUrl: string | null;
}

export interface ArticlePipelineDeps {
  discoverSeeds: SeedDiscovery;
  loadPage: PageLoader;
  synthesizer: ContentSynthesizer;
  imageGenerator?: ImageGenerator | null;
  store: ArtifactStore;
  logger: Logger;
  /** Search hits used as BFS seeds, at most. */
  bfsSeedLimit: number;
}

export interface ArticleRunOptions {
  signal?: AbortSignal;
  send?: StageEventSender;
}

const saveArtifact = async (deps: ArticlePipelineDeps, runId: string, kind: string, data: unknown) => {
  try {
    await deps.store.saveRunArtifact(runId, kind, data);
  } catch (error) {
    deps.logger.warn('Failed to save run artifact', {
      runId,
      kind,
      error: error instanceof Error ? error.message : String(error),
    });
  }
};

/**
 * search -> crawl -> synthesis (-> image). Every stage reports start and
 * success/failure through `options.send`.
 */
export const runArticlePipeline = async (
  request: ArticleRunRequest,
  deps: ArticlePipelineDeps,
  options: ArticleRunOptions = {},
): Promise<ArticleRunResult> => {
  const { logger } = deps;
  const { signal, send } = options;
  const runId = request.runId ?? randomId();
  const base: Omit<ArticleRunResult, 'status'> = {
    runId,
    query: request.query,
    strategy: request.strategy,
    hits: [],
    results: [],
    article: null,
    usage: zeroTokenUsage(),
    imageUrl: null,
  };

  const searchStage = makeStageEmitter(runId, 'search', send);
  const seedCount =
    request.strategy === 'bfs' ? Math.min(deps.bfsSeedLimit, request.maxPages) : request.numResults;
  searchStage.start({ message: `Searching for "${request.query}"`, data: { requested: seedCount } });
  const hits = await deps.discoverSeeds(request.query, seedCount, signal);
  searchStage.success({ message: `Found ${hits.length} search results`, data: { returned: hits.length } });
  await saveArtifact(deps, runId, 'search_hits', hits);

  if (!hits.length) {
    logger.warn('No search results', { runId, query: request.query });
    return { ...base, status: 'empty' };
  }

  const crawlStage = makeStageEmitter(runId, 'crawl', send);
  crawlStage.start({ message: `Crawling with ${request.strategy} strategy` });
  let results: EnrichedResult[];
  try {
    if (request.strategy === 'bfs') {
      const traversal = new CrawlTraversal({ loadPage: deps.loadPage, logger });
      results = await traversal.traverse(hits, request.maxPages, request.maxDepth, {
        signal,
        observer: {
          onResult: (result, count) =>
            crawlStage.progress({
              message: `Added result ${count}/${request.maxPages}`,
              data: { url: result.link, depth: result.depth },
            }),
        },
      });
    } else {
      results = await crawlHits({
        hits,
        loadPage: deps.loadPage,
        logger,
        signal,
        onResult: (result, index, total) =>
          crawlStage.progress({ message: `Processed result ${index}/${total}`, data: { url: result.link } }),
      });
    }
  } catch (error) {
    crawlStage.failure(error);
    throw error;
  }
  crawlStage.success({ message: `Collected ${results.length} pages`, data: { pages: results.length } });
  await saveArtifact(deps, runId, 'crawl_results', results);

  if (!results.length) {
    return { ...base, hits, status: 'empty' };
  }

  const synthesisStage = makeStageEmitter(runId, 'synthesis', send);
  synthesisStage.start({ message: 'Generating article' });
  const { article, usage } = await deps.synthesizer.synthesize(results, request.customPrompt, { signal });
  if (!article) {
    synthesisStage.failure(new Error('Article generation failed'));
    return { ...base, hits, results, status: 'failed' };
  }
  synthesisStage.success({ data: { usage } });

  let imageUrl: string | null = null;
  if (request.includeImage && deps.imageGenerator) {
    const imageStage = makeStageEmitter(runId, 'image', send);
    imageStage.start({ message: 'Generating image' });
    imageUrl = await deps.imageGenerator.createArticleImage(request.query, article, signal);
    if (imageUrl) {
      imageStage.success({ data: { imageUrl } });
    } else {
      imageStage.failure(new Error('Image generation failed'));
    }
  }

  const result: ArticleRunResult = { ...base, hits, results, article, usage, imageUrl, status: 'success' };
  await saveArtifact(deps, runId, 'article', {
    query: result.query,
    strategy: result.strategy,
    article,
    usage,
    imageUrl,
    sources: results.map((r) => ({ title: r.title, link: r.link, depth: r.depth })),
  });
  return result;
};
