import 'dotenv/config';
import { createInterface, type Interface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';
import { parseArgs } from 'node:util';
import { parseBoundedInt } from '../shared/config';
import { createNoopArtifactStore } from '../shared/artifacts';
import type { CrawlStrategy } from '../shared/types';
import { ConfigurationError, loadConfig, requireCredentials } from './config/config';
import { createLogger } from './obs/logger';
import { createFsArtifactStore } from './persistence/fsStore';
import { runArticlePipeline, type ArticleRunResult } from './pipeline/articlePipeline';
import { createArticlePipelineDeps } from './pipeline/createPipeline';

const RULE = '='.repeat(60);

const ask = async (rl: Interface, question: string, fallback: string): Promise<string> => {
  const answer = (await rl.question(question)).trim();
  return answer || fallback;
};

const renderOverview = (result: ArticleRunResult): string[] =>
  result.results.map(
    (entry, idx) => `${idx + 1}. ${entry.title}\n   ${entry.link}\n   ${entry.content.length} characters (depth ${entry.depth})`,
  );

const renderAnalysisDocument = (result: ArticleRunResult): string =>
  [`Query: ${result.query}`, `Strategy: ${result.strategy}`, '', result.article ?? '', ''].join('\n');

const main = async () => {
  const { values } = parseArgs({ options: { query: { type: 'string' } }, strict: false });
  const config = loadConfig();
  const logger = createLogger(config, { output: 'stderr' });
  const store = config.persistence.mode === 'fs' ? createFsArtifactStore(config.persistence) : createNoopArtifactStore();
  const rl = createInterface({ input: stdin, output: stdout });

  try {
    const preset = typeof values.query === 'string' ? values.query.trim() : '';
    const query = preset || (await ask(rl, 'Search query: ', ''));
    if (!query) {
      stdout.write('A search query is required.\n');
      process.exitCode = 1;
      return;
    }

    requireCredentials(config);

    const numResults = parseBoundedInt(
      await ask(rl, `Number of results [${config.crawl.defaultNumResults}]: `, ''),
      config.crawl.defaultNumResults,
      1,
      50,
    );
    const strategyChoice = await ask(rl, 'Strategy (1 = standard, 2 = BFS) [1]: ', '1');
    const strategy: CrawlStrategy = strategyChoice === '2' ? 'bfs' : 'standard';

    let maxPages = config.crawl.defaultMaxPages;
    let maxDepth = config.crawl.defaultMaxDepth;
    if (strategy === 'bfs') {
      maxPages = parseBoundedInt(await ask(rl, `Max pages [${maxPages}]: `, ''), maxPages, 1, 100);
      maxDepth = parseBoundedInt(await ask(rl, `Max depth [${maxDepth}]: `, ''), maxDepth, 0, 10);
    }

    const deps = createArticlePipelineDeps(config, logger, store);
    const result = await runArticlePipeline({ query, strategy, numResults, maxPages, maxDepth }, deps);

    if (result.status === 'empty') {
      stdout.write(`No content found for "${query}".\n`);
      return;
    }

    stdout.write(`\nCollected ${result.results.length} results:\n`);
    stdout.write(`${renderOverview(result).join('\n')}\n`);

    if (result.status === 'failed' || !result.article) {
      stdout.write('\nArticle generation failed.\n');
      process.exitCode = 1;
      return;
    }

    const { usage } = result;
    stdout.write(`\n${RULE}\n${result.article}\n${RULE}\n`);
    stdout.write(
      `Tokens: ${usage.totalTokens} (prompt ${usage.promptTokens}, completion ${usage.completionTokens}), cost $${usage.costUsd.toFixed(6)}\n`,
    );

    const save = (await ask(rl, '\nSave the analysis to a file? (y/N): ', 'n')).toLowerCase();
    if (save === 'y') {
      const filePath = await store.saveArticleDocument(`analysis_${query}.txt`, renderAnalysisDocument(result));
      stdout.write(filePath ? `Saved to ${filePath}\n` : 'Persistence is disabled; nothing was written.\n');
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      stdout.write(`Configuration error: ${error.message}\n`);
      process.exitCode = 1;
      return;
    }
    throw error;
  } finally {
    rl.close();
  }
};

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Fatal: ${message}\n`);
  process.exit(1);
});
