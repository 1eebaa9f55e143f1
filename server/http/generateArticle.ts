import { z } from 'zod';
import { parseBoundedInt, type AppConfig } from '../../shared/config';
import { toTokenUsagePayload, type TokenUsagePayload } from '../../shared/types';
import { ConfigurationError, requireCredentials } from '../config/config';
import type { Logger } from '../obs/logger';
import { sanitizeSegment } from '../persistence/fsStore';
import {
  runArticlePipeline,
  type ArticlePipelineDeps,
  type ArticleRunOptions,
  type ArticleRunRequest,
  type ArticleRunResult,
} from '../pipeline/articlePipeline';

export const MAX_SCRAPING_NUMBER = 50;
export const MAX_REQUEST_DEPTH = 5;

const flag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .optional()
  .transform((value) => value === true || value === 'true' || value === '1');

const integerLike = z.union([z.number(), z.string()]).optional();

export const GenerateArticleBodySchema = z.object({
  keyword: z.string().trim().min(1, 'keyword is required'),
  scraping_number: integerLike,
  isNeedImage: flag,
  custom_prompt: z.string().nullish(),
  return_json: flag,
  strategy: z.enum(['standard', 'bfs']).optional(),
  max_depth: integerLike,
});

export interface GenerateArticleRequest {
  run: ArticleRunRequest;
  returnJson: boolean;
}

export type ParsedRequest = { ok: true; value: GenerateArticleRequest } | { ok: false; message: string };

/**
 * Maps the public body onto a pipeline request. `scraping_number` is the
 * result count for the standard strategy and the page budget for BFS.
 */
export const parseGenerateArticleRequest = (body: unknown, config: AppConfig): ParsedRequest => {
  const parsed = GenerateArticleBodySchema.safeParse(body ?? {});
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
    return { ok: false, message };
  }
  const data = parsed.data;
  const count = parseBoundedInt(data.scraping_number, config.crawl.defaultNumResults, 1, MAX_SCRAPING_NUMBER);
  return {
    ok: true,
    value: {
      returnJson: data.return_json,
      run: {
        query: data.keyword,
        strategy: data.strategy ?? 'bfs',
        numResults: count,
        maxPages: count,
        maxDepth: parseBoundedInt(data.max_depth, config.crawl.defaultMaxDepth, 0, MAX_REQUEST_DEPTH),
        customPrompt: data.custom_prompt ?? null,
        includeImage: data.isNeedImage,
      },
    },
  };
};

export interface GenerateArticleJson {
  status: 'success' | 'error';
  message: string;
  content?: string;
  token_usage?: TokenUsagePayload;
  image_url?: string | null;
}

export type GenerateArticleOutcome =
  | { kind: 'json'; statusCode: number; body: GenerateArticleJson }
  | { kind: 'document'; filename: string; text: string };

export const articleDocumentName = (keyword: string): string => `article_${sanitizeSegment(keyword)}.txt`;

export const renderArticleDocument = (result: ArticleRunResult): string => {
  const usage = result.usage;
  const lines = [
    `Keyword: ${result.query}`,
    `Strategy: ${result.strategy}`,
    `Tokens: ${usage.totalTokens} (prompt ${usage.promptTokens}, completion ${usage.completionTokens})`,
    `Cost (USD): ${usage.costUsd.toFixed(6)}`,
  ];
  if (result.imageUrl) {
    lines.push(`Image: ${result.imageUrl}`);
  }
  lines.push('', result.article ?? '', '', 'Sources:');
  result.results.forEach((entry, idx) => lines.push(`${idx + 1}. ${entry.title} - ${entry.link}`));
  return `${lines.join('\n')}\n`;
};

const errorOutcome = (statusCode: number, message: string): GenerateArticleOutcome => ({
  kind: 'json',
  statusCode,
  body: { status: 'error', message },
});

export const toOutcome = (result: ArticleRunResult, returnJson: boolean): GenerateArticleOutcome => {
  if (result.status === 'empty') {
    return errorOutcome(404, `No content found for "${result.query}"`);
  }
  if (result.status === 'failed' || !result.article) {
    return errorOutcome(502, 'Article generation failed');
  }
  if (!returnJson) {
    return { kind: 'document', filename: articleDocumentName(result.query), text: renderArticleDocument(result) };
  }
  return {
    kind: 'json',
    statusCode: 200,
    body: {
      status: 'success',
      message: `Article generated from ${result.results.length} sources`,
      content: result.article,
      token_usage: toTokenUsagePayload(result.usage),
      image_url: result.imageUrl,
    },
  };
};

export interface GenerateArticleDeps {
  config: AppConfig;
  logger: Logger;
  buildPipeline: (options: { image: boolean }) => ArticlePipelineDeps;
}

export const handleGenerateArticle = async (
  body: unknown,
  { config, logger, buildPipeline }: GenerateArticleDeps,
  options: ArticleRunOptions = {},
): Promise<GenerateArticleOutcome> => {
  const parsed = parseGenerateArticleRequest(body, config);
  if (!parsed.ok) {
    return errorOutcome(400, parsed.message);
  }
  const { run, returnJson } = parsed.value;

  try {
    requireCredentials(config, { image: run.includeImage });
    const pipeline = buildPipeline({ image: Boolean(run.includeImage) });
    const result = await runArticlePipeline(run, pipeline, options);
    return toOutcome(result, returnJson);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error('Configuration error', { missing: error.missing });
      return errorOutcome(500, `Configuration error: ${error.message}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Article request failed', { keyword: run.query, error: message });
    return errorOutcome(500, message);
  }
};
