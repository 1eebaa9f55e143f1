import type { AppConfig } from '../../shared/config';
import { SEARCH_CONTENT_PLACEHOLDER } from '../../shared/prompts';
import type { EnrichedResult, PageRecord, TokenUsage } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { fillTemplate, loadPrompt } from '../prompts/loader';
import { computeCostUsd, resolveModelPrice, zeroTokenUsage } from '../services/pricing';
import type { TextGenerator } from '../services/textGeneration';

export type SynthesisRecord = EnrichedResult | PageRecord;

export interface SynthesisResult {
  article: string | null;
  usage: TokenUsage;
}

export interface ContentSynthesizerDeps {
  generator: TextGenerator;
  config: AppConfig['llm'];
  logger: Logger;
}

const linkOf = (record: SynthesisRecord): string => ('link' in record ? record.link : record.sourceUrl);

export const renderSourceBlock = (record: SynthesisRecord, index: number): string => {
  const tags = record.tags ? Array.from(record.tags) : [];
  return [
    `Source ${index + 1}:`,
    `Title: ${record.title}`,
    `URL: ${linkOf(record)}`,
    `Published: ${record.publishedDate || 'unknown'}`,
    `Author: ${record.author || 'unknown'}`,
    `Tags: ${tags.join(', ')}`,
    `Content: ${record.content || '(no content)'}`,
    `Images available: ${record.images?.length ?? 0}`,
  ].join('\n');
};

export const renderSources = (records: readonly SynthesisRecord[]): string =>
  records.map((record, idx) => renderSourceBlock(record, idx)).join('\n\n');

/** Custom templates without the placeholder get the sources appended. */
export const buildUserPrompt = (template: string, sources: string): string =>
  template.includes(SEARCH_CONTENT_PLACEHOLDER)
    ? fillTemplate(template, { search_content: sources })
    : `${template.trimEnd()}\n\n${sources}`;

/**
 * Sends crawled pages to the text model in one call and keeps the token
 * accounting of the latest call.
 */
export class ContentSynthesizer {
  private lastUsage: TokenUsage = zeroTokenUsage();

  constructor(private readonly deps: ContentSynthesizerDeps) {}

  getTokenUsage(): TokenUsage {
    return { ...this.lastUsage };
  }

  async synthesize(
    records: readonly SynthesisRecord[],
    template?: string | null,
    options: { signal?: AbortSignal } = {},
  ): Promise<SynthesisResult> {
    const { generator, config, logger } = this.deps;
    const userPrompt = buildUserPrompt(template?.trim() ? template : loadPrompt('article.md'), renderSources(records));

    try {
      logger.info('Synthesizing article', { provider: generator.provider, model: config.model, sources: records.length });
      const response = await generator.complete({
        model: config.model,
        messages: [
          { role: 'system', content: loadPrompt('article_system.md') },
          { role: 'user', content: userPrompt },
        ],
        maxOutputTokens: config.maxOutputTokens,
        temperature: config.temperature,
        signal: options.signal,
      });

      const article = response.choices[0]?.message.content?.trim();
      if (!article) {
        throw new Error('Empty response from text model');
      }

      const { promptTokens, completionTokens, totalTokens } = response.usage;
      const price = resolveModelPrice(config.model, config.prices, config.defaultPrice);
      this.lastUsage = {
        promptTokens,
        completionTokens,
        totalTokens,
        costUsd: computeCostUsd(promptTokens, completionTokens, price),
      };
      logger.info('Article synthesized', { ...this.lastUsage });
      return { article, usage: this.getTokenUsage() };
    } catch (error) {
      this.lastUsage = zeroTokenUsage();
      logger.error('Article synthesis failed', {
        model: config.model,
        error: error instanceof Error ? error.message : String(error),
      });
      return { article: null, usage: this.getTokenUsage() };
    }
  }
}
