import type { AppConfig } from '../../shared/config';
import type { Logger } from '../obs/logger';
import { fillTemplate, loadPrompt } from '../prompts/loader';
import type { ImageApi } from '../services/openai';

export const MAX_IMAGE_PROMPT_LENGTH = 4000;
const ARTICLE_EXCERPT_LENGTH = 1500;

export const truncatePrompt = (prompt: string, max = MAX_IMAGE_PROMPT_LENGTH): string =>
  prompt.length > max ? prompt.slice(0, max) : prompt;

export const buildImagePrompt = (keyword: string, article: string): string =>
  truncatePrompt(
    fillTemplate(loadPrompt('image.md'), {
      keyword: keyword.trim(),
      article: article.replace(/\s+/g, ' ').trim().slice(0, ARTICLE_EXCERPT_LENGTH),
    }),
  );

export interface ImageGeneratorDeps {
  api: ImageApi;
  config: AppConfig['image'];
  logger: Logger;
}

export class ImageGenerator {
  constructor(private readonly deps: ImageGeneratorDeps) {}

  /** Raw call; the prompt is cut to {@link MAX_IMAGE_PROMPT_LENGTH} characters first. */
  generate(prompt: string, signal?: AbortSignal) {
    const { api, config } = this.deps;
    return api.generate(truncatePrompt(prompt), config.size, config.quality, signal);
  }

  /** Returns the first image URL, or `null` when generation fails. */
  async createArticleImage(keyword: string, article: string, signal?: AbortSignal): Promise<string | null> {
    const { logger } = this.deps;
    try {
      const response = await this.generate(buildImagePrompt(keyword, article), signal);
      const url = response.data.find((item) => item.url)?.url ?? null;
      if (!url) {
        logger.warn('Image generation returned no URL', { keyword });
      }
      return url;
    } catch (error) {
      logger.warn('Image generation failed', { keyword, error: error instanceof Error ? error.message : String(error) });
      return null;
    }
  }
}
