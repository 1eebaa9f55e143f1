import { describe, expect, it, vi } from 'vitest';
import { buildConfig } from '../../config/config';
import { createSilentLogger } from '../../obs/logger';
import type { ImageApi } from '../../services/openai';
import { ImageGenerator, MAX_IMAGE_PROMPT_LENGTH, buildImagePrompt, truncatePrompt } from '../imageGeneration';

const imageConfig = buildConfig({}).image;

describe('truncatePrompt', () => {
  it('cuts prompts longer than the limit', () => {
    expect(truncatePrompt('a'.repeat(5000))).toHaveLength(MAX_IMAGE_PROMPT_LENGTH);
    expect(truncatePrompt('short')).toBe('short');
  });
});

describe('buildImagePrompt', () => {
  it('fills the keyword and article excerpt', () => {
    const prompt = buildImagePrompt('  web crawling ', 'Line one.\n\nLine two.');
    expect(prompt).toContain('web crawling');
    expect(prompt).toContain('Line one. Line two.');
    expect(prompt).not.toContain('{keyword}');
  });
});

describe('ImageGenerator', () => {
  it('sends a truncated prompt with the configured size and quality', async () => {
    const generate = vi.fn<ImageApi['generate']>(async () => ({ data: [{ url: 'https://img.test/1.png' }] }));
    const generator = new ImageGenerator({ api: { generate }, config: imageConfig, logger: createSilentLogger() });

    await generator.generate('p'.repeat(4500));

    expect(generate).toHaveBeenCalledWith('p'.repeat(4000), '1024x1024', 'standard', undefined);
  });

  it('returns the first image url', async () => {
    const generate = vi.fn<ImageApi['generate']>(async () => ({ data: [{ url: null }, { url: 'https://img.test/2.png' }] }));
    const generator = new ImageGenerator({ api: { generate }, config: imageConfig, logger: createSilentLogger() });

    await expect(generator.createArticleImage('bfs', 'article')).resolves.toBe('https://img.test/2.png');
  });

  it('returns null when the api fails', async () => {
    const generate = vi.fn<ImageApi['generate']>(async () => {
      throw new Error('content policy');
    });
    const generator = new ImageGenerator({ api: { generate }, config: imageConfig, logger: createSilentLogger() });

    await expect(generator.createArticleImage('bfs', 'article')).resolves.toBeNull();
  });
});
