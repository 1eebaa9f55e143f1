import { describe, expect, it, vi } from 'vitest';
import { buildConfig } from '../../config/config';
import { createSilentLogger } from '../../obs/logger';
import type { CompletionRequest, CompletionResponse, TextGenerator } from '../../services/textGeneration';
import type { EnrichedResult } from '../../../shared/types';
import { ContentSynthesizer, buildUserPrompt, renderSourceBlock } from '../synthesis';

const llmConfig = { ...buildConfig({}).llm, model: 'o3-mini' };

const result: EnrichedResult = {
  title: 'Crawling basics',
  link: 'https://site.com/a',
  snippet: 'x',
  content: 'Queues and visited sets.',
  depth: 0,
  author: 'Ann',
  tags: ['bfs', 'web'],
  images: ['https://site.com/1.png', 'https://site.com/2.png'],
};

const generatorReturning = (response: CompletionResponse | Error) => {
  const complete = vi.fn(async (_request: CompletionRequest) => {
    if (response instanceof Error) throw response;
    return response;
  });
  const generator: TextGenerator = { provider: 'fake', complete };
  return { generator, complete };
};

describe('renderSourceBlock', () => {
  it('renders metadata with unknown placeholders', () => {
    expect(renderSourceBlock(result, 0)).toBe(
      [
        'Source 1:',
        'Title: Crawling basics',
        'URL: https://site.com/a',
        'Published: unknown',
        'Author: Ann',
        'Tags: bfs, web',
        'Content: Queues and visited sets.',
        'Images available: 2',
      ].join('\n'),
    );
  });
});

describe('buildUserPrompt', () => {
  it('replaces every placeholder occurrence', () => {
    expect(buildUserPrompt('A {search_content} B {search_content}', 'S')).toBe('A S B S');
  });

  it('appends sources to templates without a placeholder', () => {
    expect(buildUserPrompt('Write a summary.\n', 'S')).toBe('Write a summary.\n\nS');
  });
});

describe('ContentSynthesizer', () => {
  it('returns the article and prices the usage', async () => {
    const { generator, complete } = generatorReturning({
      choices: [{ message: { content: '  The article.  ' } }],
      usage: { promptTokens: 1_000_000, completionTokens: 0, totalTokens: 1_000_000 },
    });
    const synthesizer = new ContentSynthesizer({ generator, config: llmConfig, logger: createSilentLogger() });

    const { article, usage } = await synthesizer.synthesize([result], 'Summarize:\n{search_content}');

    expect(article).toBe('The article.');
    expect(usage.promptTokens).toBe(1_000_000);
    expect(usage.totalTokens).toBe(1_000_000);
    expect(usage.costUsd).toBeCloseTo(1.1, 10);
    expect(synthesizer.getTokenUsage()).toEqual(usage);

    const request = complete.mock.calls[0][0];
    expect(request.model).toBe('o3-mini');
    expect(request.maxOutputTokens).toBe(4000);
    expect(request.messages.map((m) => m.role)).toEqual(['system', 'user']);
    expect(request.messages[1].content).toBe(`Summarize:\n${renderSourceBlock(result, 0)}`);
  });

  it('uses the default template when none is given', async () => {
    const { generator, complete } = generatorReturning({
      choices: [{ message: { content: 'ok' } }],
      usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
    });
    const synthesizer = new ContentSynthesizer({ generator, config: llmConfig, logger: createSilentLogger() });

    await synthesizer.synthesize([result], '   ');

    const userPrompt = complete.mock.calls[0][0].messages[1].content;
    expect(userPrompt).toContain(renderSourceBlock(result, 0));
    expect(userPrompt).not.toContain('{search_content}');
  });

  it('resets usage to zero when the call fails', async () => {
    const ok = generatorReturning({
      choices: [{ message: { content: 'ok' } }],
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    });
    const synthesizer = new ContentSynthesizer({ generator: ok.generator, config: llmConfig, logger: createSilentLogger() });
    await synthesizer.synthesize([result]);
    expect(synthesizer.getTokenUsage().totalTokens).toBe(15);

    const failing = new ContentSynthesizer({
      generator: generatorReturning(new Error('rate limited')).generator,
      config: llmConfig,
      logger: createSilentLogger(),
    });

    await expect(failing.synthesize([result])).resolves.toEqual({
      article: null,
      usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0, costUsd: 0 },
    });
  });

  it('treats an empty choice as a failure', async () => {
    const { generator } = generatorReturning({
      choices: [{ message: { content: '   ' } }],
      usage: { promptTokens: 10, completionTokens: 0, totalTokens: 10 },
    });
    const synthesizer = new ContentSynthesizer({ generator, config: llmConfig, logger: createSilentLogger() });

    const { article, usage } = await synthesizer.synthesize([result]);

    expect(article).toBeNull();
    expect(usage.totalTokens).toBe(0);
  });

  it('falls back to the default price for unknown models', async () => {
    const { generator } = generatorReturning({
      choices: [{ message: { content: 'ok' } }],
      usage: { promptTokens: 1_000_000, completionTokens: 1_000_000, totalTokens: 2_000_000 },
    });
    const synthesizer = new ContentSynthesizer({
      generator,
      config: { ...llmConfig, model: 'local-model' },
      logger: createSilentLogger(),
    });

    const { usage } = await synthesizer.synthesize([result]);

    expect(usage.costUsd).toBeCloseTo(0.03, 10);
  });
});
