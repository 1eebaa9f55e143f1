import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { DEFAULT_PRICE_TABLE } from '../../../shared/config';
import { ConfigurationError, buildConfig, requireCredentials } from '../config';

describe('buildConfig', () => {
  it('applies defaults', () => {
    const config = buildConfig({});

    expect(config.llm.provider).toBe('openai');
    expect(config.llm.model).toBe('o3-mini');
    expect(config.llm.temperature).toBe(0.7);
    expect(config.llm.maxOutputTokens).toBe(4000);
    expect(config.llm.defaultPrice).toEqual({ input: 0.01, output: 0.02 });
    expect(config.crawl).toMatchObject({
      fetchTimeoutMs: 30_000,
      defaultNumResults: 5,
      defaultMaxPages: 10,
      defaultMaxDepth: 2,
      bfsSeedLimit: 5,
    });
    expect(config.search.fallbackEnabled).toBe(true);
    expect(config.persistence.outputsDir).toBe(path.resolve(process.cwd(), 'raw_data', 'outputs'));
  });

  it('accepts the alternate Google variable names', () => {
    const config = buildConfig({ GOOGLE_CSE_API_KEY: 'test-secret', GOOGLE_CSE_CX: 'test-cx' });

    expect(config.search.googleCse).toEqual({ apiKey: 'test-secret', searchEngineId: 'test-cx' });
  });

  it('picks the Gemini model for the Gemini provider', () => {
    expect(buildConfig({ LLM_PROVIDER: 'gemini' }).llm.model).toBe('gemini-2.5-flash');
    expect(buildConfig({ LLM_PROVIDER: 'gemini', GEMINI_MODEL: 'gemini-2.5-pro' }).llm.model).toBe('gemini-2.5-pro');
  });

  it('merges a custom price table and ignores malformed ones', () => {
    const merged = buildConfig({ LLM_PRICE_TABLE: '{"local-model":{"input":0,"output":0}}' }).llm.prices;
    expect(merged['local-model']).toEqual({ input: 0, output: 0 });
    expect(merged['o3-mini']).toEqual(DEFAULT_PRICE_TABLE['o3-mini']);

    expect(buildConfig({ LLM_PRICE_TABLE: 'not json' }).llm.prices).toEqual(DEFAULT_PRICE_TABLE);
  });

  it('rejects unsupported providers', () => {
    expect(() => buildConfig({ LLM_PROVIDER: 'other' })).toThrow();
  });
});

describe('requireCredentials', () => {
  it('lists every missing variable', () => {
    try {
      requireCredentials(buildConfig({ LLM_PROVIDER: 'gemini' }), { image: true });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error instanceof ConfigurationError && error.missing).toEqual([
        'GOOGLE_API_KEY',
        'GOOGLE_CSE_ID',
        'GEMINI_API_KEY',
        'OPENAI_API_KEY',
      ]);
    }
  });

  it('passes when the chosen provider is configured', () => {
    const config = buildConfig({ GOOGLE_API_KEY: 'test-secret', GOOGLE_CSE_ID: 'test-cx', OPENAI_API_KEY: 'test-secret' });

    expect(() => requireCredentials(config, { image: true })).not.toThrow();
  });
});
