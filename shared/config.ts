import { z } from 'zod';

export const ModelPriceSchema = z.object({
  input: z.number().nonnegative(),
  output: z.number().nonnegative(),
});

export type ModelPrice = z.infer<typeof ModelPriceSchema>;

export const PriceTableSchema = z.record(z.string().min(1), ModelPriceSchema);

export type PriceTable = z.infer<typeof PriceTableSchema>;

// USD per 1M tokens.
export const DEFAULT_PRICE_TABLE: PriceTable = {
  'o3-mini': { input: 1.1, output: 4.4 },
  'o4-mini': { input: 1.1, output: 4.4 },
  'gpt-4o-mini': { input: 0.15, output: 0.6 },
  'gpt-4o': { input: 2.5, output: 10 },
  'gpt-4.1-mini': { input: 0.4, output: 1.6 },
  'gpt-4.1': { input: 2, output: 8 },
  'gemini-2.5-flash': { input: 0.3, output: 2.5 },
  'gemini-2.5-pro': { input: 1.25, output: 10 },
};

export const DEFAULT_MODEL_PRICE: ModelPrice = { input: 0.01, output: 0.02 };

export const IMAGE_SIZES = ['256x256', '512x512', '1024x1024', '1792x1024', '1024x1792'] as const;
export const IMAGE_QUALITIES = ['standard', 'hd'] as const;

export type ImageSize = (typeof IMAGE_SIZES)[number];
export type ImageQuality = (typeof IMAGE_QUALITIES)[number];

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
    heartbeatIntervalMs: z.number().int().positive(),
  }),
  search: z.object({
    googleCse: z.object({
      apiKey: z.string().optional(),
      searchEngineId: z.string().optional(),
    }),
    pageDelayMs: z.number().int().nonnegative(),
    fallbackEnabled: z.boolean(),
  }),
  crawl: z.object({
    fetchTimeoutMs: z.number().int().positive(),
    userAgent: z.string().min(1),
    defaultNumResults: z.number().int().positive(),
    defaultMaxPages: z.number().int().positive(),
    defaultMaxDepth: z.number().int().nonnegative(),
    bfsSeedLimit: z.number().int().positive(),
  }),
  llm: z.object({
    provider: z.enum(['openai', 'gemini']),
    openaiApiKey: z.string().optional(),
    openaiBaseUrl: z.string().url(),
    geminiApiKey: z.string().optional(),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2),
    maxOutputTokens: z.number().int().positive(),
    prices: PriceTableSchema,
    defaultPrice: ModelPriceSchema,
  }),
  image: z.object({
    model: z.string().min(1),
    size: z.enum(IMAGE_SIZES),
    quality: z.enum(IMAGE_QUALITIES),
  }),
  persistence: z.object({
    mode: z.enum(['fs', 'none']),
    outputsDir: z.string().min(1),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export interface PublicConfig {
  search: {
    googleCseConfigured: boolean;
    fallbackEnabled: boolean;
  };
  crawl: {
    defaultNumResults: number;
    defaultMaxPages: number;
    defaultMaxDepth: number;
  };
  llm: {
    provider: AppConfig['llm']['provider'];
    model: string;
  };
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  search: {
    googleCseConfigured: Boolean(config.search.googleCse.apiKey && config.search.googleCse.searchEngineId),
    fallbackEnabled: config.search.fallbackEnabled,
  },
  crawl: {
    defaultNumResults: config.crawl.defaultNumResults,
    defaultMaxPages: config.crawl.defaultMaxPages,
    defaultMaxDepth: config.crawl.defaultMaxDepth,
  },
  llm: {
    provider: config.llm.provider,
    model: config.llm.model,
  },
});

/**
 * Reads an integer request parameter, clamped to `[min, max]`.
 * Missing or non-numeric input yields `fallback`.
 */
export const parseBoundedInt = (value: unknown, fallback: number, min: number, max: number): number => {
  if (value == null || (typeof value === 'string' && value.trim() === '')) {
    return fallback;
  }
  const n = Number(value);
  if (!Number.isFinite(n)) {
    return fallback;
  }
  return Math.max(min, Math.min(max, Math.round(n)));
};
