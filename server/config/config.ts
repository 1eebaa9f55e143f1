import path from 'node:path';
import {
  ConfigSchema,
  DEFAULT_MODEL_PRICE,
  DEFAULT_PRICE_TABLE,
  PriceTableSchema,
  type AppConfig,
  type PriceTable,
  type PublicConfig,
  getPublicConfig as getPublicConfigShared,
} from '../../shared/config';

type Env = Record<string, string | undefined>;

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

const stringFromEnv = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

// LLM_PRICE_TABLE entries are merged over the built-in table; a malformed value is ignored.
const priceTableFromEnv = (value: string | undefined): PriceTable => {
  if (!value?.trim()) {
    return DEFAULT_PRICE_TABLE;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return DEFAULT_PRICE_TABLE;
  }
  const result = PriceTableSchema.safeParse(parsed);
  return result.success ? { ...DEFAULT_PRICE_TABLE, ...result.data } : DEFAULT_PRICE_TABLE;
};

export type { AppConfig, PublicConfig };

export class ConfigurationError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing required environment variables: ${missing.join(', ')}`);
    this.name = 'ConfigurationError';
    this.missing = missing;
  }
}

export interface CredentialRequirements {
  image?: boolean;
}

/**
 * Fails fast when a collaborator cannot be reached for lack of credentials.
 * Called by the entry points before any search or crawl starts.
 */
export const requireCredentials = (config: AppConfig, requirements: CredentialRequirements = {}): void => {
  const missing: string[] = [];
  if (!config.search.googleCse.apiKey) missing.push('GOOGLE_API_KEY');
  if (!config.search.googleCse.searchEngineId) missing.push('GOOGLE_CSE_ID');
  if (config.llm.provider === 'openai' && !config.llm.openaiApiKey) missing.push('OPENAI_API_KEY');
  if (config.llm.provider === 'gemini' && !config.llm.geminiApiKey) missing.push('GEMINI_API_KEY');
  // Images always go through OpenAI.
  if (requirements.image && !config.llm.openaiApiKey && !missing.includes('OPENAI_API_KEY')) {
    missing.push('OPENAI_API_KEY');
  }
  if (missing.length) {
    throw new ConfigurationError(missing);
  }
};

let cachedConfig: AppConfig | null = null;

export const buildConfig = (env: Env = process.env): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();
  const provider = (env.LLM_PROVIDER || 'openai').trim().toLowerCase();
  const defaultModel = provider === 'gemini' ? 'gemini-2.5-flash' : 'o3-mini';
  const outputsDir = path.resolve(env.OUTPUT_DIR || path.join(process.cwd(), 'raw_data', 'outputs'));

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 3001),
      heartbeatIntervalMs: numberFromEnv(env.HEARTBEAT_INTERVAL_MS, 15_000),
    },
    search: {
      googleCse: {
        apiKey: stringFromEnv(env.GOOGLE_API_KEY) ?? stringFromEnv(env.GOOGLE_CSE_API_KEY),
        searchEngineId: stringFromEnv(env.GOOGLE_CSE_ID) ?? stringFromEnv(env.GOOGLE_CSE_CX),
      },
      pageDelayMs: numberFromEnv(env.SEARCH_PAGE_DELAY_MS, 0),
      fallbackEnabled: booleanFromEnv(env.SEARCH_FALLBACK_ENABLED, true),
    },
    crawl: {
      fetchTimeoutMs: numberFromEnv(env.CRAWL_FETCH_TIMEOUT_MS, 30_000),
      userAgent:
        stringFromEnv(env.CRAWL_USER_AGENT) ||
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0 Safari/537.36',
      defaultNumResults: numberFromEnv(env.CRAWL_NUM_RESULTS, 5),
      defaultMaxPages: numberFromEnv(env.CRAWL_MAX_PAGES, 10),
      defaultMaxDepth: numberFromEnv(env.CRAWL_MAX_DEPTH, 2),
      bfsSeedLimit: numberFromEnv(env.CRAWL_BFS_SEED_LIMIT, 5),
    },
    llm: {
      provider,
      openaiApiKey: stringFromEnv(env.OPENAI_API_KEY),
      openaiBaseUrl: stringFromEnv(env.OPENAI_API_BASE) || 'https://api.openai.com/v1',
      geminiApiKey: stringFromEnv(env.GEMINI_API_KEY),
      model:
        (provider === 'gemini' ? stringFromEnv(env.GEMINI_MODEL) : stringFromEnv(env.OPENAI_MODEL)) || defaultModel,
      temperature: numberFromEnv(env.LLM_TEMPERATURE, 0.7),
      maxOutputTokens: numberFromEnv(env.LLM_MAX_OUTPUT_TOKENS, 4000),
      prices: priceTableFromEnv(env.LLM_PRICE_TABLE),
      defaultPrice: DEFAULT_MODEL_PRICE,
    },
    image: {
      model: stringFromEnv(env.IMAGE_MODEL) || 'dall-e-3',
      size: stringFromEnv(env.IMAGE_SIZE) || '1024x1024',
      quality: stringFromEnv(env.IMAGE_QUALITY) || 'standard',
    },
    persistence: {
      mode: booleanFromEnv(env.PERSISTENCE_ENABLED, true) ? 'fs' : 'none',
      outputsDir,
    },
    observability: {
      logLevel: (env.LOG_LEVEL || 'info').trim().toLowerCase(),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};

export const getPublicConfig = (config: AppConfig = loadConfig()): PublicConfig => getPublicConfigShared(config);
