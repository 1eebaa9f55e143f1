export type StageName = 'search' | 'crawl' | 'synthesis' | 'image';

export type StageStatus = 'start' | 'progress' | 'success' | 'failure';

export interface StageEvent<T = unknown> {
  runId: string;
  stage: StageName;
  status: StageStatus;
  message?: string;
  data?: T;
  ts: string;
}

export type CrawlStrategy = 'standard' | 'bfs';

/** One entry returned by a search provider. Fields may be empty strings. */
export interface SearchHit {
  title: string;
  link: string;
  snippet: string;
}

/** Canonical record for one fetched URL. */
export interface PageRecord {
  sourceUrl: string;
  title: string;
  content: string;
  links: string[];
  images: string[];
  publishedDate?: string;
  author?: string;
  tags: Set<string>;
}

export interface EnrichedResult {
  title: string;
  link: string;
  snippet: string;
  content: string;
  /** BFS level the link was discovered at; 0 for seeds. */
  depth: number;
  publishedDate?: string;
  author?: string;
  tags?: string[];
  images?: string[];
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  costUsd: number;
}

export interface TokenUsagePayload {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
  cost_usd: number;
}

export const toTokenUsagePayload = (usage: TokenUsage): TokenUsagePayload => ({
  prompt_tokens: usage.promptTokens,
  completion_tokens: usage.completionTokens,
  total_tokens: usage.totalTokens,
  cost_usd: usage.costUsd,
});
