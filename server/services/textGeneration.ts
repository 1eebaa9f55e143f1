export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  maxOutputTokens: number;
  /** Ignored by models that do not accept a sampling temperature. */
  temperature?: number;
  signal?: AbortSignal;
}

export interface CompletionUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CompletionResponse {
  choices: Array<{ message: { content: string | null } }>;
  usage: CompletionUsage;
}

/** A single, non-retried call to a generative-text service. */
export interface TextGenerator {
  readonly provider: string;
  complete: (request: CompletionRequest) => Promise<CompletionResponse>;
}
