import OpenAI from 'openai';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import type { ImageQuality, ImageSize } from '../../shared/config';
import type { ChatMessage, TextGenerator } from './textGeneration';

export interface OpenAiClientOptions {
  apiKey: string;
  baseUrl?: string;
}

// o-series reasoning models reject `temperature` and `max_tokens`.
export const isReasoningModel = (model: string): boolean => /^o\d/i.test(model.trim());

const createClient = ({ apiKey, baseUrl }: OpenAiClientOptions) => new OpenAI({ apiKey, baseURL: baseUrl, maxRetries: 0 });

const toOpenAiMessage = (message: ChatMessage): ChatCompletionMessageParam => {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    default:
      return { role: 'user', content: message.content };
  }
};

export const buildChatCompletionParams = (
  model: string,
  messages: ChatMessage[],
  maxOutputTokens: number,
  temperature?: number,
): ChatCompletionCreateParamsNonStreaming => {
  const base = { model, messages: messages.map(toOpenAiMessage) };
  if (isReasoningModel(model)) {
    return { ...base, max_completion_tokens: maxOutputTokens };
  }
  return { ...base, max_tokens: maxOutputTokens, temperature };
};

export const createOpenAiTextGenerator = (options: OpenAiClientOptions): TextGenerator => {
  const client = createClient(options);
  return {
    provider: 'openai',
    complete: async ({ model, messages, maxOutputTokens, temperature, signal }) => {
      const completion = await client.chat.completions.create(
        buildChatCompletionParams(model, messages, maxOutputTokens, temperature),
        { signal },
      );
      return {
        choices: completion.choices.map((choice) => ({ message: { content: choice.message.content } })),
        usage: {
          promptTokens: completion.usage?.prompt_tokens ?? 0,
          completionTokens: completion.usage?.completion_tokens ?? 0,
          totalTokens: completion.usage?.total_tokens ?? 0,
        },
      };
    },
  };
};

export interface ImageGenerationResponse {
  data: Array<{ url: string | null }>;
}

export interface ImageApi {
  generate: (
    prompt: string,
    size: ImageSize,
    quality: ImageQuality,
    signal?: AbortSignal,
  ) => Promise<ImageGenerationResponse>;
}

export const createOpenAiImageApi = (options: OpenAiClientOptions & { model: string }): ImageApi => {
  const client = createClient(options);
  return {
    generate: async (prompt, size, quality, signal) => {
      const response = await client.images.generate({ model: options.model, prompt, size, quality, n: 1 }, { signal });
      return { data: (response.data ?? []).map((image) => ({ url: image.url ?? null })) };
    },
  };
};
