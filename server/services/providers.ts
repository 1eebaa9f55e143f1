import type { AppConfig } from '../../shared/config';
import { ConfigurationError } from '../config/config';
import { createGeminiTextGenerator } from './genai';
import { createOpenAiImageApi, createOpenAiTextGenerator, type ImageApi } from './openai';
import type { TextGenerator } from './textGeneration';

export const createTextGenerator = (config: AppConfig['llm']): TextGenerator => {
  if (config.provider === 'gemini') {
    if (!config.geminiApiKey) throw new ConfigurationError(['GEMINI_API_KEY']);
    return createGeminiTextGenerator(config.geminiApiKey);
  }
  if (!config.openaiApiKey) throw new ConfigurationError(['OPENAI_API_KEY']);
  return createOpenAiTextGenerator({ apiKey: config.openaiApiKey, baseUrl: config.openaiBaseUrl });
};

export const createImageApi = (config: AppConfig): ImageApi => {
  if (!config.llm.openaiApiKey) throw new ConfigurationError(['OPENAI_API_KEY']);
  return createOpenAiImageApi({
    apiKey: config.llm.openaiApiKey,
    baseUrl: config.llm.openaiBaseUrl,
    model: config.image.model,
  });
};
