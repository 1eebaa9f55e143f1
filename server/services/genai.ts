import { GoogleGenAI, type Content } from '@google/genai';
import type { TextGenerator } from './textGeneration';

type KeyState = {
  client: GoogleGenAI;
  lastUsedAt: number;
};

const stateByApiKey = new Map<string, KeyState>();
const MAX_KEYS = 32;

const trimStateCache = () => {
  if (stateByApiKey.size <= MAX_KEYS) {
    return;
  }
  let oldestKey: string | null = null;
  let oldestTs = Infinity;
  for (const [key, state] of stateByApiKey.entries()) {
    if (state.lastUsedAt < oldestTs) {
      oldestTs = state.lastUsedAt;
      oldestKey = key;
    }
  }
  if (oldestKey) {
    stateByApiKey.delete(oldestKey);
  }
};

const getClientForApiKey = (apiKey: string): GoogleGenAI => {
  const existing = stateByApiKey.get(apiKey);
  if (existing) {
    existing.lastUsedAt = Date.now();
    return existing.client;
  }
  const created: KeyState = { client: new GoogleGenAI({ apiKey }), lastUsedAt: Date.now() };
  stateByApiKey.set(apiKey, created);
  trimStateCache();
  return created.client;
};

/**
 * Gemini behind the chat-completion shape. System messages become the
 * system instruction; assistant turns map to the `model` role.
 */
export const createGeminiTextGenerator = (apiKey: string): TextGenerator => ({
  provider: 'gemini',
  complete: async ({ model, messages, maxOutputTokens, temperature, signal }) => {
    const ai = getClientForApiKey(apiKey);
    const systemInstruction = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');
    const contents: Content[] = messages
      .filter((m) => m.role !== 'system')
      .map((m) => ({ role: m.role === 'assistant' ? 'model' : 'user', parts: [{ text: m.content }] }));

    const response = await ai.models.generateContent({
      model,
      contents,
      config: {
        systemInstruction: systemInstruction || undefined,
        maxOutputTokens,
        temperature,
        abortSignal: signal,
      },
    });

    const usage = response.usageMetadata;
    const promptTokens = usage?.promptTokenCount ?? 0;
    const completionTokens = (usage?.candidatesTokenCount ?? 0) + (usage?.thoughtsTokenCount ?? 0);
    return {
      choices: [{ message: { content: response.text ?? null } }],
      usage: {
        promptTokens,
        completionTokens,
        totalTokens: usage?.totalTokenCount ?? promptTokens + completionTokens,
      },
    };
  },
});
