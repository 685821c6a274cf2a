import { AppEnv } from '../../shared/config/env';
import { ChatCompletionsClient } from './chat-completions-client';
import { LLMClient } from './llm-types';

export interface LLMClientOptions {
  chatModel?: string;
}

export function createLLMClient(env: AppEnv, opts?: LLMClientOptions): LLMClient {
  return new ChatCompletionsClient({
    baseUrl: env.LLM_BASE_URL,
    apiKey: env.LLM_API_KEY,
    model: opts?.chatModel ?? env.CHAT_MODEL,
    temperature: env.MODEL_TEMPERATURE,
    maxTokens: env.MAX_TOKENS,
    timeoutMs: env.TIMEOUT_CHAT_MS,
    maxRetries: env.LLM_MAX_RETRIES,
  });
}

export * from './llm-types';
export { ChatCompletionsClient } from './chat-completions-client';
