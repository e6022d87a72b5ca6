// Provider Registry
// Builds the language model the orchestrator talks to

import type { LanguageModel } from './types.js';
import { OpenAICompatibleProvider } from './openai-compatible.js';
import { env, isProviderConfigured } from '../env.js';

const DEEPSEEK_BASE_URL = 'https://api.deepseek.com';

export function createProvider(name: string = env.LLM_PROVIDER): LanguageModel {
  if (!isProviderConfigured(name)) {
    throw new Error(`Provider "${name}" is not available or not configured`);
  }

  switch (name) {
    case 'openai':
      return new OpenAICompatibleProvider({
        name: 'openai',
        apiKey: env.OPENAI_API_KEY,
        baseURL: env.OPENAI_BASE_URL,
        model: env.OPENAI_MODEL,
        temperature: env.MODEL_TEMPERATURE,
        maxRetries: env.MODEL_MAX_RETRIES,
      });
    case 'deepseek':
      return new OpenAICompatibleProvider({
        name: 'deepseek',
        apiKey: env.DEEPSEEK_API_KEY,
        baseURL: DEEPSEEK_BASE_URL,
        model: env.DEEPSEEK_MODEL,
        temperature: env.MODEL_TEMPERATURE,
        maxRetries: env.MODEL_MAX_RETRIES,
      });
    default:
      throw new Error(`Unknown provider "${name}"`);
  }
}

export type {
  CompleteOptions,
  ConversationMessage,
  LanguageModel,
  ModelDecision,
  StreamOptions,
  ToolCallRequest,
} from './types.js';
