import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';

import { config } from '@config/env.config';

/** The slice of the OpenAI SDK the assistant uses; tests pass a fake. */
export interface ChatClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { timeout?: number },
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

let client: OpenAI | null = null;

/** Null when no API key is configured. */
export function getOpenAI(): ChatClient | null {
  if (!config.OPENAI_API_KEY) return null;
  if (!client) {
    client = new OpenAI({ apiKey: config.OPENAI_API_KEY });
  }
  return client;
}
