import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

import type { BookingState, ConversationTurn, SlotField } from '@core/interfaces/index.js';

import { withRetry } from '@infra/openai/chat.retry.js';
import { type ChatClient, getOpenAI } from '@infra/openai/openai.client.js';

import { tryEnrich } from '@services/enrichment/capability.js';

import { config } from '@config/env.config';

import { logger } from '@utils/logger.js';

import { generateClarifyingQuestion } from './clarifier.js';
import type { MessageSignals } from './signals.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const DEFAULT_TEMPERATURE = 0.3;
const HISTORY_WINDOW = 6;
const GENERIC_PROMPT = 'Could you tell me a bit more about the booking you need?';

export interface DraftReplyInput {
  state: BookingState;
  missing: SlotField[];
  turns: readonly ConversationTurn[];
  signals: MessageSignals;
}

export interface AssistantReply {
  text: string;
  source: 'llm' | 'fallback';
}

function describeKnown(state: BookingState): string {
  const known = (['service', 'date', 'time', 'location'] as const)
    .filter((field) => state[field])
    .map((field) => `${field}=${state[field]}`);
  return known.length ? known.join(', ') : 'nothing yet';
}

function toChatMessage(turn: ConversationTurn): ChatCompletionMessageParam {
  return turn.role === 'user'
    ? { role: 'user', content: turn.content }
    : { role: 'assistant', content: turn.content };
}

export function buildSystemPrompt(input: DraftReplyInput): string {
  const tone = {
    concise: 'Answer in one short sentence.',
    formal: 'Use a polite, formal tone.',
    friendly: 'Use a warm, friendly tone.',
  }[input.signals.style];
  return [
    'You are a booking assistant collecting the details of a reservation.',
    `Known so far: ${describeKnown(input.state)}.`,
    `Still missing: ${input.missing.join(', ')}.`,
    'Ask ONE question that gathers the missing details. Do not invent values or confirm a booking.',
    tone,
    input.signals.urgent ? 'The user is in a hurry; suggest the earliest option if relevant.' : '',
  ]
    .filter(Boolean)
    .join('\n');
}

/** Drafts the next question with the chat model; falls back to the rule-based clarifier. */
export class AssistantReplyService {
  constructor(private readonly client: ChatClient | null = getOpenAI()) {}

  async draftQuestion(input: DraftReplyInput): Promise<AssistantReply> {
    const fallback = generateClarifyingQuestion(input.state) ?? GENERIC_PROMPT;
    const client = this.client;
    if (!client) {
      logger.debug('[assistant] chat model not configured, using clarifier');
      return { text: fallback, source: 'fallback' };
    }

    const result = await tryEnrich(
      'assistant-reply',
      async () => {
        const completion = await withRetry(
          () =>
            client.chat.completions.create(
              {
                model: config.OPENAI_MODEL ?? DEFAULT_MODEL,
                temperature: config.OPENAI_TEMPERATURE ?? DEFAULT_TEMPERATURE,
                messages: [
                  { role: 'system', content: buildSystemPrompt(input) },
                  ...input.turns.slice(-HISTORY_WINDOW).map(toChatMessage),
                ],
              },
              { timeout: 20000 },
            ),
          { label: 'assistant' },
        );
        const text = completion.choices[0]?.message.content?.trim();
        if (!text) throw new Error('empty completion');
        return text;
      },
      () => fallback,
    );

    return { text: result.value, source: result.status === 'ok' ? 'llm' : 'fallback' };
  }
}
