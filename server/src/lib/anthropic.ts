import Anthropic from '@anthropic-ai/sdk';
import type { TextCompletion } from '../agents/reasoning/completion-reasoner.js';
import logger from './logger.js';
import { withRetry } from './retry.js';

let anthropicClient: Anthropic | null = null;

/**
 * Lazily create the Anthropic client so modules can be imported in test/dev
 * environments even when Anthropic credentials are not configured.
 */
export function getAnthropicClient(apiKey = process.env.ANTHROPIC_API_KEY): Anthropic {
  if (!apiKey) {
    throw new Error('ANTHROPIC_API_KEY environment variable is required for reasoning agents');
  }
  if (!anthropicClient) {
    anthropicClient = new Anthropic({ apiKey });
  }
  return anthropicClient;
}

interface ResponseBlock {
  type: string;
  text?: string;
}

/** The part of the Anthropic client a completion uses. */
export interface MessagesClient {
  messages: {
    create(
      body: Anthropic.MessageCreateParamsNonStreaming,
      options?: { signal?: AbortSignal },
    ): Promise<{ content: readonly ResponseBlock[] }>;
  };
}

/**
 * Concatenate the text blocks of an Anthropic API response.
 * Returns an empty string if there are none.
 */
export function extractResponseText(response: { content: readonly ResponseBlock[] }): string {
  return response.content
    .map((block) => (block.type === 'text' ? block.text ?? '' : ''))
    .join('');
}

export interface AnthropicCompletionOptions {
  model: string;
  maxTokens: number;
  maxAttempts?: number;
  /** Delay before the first retry, in ms */
  baseDelay?: number;
  /** Defaults to the lazily created shared client */
  client?: MessagesClient;
  /** Key for the shared client; falls back to ANTHROPIC_API_KEY */
  apiKey?: string;
}

/**
 * A TextCompletion over the Messages API. Transient failures (rate limits,
 * overload, network resets) are retried inside the activation's deadline.
 * Every call logs one line with its agent, model, duration and sizes.
 */
export function createAnthropicCompletion(options: AnthropicCompletionOptions): TextCompletion {
  return async (prompt, signal, context) => {
    const client: MessagesClient = options.client ?? getAnthropicClient(options.apiKey);
    const started = Date.now();
    const promptChars = prompt.system.length + prompt.user.length;
    let text: string;
    try {
      const response = await withRetry(
        () => client.messages.create(
          {
            model: options.model,
            max_tokens: options.maxTokens,
            system: prompt.system,
            messages: [{ role: 'user', content: prompt.user }],
          },
          { signal },
        ),
        {
          maxAttempts: options.maxAttempts ?? 3,
          ...(options.baseDelay !== undefined ? { baseDelay: options.baseDelay } : {}),
          signal,
          onRetry: (attempt, error) => {
            logger.warn(
              { agentId: context.agentId, attempt, err: error.message, model: options.model },
              'Anthropic: retrying completion',
            );
          },
        },
      );
      text = extractResponseText(response);
    } catch (err) {
      logger.warn(
        {
          agentId: context.agentId,
          model: options.model,
          durationMs: Date.now() - started,
          promptChars,
          err: err instanceof Error ? err.message : String(err),
        },
        'Anthropic: completion failed',
      );
      throw err;
    }

    logger.info(
      {
        agentId: context.agentId,
        model: options.model,
        durationMs: Date.now() - started,
        promptChars,
        outputChars: text.length,
      },
      'Anthropic: completion',
    );
    logger.debug({ agentId: context.agentId, system: prompt.system, user: prompt.user, output: text }, 'Anthropic: completion text');
    return text;
  };
}
