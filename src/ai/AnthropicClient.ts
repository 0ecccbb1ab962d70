/**
 * AnthropicClient - Text/vision completions against the Anthropic Messages API
 *
 * Thin wrapper used by the moment analyzer and the document generator. The
 * SDK's own retries are disabled; a RetryPolicy owned by the caller decides
 * what to retry, and every attempt gets its own timeout and the session's
 * AbortSignal.
 */

import Anthropic from '@anthropic-ai/sdk';

import { RetryPolicy } from '../utils/RetryPolicy.js';
import { attemptSignal } from '../utils/abort.js';
import { describeError } from '../shared/errors.js';
import { createLogger } from '../utils/Logger.js';

const log = createLogger('AnthropicClient');

// =============================================================================
// Types
// =============================================================================

export type LlmContentBlock =
  | { type: 'text'; text: string }
  | { type: 'image'; mediaType: 'image/jpeg' | 'image/png'; data: Buffer };

export interface LlmRequest {
  /** Label used in logs ("moment-analysis", "document-generation") */
  purpose: string;
  system: string;
  content: LlmContentBlock[];
  maxTokens?: number;
  temperature?: number;
  /** Per-attempt timeout; defaults to the client's */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface LlmClient {
  /** Returns the concatenated text of the model's reply. */
  complete(request: LlmRequest): Promise<string>;
}

export interface AnthropicClientOptions {
  model: string;
  maxTokens: number;
  temperature: number;
  /** Per-attempt timeout in milliseconds */
  timeoutMs: number;
  baseUrl?: string;
}

export const DEFAULT_ANTHROPIC_OPTIONS: AnthropicClientOptions = {
  model: 'claude-sonnet-4-5-20250929',
  maxTokens: 4096,
  temperature: 0.3,
  timeoutMs: 120_000,
};

// =============================================================================
// Helpers
// =============================================================================

function toContentBlocks(content: LlmContentBlock[]): Anthropic.Messages.ContentBlockParam[] {
  return content.map((block): Anthropic.Messages.ContentBlockParam =>
    block.type === 'text'
      ? { type: 'text', text: block.text }
      : {
          type: 'image',
          source: {
            type: 'base64',
            media_type: block.mediaType,
            data: block.data.toString('base64'),
          },
        }
  );
}

// =============================================================================
// AnthropicClient
// =============================================================================

export class AnthropicClient implements LlmClient {
  private client: Anthropic;
  private options: AnthropicClientOptions;
  private retryPolicy: RetryPolicy;

  constructor(apiKey: string, options?: Partial<AnthropicClientOptions>, retryPolicy?: RetryPolicy) {
    this.options = { ...DEFAULT_ANTHROPIC_OPTIONS, ...options };
    this.retryPolicy = retryPolicy ?? new RetryPolicy();

    const clientOptions: ConstructorParameters<typeof Anthropic>[0] = { apiKey, maxRetries: 0 };
    if (this.options.baseUrl) {
      clientOptions.baseURL = this.options.baseUrl;
    }
    this.client = new Anthropic(clientOptions);
  }

  async complete(request: LlmRequest): Promise<string> {
    const messages: Anthropic.Messages.MessageParam[] = [
      { role: 'user', content: toContentBlocks(request.content) },
    ];

    return this.retryPolicy.execute(
      async (attempt) => {
        const started = Date.now();
        const response = await this.client.messages.create(
          {
            model: this.options.model,
            max_tokens: request.maxTokens ?? this.options.maxTokens,
            temperature: request.temperature ?? this.options.temperature,
            system: request.system,
            messages,
          },
          { signal: attemptSignal(request.signal, request.timeoutMs ?? this.options.timeoutMs) }
        );

        const text = response.content
          .map((block) => (block.type === 'text' ? block.text : ''))
          .join('')
          .trim();

        if (!text) {
          throw new Error(`No text content in ${request.purpose} response`);
        }

        log.info(
          `${request.purpose}: ${response.usage.input_tokens} in / ${response.usage.output_tokens} out ` +
            `tokens (attempt ${attempt}, ${Date.now() - started}ms)`
        );
        return text;
      },
      {
        signal: request.signal,
        onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
          log.warn(
            `${request.purpose} attempt ${attempt}/${maxAttempts} failed (${describeError(error)}), ` +
              `retrying in ${Math.round(delayMs)}ms`
          );
        },
      }
    );
  }
}
