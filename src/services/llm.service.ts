/**
 * LLM completion clients for the last-resort extraction layers
 * The model only proposes a value; every answer is re-validated by the caller
 */

import OpenAI from 'openai';
import { createChildLogger } from '../config/logger';
import type { LlmCompletionClient } from '../types/extraction.types';

const NO_ANSWER = /^(none|null|unknown|n\/a|no answer)\.?$/i;

/**
 * Normalize a model reply: drop code fences and quotes, map "NONE"-style answers to null
 */
export function cleanLlmReply(reply: string | null | undefined): string | null {
  if (!reply) {
    return null;
  }

  const cleaned = reply
    .trim()
    .replace(/^```[a-z]*\s*/i, '')
    .replace(/\s*```$/, '')
    .trim()
    .replace(/^["'`]+|["'`]+$/g, '')
    .trim();

  if (!cleaned || NO_ANSWER.test(cleaned)) {
    return null;
  }

  return cleaned;
}

/**
 * Chat-completions client
 * SDK retries are off; RetryingCompletionClient owns the retry policy
 */
export class OpenAiCompletionClient implements LlmCompletionClient {
  readonly enabled = true;
  private client: OpenAI;
  private readonly model: string;
  private log = createChildLogger({ service: 'llm' });

  constructor(options: { apiKey: string; model: string; baseURL?: string; timeoutMs: number }) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      maxRetries: 0,
      timeout: options.timeoutMs,
    });
    this.model = options.model;
  }

  async complete(
    request: { instruction: string; transcript: string },
    signal: AbortSignal
  ): Promise<string | null> {
    const startTime = Date.now();

    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: request.instruction },
          { role: 'user', content: request.transcript },
        ],
        temperature: 0,
        max_tokens: 40,
      },
      { signal }
    );

    this.log.debug({ model: this.model, duration: Date.now() - startTime }, 'LLM completion received');
    return cleanLlmReply(response.choices[0]?.message?.content);
  }
}

/**
 * Rate limits, server errors and connection failures are worth one more try
 */
export function isTransientLlmError(error: unknown): boolean {
  if (error instanceof OpenAI.APIConnectionError) {
    return true;
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status ?? 0;
    return status === 429 || status >= 500;
  }
  return false;
}

/**
 * Wraps a client with a single retry on transient errors
 */
export class RetryingCompletionClient implements LlmCompletionClient {
  private log = createChildLogger({ service: 'llm' });

  constructor(
    private readonly inner: LlmCompletionClient,
    private readonly isTransient: (error: unknown) => boolean = isTransientLlmError
  ) {}

  get enabled(): boolean {
    return this.inner.enabled;
  }

  async complete(
    request: { instruction: string; transcript: string },
    signal: AbortSignal
  ): Promise<string | null> {
    try {
      return await this.inner.complete(request, signal);
    } catch (error) {
      if (signal.aborted || !this.isTransient(error)) {
        throw error;
      }
      this.log.warn({ err: error }, 'Transient LLM error, retrying once');
      return this.inner.complete(request, signal);
    }
  }
}

/**
 * Used when LLM_ENABLED is off; the LLM layers then always fall through
 */
export class DisabledCompletionClient implements LlmCompletionClient {
  readonly enabled = false;

  async complete(): Promise<string | null> {
    return null;
  }
}
