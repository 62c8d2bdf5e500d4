/**
 * OpenAI-compatible chat client for SQL translation.
 *
 * SDK retries are switched off; this class owns the retry policy so that
 * attempts, backoff and the non-retryable set live in one place.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import OpenAI, { type ClientOptions } from 'openai';
import { cancelled, modelUnavailable, type PipelineError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { ModelClient, ModelResponse, PromptText } from './types.js';

const MAX_ATTEMPTS = 3;
const DEFAULT_RETRY_DELAY_MS = 500;

export interface OpenAIModelClientOptions {
  apiKey: string;
  baseURL?: string;
  model: string;
  /** Per-attempt timeout */
  timeoutMs: number;
  /** Clamped to 1..3 */
  maxAttempts?: number;
  temperature?: number;
  maxTokens?: number;
  /** Base backoff; doubles per attempt */
  retryDelayMs?: number;
  logger: Logger;
  /** Replaces the transport, used by tests */
  fetch?: ClientOptions['fetch'];
}

class MalformedResponse extends Error {}

type AttemptFailure = { retryable: boolean; reason: string; status?: number };

function classify(err: unknown): AttemptFailure {
  if (err instanceof MalformedResponse) {
    return { retryable: false, reason: err.message };
  }
  if (err instanceof OpenAI.APIConnectionError) {
    const reason = err instanceof OpenAI.APIConnectionTimeoutError ? 'timeout' : 'connection error';
    return { retryable: true, reason };
  }
  if (err instanceof OpenAI.APIError) {
    const status = err.status;
    const retryable =
      status === 408 || status === 409 || status === 429 || (status !== undefined && status >= 500);
    return { retryable, reason: `HTTP ${status ?? 'error'}`, status };
  }
  return { retryable: false, reason: err instanceof Error ? err.message : String(err) };
}

export class OpenAIModelClient implements ModelClient {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly maxAttempts: number;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;

  constructor(options: OpenAIModelClientOptions) {
    if (!options.apiKey) {
      throw new Error('A language model API key is required (set LLM_API_KEY).');
    }
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      maxRetries: 0,
      fetch: options.fetch,
    });
    this.model = options.model;
    this.maxAttempts = Math.min(Math.max(options.maxAttempts ?? MAX_ATTEMPTS, 1), MAX_ATTEMPTS);
    this.temperature = options.temperature ?? 0.1;
    this.maxTokens = options.maxTokens ?? 512;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.logger = options.logger;
  }

  async translate(prompt: PromptText, signal?: AbortSignal): Promise<ModelResponse> {
    let last: AttemptFailure = { retryable: false, reason: 'not attempted' };

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (signal?.aborted) throw cancelled();

      const started = performance.now();
      try {
        const text = await this.callOnce(prompt, signal);
        const latencyMs = Math.round(performance.now() - started);
        this.logger.info(
          { event: 'model_call', model: this.model, attempt, latencyMs, outcome: 'ok' },
          'model call succeeded',
        );
        return { text, latencyMs, model: this.model, attempts: attempt };
      } catch (err: unknown) {
        const latencyMs = Math.round(performance.now() - started);
        if (err instanceof OpenAI.APIUserAbortError || signal?.aborted) {
          this.logger.info(
            { event: 'model_call', model: this.model, attempt, latencyMs, outcome: 'cancelled' },
            'model call cancelled',
          );
          throw cancelled();
        }

        last = classify(err);
        this.logger.warn(
          {
            event: 'model_call',
            model: this.model,
            attempt,
            latencyMs,
            outcome: 'error',
            reason: last.reason,
            status: last.status,
            retryable: last.retryable,
          },
          'model call failed',
        );
        if (!last.retryable) break;
      }

      if (attempt < this.maxAttempts) {
        await this.backoff(attempt, signal);
      }
    }

    throw this.unavailable(last);
  }

  private async callOnce(prompt: PromptText, signal?: AbortSignal): Promise<string> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
        temperature: this.temperature,
        max_tokens: this.maxTokens,
      },
      { signal },
    );

    const content = completion.choices[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new MalformedResponse('response has no message content');
    }
    return content;
  }

  private async backoff(attempt: number, signal?: AbortSignal): Promise<void> {
    const delay = this.retryDelayMs * 2 ** (attempt - 1);
    if (delay <= 0) return;
    try {
      await sleep(delay, undefined, { signal });
    } catch (err: unknown) {
      if (signal?.aborted) throw cancelled();
      throw err;
    }
  }

  private unavailable(failure: AttemptFailure): PipelineError {
    return modelUnavailable(`Language model request failed: ${failure.reason}.`, {
      model: this.model,
      reason: failure.reason,
      status: failure.status,
    });
  }
}
