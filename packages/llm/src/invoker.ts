/**
 * Single gate in front of the chat model: a fixed-interval throttle plus a
 * bounded retry that only fires on rate-limit errors. Share one instance
 * between every caller so the spacing is global.
 */

import {
  FixedIntervalThrottle,
  createLogger,
  errorMessage,
  linearBackoff,
  sleep as defaultSleep,
  withRetry,
  type Clock,
  type Logger,
  type Sleep,
} from '@profilescout/core';
import {
  ModelInvocationError,
  ModelRateLimitError,
  completionText,
  type ChatClient,
  type ChatMessage,
} from './client.js';
import { defaultModelConfig } from './models.js';

export interface InvokeOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface ModelInvoker {
  invoke(messages: ChatMessage[], options?: InvokeOptions): Promise<string>;
}

export interface RateLimitedInvokerOptions {
  model: string;
  temperature?: number;
  /** Default max_tokens; left out of the request when unset. */
  maxTokens?: number;
  timeout?: number;
  /** Minimum spacing between requests (default 2000 ms). */
  minRequestIntervalMs?: number;
  /** Total attempts for a rate-limited request (default 3). */
  maxRetries?: number;
  /** Wait after attempt n is n * backoffStepMs (default 5000 ms). */
  backoffStepMs?: number;
  sleep?: Sleep;
  now?: Clock;
  logger?: Logger;
}

export class RateLimitedInvoker implements ModelInvoker {
  readonly throttle: FixedIntervalThrottle;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens?: number;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly backoffStepMs: number;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(
    private readonly client: ChatClient,
    options: RateLimitedInvokerOptions,
  ) {
    this.model = options.model;
    this.temperature = options.temperature ?? defaultModelConfig.temperature;
    this.maxTokens = options.maxTokens;
    this.timeout = options.timeout ?? defaultModelConfig.timeout;
    this.maxRetries = options.maxRetries ?? 3;
    this.backoffStepMs = options.backoffStepMs ?? 5000;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createLogger('model-invoker');
    this.throttle = new FixedIntervalThrottle({
      minIntervalMs: options.minRequestIntervalMs ?? 2000,
      now: options.now,
      sleep: this.sleep,
    });
  }

  /**
   * Send one chat request and return the completion text. Rejects with
   * ModelInvocationError once retries are exhausted or on any
   * non-rate-limit failure.
   */
  async invoke(messages: ChatMessage[], options: InvokeOptions = {}): Promise<string> {
    try {
      return await withRetry(
        async (attempt) => {
          const waited = await this.throttle.acquire();
          this.logger.debug(`Model request attempt ${attempt}`, { waitedMs: waited });
          const response = await this.client.chat(
            {
              model: this.model,
              messages,
              temperature: options.temperature ?? this.temperature,
              max_tokens: options.maxTokens ?? this.maxTokens,
            },
            this.timeout,
          );
          return completionText(response);
        },
        {
          attempts: this.maxRetries,
          delayMs: linearBackoff(this.backoffStepMs),
          shouldRetry: (error) => error instanceof ModelRateLimitError,
          onRetry: (error, attempt, delayMs) =>
            this.logger.warn(
              `Rate limited on attempt ${attempt}; retrying in ${delayMs} ms`,
              errorMessage(error),
            ),
          sleep: this.sleep,
        },
      );
    } catch (error) {
      if (error instanceof ModelInvocationError) throw error;
      throw new ModelInvocationError(`Model invocation failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
