/**
 * HTTP client for an OpenAI-compatible chat completion endpoint
 * (Groq, OpenAI, or a local server exposing /chat/completions).
 */

import { z } from 'zod';
import { defaultModelConfig } from './models.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  max_tokens?: number;
}

const chatCompletionResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        index: z.number().optional(),
        message: z.object({
          role: z.string().optional(),
          content: z.string().nullable(),
        }),
        finish_reason: z.string().nullish(),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

export type ChatCompletionResponse = z.infer<typeof chatCompletionResponseSchema>;

export class ModelInvocationError extends Error {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, { cause: options?.cause });
    this.name = 'ModelInvocationError';
    this.status = options?.status;
  }
}

/** The provider asked us to slow down. The only retryable model error. */
export class ModelRateLimitError extends ModelInvocationError {
  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.name = 'ModelRateLimitError';
  }
}

const RATE_LIMIT_PATTERN = /rate[\s_-]?limit|too many requests/i;

export function isRateLimitMessage(text: string): boolean {
  return RATE_LIMIT_PATTERN.test(text);
}

/** Anything that can answer a chat completion request. */
export interface ChatClient {
  chat(request: ChatCompletionRequest, timeout?: number): Promise<ChatCompletionResponse>;
}

export class ChatCompletionClient implements ChatClient {
  private baseUrl: string;
  private apiKey: string;
  private defaultTimeout: number;

  constructor(options: { apiKey: string; baseUrl: string; timeout?: number }) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.apiKey = options.apiKey;
    this.defaultTimeout = options.timeout ?? defaultModelConfig.timeout;
  }

  /**
   * POST /chat/completions. 429s and rate-limit messages surface as
   * ModelRateLimitError, every other failure as ModelInvocationError.
   */
  async chat(request: ChatCompletionRequest, timeout?: number): Promise<ChatCompletionResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout ?? this.defaultTimeout);

    try {
      let response: Response;
      try {
        response = await fetch(`${this.baseUrl}/chat/completions`, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.apiKey}`,
          },
          body: JSON.stringify(request),
          signal: controller.signal,
        });
      } catch (error) {
        throw new ModelInvocationError(
          `Chat completion request failed: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error },
        );
      }

      if (!response.ok) {
        const body = await response.text();
        const message = `Chat completion failed: ${response.status} - ${body.slice(0, 500)}`;
        if (response.status === 429 || isRateLimitMessage(body)) {
          throw new ModelRateLimitError(message, { status: response.status });
        }
        throw new ModelInvocationError(message, { status: response.status });
      }

      const json: unknown = await response.json();
      const parsed = chatCompletionResponseSchema.safeParse(json);
      if (!parsed.success) {
        throw new ModelInvocationError(
          `Malformed chat completion response: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
        );
      }
      return parsed.data;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/** Text of the first choice, or '' when the model returned no content. */
export function completionText(response: ChatCompletionResponse): string {
  return response.choices[0]?.message.content ?? '';
}
