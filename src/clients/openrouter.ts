/**
 * OpenRouter Client
 * Handles: chat completions (event scoring), embeddings (event relations)
 *
 * OpenAI-compatible REST endpoints called with fetch and scheduled on the
 * OPENROUTER limiter. Response bodies are validated with zod.
 */

import { z } from 'zod';
import { ErrorCode, SdkError } from '../core/errors.js';
import { DEFAULT_TIMEOUT_MS, joinUrl } from '../core/http-client.js';
import { ApiType, RateLimiter } from '../core/rate-limiter.js';

export const OPENROUTER_API_BASE = 'https://openrouter.ai/api/v1';

// ===== Types =====

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: readonly ChatMessage[];
  maxTokens?: number;
  temperature?: number;
}

export interface OpenRouterClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
}

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
});

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int().optional(),
    })
  ),
});

// ===== Client =====

export class OpenRouterClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(
    private rateLimiter: RateLimiter,
    options: OpenRouterClientOptions
  ) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? OPENROUTER_API_BASE;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * POST /chat/completions and return the first choice's text.
   */
  async chatCompletion(request: ChatCompletionRequest): Promise<string> {
    const data = await this.post('/chat/completions', {
      model: request.model,
      messages: request.messages,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
    });
    const parsed = chatResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new SdkError(ErrorCode.INVALID_RESPONSE, 'Chat completion response has no choices', true);
    }
    return parsed.data.choices[0].message.content ?? '';
  }

  /**
   * POST /embeddings. Vectors come back in input order.
   */
  async embed(model: string, input: readonly string[]): Promise<number[][]> {
    if (input.length === 0) return [];
    const data = await this.post('/embeddings', { model, input });
    const parsed = embeddingResponseSchema.safeParse(data);
    if (!parsed.success || parsed.data.data.length !== input.length) {
      throw new SdkError(
        ErrorCode.INVALID_RESPONSE,
        `Embedding response does not match ${input.length} inputs`,
        true
      );
    }
    return parsed.data.data
      .map((item, position) => ({ order: item.index ?? position, embedding: item.embedding }))
      .sort((a, b) => a.order - b.order)
      .map((item) => item.embedding);
  }

  private async post(path: string, body: Record<string, unknown>): Promise<unknown> {
    return this.rateLimiter.execute(ApiType.OPENROUTER, async () => {
      let response: Response;
      try {
        response = await fetch(joinUrl(this.baseUrl, path), {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${this.apiKey}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify(body),
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (error) {
        const cause = error instanceof Error ? error : undefined;
        const timedOut = cause?.name === 'TimeoutError' || cause?.name === 'AbortError';
        throw new SdkError(
          timedOut ? ErrorCode.TIMEOUT : ErrorCode.NETWORK_ERROR,
          `OpenRouter ${path} failed: ${cause?.message ?? String(error)}`,
          true,
          cause
        );
      }

      if (!response.ok) {
        throw SdkError.fromHttpError(response.status, await response.json().catch(() => null));
      }

      try {
        const data: unknown = await response.json();
        return data;
      } catch (error) {
        throw new SdkError(
          ErrorCode.INVALID_RESPONSE,
          `Invalid JSON from OpenRouter ${path}`,
          true,
          error instanceof Error ? error : undefined
        );
      }
    });
  }
}
