/**
 * Web search client: Google results via SerpAPI, each hit enriched with the
 * visible text of its page. Callers get results in provider rank order.
 */

import { z } from 'zod';
import {
  createLogger,
  errorMessage,
  exponentialBackoff,
  sleep as defaultSleep,
  withRetry,
  type Logger,
  type Sleep,
} from '@profilescout/core';
import type { SearchResult } from '@profilescout/schemas';
import { DEFAULT_MAX_CONTENT_CHARS, DEFAULT_PAGE_TIMEOUT_MS, fetchPageText } from './page-content.js';

export const SERPAPI_BASE = 'https://serpapi.com/search';
export const DEFAULT_MAX_RESULTS = 5;
export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;

export class SearchProviderError extends Error {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, { cause: options?.cause });
    this.name = 'SearchProviderError';
    this.status = options?.status;
  }
}

const serpApiResponseSchema = z.object({
  error: z.string().optional(),
  organic_results: z
    .array(
      z.object({
        title: z.string().optional(),
        link: z.string().optional(),
        snippet: z.string().optional(),
        displayed_link: z.string().optional(),
      }),
    )
    .optional(),
});

/** What the orchestrator needs from a search backend. */
export interface WebSearcher {
  search(query: string, maxResults?: number): Promise<SearchResult[]>;
}

export interface SearchClientOptions {
  apiKey: string;
  baseUrl?: string;
  /** Default number of hits per query. */
  maxResults?: number;
  /** Total attempts per query (default 3). */
  attempts?: number;
  /** Abort a provider exchange, body included, after this long (default 15 s). */
  requestTimeoutMs?: number;
  backoffBaseMs?: number;
  backoffMaxMs?: number;
  pageTimeoutMs?: number;
  maxContentChars?: number;
  /** Pause between batches in batchSearch (default 2000 ms). */
  batchPauseMs?: number;
  sleep?: Sleep;
  logger?: Logger;
}

export class SearchClient implements WebSearcher {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly maxResults: number;
  private readonly attempts: number;
  private readonly requestTimeoutMs: number;
  private readonly backoff: (attempt: number) => number;
  private readonly pageTimeoutMs: number;
  private readonly maxContentChars: number;
  private readonly batchPauseMs: number;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(options: SearchClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? SERPAPI_BASE;
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
    this.attempts = options.attempts ?? 3;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.backoff = exponentialBackoff({
      baseMs: options.backoffBaseMs ?? 4000,
      maxMs: options.backoffMaxMs ?? 10_000,
    });
    this.pageTimeoutMs = options.pageTimeoutMs ?? DEFAULT_PAGE_TIMEOUT_MS;
    this.maxContentChars = options.maxContentChars ?? DEFAULT_MAX_CONTENT_CHARS;
    this.batchPauseMs = options.batchPauseMs ?? 2000;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createLogger('search');
  }

  /**
   * Query the provider (retrying with exponential backoff) and enrich every
   * hit with its page text. Rejects with SearchProviderError once attempts
   * are exhausted.
   */
  async search(query: string, maxResults: number = this.maxResults): Promise<SearchResult[]> {
    const q = query.trim();
    if (!q) {
      throw new SearchProviderError('Search query is empty');
    }

    const results = await withRetry(() => this.fetchOrganicResults(q, maxResults), {
      attempts: this.attempts,
      delayMs: this.backoff,
      onRetry: (error, attempt, delayMs) =>
        this.logger.warn(
          `Search attempt ${attempt} failed for "${q}"; retrying in ${delayMs} ms: ${errorMessage(error)}`,
        ),
      sleep: this.sleep,
    }).catch((error: unknown) => {
      this.logger.error(`Search failed for "${q}": ${errorMessage(error)}`);
      throw error;
    });

    return this.enhanceResults(results);
  }

  /**
   * Fetch every result's page concurrently. A failed fetch leaves that
   * result without `content`; the returned array keeps the input order.
   */
  async enhanceResults(results: readonly SearchResult[]): Promise<SearchResult[]> {
    return Promise.all(
      results.map(async (result): Promise<SearchResult> => {
        const page = await fetchPageText(result.link, {
          timeoutMs: this.pageTimeoutMs,
          maxChars: this.maxContentChars,
        });
        if (!page.ok) {
          this.logger.warn(`Failed to enhance content for ${result.link}: ${page.reason}`);
          return result;
        }
        return page.text ? { ...result, content: page.text } : result;
      }),
    );
  }

  /**
   * Search many queries, `batchSize` at a time, pausing between batches.
   * Any failed query rejects the whole call.
   */
  async batchSearch(
    queries: readonly string[],
    batchSize: number = 10,
  ): Promise<Map<string, SearchResult[]>> {
    const size = Math.max(1, Math.floor(batchSize));
    const results = new Map<string, SearchResult[]>();

    for (let i = 0; i < queries.length; i += size) {
      const batch = queries.slice(i, i + size);
      const found = await Promise.all(batch.map((query) => this.search(query)));
      batch.forEach((query, idx) => results.set(query, found[idx] ?? []));

      if (i + size < queries.length) {
        await this.sleep(this.batchPauseMs);
      }
    }
    return results;
  }

  private async fetchOrganicResults(query: string, maxResults: number): Promise<SearchResult[]> {
    const params = new URLSearchParams({
      engine: 'google',
      q: query,
      api_key: this.apiKey,
      num: String(maxResults),
      hl: 'en',
      gl: 'us',
    });

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    try {
      let res: Response;
      try {
        res = await fetch(`${this.baseUrl}?${params.toString()}`, {
          method: 'GET',
          signal: controller.signal,
          headers: { Accept: 'application/json' },
        });
      } catch (error) {
        throw new SearchProviderError(`Search request failed: ${errorMessage(error)}`, {
          cause: error,
        });
      }

      let body: unknown;
      try {
        body = await res.json();
      } catch (error) {
        const message = controller.signal.aborted
          ? `SerpAPI response timed out after ${this.requestTimeoutMs} ms`
          : `SerpAPI returned a non-JSON response (HTTP ${res.status})`;
        throw new SearchProviderError(message, { cause: error, status: res.status });
      }

      const parsed = serpApiResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new SearchProviderError(
          `Unexpected SerpAPI response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
          { status: res.status },
        );
      }
      if (parsed.data.error) {
        throw new SearchProviderError(`SerpAPI error: ${parsed.data.error}`, { status: res.status });
      }
      if (!res.ok) {
        throw new SearchProviderError(`SerpAPI request failed: HTTP ${res.status}`, {
          status: res.status,
        });
      }

      return (parsed.data.organic_results ?? []).slice(0, maxResults).map((item) => ({
        title: item.title ?? '',
        link: item.link ?? '',
        snippet: item.snippet ?? '',
        displayed_link: item.displayed_link ?? '',
      }));
    } finally {
      clearTimeout(timeout);
    }
  }
}
