/**
 * Wires the resolution pipeline from validated configuration. Both agents
 * share one invoker so the model throttle covers every request.
 */

import type { AppConfig, Clock, Sleep } from '@profilescout/core';
import { ChatCompletionClient, RateLimitedInvoker, type ChatClient } from '@profilescout/llm';
import { BatchOrchestrator } from './batch/batch-orchestrator.js';
import { ExtractionAgent } from './extract/extraction-agent.js';
import { SearchClient } from './search/web-search-client.js';
import { VerificationAgent } from './verify/verification-agent.js';

export interface ResolutionPipeline {
  searchClient: SearchClient;
  invoker: RateLimitedInvoker;
  extractor: ExtractionAgent;
  verifier: VerificationAgent;
  orchestrator: BatchOrchestrator;
}

export interface PipelineOverrides {
  chatClient?: ChatClient;
  sleep?: Sleep;
  now?: Clock;
}

export function createResolutionPipeline(
  config: AppConfig,
  overrides: PipelineOverrides = {},
): ResolutionPipeline {
  const { search, llm, batch } = config;

  const searchClient = new SearchClient({
    apiKey: search.apiKey,
    maxResults: search.maxResults,
    attempts: search.retryAttempts,
    pageTimeoutMs: search.pageTimeoutMs,
    maxContentChars: search.maxContentChars,
    batchPauseMs: batch.batchPauseMs,
    sleep: overrides.sleep,
  });

  const chatClient =
    overrides.chatClient ??
    new ChatCompletionClient({ apiKey: llm.apiKey, baseUrl: llm.baseUrl, timeout: llm.timeoutMs });

  const invoker = new RateLimitedInvoker(chatClient, {
    model: llm.model,
    temperature: llm.temperature,
    maxTokens: llm.maxTokens,
    timeout: llm.timeoutMs,
    minRequestIntervalMs: llm.minRequestIntervalMs,
    maxRetries: llm.maxRetries,
    sleep: overrides.sleep,
    now: overrides.now,
  });

  const agentOptions = { temperature: llm.temperature, maxTokens: llm.maxTokens };
  const extractor = new ExtractionAgent(invoker, agentOptions);
  const verifier = new VerificationAgent(invoker, agentOptions);

  const orchestrator = new BatchOrchestrator({
    searcher: searchClient,
    extractor,
    verifier,
    maxResults: search.maxResults,
    batchSize: batch.batchSize,
    batchPauseMs: batch.batchPauseMs,
    failurePauseMs: batch.failurePauseMs,
    sleep: overrides.sleep,
  });

  return { searchClient, invoker, extractor, verifier, orchestrator };
}
