/**
 * Chat model settings. Values come from configuration; these are the
 * fallbacks used when a caller leaves one out.
 */

export interface ChatModelDefaults {
  temperature: number;
  maxTokens: number;
  timeout: number;
}

export const defaultModelConfig: ChatModelDefaults = {
  temperature: 0.1,
  maxTokens: 1000,
  timeout: 60_000, // one minute per completion
};
