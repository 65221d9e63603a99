/**
 * Extraction Agent - Turns search results into a draft profile
 *
 * Responsibilities:
 * - Build a bounded prompt from the top search results
 * - Ask the model for evidenced fields only, in a fixed JSON shape
 * - Validate the answer; anything unusable becomes the empty profile
 *
 * LLM Usage: One call per entity (through the shared invoker)
 */

import { z } from 'zod';
import {
  jsonExtractionPrompt,
  parseWithRetry,
  structuredExtractionSystem,
  type ChatMessage,
  type ModelInvoker,
} from '@profilescout/llm';
import {
  emptyProfile,
  modelProfileSchema,
  profileSchema,
  searchResultSchema,
  toProfile,
  type Profile,
  type SearchResult,
} from '@profilescout/schemas';
import { BaseAgent } from '../shared/base-agent.js';
import type { AgentConfig, AgentContext } from '../shared/types.js';

export const MAX_PROMPT_RESULTS = 3;
export const EXCERPT_CHARS = 200;

export const PROFILE_JSON_SHAPE = `{
  "website": "main website URL or null",
  "location": "physical location or address or null",
  "description": "brief description or null",
  "email": "contact email address or null",
  "phone": "contact phone number or null",
  "social_media": { "<platform>": "<profile URL>" },
  "additional_info": { "<key>": "<value>" }
}`;

export const extractionInputSchema = z.object({
  entity: z.string().trim().min(1),
  results: z.array(searchResultSchema),
});

export type ExtractionInput = z.infer<typeof extractionInputSchema>;

/**
 * Cut text to `maxChars`, ending at the last sentence boundary when one
 * falls in the second half of the excerpt.
 */
export function excerpt(text: string, maxChars: number = EXCERPT_CHARS): string {
  const clean = text.replace(/\s+/g, ' ').trim();
  if (clean.length <= maxChars) return clean;

  const cut = clean.slice(0, maxChars);
  if (/[.!?]$/.test(cut)) return cut;

  const boundary = Math.max(cut.lastIndexOf('. '), cut.lastIndexOf('! '), cut.lastIndexOf('? '));
  if (boundary >= maxChars / 2) return cut.slice(0, boundary + 1);
  return cut.trimEnd();
}

export function buildExtractionPrompt(results: readonly SearchResult[], entity: string): string {
  const sources = results
    .slice(0, MAX_PROMPT_RESULTS)
    .map(
      (r, i) =>
        `[${i + 1}] Title: ${r.title}\nURL: ${r.link}\nContent: ${excerpt(r.content || r.snippet)}`,
    )
    .join('\n\n');

  return jsonExtractionPrompt(
    sources,
    PROFILE_JSON_SHAPE,
    `Task: Extract structured information about "${entity}" from the search results below. ` +
      'Only include values that appear in these sources; use null for anything not found.',
  );
}

export interface ExtractionAgentOptions {
  temperature?: number;
  maxTokens?: number;
}

export class ExtractionAgent extends BaseAgent<ExtractionInput, Profile> {
  config: AgentConfig = {
    name: 'extraction',
    description: 'Extracts a draft profile for an entity from web search results',
    version: '1.0.0',
  };
  inputSchema = extractionInputSchema;
  outputSchema = profileSchema;

  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(
    private readonly invoker: ModelInvoker,
    options: ExtractionAgentOptions = {},
  ) {
    super();
    this.temperature = options.temperature ?? 0.1;
    this.maxTokens = options.maxTokens ?? 1000;
  }

  /**
   * Draft profile for `entity`. Never rejects: invocation, parse and
   * validation failures all yield the empty profile.
   */
  async extract(
    results: readonly SearchResult[],
    entity: string,
    context?: Partial<AgentContext>,
  ): Promise<Profile> {
    const result = await this.execute({ entity, results: [...results] }, { entityName: entity, ...context });
    return result.success ? result.data : emptyProfile();
  }

  protected async run(input: ExtractionInput): Promise<Profile> {
    if (input.results.length === 0) {
      this.info(`No search results for "${input.entity}"; nothing to extract`);
      return emptyProfile();
    }

    const messages: ChatMessage[] = [
      {
        role: 'system',
        content: structuredExtractionSystem(
          'extract contact and profile details about one entity from web search results',
        ),
      },
      { role: 'user', content: buildExtractionPrompt(input.results, input.entity) },
    ];

    const response = await this.invoker.invoke(messages, {
      temperature: this.temperature,
      maxTokens: this.maxTokens,
    });

    const parsed = parseWithRetry(response, modelProfileSchema);
    if (!parsed.success) {
      this.warn(`Unusable extraction response for "${input.entity}": ${parsed.error}`);
      return emptyProfile();
    }
    return toProfile(parsed.data);
  }
}
