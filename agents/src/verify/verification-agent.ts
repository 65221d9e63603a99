/**
 * Verification Agent - Second model pass over a draft profile
 *
 * Checks formats and plausibility, attaches per-field confidence scores and
 * never loses a field the draft already had.
 */

import {
  parseWithRetry,
  structuredExtractionSystem,
  type ChatMessage,
  type ModelInvoker,
} from '@profilescout/llm';
import {
  PROFILE_TEXT_FIELDS,
  emptyProfile,
  modelProfileSchema,
  pickScores,
  populatedFields,
  profileSchema,
  type ModelProfile,
  type Profile,
} from '@profilescout/schemas';
import { BaseAgent } from '../shared/base-agent.js';
import type { AgentConfig, AgentContext } from '../shared/types.js';

export const VERIFIED_JSON_SHAPE = `{
  "website": "verified URL or null",
  "location": "verified location or null",
  "description": "verified description or null",
  "email": "verified email or null",
  "phone": "verified phone or null",
  "social_media": { "<platform>": "<profile URL>" },
  "additional_info": { "<key>": "<value>" },
  "confidence_scores": { "<field name>": 0.0 }
}`;

export function buildVerificationPrompt(draft: Profile): string {
  return `Verify the following extracted information and provide confidence scores:
${JSON.stringify(draft, null, 2)}

For each populated field:
1. Verify the format (email, URL, phone number)
2. Check that the value is plausible and complete
3. Give a confidence score between 0 and 1, keyed by field name

Keep every value you cannot disprove. Respond with JSON only, in this shape:
${VERIFIED_JSON_SHAPE}`;
}

/**
 * Overlay the verified answer on the draft. Text fields the model left out
 * keep the draft value, maps are merged key by key, and scores survive only
 * for fields that end up populated.
 */
export function mergeVerified(draft: Profile, verified: ModelProfile): Profile {
  const merged = emptyProfile();
  for (const field of PROFILE_TEXT_FIELDS) {
    const value = verified[field] ?? draft[field];
    if (value !== undefined) merged[field] = value;
  }
  merged.social_media = { ...draft.social_media, ...verified.social_media };
  merged.additional_info = { ...draft.additional_info, ...verified.additional_info };
  merged.confidence_scores = pickScores(
    { ...draft.confidence_scores, ...verified.confidence_scores },
    populatedFields(merged),
  );
  return merged;
}

export interface VerificationAgentOptions {
  temperature?: number;
  maxTokens?: number;
}

export class VerificationAgent extends BaseAgent<Profile, Profile> {
  config: AgentConfig = {
    name: 'verification',
    description: 'Checks a draft profile and attaches confidence scores',
    version: '1.0.0',
  };
  inputSchema = profileSchema;
  outputSchema = profileSchema;

  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(
    private readonly invoker: ModelInvoker,
    options: VerificationAgentOptions = {},
  ) {
    super();
    this.temperature = options.temperature ?? 0.1;
    this.maxTokens = options.maxTokens ?? 1000;
  }

  /** Verified profile; the draft itself whenever verification fails. */
  async verify(draft: Profile, context?: Partial<AgentContext>): Promise<Profile> {
    const result = await this.execute(draft, context);
    return result.success ? result.data : draft;
  }

  protected async run(draft: Profile, context: AgentContext): Promise<Profile> {
    const messages: ChatMessage[] = [
      {
        role: 'system',
        content: structuredExtractionSystem('verify extracted profile data and score each field'),
      },
      { role: 'user', content: buildVerificationPrompt(draft) },
    ];

    const response = await this.invoker.invoke(messages, {
      temperature: this.temperature,
      maxTokens: this.maxTokens,
    });

    const parsed = parseWithRetry(response, modelProfileSchema);
    if (!parsed.success) {
      this.warn(
        `Unusable verification response for "${context.entityName ?? 'entity'}": ${parsed.error}`,
      );
      return draft;
    }
    return mergeVerified(draft, parsed.data);
  }
}
