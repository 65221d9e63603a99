import { z } from 'zod';
import {
  profileTextFieldEnum,
  scoredFieldEnum,
  type ProfileTextField,
  type ScoredField,
} from './enums.js';

export const profileSchema = z.object({
  email: z.string().optional(),
  location: z.string().optional(),
  website: z.string().optional(),
  phone: z.string().optional(),
  description: z.string().optional(),
  social_media: z.record(z.string()).default({}),
  additional_info: z.record(z.unknown()).default({}),
  confidence_scores: z.record(z.number().min(0).max(1)).default({}),
});

export type Profile = z.infer<typeof profileSchema>;

export const PROFILE_TEXT_FIELDS: readonly ProfileTextField[] = profileTextFieldEnum.options;

export function emptyProfile(): Profile {
  return { social_media: {}, additional_info: {}, confidence_scores: {} };
}

/** Field names that carry a value, in declaration order. */
export function populatedFields(profile: Profile): ScoredField[] {
  const fields: ScoredField[] = PROFILE_TEXT_FIELDS.filter((f) => profile[f] !== undefined);
  if (Object.keys(profile.social_media).length > 0) fields.push('social_media');
  if (Object.keys(profile.additional_info).length > 0) fields.push('additional_info');
  return fields;
}

export function isEmptyProfile(profile: Profile): boolean {
  return populatedFields(profile).length === 0;
}

// ---------------------------------------------------------------------------
// Model output: lenient shape accepted at the parsing boundary
// ---------------------------------------------------------------------------

const PLACEHOLDER_TEXT = new Set(['', 'null', 'none', 'n/a', 'na', 'unknown', 'not found']);

function cleanText(value: string): string | undefined {
  const text = value.trim();
  return PLACEHOLDER_TEXT.has(text.toLowerCase()) ? undefined : text;
}

const modelText = z
  .union([z.string(), z.number(), z.array(z.union([z.string(), z.number()]))])
  .nullish()
  .transform((value): string | undefined => {
    if (value === null || value === undefined) return undefined;
    if (Array.isArray(value)) {
      const parts = value
        .map((v) => cleanText(String(v)))
        .filter((v): v is string => v !== undefined);
      return parts.length > 0 ? parts.join(', ') : undefined;
    }
    return cleanText(String(value));
  });

const modelStringMap = z
  .record(z.unknown())
  .nullish()
  .transform((value) => {
    const out: Record<string, string> = {};
    for (const [key, raw] of Object.entries(value ?? {})) {
      if (typeof raw !== 'string') continue;
      const text = cleanText(raw);
      if (text) out[key] = text;
    }
    return out;
  });

const modelInfoMap = z
  .record(z.unknown())
  .nullish()
  .transform((value) => {
    const out: Record<string, unknown> = {};
    for (const [key, raw] of Object.entries(value ?? {})) {
      if (raw === null || raw === undefined) continue;
      if (typeof raw === 'string' && cleanText(raw) === undefined) continue;
      out[key] = raw;
    }
    return out;
  });

const modelScores = z
  .record(z.unknown())
  .nullish()
  .transform((value) => {
    const out: Partial<Record<ScoredField, number>> = {};
    for (const [key, raw] of Object.entries(value ?? {})) {
      const field = scoredFieldEnum.safeParse(key);
      if (!field.success) continue;
      const score = typeof raw === 'string' ? Number.parseFloat(raw) : raw;
      if (typeof score !== 'number' || Number.isNaN(score)) continue;
      out[field.data] = Math.min(1, Math.max(0, score));
    }
    return out;
  });

/**
 * JSON object a model returns for extraction or verification. Nulls and
 * placeholder strings become absent, lists of strings are joined, and scores
 * are clamped to [0, 1].
 */
export const modelProfileSchema = z.object({
  email: modelText,
  location: modelText,
  website: modelText,
  phone: modelText,
  description: modelText,
  social_media: modelStringMap,
  additional_info: modelInfoMap,
  confidence_scores: modelScores,
});

export type ModelProfile = z.infer<typeof modelProfileSchema>;

/**
 * Build a Profile from parsed model output. Scores for fields that ended up
 * empty are dropped.
 */
export function toProfile(raw: ModelProfile): Profile {
  const profile = emptyProfile();
  for (const field of PROFILE_TEXT_FIELDS) {
    const value = raw[field];
    if (value !== undefined) profile[field] = value;
  }
  profile.social_media = { ...raw.social_media };
  profile.additional_info = { ...raw.additional_info };
  profile.confidence_scores = pickScores(raw.confidence_scores, populatedFields(profile));
  return profile;
}

/** Scores restricted to `fields`, in field order. */
export function pickScores(
  scores: Readonly<Partial<Record<string, number>>>,
  fields: readonly ScoredField[],
): Record<string, number> {
  const out: Record<string, number> = {};
  for (const field of fields) {
    const score = scores[field];
    if (score !== undefined) out[field] = score;
  }
  return out;
}
