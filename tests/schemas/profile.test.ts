import { describe, it, expect } from 'vitest';
import {
  emptyProfile,
  isEmptyProfile,
  isFailedRecord,
  modelProfileSchema,
  pickScores,
  populatedFields,
  profileSchema,
  toProfile,
  type EntityRecord,
} from '@profilescout/schemas';

const fromModel = (raw: unknown) => toProfile(modelProfileSchema.parse(raw));

describe('profileSchema', () => {
  it('defaults every mapping to empty', () => {
    expect(profileSchema.parse({})).toEqual(emptyProfile());
  });

  it('rejects scores outside [0, 1]', () => {
    expect(profileSchema.safeParse({ confidence_scores: { email: 1.5 } }).success).toBe(false);
  });
});

describe('model output handling', () => {
  it('turns nulls and placeholder strings into absent fields', () => {
    expect(fromModel({ email: null, phone: 'N/A', website: '  ', location: 'Oslo, Norway' })).toEqual({
      location: 'Oslo, Norway',
      social_media: {},
      additional_info: {},
      confidence_scores: {},
    });
  });

  it('joins lists and stringifies numbers', () => {
    const profile = fromModel({ phone: ['+1 555 0100', '+1 555 0101'], location: 10001 });
    expect(profile.phone).toBe('+1 555 0100, +1 555 0101');
    expect(profile.location).toBe('10001');
  });

  it('keeps only string social links and non-empty extra info', () => {
    const profile = fromModel({
      social_media: { linkedin: 'https://linkedin.test/acme', twitter: null, followers: 300 },
      additional_info: { founded: 1999, ceo: 'unknown', industry: 'Robotics', hq: null },
    });
    expect(profile.social_media).toEqual({ linkedin: 'https://linkedin.test/acme' });
    expect(profile.additional_info).toEqual({ founded: 1999, industry: 'Robotics' });
  });

  it('clamps scores and drops scores for empty or unknown fields', () => {
    const profile = fromModel({
      email: 'info@acme.test',
      phone: '+1 555 0100',
      confidence_scores: { email: 1.4, phone: '0.5', website: 0.8, bogus: 0.3, location: 'high' },
    });
    expect(profile.confidence_scores).toEqual({ email: 1, phone: 0.5 });
  });

  it('accepts an empty object as the empty profile', () => {
    expect(fromModel({})).toEqual(emptyProfile());
  });

  it('rejects output that is not an object', () => {
    expect(modelProfileSchema.safeParse(['info@acme.test']).success).toBe(false);
    expect(modelProfileSchema.safeParse({ social_media: 'linkedin' }).success).toBe(false);
  });
});

describe('profile helpers', () => {
  it('lists populated fields in declaration order', () => {
    const profile = { ...emptyProfile(), website: 'https://acme.test', email: 'info@acme.test', social_media: { x: 'https://x.test/acme' } };
    expect(populatedFields(profile)).toEqual(['email', 'website', 'social_media']);
    expect(isEmptyProfile(profile)).toBe(false);
    expect(isEmptyProfile(emptyProfile())).toBe(true);
  });

  it('pickScores keeps only the requested fields', () => {
    expect(pickScores({ email: 0.9, phone: 0.4, extra: 1 }, ['email', 'website'])).toEqual({ email: 0.9 });
  });

  it('tells failed records from profile records', () => {
    const done: EntityRecord = { Entity: 'Acme', ...emptyProfile() };
    const failed: EntityRecord = { Entity: 'Globex', error: 'Search failed' };
    expect(isFailedRecord(done)).toBe(false);
    expect(isFailedRecord(failed)).toBe(true);
  });
});
