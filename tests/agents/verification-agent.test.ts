import { describe, it, expect } from 'vitest';
import { VerificationAgent, buildVerificationPrompt, mergeVerified } from '@profilescout/agents';
import { ModelRateLimitError } from '@profilescout/llm';
import { emptyProfile, modelProfileSchema, type Profile } from '@profilescout/schemas';
import { ScriptedInvoker } from '../fakes.js';

const draft: Profile = {
  email: 'info@acme.test',
  phone: '+1 555 0100',
  social_media: { linkedin: 'https://linkedin.test/acme' },
  additional_info: { founded: 1999 },
  confidence_scores: {},
};

describe('VerificationAgent', () => {
  it('back-fills fields the model left out and scores populated fields', async () => {
    const invoker = new ScriptedInvoker([
      '{"email": "info@acme.test", "confidence_scores": {"email": 0.95, "phone": 0.6, "website": 0.9}}',
    ]);

    const verified = await new VerificationAgent(invoker).verify(draft);

    expect(verified).toEqual({
      email: 'info@acme.test',
      phone: '+1 555 0100',
      social_media: { linkedin: 'https://linkedin.test/acme' },
      additional_info: { founded: 1999 },
      confidence_scores: { email: 0.95, phone: 0.6 },
    });
  });

  it('merges mappings so draft keys survive', async () => {
    const invoker = new ScriptedInvoker([
      '```json\n{"social_media": {"twitter": "https://x.test/acme"}, "additional_info": {"industry": "Robotics"}}\n```',
    ]);

    const verified = await new VerificationAgent(invoker).verify(draft);

    expect(verified.social_media).toEqual({
      linkedin: 'https://linkedin.test/acme',
      twitter: 'https://x.test/acme',
    });
    expect(verified.additional_info).toEqual({ founded: 1999, industry: 'Robotics' });
  });

  it('takes corrected values from the model', async () => {
    const invoker = new ScriptedInvoker(['{"phone": "+1-555-0100"}']);
    const verified = await new VerificationAgent(invoker).verify(draft);
    expect(verified.phone).toBe('+1-555-0100');
    expect(verified.email).toBe('info@acme.test');
  });

  it('returns the draft when the answer cannot be parsed', async () => {
    const invoker = new ScriptedInvoker(['Looks good to me!']);
    expect(await new VerificationAgent(invoker).verify(draft)).toEqual(draft);
  });

  it('returns the draft when the model call fails', async () => {
    const invoker = new ScriptedInvoker([new ModelRateLimitError('Chat completion failed: 429 - slow down')]);
    expect(await new VerificationAgent(invoker).verify(draft)).toEqual(draft);
  });

  it('still verifies an empty draft', async () => {
    const invoker = new ScriptedInvoker(['{}']);
    expect(await new VerificationAgent(invoker).verify(emptyProfile())).toEqual(emptyProfile());
    expect(invoker.calls).toHaveLength(1);
    expect(invoker.calls[0]?.options).toEqual({ temperature: 0.1, maxTokens: 1000 });
  });

  it('sends the draft in the prompt', async () => {
    const invoker = new ScriptedInvoker(['{}']);
    await new VerificationAgent(invoker).verify(draft);
    expect(invoker.userPrompt()).toBe(buildVerificationPrompt(draft));
    expect(invoker.userPrompt()).toContain('"email": "info@acme.test"');
  });
});

describe('mergeVerified', () => {
  it('keeps draft scores the model did not replace', () => {
    const scored: Profile = { ...draft, confidence_scores: { email: 0.7, phone: 0.4 } };
    const merged = mergeVerified(scored, modelProfileSchema.parse({ confidence_scores: { phone: 0.9 } }));
    expect(merged.confidence_scores).toEqual({ email: 0.7, phone: 0.9 });
  });

  it('never drops a populated draft field', () => {
    const merged = mergeVerified(draft, modelProfileSchema.parse({ email: null, phone: 'N/A' }));
    expect(merged.email).toBe('info@acme.test');
    expect(merged.phone).toBe('+1 555 0100');
  });
});
