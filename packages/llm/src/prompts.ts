/**
 * Prompt builders shared by the extraction and verification agents.
 */

/**
 * Substitute `{name}` placeholders. Placeholders without a value are left as-is.
 */
export function buildPrompt(template: string, variables: Record<string, string>): string {
  let result = template;
  for (const [key, value] of Object.entries(variables)) {
    result = result.split(`{${key}}`).join(value);
  }
  return result;
}

/**
 * Task instructions, the JSON shape to answer in, then the source material.
 */
export function jsonExtractionPrompt(content: string, shape: string, instructions?: string): string {
  const sections = [
    instructions,
    `Respond with a single JSON object in exactly this shape:\n${shape}`,
    `Sources:\n${content.trim() || '(none)'}`,
    'Return only the JSON object, with no explanation and no markdown fences.',
  ];
  return sections.filter((s): s is string => Boolean(s)).join('\n\n');
}

export function structuredExtractionSystem(task: string): string {
  return [
    `You are a careful research assistant. Your task is to ${task}.`,
    '',
    'Rules:',
    '- Use only facts stated in the provided material; never guess or invent values.',
    '- Use null for any field the material does not support.',
    '- Copy emails, phone numbers and URLs exactly as written.',
    '- Answer with valid JSON only.',
  ].join('\n');
}
