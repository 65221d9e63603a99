import type { ChatMessage, InvokeOptions, ModelInvoker } from '@profilescout/llm';
import type { SearchResult } from '@profilescout/schemas';

/** Model invoker that replays scripted completions (or errors) in order. */
export class ScriptedInvoker implements ModelInvoker {
  readonly calls: Array<{ messages: ChatMessage[]; options?: InvokeOptions }> = [];

  constructor(private readonly responses: Array<string | Error>) {}

  async invoke(messages: ChatMessage[], options?: InvokeOptions): Promise<string> {
    this.calls.push({ messages, options });
    const next = this.responses.shift();
    if (next === undefined) throw new Error('ScriptedInvoker ran out of responses');
    if (next instanceof Error) throw next;
    return next;
  }

  /** Content of the user message sent in call `index`. */
  userPrompt(index = 0): string {
    return this.calls[index]?.messages.find((m) => m.role === 'user')?.content ?? '';
  }
}

export function searchResult(n: number, overrides: Partial<SearchResult> = {}): SearchResult {
  return {
    title: `Result ${n}`,
    link: `https://site${n}.test/`,
    snippet: `Snippet ${n}`,
    displayed_link: `site${n}.test`,
    ...overrides,
  };
}
