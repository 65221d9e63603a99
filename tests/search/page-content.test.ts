import { describe, it, expect, vi, afterEach } from 'vitest';
import { fetchPageText, htmlToText } from '@profilescout/agents';

describe('htmlToText', () => {
  it('keeps visible text and drops scripts, styles and noscript blocks', () => {
    const html = `<html>
      <head><title>Acme</title><style>.x { color: red }</style><script>var a = 1;</script></head>
      <body>
        <h1>Smith &amp; Co</h1>
        <p>Contact   us at <b>info@acme.test</b></p>
        <noscript>Please enable JavaScript</noscript>
      </body>
    </html>`;

    expect(htmlToText(html)).toBe('Acme Smith & Co Contact us at info@acme.test');
  });

  it('separates adjacent block elements', () => {
    expect(htmlToText('<ul><li>One</li><li>Two</li></ul><div>Three</div>')).toBe('One Two Three');
  });

  it('truncates to the character limit', () => {
    const text = htmlToText(`<p>${'a'.repeat(6000)}</p>`, 5000);
    expect(text).toHaveLength(5000);
  });

  it('does not split a surrogate pair at the cut', () => {
    expect(htmlToText('<p>ab\u{1F600}c</p>', 3)).toBe('ab');
    expect(htmlToText('<p>ab\u{1F600}c</p>', 4)).toBe('ab\u{1F600}');
  });
});

describe('fetchPageText', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the visible text of a 2xx page', async () => {
    const fetchMock = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) =>
        new Response('<p>Hello <i>world</i></p>', { status: 200 }),
    );
    vi.stubGlobal('fetch', fetchMock);

    const result = await fetchPageText('https://acme.test/about', { maxChars: 100 });

    expect(result).toEqual({ ok: true, text: 'Hello world' });
    expect(String(fetchMock.mock.calls[0]?.[0])).toBe('https://acme.test/about');
    expect(fetchMock.mock.calls[0]?.[1]?.redirect).toBe('follow');
  });

  it('does not parse non-2xx responses', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('<p>Not here</p>', { status: 404 })));

    expect(await fetchPageText('https://acme.test/missing')).toEqual({ ok: false, reason: 'HTTP 404' });
  });

  it('reports transport failures instead of throwing', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      }),
    );

    expect(await fetchPageText('https://acme.test/')).toEqual({ ok: false, reason: 'fetch failed' });
  });

  it('rejects links that are not http(s) without fetching', async () => {
    const fetchMock = vi.fn(async () => new Response(''));
    vi.stubGlobal('fetch', fetchMock);

    expect(await fetchPageText('not a url')).toEqual({ ok: false, reason: 'invalid URL' });
    expect(await fetchPageText('ftp://files.acme.test/x')).toEqual({
      ok: false,
      reason: 'unsupported protocol ftp:',
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
