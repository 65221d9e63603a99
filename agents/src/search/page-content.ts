/**
 * Page fetch + visible-text extraction used to enrich search hits.
 */

import { parse, HTMLElement, TextNode, type Node } from 'node-html-parser';
import { APP_NAME } from '@profilescout/core';

export const DEFAULT_PAGE_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_CONTENT_CHARS = 5000;

const STRIP_TAGS = ['script', 'style', 'noscript', 'template', 'svg'];

// Elements that start a new line of text in a browser
const BLOCK_TAGS = new Set([
  'address',
  'article',
  'aside',
  'blockquote',
  'br',
  'dd',
  'div',
  'dl',
  'dt',
  'figcaption',
  'footer',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'header',
  'hr',
  'li',
  'main',
  'nav',
  'ol',
  'p',
  'pre',
  'section',
  'table',
  'td',
  'th',
  'title',
  'tr',
  'ul',
]);

function collectText(node: Node, parts: string[]): void {
  for (const child of node.childNodes) {
    if (child instanceof TextNode) {
      parts.push(child.text);
    } else if (child instanceof HTMLElement) {
      const block = BLOCK_TAGS.has((child.rawTagName ?? '').toLowerCase());
      if (block) parts.push(' ');
      collectText(child, parts);
      if (block) parts.push(' ');
    }
  }
}

/**
 * Visible text of an HTML document: script/style markup removed, entities
 * decoded, whitespace collapsed, cut to `maxChars`.
 */
export function htmlToText(html: string, maxChars: number = DEFAULT_MAX_CONTENT_CHARS): string {
  const root = parse(html, {
    comment: false,
    blockTextElements: {
      script: false,
      noscript: false,
      style: false,
    },
  });

  for (const el of root.querySelectorAll(STRIP_TAGS.join(','))) {
    el.remove();
  }

  const parts: string[] = [];
  collectText(root, parts);
  return truncate(parts.join('').replace(/\s+/g, ' ').trim(), maxChars);
}

// Cut at a UTF-16 boundary without leaving half of a surrogate pair
function truncate(text: string, maxChars: number): string {
  const cut = text.slice(0, Math.max(0, maxChars));
  const last = cut.charCodeAt(cut.length - 1);
  return last >= 0xd800 && last <= 0xdbff ? cut.slice(0, -1) : cut;
}

export type PageTextResult = { ok: true; text: string } | { ok: false; reason: string };

/**
 * GET a page (redirects followed) and return its visible text. Only 2xx
 * responses are parsed; every failure comes back as `{ ok: false }`.
 */
export async function fetchPageText(
  url: string,
  options: { timeoutMs?: number; maxChars?: number } = {},
): Promise<PageTextResult> {
  let target: URL;
  try {
    target = new URL(url);
  } catch {
    return { ok: false, reason: 'invalid URL' };
  }
  if (target.protocol !== 'http:' && target.protocol !== 'https:') {
    return { ok: false, reason: `unsupported protocol ${target.protocol}` };
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs ?? DEFAULT_PAGE_TIMEOUT_MS);
  try {
    const res = await fetch(target, {
      redirect: 'follow',
      signal: controller.signal,
      headers: {
        'User-Agent': `Mozilla/5.0 (compatible; ${APP_NAME}/1.0)`,
        Accept: 'text/html,application/xhtml+xml',
        'Accept-Language': 'en-US,en;q=0.9',
      },
    });
    if (!res.ok) {
      return { ok: false, reason: `HTTP ${res.status}` };
    }
    const html = await res.text();
    return { ok: true, text: htmlToText(html, options.maxChars ?? DEFAULT_MAX_CONTENT_CHARS) };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  } finally {
    clearTimeout(timeout);
  }
}
