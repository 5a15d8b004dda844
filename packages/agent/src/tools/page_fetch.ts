import { Type } from '@sinclair/typebox';

import { TransportError, errorMessage } from '../errors.js';
import { completed, errored, type AgentTool, type FetchLike } from './types.js';

export const PAGE_FETCH_TOOL_NAME = 'fetch_page';

export const PageFetchInputSchema = Type.Object({
  url: Type.String({ minLength: 1, description: 'Absolute http(s) URL of the page to read.' }),
});

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

const MAX_CODE_POINT = 0x10ffff;

function decodeCodePoint(codePoint: number, match: string): string {
  return codePoint <= MAX_CODE_POINT ? String.fromCodePoint(codePoint) : match;
}

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith('#x') || entity.startsWith('#X')) {
      return decodeCodePoint(Number.parseInt(entity.slice(2), 16), match);
    }
    if (entity.startsWith('#')) {
      return decodeCodePoint(Number.parseInt(entity.slice(1), 10), match);
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

export function htmlToText(html: string): string {
  return decodeEntities(
    html
      .replace(/<!--[\s\S]*?-->/g, ' ')
      .replace(/<(script|style|noscript|template)\b[^>]*>[\s\S]*?<\/\1>/gi, ' ')
      .replace(/<\/?(p|div|br|li|h[1-6]|tr|section|article|header|footer)\b[^>]*>/gi, '\n')
      .replace(/<[^>]+>/g, ' '),
  )
    .split('\n')
    .map((line) => line.replace(/[ \t\r\f\v]+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

export interface PageFetchToolOptions {
  maxChars: number;
  fetch?: FetchLike;
}

export function createPageFetchTool(options: PageFetchToolOptions): AgentTool<typeof PageFetchInputSchema> {
  const fetchImpl = options.fetch ?? fetch;

  return {
    name: PAGE_FETCH_TOOL_NAME,
    description: 'Read the text content of a web page. Use when the user provides a URL.',
    parameters: PageFetchInputSchema,
    async execute(input, context) {
      let url: URL;
      try {
        url = new URL(input.url);
      } catch {
        return errored(`Error: invalid URL: ${input.url}`);
      }

      if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        return errored(`Error: only http(s) URLs can be fetched, got ${url.protocol}`);
      }

      try {
        const response = await fetchImpl(url, { signal: context.signal, redirect: 'follow' });
        if (!response.ok) {
          throw new TransportError('fetch_page', `HTTP ${response.status} for ${input.url}`, {
            statusCode: response.status,
          });
        }

        const body = await response.text();
        const contentType = response.headers.get('content-type') ?? '';
        const text = contentType.includes('html') || /<html[\s>]/i.test(body) ? htmlToText(body) : body.trim();

        if (!text) {
          return completed('No content found');
        }

        const content = text.slice(0, options.maxChars);
        console.log(`[agent] fetched ${content.length} chars from ${input.url}`);
        return completed(`Content from ${input.url}:\n\n${content}`, [{ source: url.hostname, url: input.url }]);
      } catch (error) {
        if (context.signal?.aborted) {
          throw error;
        }
        console.error(`[agent] page fetch failed for ${input.url}: ${errorMessage(error)}`);
        return errored(`Error: ${errorMessage(error)}`);
      }
    },
  };
}
