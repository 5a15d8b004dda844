import { Type } from '@sinclair/typebox';
import { z } from 'zod';

import { TransportError, errorMessage } from '../errors.js';
import type { Citation } from '../types.js';
import { completed, errored, type AgentTool, type FetchLike } from './types.js';

export const WEB_SEARCH_TOOL_NAME = 'web_search';

export const WebSearchInputSchema = Type.Object({
  query: Type.String({ minLength: 1, description: 'Search query.' }),
});

const SearchResponseSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string().default(''),
        link: z.string(),
        snippet: z.string().default(''),
      }),
    )
    .default([]),
});

export interface WebSearchToolOptions {
  endpoint: string;
  maxResults: number;
  apiKey?: string;
  searchEngineId?: string;
  fetch?: FetchLike;
}

export function createWebSearchTool(options: WebSearchToolOptions): AgentTool<typeof WebSearchInputSchema> {
  const fetchImpl = options.fetch ?? fetch;

  return {
    name: WEB_SEARCH_TOOL_NAME,
    description: 'Search the web for current information. Use for news, recent events or facts that may have changed.',
    parameters: WebSearchInputSchema,
    async execute(input, context) {
      if (!options.apiKey || !options.searchEngineId) {
        return errored('Web search not configured');
      }

      const url = new URL(options.endpoint);
      url.searchParams.set('key', options.apiKey);
      url.searchParams.set('cx', options.searchEngineId);
      url.searchParams.set('q', input.query);
      url.searchParams.set('num', String(options.maxResults));

      try {
        const response = await fetchImpl(url, { signal: context.signal });
        if (!response.ok) {
          throw new TransportError('web_search', `HTTP ${response.status}`, { statusCode: response.status });
        }

        const parsed = SearchResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
          throw new TransportError('web_search', 'malformed response body');
        }

        const items = parsed.data.items.slice(0, options.maxResults);
        if (items.length === 0) {
          return completed(`No good search results found for "${input.query}".`);
        }

        console.log(`[agent] web search returned ${items.length} results`);
        const text = items
          .map((item, index) => `${index + 1}. ${item.title}\n   ${item.snippet.replace(/\s+/g, ' ').trim()}\n   ${item.link}`)
          .join('\n\n');
        const sources: Citation[] = items.map((item) => ({ source: item.title || item.link, url: item.link }));
        return completed(text, sources);
      } catch (error) {
        if (context.signal?.aborted) {
          throw error;
        }
        console.error(`[agent] web search failed: ${errorMessage(error)}`);
        return errored(`Error: ${errorMessage(error)}`);
      }
    },
  };
}
