import { Type } from '@sinclair/typebox';
import { describe, expect, it } from 'vitest';

import { ToolExecutionError, TurnCancelledError } from '../src/errors.js';
import { createCalculatorTool } from '../src/tools/calculator.js';
import {
  NO_DOCUMENTS_TEXT,
  NO_MATCHES_TEXT,
  createDocumentSearchTool,
} from '../src/tools/document_search.js';
import { ToolExecutor } from '../src/tools/executor.js';
import { createPageFetchTool, htmlToText } from '../src/tools/page_fetch.js';
import type { AgentTool, FetchLike, ToolContext } from '../src/tools/types.js';
import { createWebSearchTool } from '../src/tools/web_search.js';
import type { DocumentIndex, DocumentQueryResult } from '../src/vectorstore/document_index.js';

const context: ToolContext = { userId: 'alice', threadId: 'thread-1' };

function stubFetch(handler: (url: string) => Response): { fetch: FetchLike; urls: string[] } {
  const urls: string[] = [];
  return {
    urls,
    fetch: async (input) => {
      const url = String(input);
      urls.push(url);
      return handler(url);
    },
  };
}

function fakeIndex(result: DocumentQueryResult, seen: string[] = []): DocumentIndex {
  return {
    ingest: async () => ({ ok: false, error: 'not supported' }),
    query: async (userId, text) => {
      seen.push(`${userId}:${text}`);
      return result;
    },
    hasIndex: async () => result.status === 'ok',
    deleteIndex: async () => false,
    close: async () => undefined,
  };
}

describe('ToolExecutor', () => {
  const failingTool: AgentTool = {
    name: 'boom_tool',
    description: 'always fails',
    parameters: Type.Object({}),
    execute: async () => {
      throw new Error('kaboom');
    },
  };
  const quotaTool: AgentTool = {
    name: 'quota_tool',
    description: 'reports its own failure text',
    parameters: Type.Object({}),
    execute: async () => {
      throw new ToolExecutionError('quota_tool', 'daily quota exhausted');
    },
  };
  const executor = new ToolExecutor([createCalculatorTool(), failingTool, quotaTool]);

  it('lists the specs the model sees', () => {
    expect(executor.specs.map((spec) => spec.name)).toEqual(['calculator', 'boom_tool', 'quota_tool']);
  });

  it('runs a known tool', async () => {
    const result = await executor.execute(
      { id: 'c1', name: 'calculator', arguments: { expression: '6 * 7' } },
      context,
    );
    expect(result).toEqual({ text: 'Result: 42', status: 'completed' });
  });

  it('turns an unknown tool into an errored result', async () => {
    expect(await executor.execute({ id: 'c1', name: 'nope', arguments: {} }, context)).toEqual({
      text: 'Error: unknown tool "nope". Available tools: calculator, boom_tool, quota_tool',
      status: 'errored',
    });
  });

  it('turns invalid arguments into an errored result', async () => {
    const result = await executor.execute({ id: 'c1', name: 'calculator', arguments: { expression: 5 } }, context);
    expect(result.status).toBe('errored');
    expect(result.text.startsWith('Error: invalid arguments for calculator: /expression:')).toBe(true);
  });

  it('turns a thrown error into an errored result', async () => {
    expect(await executor.execute({ id: 'c1', name: 'boom_tool', arguments: {} }, context)).toEqual({
      text: 'Error: boom_tool failed: kaboom',
      status: 'errored',
    });
  });

  it('keeps the message of a ToolExecutionError thrown by the tool', async () => {
    expect(await executor.execute({ id: 'c1', name: 'quota_tool', arguments: {} }, context)).toEqual({
      text: 'Error: daily quota exhausted',
      status: 'errored',
    });
  });

  it('propagates cancellation', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      executor.execute({ id: 'c1', name: 'calculator', arguments: { expression: '1' } }, { ...context, signal: controller.signal }),
    ).rejects.toBeInstanceOf(TurnCancelledError);
  });

  it('rejects duplicate tool names', () => {
    expect(() => new ToolExecutor([createCalculatorTool(), createCalculatorTool()])).toThrow(
      '[agent] duplicate tool name: calculator',
    );
  });
});

describe('search_my_documents', () => {
  it('explains how to upload when the user has no index', async () => {
    const tool = createDocumentSearchTool({ index: fakeIndex({ status: 'unavailable' }), topK: 4 });
    expect(await tool.execute({ query: 'resume' }, context)).toEqual({ text: NO_DOCUMENTS_TEXT, status: 'completed' });
    expect(NO_DOCUMENTS_TEXT.startsWith("I don't see any uploaded documents in your account yet.")).toBe(true);
  });

  it('says when nothing matched', async () => {
    const tool = createDocumentSearchTool({ index: fakeIndex({ status: 'ok', matches: [] }), topK: 4 });
    expect((await tool.execute({ query: 'resume' }, context)).text).toBe(NO_MATCHES_TEXT);
  });

  it('formats matches with truncation and citations, querying as the context user', async () => {
    const seen: string[] = [];
    const index = fakeIndex(
      {
        status: 'ok',
        matches: [
          { id: 'r1', documentId: 'd1', source: 'a.pdf', page: 3, chunkIndex: 0, text: 'x'.repeat(500), score: 0.9 },
          { id: 'r2', documentId: 'd2', source: 'b.txt', page: 1, chunkIndex: 0, text: '  short  ', score: 0.5 },
        ],
      },
      seen,
    );
    const tool = createDocumentSearchTool({ index, topK: 4 });

    const result = await tool.execute({ query: 'budget' }, context);

    expect(seen).toEqual(['alice:budget']);
    expect(result.text).toBe(
      'I found 2 relevant sections in your documents:\n' +
        '\n' +
        '\n**Source 1: a.pdf, Page 3**\n' +
        `${'x'.repeat(397)}...\n` +
        '\n' +
        '\n**Source 2: b.txt, Page 1**\n' +
        'short\n',
    );
    expect(result.sources).toEqual([
      { source: 'a.pdf', page: 3 },
      { source: 'b.txt', page: 1 },
    ]);
  });
});

describe('web_search', () => {
  const baseOptions = { endpoint: 'https://search.example/v1', maxResults: 5 };

  it('reports missing configuration', async () => {
    const tool = createWebSearchTool(baseOptions);
    expect(await tool.execute({ query: 'news' }, context)).toEqual({ text: 'Web search not configured', status: 'errored' });
  });

  it('formats results with links', async () => {
    const stub = stubFetch(() =>
      Response.json({ items: [{ title: 'Result A', link: 'https://a.example/', snippet: 'First \n snippet' }] }),
    );
    const tool = createWebSearchTool({ ...baseOptions, apiKey: 'test-secret', searchEngineId: 'test-cse', fetch: stub.fetch });

    const result = await tool.execute({ query: 'latest news' }, context);

    expect(result).toEqual({
      text: '1. Result A\n   First snippet\n   https://a.example/',
      status: 'completed',
      sources: [{ source: 'Result A', url: 'https://a.example/' }],
    });
    expect(stub.urls).toEqual(['https://search.example/v1?key=test-secret&cx=test-cse&q=latest+news&num=5']);
  });

  it('reports an empty result set', async () => {
    const stub = stubFetch(() => Response.json({}));
    const tool = createWebSearchTool({ ...baseOptions, apiKey: 'test-secret', searchEngineId: 'test-cse', fetch: stub.fetch });

    expect((await tool.execute({ query: 'zzz' }, context)).text).toBe('No good search results found for "zzz".');
  });

  it('turns HTTP failures into text', async () => {
    const stub = stubFetch(() => new Response('quota', { status: 429 }));
    const tool = createWebSearchTool({ ...baseOptions, apiKey: 'test-secret', searchEngineId: 'test-cse', fetch: stub.fetch });

    expect(await tool.execute({ query: 'zzz' }, context)).toEqual({ text: 'Error: web_search: HTTP 429', status: 'errored' });
  });
});

describe('fetch_page', () => {
  it('reduces HTML to text', async () => {
    const stub = stubFetch(
      () =>
        new Response('<html><body><h1>Title</h1><p>Hello &amp; welcome</p><script>x()</script></body></html>', {
          headers: { 'content-type': 'text/html; charset=utf-8' },
        }),
    );
    const tool = createPageFetchTool({ maxChars: 2000, fetch: stub.fetch });

    expect(await tool.execute({ url: 'https://example.com/page' }, context)).toEqual({
      text: 'Content from https://example.com/page:\n\nTitle\nHello & welcome',
      status: 'completed',
      sources: [{ source: 'example.com', url: 'https://example.com/page' }],
    });
  });

  it('keeps only the first maxChars characters', async () => {
    const stub = stubFetch(() => new Response('y'.repeat(3000), { headers: { 'content-type': 'text/plain' } }));
    const tool = createPageFetchTool({ maxChars: 2000, fetch: stub.fetch });

    const result = await tool.execute({ url: 'https://example.com/long' }, context);
    expect(result.text).toBe(`Content from https://example.com/long:\n\n${'y'.repeat(2000)}`);
  });

  it('reports empty pages', async () => {
    const stub = stubFetch(() => new Response('<html><body> </body></html>', { headers: { 'content-type': 'text/html' } }));
    const tool = createPageFetchTool({ maxChars: 2000, fetch: stub.fetch });

    expect((await tool.execute({ url: 'https://example.com/empty' }, context)).text).toBe('No content found');
  });

  it('refuses non-http URLs without fetching', async () => {
    const stub = stubFetch(() => new Response('unused'));
    const tool = createPageFetchTool({ maxChars: 2000, fetch: stub.fetch });

    expect(await tool.execute({ url: 'file:///etc/passwd' }, context)).toEqual({
      text: 'Error: only http(s) URLs can be fetched, got file:',
      status: 'errored',
    });
    expect(stub.urls).toEqual([]);
  });

  it('turns HTTP failures into text', async () => {
    const stub = stubFetch(() => new Response('down', { status: 500 }));
    const tool = createPageFetchTool({ maxChars: 2000, fetch: stub.fetch });

    expect((await tool.execute({ url: 'https://example.com/down' }, context)).text).toBe(
      'Error: fetch_page: HTTP 500 for https://example.com/down',
    );
  });

  it('decodes numeric entities and drops comments', () => {
    expect(htmlToText('<p>A&#39;s <!-- hidden --> &#x41;</p>')).toBe("A's A");
  });

  it('leaves out-of-range numeric entities as written', async () => {
    const stub = stubFetch(
      () => new Response('<p>Hello world &#99999999; end &#x110000;</p>', { headers: { 'content-type': 'text/html' } }),
    );
    const tool = createPageFetchTool({ maxChars: 2000, fetch: stub.fetch });

    expect(await tool.execute({ url: 'https://example.com/odd' }, context)).toEqual({
      text: 'Content from https://example.com/odd:\n\nHello world &#99999999; end &#x110000;',
      status: 'completed',
      sources: [{ source: 'example.com', url: 'https://example.com/odd' }],
    });
  });
});
