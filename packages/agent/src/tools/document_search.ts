import { Type } from '@sinclair/typebox';

import type { Citation } from '../types.js';
import type { DocumentChunkMatch, DocumentIndex } from '../vectorstore/document_index.js';
import { completed, type AgentTool } from './types.js';

export const DOCUMENT_SEARCH_TOOL_NAME = 'search_my_documents';

const MAX_SECTION_CHARS = 400;

export const DocumentSearchInputSchema = Type.Object({
  query: Type.String({ minLength: 1, description: 'What to look for in the uploaded documents.' }),
});

export const NO_DOCUMENTS_TEXT = [
  "I don't see any uploaded documents in your account yet.",
  '',
  'To use this feature:',
  '1. Upload a document',
  '2. Wait for processing to complete',
  '3. Ask me questions about your document',
].join('\n');

export const NO_MATCHES_TEXT = [
  "I couldn't find any relevant information in your documents for this query.",
  'Try rephrasing your question or check if the information is in your uploaded files.',
].join('\n');

function truncateSection(text: string): string {
  const content = text.trim();
  return content.length > MAX_SECTION_CHARS ? `${content.slice(0, MAX_SECTION_CHARS - 3)}...` : content;
}

export function formatDocumentMatches(matches: DocumentChunkMatch[]): string {
  const lines = [`I found ${matches.length} relevant sections in your documents:\n`];

  matches.forEach((match, index) => {
    lines.push(`\n**Source ${index + 1}: ${match.source}, Page ${match.page}**\n${truncateSection(match.text)}\n`);
  });

  return lines.join('\n');
}

function toCitations(matches: DocumentChunkMatch[]): Citation[] {
  const seen = new Set<string>();
  const citations: Citation[] = [];

  for (const match of matches) {
    const key = `${match.source}#${match.page}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    citations.push({ source: match.source, page: match.page });
  }

  return citations;
}

export interface DocumentSearchToolOptions {
  index: DocumentIndex;
  topK: number;
}

export function createDocumentSearchTool(options: DocumentSearchToolOptions): AgentTool<typeof DocumentSearchInputSchema> {
  return {
    name: DOCUMENT_SEARCH_TOOL_NAME,
    description:
      "Search the user's uploaded documents. Use when the user mentions 'my document', 'my file', " +
      'or anything they uploaded.',
    parameters: DocumentSearchInputSchema,
    async execute(input, context) {
      const result = await options.index.query(context.userId, input.query, options.topK, context.signal);

      if (result.status === 'unavailable') {
        console.log(`[agent] no document index for user ${context.userId}`);
        return completed(NO_DOCUMENTS_TEXT);
      }

      if (result.matches.length === 0) {
        return completed(NO_MATCHES_TEXT);
      }

      console.log(`[agent] document search found ${result.matches.length} chunks for user ${context.userId}`);
      return completed(formatDocumentMatches(result.matches), toCitations(result.matches));
    },
  };
}
