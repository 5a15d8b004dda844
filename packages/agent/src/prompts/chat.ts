import { CALCULATOR_TOOL_NAME } from '../tools/calculator.js';
import { DOCUMENT_SEARCH_TOOL_NAME } from '../tools/document_search.js';
import { PAGE_FETCH_TOOL_NAME } from '../tools/page_fetch.js';
import { WEB_SEARCH_TOOL_NAME } from '../tools/web_search.js';

export const EMPTY_MEMORY_TEXT = 'No information stored yet.';

export function formatUserMemory(facts: string[]): string {
  if (facts.length === 0) {
    return EMPTY_MEMORY_TEXT;
  }

  return facts.map((fact, index) => `${index + 1}. ${fact}`).join('\n');
}

export function buildChatSystemPrompt(facts: string[]): string {
  return [
    'You are a helpful assistant with long-term memory and a small set of tools.',
    '',
    'What you know about the user:',
    formatUserMemory(facts),
    '',
    'Tool usage:',
    `1. User documents: when the user mentions "my document", "my file" or something they uploaded, call \`${DOCUMENT_SEARCH_TOOL_NAME}\` first, before any other tool or answering from general knowledge.`,
    `2. Calculations: use \`${CALCULATOR_TOOL_NAME}\` for any arithmetic or expression.`,
    `3. Current information: use \`${WEB_SEARCH_TOOL_NAME}\` for news, recent events or anything that may have changed. Never use it for questions about the user's own documents.`,
    `4. Specific pages: use \`${PAGE_FETCH_TOOL_NAME}\` when the user gives a URL.`,
    '5. General knowledge: answer directly when no tool is needed.',
    '',
    'Response guidelines:',
    '- Be conversational and friendly.',
    '- Use what you know about the user naturally; if nothing is known, introduce yourself.',
    '- Cite sources when an answer relies on a tool result.',
    '- Do not make up information.',
    '- After answering, suggest two or three relevant follow-up questions.',
  ].join('\n');
}
