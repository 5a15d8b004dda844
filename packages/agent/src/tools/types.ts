import type { Static, TSchema } from '@sinclair/typebox';

import type { ToolSpec } from '../model/chat_model.js';
import type { Citation } from '../types.js';

/**
 * Per-turn ambient values handed to every tool call. Identity travels here
 * rather than in the tool's input schema, so the model can never choose whose
 * documents are read.
 */
export interface ToolContext {
  readonly userId: string;
  readonly threadId: string;
  readonly signal?: AbortSignal;
}

export type ToolStatus = 'completed' | 'errored';

export interface ToolResult {
  text: string;
  status: ToolStatus;
  sources?: Citation[];
}

export interface AgentTool<TParams extends TSchema = TSchema> extends ToolSpec<TParams> {
  execute(input: Static<TParams>, context: ToolContext): Promise<ToolResult>;
}

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export function completed(text: string, sources?: Citation[]): ToolResult {
  return sources && sources.length > 0 ? { text, status: 'completed', sources } : { text, status: 'completed' };
}

export function errored(text: string): ToolResult {
  return { text, status: 'errored' };
}
