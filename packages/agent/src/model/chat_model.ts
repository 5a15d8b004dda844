import type { Static, TSchema } from '@sinclair/typebox';

import type { ConversationMessage, ToolCallRequest } from '../types.js';

export interface ToolSpec<TParams extends TSchema = TSchema> {
  name: string;
  description: string;
  parameters: TParams;
}

export interface GenerationRequest {
  systemPrompt: string;
  messages: ConversationMessage[];
  tools: ToolSpec[];
}

export interface GenerateOptions {
  signal?: AbortSignal;
  traceId?: string;
  onTextDelta?: (delta: string) => void;
}

/**
 * What one response-generation step produced. The state machine switches on
 * `kind`; nothing else about the model's output decides whether tools run.
 */
export type GenerationResult =
  | { kind: 'final_answer'; text: string }
  | { kind: 'tool_requests'; text: string; requests: ToolCallRequest[] };

export interface ForcedToolCallRequest<TParams extends TSchema> {
  systemPrompt: string;
  userText: string;
  tool: ToolSpec<TParams>;
  signal?: AbortSignal;
  traceId?: string;
}

export interface ChatModel {
  readonly label: string;
  generate(request: GenerationRequest, options?: GenerateOptions): Promise<GenerationResult>;
  /** Forces a single call of `tool` and returns its validated arguments. */
  callTool<TParams extends TSchema>(request: ForcedToolCallRequest<TParams>): Promise<Static<TParams>>;
}
