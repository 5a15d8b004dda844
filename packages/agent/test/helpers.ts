import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';

import type { Static, TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

import { parseAgentConfig, type AgentConfig } from '../src/config.js';
import { throwIfAborted } from '../src/errors.js';
import type {
  ChatModel,
  ForcedToolCallRequest,
  GenerateOptions,
  GenerationRequest,
  GenerationResult,
} from '../src/model/chat_model.js';
import { createAgentRuntime, type AgentRuntime } from '../src/runtime.js';
import type { StreamChunk } from '../src/stream/protocol.js';
import type { FetchLike } from '../src/tools/types.js';
import type { ConversationMessage } from '../src/types.js';

export type Responder = (request: GenerationRequest, callIndex: number) => GenerationResult | Promise<GenerationResult>;
export type Decider = (userText: string, systemPrompt: string) => unknown;

export interface ScriptedChatModelOptions {
  respond: Responder;
  decide?: Decider;
  /** Delay before each generation; honours the abort signal. */
  delayMs?: number;
}

/** Deterministic stand-in for the hosted model; streams final text word by word. */
export class ScriptedChatModel implements ChatModel {
  public readonly label = 'scripted/test';
  public readonly requests: GenerationRequest[] = [];
  public readonly memoryCalls: string[] = [];

  constructor(private readonly options: ScriptedChatModelOptions) {}

  async generate(request: GenerationRequest, options: GenerateOptions = {}): Promise<GenerationResult> {
    throwIfAborted(options.signal);
    const callIndex = this.requests.length;
    this.requests.push({ ...request, messages: [...request.messages] });

    if (this.options.delayMs !== undefined) {
      await sleep(this.options.delayMs, undefined, { signal: options.signal });
    }

    const result = await this.options.respond(request, callIndex);
    for (const piece of result.text.match(/\S+\s*/g) ?? []) {
      options.onTextDelta?.(piece);
    }

    return result;
  }

  async callTool<TParams extends TSchema>(request: ForcedToolCallRequest<TParams>): Promise<Static<TParams>> {
    this.memoryCalls.push(request.userText);
    const payload = this.options.decide
      ? this.options.decide(request.userText, request.systemPrompt)
      : { should_write: false, memories: [] };

    if (!Value.Check(request.tool.parameters, payload)) {
      throw new Error(`scripted payload does not match ${request.tool.name}`);
    }

    return payload;
  }
}

export function lastMessage(request: GenerationRequest): ConversationMessage | undefined {
  return request.messages[request.messages.length - 1];
}

export function finalAnswer(text: string): GenerationResult {
  return { kind: 'final_answer', text };
}

export function toolRequest(id: string, name: string, args: Record<string, unknown>, text = ''): GenerationResult {
  return { kind: 'tool_requests', text, requests: [{ id, name, arguments: args }] };
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

export function contentText(chunks: StreamChunk[]): string {
  return chunks.map((chunk) => (chunk.type === 'content' ? chunk.data : '')).join('');
}

export async function makeTempDir(): Promise<string> {
  return await mkdtemp(path.join(os.tmpdir(), 'recall-agent-'));
}

export function makeTestConfig(dir: string, overrides: Record<string, unknown> = {}): AgentConfig {
  return parseAgentConfig(
    {
      server: { port: 8790 },
      data: { dir: './data' },
      secretsFile: './agent.secrets.json',
      ...overrides,
    },
    path.join(dir, 'agent.config.json'),
  );
}

export interface TestRuntime {
  runtime: AgentRuntime;
  config: AgentConfig;
  dir: string;
  cleanup(): Promise<void>;
}

export async function createTestRuntime(
  model: ChatModel,
  options: { config?: Record<string, unknown>; fetch?: FetchLike } = {},
): Promise<TestRuntime> {
  const dir = await makeTempDir();
  const config = makeTestConfig(dir, options.config);
  const runtime = createAgentRuntime({
    config,
    secrets: { openaiApiKey: 'test-secret' },
    overrides: { model, fetch: options.fetch },
  });
  await runtime.init();

  return {
    runtime,
    config,
    dir,
    async cleanup() {
      await runtime.shutdown();
      await rm(dir, { recursive: true, force: true });
    },
  };
}
