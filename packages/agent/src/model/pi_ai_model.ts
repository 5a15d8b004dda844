import { randomUUID } from 'node:crypto';

import { complete, getModel, stream, type AssistantMessage, type ToolCall } from '@mariozechner/pi-ai';
import type { Static, TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

import type { ModelConfig } from '../config.js';
import { GenerationError, TransportError, TurnCancelledError, errorMessage } from '../errors.js';
import { disabledLlmTraceLogger, type LlmTraceKind, type LlmTraceLogger } from '../llm_log.js';
import type { ConversationMessage, ToolCallRequest } from '../types.js';
import type {
  ChatModel,
  ForcedToolCallRequest,
  GenerateOptions,
  GenerationRequest,
  GenerationResult,
  ToolSpec,
} from './chat_model.js';

interface TextBlock {
  type: 'text';
  text: string;
}

interface ToolCallBlock {
  type: 'toolCall';
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

type ContextMessage =
  | { role: 'user'; content: string; timestamp: number }
  | {
      role: 'assistant';
      content: Array<TextBlock | ToolCallBlock>;
      api: string;
      provider: string;
      model: string;
      usage: typeof EMPTY_USAGE;
      stopReason: 'stop' | 'toolUse';
      timestamp: number;
    }
  | {
      role: 'toolResult';
      toolCallId: string;
      toolName: string;
      content: TextBlock[];
      isError: boolean;
      timestamp: number;
    };

interface ModelContext {
  systemPrompt: string;
  messages: ContextMessage[];
  tools: ToolSpec[];
}

const EMPTY_USAGE = {
  input: 0,
  output: 0,
  cacheRead: 0,
  cacheWrite: 0,
  totalTokens: 0,
  cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0, total: 0 },
};

function resolveModel(config: ModelConfig) {
  try {
    return getModel(config.provider as never, config.id as never);
  } catch (error) {
    throw new Error(`[agent] invalid model configuration (${config.provider}/${config.id}): ${errorMessage(error)}`);
  }
}

type ResolvedModel = ReturnType<typeof resolveModel>;

export interface PiAiChatModelOptions {
  model: ModelConfig;
  apiKey: string;
  traceLogger?: LlmTraceLogger;
}

export class PiAiChatModel implements ChatModel {
  public readonly label: string;

  private readonly modelConfig: ModelConfig;
  private readonly apiKey: string;
  private readonly traceLogger: LlmTraceLogger;
  private readonly model: ResolvedModel;

  constructor(options: PiAiChatModelOptions) {
    this.modelConfig = options.model;
    this.apiKey = options.apiKey;
    this.traceLogger = options.traceLogger ?? disabledLlmTraceLogger;
    this.label = `${options.model.provider}/${options.model.id}`;
    this.model = resolveModel(options.model);
  }

  async generate(request: GenerationRequest, options: GenerateOptions = {}): Promise<GenerationResult> {
    const traceId = options.traceId ?? randomUUID();
    const context: ModelContext = {
      systemPrompt: request.systemPrompt,
      messages: this.toContextMessages(request.messages),
      tools: request.tools,
    };

    await this.trace('chat', 'request', traceId, context);

    let assistantMessage: AssistantMessage;
    try {
      const eventStream = stream(this.model as never, context as never, {
        apiKey: this.apiKey,
        signal: options.signal,
      });

      for await (const event of eventStream) {
        if (event.type === 'text_delta') {
          options.onTextDelta?.(event.delta);
        }
      }

      assistantMessage = await eventStream.result();
    } catch (error) {
      await this.trace('chat', 'error', traceId, error);
      if (options.signal?.aborted) {
        throw new TurnCancelledError();
      }

      throw new TransportError('model', `chat request failed: ${errorMessage(error)}`, { cause: error });
    }

    await this.trace('chat', 'response', traceId, assistantMessage);
    this.assertUsableResponse(assistantMessage, 'Chat', options.signal);

    const textParts: string[] = [];
    const requests: ToolCallRequest[] = [];

    for (const block of assistantMessage.content) {
      if (block.type === 'text') {
        textParts.push(block.text);
      } else if (block.type === 'toolCall') {
        requests.push({ id: block.id, name: block.name, arguments: { ...block.arguments } });
      }
    }

    const text = textParts.join('');
    if (requests.length > 0) {
      return { kind: 'tool_requests', text, requests };
    }

    return { kind: 'final_answer', text };
  }

  async callTool<TParams extends TSchema>(request: ForcedToolCallRequest<TParams>): Promise<Static<TParams>> {
    const traceId = request.traceId ?? randomUUID();
    const context: ModelContext = {
      systemPrompt: request.systemPrompt,
      messages: [{ role: 'user', content: request.userText, timestamp: Date.now() }],
      tools: [request.tool],
    };

    await this.trace('memory', 'request', traceId, context);

    let assistantMessage: AssistantMessage;
    try {
      assistantMessage = await complete(this.model as never, context as never, {
        apiKey: this.apiKey,
        signal: request.signal,
      });
    } catch (error) {
      await this.trace('memory', 'error', traceId, error);
      throw new TransportError('model', `tool request failed: ${errorMessage(error)}`, { cause: error });
    }

    await this.trace('memory', 'response', traceId, assistantMessage);
    this.assertUsableResponse(assistantMessage, 'Tool', request.signal);

    const toolCall = assistantMessage.content.find(
      (block): block is ToolCall => block.type === 'toolCall' && block.name === request.tool.name,
    );
    if (!toolCall) {
      throw new GenerationError(`Model did not call required tool: ${request.tool.name}`);
    }

    const args: unknown = toolCall.arguments;
    if (!Value.Check(request.tool.parameters, args)) {
      const details = [...Value.Errors(request.tool.parameters, args)]
        .map((issue) => `${issue.path || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new GenerationError(`Invalid tool arguments from model for ${request.tool.name}: ${details}`);
    }

    return args;
  }

  private assertUsableResponse(message: AssistantMessage, label: string, signal: AbortSignal | undefined): void {
    if (message.stopReason === 'aborted' || signal?.aborted) {
      throw new TurnCancelledError();
    }

    if (message.stopReason === 'error') {
      const detail =
        typeof message.errorMessage === 'string' && message.errorMessage.length > 0
          ? message.errorMessage
          : `${label} model returned an error response.`;
      throw new GenerationError(detail);
    }
  }

  private toContextMessages(messages: ConversationMessage[]): ContextMessage[] {
    return messages.map((message): ContextMessage => {
      switch (message.role) {
        case 'user':
          return { role: 'user', content: message.content, timestamp: message.createdAtMs };
        case 'assistant': {
          const toolCalls = message.toolCalls ?? [];
          const content: Array<TextBlock | ToolCallBlock> = [];
          if (message.content.length > 0) {
            content.push({ type: 'text', text: message.content });
          }
          for (const call of toolCalls) {
            content.push({ type: 'toolCall', id: call.id, name: call.name, arguments: call.arguments });
          }

          return {
            role: 'assistant',
            content,
            api: this.model.api,
            provider: this.modelConfig.provider,
            model: this.modelConfig.id,
            usage: EMPTY_USAGE,
            stopReason: toolCalls.length > 0 ? 'toolUse' : 'stop',
            timestamp: message.createdAtMs,
          };
        }
        case 'tool':
          return {
            role: 'toolResult',
            toolCallId: message.toolCallId,
            toolName: message.toolName,
            content: [{ type: 'text', text: message.content }],
            isError: message.isError,
            timestamp: message.createdAtMs,
          };
      }
    });
  }

  private async trace(kind: LlmTraceKind, phase: 'request' | 'response' | 'error', traceId: string, payload: unknown) {
    await this.traceLogger.log({
      kind,
      phase,
      traceId,
      model: { provider: this.modelConfig.provider, id: this.modelConfig.id },
      payload,
    });
  }
}
