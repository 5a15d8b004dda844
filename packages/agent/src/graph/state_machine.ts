import type { CheckpointStore } from '../checkpoint/sqlite_checkpointer.js';
import { AgentError, GenerationError, TurnCancelledError, errorMessage, throwIfAborted } from '../errors.js';
import type { MemoryExtractor } from '../memory/extractor.js';
import type { FactStore } from '../memory/fact_store.js';
import type { ChatModel, GenerationResult } from '../model/chat_model.js';
import { buildChatSystemPrompt } from '../prompts/chat.js';
import type { ToolExecutor } from '../tools/executor.js';
import type { ToolContext } from '../tools/types.js';
import type { Citation, ConversationMessage, ThreadKey } from '../types.js';
import type { TurnEventSink, TurnRequest, TurnResult, TurnState } from './events.js';

const TRANSITIONS: Record<TurnState, readonly TurnState[]> = {
  START: ['MEMORY_EXTRACTION'],
  MEMORY_EXTRACTION: ['RESPONSE_GENERATION'],
  RESPONSE_GENERATION: ['TOOL_EXECUTION', 'TERMINAL'],
  TOOL_EXECUTION: ['RESPONSE_GENERATION'],
  TERMINAL: [],
};

export class IllegalTransitionError extends Error {
  constructor(from: TurnState, to: TurnState) {
    super(`[agent] illegal turn transition ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export function canTransition(from: TurnState, to: TurnState): boolean {
  return TRANSITIONS[from].includes(to);
}

class TurnStateTracker {
  private current: TurnState = 'START';

  constructor(private readonly emit: TurnEventSink) {}

  get state(): TurnState {
    return this.current;
  }

  transition(to: TurnState): void {
    const from = this.current;
    if (!canTransition(from, to)) {
      throw new IllegalTransitionError(from, to);
    }

    this.current = to;
    this.emit({ type: 'state', from, to });
  }
}

export interface ConversationEngineOptions {
  model: ChatModel;
  memoryExtractor: MemoryExtractor;
  factStore: FactStore;
  checkpoints: CheckpointStore;
  tools: ToolExecutor;
  maxToolRounds: number;
}

function citationKey(citation: Citation): string {
  return `${citation.source}|${citation.page ?? ''}|${citation.url ?? ''}`;
}

/**
 * Runs one turn: memory extraction, then generation with a bounded tool loop.
 * Messages produced by the turn are committed together once the final answer
 * exists; a failed or cancelled turn leaves the thread untouched.
 */
export class ConversationEngine {
  constructor(private readonly options: ConversationEngineOptions) {}

  async run(request: TurnRequest, emit: TurnEventSink, signal: AbortSignal): Promise<TurnResult> {
    const key: ThreadKey = { userId: request.userId, threadId: request.threadId };
    const tracker = new TurnStateTracker(emit);

    tracker.transition('MEMORY_EXTRACTION');
    emit({ type: 'status', step: 'memory', status: 'retrieving' });
    const { facts, written } = await this.rememberFacts(request, emit, signal);
    throwIfAborted(signal);

    const history = this.options.checkpoints.loadMessages(key);
    const pending: ConversationMessage[] = [{ role: 'user', content: request.message, createdAtMs: Date.now() }];
    const systemPrompt = buildChatSystemPrompt(facts);
    const toolContext: ToolContext = { userId: request.userId, threadId: request.threadId, signal };
    const sources = new Map<string, Citation>();
    let toolRounds = 0;

    for (let step = 0; ; step += 1) {
      tracker.transition('RESPONSE_GENERATION');
      emit({ type: 'generation_step', step });

      const result = await this.generate(systemPrompt, [...history, ...pending], step, emit, signal);

      if (result.kind === 'final_answer') {
        tracker.transition('TERMINAL');
        const citations = Array.from(sources.values());
        pending.push({
          role: 'assistant',
          content: result.text,
          ...(citations.length > 0 ? { sources: citations } : {}),
          createdAtMs: Date.now(),
        });

        throwIfAborted(signal);
        this.options.checkpoints.appendMessages(key, pending);

        emit({ type: 'step_resolved', step, kind: 'final_answer', text: result.text });
        if (citations.length > 0) {
          emit({ type: 'sources', sources: citations });
        }

        console.log(
          `[agent] turn complete user=${request.userId} thread=${request.threadId} tool_rounds=${toolRounds} messages=${pending.length}`,
        );
        return { answer: result.text, sources: citations, toolRounds, factsWritten: written };
      }

      emit({ type: 'step_resolved', step, kind: 'tool_requests', text: result.text });
      toolRounds += 1;
      if (toolRounds > this.options.maxToolRounds) {
        throw new GenerationError(`Tool loop exceeded ${this.options.maxToolRounds} rounds without a final answer.`);
      }

      tracker.transition('TOOL_EXECUTION');
      pending.push({ role: 'assistant', content: result.text, toolCalls: result.requests, createdAtMs: Date.now() });

      for (const call of result.requests) {
        emit({ type: 'tool_start', callId: call.id, tool: call.name, input: call.arguments });
        const outcome = await this.options.tools.execute(call, toolContext);
        throwIfAborted(signal);
        emit({ type: 'tool_complete', callId: call.id, tool: call.name, status: outcome.status, output: outcome.text });

        for (const citation of outcome.sources ?? []) {
          sources.set(citationKey(citation), citation);
        }

        pending.push({
          role: 'tool',
          content: outcome.text,
          toolName: call.name,
          toolCallId: call.id,
          isError: outcome.status === 'errored',
          createdAtMs: Date.now(),
        });
      }
    }
  }

  private async rememberFacts(
    request: TurnRequest,
    emit: TurnEventSink,
    signal: AbortSignal,
  ): Promise<{ facts: string[]; written: number }> {
    let facts: string[] = [];
    try {
      facts = this.options.factStore.listFacts(request.userId).map((fact) => fact.text);
    } catch (error) {
      console.warn(`[agent] failed to read memory facts for user ${request.userId}: ${errorMessage(error)}`);
    }

    const decision = await this.options.memoryExtractor.extract(facts, request.message, signal);
    let written = 0;

    if (decision.shouldPersist) {
      for (const fact of decision.facts) {
        if (!fact.isNew) {
          continue;
        }

        try {
          this.options.factStore.addFact(request.userId, fact.text);
          facts.push(fact.text);
          written += 1;
        } catch (error) {
          console.warn(`[agent] failed to store memory fact for user ${request.userId}: ${errorMessage(error)}`);
        }
      }
    }

    if (written > 0) {
      console.log(`[agent] stored ${written} memory facts for user ${request.userId}`);
    }
    emit({ type: 'memory', candidates: decision.facts.length, written });
    return { facts, written };
  }

  private async generate(
    systemPrompt: string,
    messages: ConversationMessage[],
    step: number,
    emit: TurnEventSink,
    signal: AbortSignal,
  ): Promise<GenerationResult> {
    try {
      return await this.options.model.generate(
        { systemPrompt, messages, tools: this.options.tools.specs },
        { signal, onTextDelta: (delta) => emit({ type: 'text_delta', step, delta }) },
      );
    } catch (error) {
      if (error instanceof TurnCancelledError || signal.aborted) {
        throw error instanceof TurnCancelledError ? error : new TurnCancelledError();
      }
      if (error instanceof AgentError) {
        throw error;
      }

      throw new GenerationError(`Response generation failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
