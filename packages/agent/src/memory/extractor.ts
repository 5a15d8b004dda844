import { Type, type Static } from '@sinclair/typebox';

import { MemoryExtractionError, errorMessage } from '../errors.js';
import type { ChatModel, ToolSpec } from '../model/chat_model.js';
import { buildMemorySystemPrompt, buildMemoryUserPrompt } from '../prompts/memory.js';

export const MEMORY_DECISION_TOOL_NAME = 'record_memory_decision';

export const MemoryDecisionSchema = Type.Object({
  should_write: Type.Boolean(),
  memories: Type.Array(
    Type.Object({
      text: Type.String(),
      is_new: Type.Boolean(),
    }),
  ),
});

export type MemoryDecisionPayload = Static<typeof MemoryDecisionSchema>;

export const MEMORY_DECISION_TOOL: ToolSpec<typeof MemoryDecisionSchema> = {
  name: MEMORY_DECISION_TOOL_NAME,
  description:
    'Record whether the latest user message contains durable personal facts. Call exactly once with should_write and memories [{text, is_new}].',
  parameters: MemoryDecisionSchema,
};

export interface CandidateFact {
  text: string;
  isNew: boolean;
}

export interface MemoryDecision {
  shouldPersist: boolean;
  facts: CandidateFact[];
}

export const EMPTY_MEMORY_DECISION: MemoryDecision = { shouldPersist: false, facts: [] };

export function normalizeFactText(text: string): string {
  return text.replace(/\s+/g, ' ').trim().toLowerCase();
}

/** Applies the stored-fact comparison on top of whatever the model claimed. */
export function reconcileDecision(payload: MemoryDecisionPayload, existingFacts: string[]): MemoryDecision {
  const known = new Set(existingFacts.map(normalizeFactText));
  const facts: CandidateFact[] = [];

  for (const memory of payload.memories) {
    const text = memory.text.trim();
    if (!text) {
      continue;
    }

    const normalized = normalizeFactText(text);
    const isNew = memory.is_new && !known.has(normalized);
    facts.push({ text, isNew });
    if (isNew) {
      known.add(normalized);
    }
  }

  return {
    shouldPersist: payload.should_write && facts.some((fact) => fact.isNew),
    facts,
  };
}

export class MemoryExtractor {
  constructor(private readonly model: ChatModel) {}

  /** Asks the model for a decision. Backend faults surface as {@link MemoryExtractionError}. */
  async decide(existingFacts: string[], latestMessage: string, signal?: AbortSignal): Promise<MemoryDecision> {
    try {
      const payload = await this.model.callTool({
        systemPrompt: buildMemorySystemPrompt({ existingFacts }),
        userText: buildMemoryUserPrompt(latestMessage),
        tool: MEMORY_DECISION_TOOL,
        signal,
      });

      return reconcileDecision(payload, existingFacts);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }

      throw new MemoryExtractionError(`memory extraction failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  /** Like {@link decide}, but a failed extraction means "nothing to remember". */
  async extract(existingFacts: string[], latestMessage: string, signal?: AbortSignal): Promise<MemoryDecision> {
    try {
      return await this.decide(existingFacts, latestMessage, signal);
    } catch (error) {
      if (!(error instanceof MemoryExtractionError)) {
        throw error;
      }

      console.warn(`[agent] ${error.message}`);
      return EMPTY_MEMORY_DECISION;
    }
  }
}
