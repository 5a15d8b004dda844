import type { ToolStatus } from '../tools/types.js';
import type { Citation } from '../types.js';

export type TurnState = 'START' | 'MEMORY_EXTRACTION' | 'RESPONSE_GENERATION' | 'TOOL_EXECUTION' | 'TERMINAL';

/**
 * Everything the engine reports while a turn runs. The multiplexer decides
 * which of these reach the consumer; `state` and `memory` never do.
 */
export type TurnEvent =
  | { type: 'state'; from: TurnState; to: TurnState }
  | { type: 'status'; step: 'memory'; status: 'retrieving' }
  | { type: 'memory'; candidates: number; written: number }
  | { type: 'generation_step'; step: number }
  | { type: 'text_delta'; step: number; delta: string }
  | { type: 'step_resolved'; step: number; kind: 'final_answer' | 'tool_requests'; text: string }
  | { type: 'tool_start'; callId: string; tool: string; input: Record<string, unknown> }
  | { type: 'tool_complete'; callId: string; tool: string; status: ToolStatus; output: string }
  | { type: 'sources'; sources: Citation[] };

export type TurnEventSink = (event: TurnEvent) => void;

export interface TurnRequest {
  userId: string;
  threadId: string;
  message: string;
}

export interface TurnResult {
  answer: string;
  sources: Citation[];
  toolRounds: number;
  factsWritten: number;
}
