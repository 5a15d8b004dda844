export interface Citation {
  source: string;
  page?: number;
  url?: string;
}

export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface UserMessage {
  role: 'user';
  content: string;
  createdAtMs: number;
}

export interface AssistantMessage {
  role: 'assistant';
  content: string;
  /** Present when this message asked for tools rather than answering. */
  toolCalls?: ToolCallRequest[];
  sources?: Citation[];
  createdAtMs: number;
}

export interface ToolMessage {
  role: 'tool';
  content: string;
  toolName: string;
  toolCallId: string;
  isError: boolean;
  createdAtMs: number;
}

export type ConversationMessage = UserMessage | AssistantMessage | ToolMessage;

export interface ThreadKey {
  userId: string;
  threadId: string;
}

export interface HistoryEntry {
  role: 'user' | 'assistant';
  content: string;
}

export interface ThreadSummary {
  threadId: string;
  title: string;
  createdAtMs: number;
  updatedAtMs: number;
}

export function isFinalAssistantMessage(message: ConversationMessage): message is AssistantMessage {
  return message.role === 'assistant' && (message.toolCalls === undefined || message.toolCalls.length === 0);
}
