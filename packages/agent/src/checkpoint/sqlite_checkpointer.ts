import { mkdirSync } from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';
import { z } from 'zod';

import type {
  Citation,
  ConversationMessage,
  ThreadKey,
  ThreadSummary,
  ToolCallRequest,
} from '../types.js';

const THREAD_TITLE_MAX_CHARS = 50;

const CHECKPOINT_SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS threads (
    user_id TEXT NOT NULL,
    thread_id TEXT NOT NULL,
    title TEXT NOT NULL,
    created_at_ms INTEGER NOT NULL,
    updated_at_ms INTEGER NOT NULL,
    PRIMARY KEY (user_id, thread_id)
  );
  CREATE TABLE IF NOT EXISTS thread_messages (
    user_id TEXT NOT NULL,
    thread_id TEXT NOT NULL,
    seq INTEGER NOT NULL,
    role TEXT NOT NULL,
    content TEXT NOT NULL,
    tool_name TEXT,
    tool_call_id TEXT,
    is_error INTEGER NOT NULL DEFAULT 0,
    tool_calls_json TEXT,
    sources_json TEXT,
    created_at_ms INTEGER NOT NULL,
    PRIMARY KEY (user_id, thread_id, seq)
  );
  CREATE INDEX IF NOT EXISTS idx_threads_user_updated
    ON threads(user_id, updated_at_ms DESC);
`;

const ToolCallsSchema = z.array(
  z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    arguments: z.record(z.unknown()),
  }),
);

const SourcesSchema = z.array(
  z.object({
    source: z.string(),
    page: z.number().optional(),
    url: z.string().optional(),
  }),
);

interface MessageRow {
  seq: number;
  role: string;
  content: string;
  tool_name: string | null;
  tool_call_id: string | null;
  is_error: number;
  tool_calls_json: string | null;
  sources_json: string | null;
  created_at_ms: number;
}

interface ThreadRow {
  thread_id: string;
  title: string;
  created_at_ms: number;
  updated_at_ms: number;
}

/**
 * Durable conversation state keyed by (user, thread). A turn's messages are
 * appended in one transaction, so a reader sees either all of them or none.
 */
export interface CheckpointStore {
  loadMessages(key: ThreadKey): ConversationMessage[];
  appendMessages(key: ThreadKey, messages: ConversationMessage[]): void;
  listThreads(userId: string): ThreadSummary[];
  close(): void;
}

function buildThreadTitle(text: string): string {
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (normalized.length <= THREAD_TITLE_MAX_CHARS) {
    return normalized || 'New conversation';
  }

  return `${normalized.slice(0, THREAD_TITLE_MAX_CHARS)}...`;
}

function parseJsonColumn<T>(raw: string | null, schema: z.ZodType<T>, label: string): T | undefined {
  if (raw === null || raw.length === 0) {
    return undefined;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw) as unknown;
  } catch {
    console.warn(`[agent] skipping unreadable ${label} column in checkpoint row`);
    return undefined;
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    console.warn(`[agent] skipping invalid ${label} column in checkpoint row`);
    return undefined;
  }

  return parsed.data;
}

function rowToMessage(row: MessageRow): ConversationMessage | null {
  if (row.role === 'user') {
    return { role: 'user', content: row.content, createdAtMs: row.created_at_ms };
  }

  if (row.role === 'assistant') {
    const toolCalls: ToolCallRequest[] | undefined = parseJsonColumn(row.tool_calls_json, ToolCallsSchema, 'tool_calls');
    const sources: Citation[] | undefined = parseJsonColumn(row.sources_json, SourcesSchema, 'sources');

    return {
      role: 'assistant',
      content: row.content,
      ...(toolCalls && toolCalls.length > 0 ? { toolCalls } : {}),
      ...(sources && sources.length > 0 ? { sources } : {}),
      createdAtMs: row.created_at_ms,
    };
  }

  if (row.role === 'tool' && row.tool_name !== null && row.tool_call_id !== null) {
    return {
      role: 'tool',
      content: row.content,
      toolName: row.tool_name,
      toolCallId: row.tool_call_id,
      isError: row.is_error === 1,
      createdAtMs: row.created_at_ms,
    };
  }

  console.warn(`[agent] skipping checkpoint row with unknown role: ${row.role} (seq=${row.seq})`);
  return null;
}

export class SqliteCheckpointStore implements CheckpointStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(CHECKPOINT_SCHEMA_SQL);
  }

  loadMessages(key: ThreadKey): ConversationMessage[] {
    const rows = this.db
      .prepare<[string, string], MessageRow>(
        `SELECT seq, role, content, tool_name, tool_call_id, is_error, tool_calls_json, sources_json, created_at_ms
         FROM thread_messages
         WHERE user_id = ? AND thread_id = ?
         ORDER BY seq ASC`,
      )
      .all(key.userId, key.threadId);

    const messages: ConversationMessage[] = [];
    for (const row of rows) {
      const message = rowToMessage(row);
      if (message) {
        messages.push(message);
      }
    }

    return messages;
  }

  appendMessages(key: ThreadKey, messages: ConversationMessage[]): void {
    if (messages.length === 0) {
      return;
    }

    const nextSeqStatement = this.db.prepare<[string, string], { next_seq: number }>(
      'SELECT COALESCE(MAX(seq), -1) + 1 AS next_seq FROM thread_messages WHERE user_id = ? AND thread_id = ?',
    );
    const insertStatement = this.db.prepare(`
      INSERT INTO thread_messages (
        user_id, thread_id, seq, role, content, tool_name, tool_call_id, is_error,
        tool_calls_json, sources_json, created_at_ms
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const upsertThreadStatement = this.db.prepare(`
      INSERT INTO threads (user_id, thread_id, title, created_at_ms, updated_at_ms)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(user_id, thread_id) DO UPDATE SET updated_at_ms = excluded.updated_at_ms
    `);

    const appendAll = this.db.transaction((batch: ConversationMessage[]) => {
      let seq = nextSeqStatement.get(key.userId, key.threadId)?.next_seq ?? 0;

      for (const message of batch) {
        insertStatement.run(
          key.userId,
          key.threadId,
          seq,
          message.role,
          message.content,
          message.role === 'tool' ? message.toolName : null,
          message.role === 'tool' ? message.toolCallId : null,
          message.role === 'tool' && message.isError ? 1 : 0,
          message.role === 'assistant' && message.toolCalls ? JSON.stringify(message.toolCalls) : null,
          message.role === 'assistant' && message.sources ? JSON.stringify(message.sources) : null,
          message.createdAtMs,
        );
        seq += 1;
      }

      const firstUserMessage = batch.find((message) => message.role === 'user');
      const lastMessage = batch[batch.length - 1];
      const nowMs = lastMessage?.createdAtMs ?? Date.now();
      upsertThreadStatement.run(
        key.userId,
        key.threadId,
        buildThreadTitle(firstUserMessage?.content ?? ''),
        batch[0]?.createdAtMs ?? nowMs,
        nowMs,
      );
    });

    appendAll(messages);
  }

  listThreads(userId: string): ThreadSummary[] {
    const rows = this.db
      .prepare<[string], ThreadRow>(
        `SELECT thread_id, title, created_at_ms, updated_at_ms
         FROM threads
         WHERE user_id = ?
         ORDER BY updated_at_ms DESC, thread_id ASC`,
      )
      .all(userId);

    return rows.map((row) => ({
      threadId: row.thread_id,
      title: row.title,
      createdAtMs: row.created_at_ms,
      updatedAtMs: row.updated_at_ms,
    }));
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
