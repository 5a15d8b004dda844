import { randomUUID } from 'node:crypto';
import { mkdirSync } from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';

export const USER_DETAILS_NAMESPACE = 'details';

export interface MemoryFact {
  id: string;
  userId: string;
  namespace: string;
  text: string;
  createdAtMs: number;
}

/** Append-only per-user fact storage: no update in place, no expiry. */
export interface FactStore {
  listFacts(userId: string): MemoryFact[];
  addFact(userId: string, text: string): MemoryFact;
  close(): void;
}

const FACT_SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS memory_facts (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    namespace TEXT NOT NULL,
    text TEXT NOT NULL,
    created_at_ms INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_memory_facts_owner
    ON memory_facts(user_id, namespace, created_at_ms);
`;

interface FactRow {
  id: string;
  user_id: string;
  namespace: string;
  text: string;
  created_at_ms: number;
}

export class SqliteFactStore implements FactStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(FACT_SCHEMA_SQL);
  }

  listFacts(userId: string): MemoryFact[] {
    const rows = this.db
      .prepare<[string, string], FactRow>(
        `SELECT id, user_id, namespace, text, created_at_ms
         FROM memory_facts
         WHERE user_id = ? AND namespace = ?
         ORDER BY created_at_ms ASC, rowid ASC`,
      )
      .all(userId, USER_DETAILS_NAMESPACE);

    return rows.map((row) => ({
      id: row.id,
      userId: row.user_id,
      namespace: row.namespace,
      text: row.text,
      createdAtMs: row.created_at_ms,
    }));
  }

  addFact(userId: string, text: string): MemoryFact {
    const normalizedText = text.trim();
    if (!normalizedText) {
      throw new Error('memory fact text is required');
    }

    const fact: MemoryFact = {
      id: randomUUID(),
      userId,
      namespace: USER_DETAILS_NAMESPACE,
      text: normalizedText,
      createdAtMs: Date.now(),
    };

    this.db
      .prepare('INSERT INTO memory_facts (id, user_id, namespace, text, created_at_ms) VALUES (?, ?, ?, ?, ?)')
      .run(fact.id, fact.userId, fact.namespace, fact.text, fact.createdAtMs);

    return fact;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
