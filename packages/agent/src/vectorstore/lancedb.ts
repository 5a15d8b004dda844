import path from 'node:path';
import { mkdir, stat } from 'node:fs/promises';

import * as lancedb from '@lancedb/lancedb';
import type { Connection, SchemaLike, Table } from '@lancedb/lancedb';

const VECTOR_COLUMN_NAME = 'vector';

export async function directoryExists(dir: string): Promise<boolean> {
  try {
    return (await stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

export async function openDb(lancedbDir: string): Promise<Connection> {
  const resolvedDir = path.resolve(lancedbDir);
  await mkdir(resolvedDir, { recursive: true });
  return await lancedb.connect(resolvedDir);
}

export async function hasTable(db: Connection, name: string): Promise<boolean> {
  const existingTableNames = await db.tableNames();
  return existingTableNames.includes(name);
}

export async function getOrCreateTable(db: Connection, name: string, schema: SchemaLike): Promise<Table> {
  if (await hasTable(db, name)) {
    return await db.openTable(name);
  }

  return await db.createEmptyTable(name, schema, {
    mode: 'create',
    existOk: true,
  });
}

export async function appendRows(table: Table, rows: Array<Record<string, unknown>>): Promise<number> {
  if (rows.length === 0) {
    return 0;
  }

  await table.add(rows);
  return rows.length;
}

/** Nearest rows by cosine distance; each row carries `_distance`. */
export async function queryTopK(
  table: Table,
  queryVector: number[],
  k: number,
): Promise<Array<Record<string, unknown>>> {
  if (k <= 0) {
    return [];
  }

  const rows = await table
    .vectorSearch(queryVector)
    .column(VECTOR_COLUMN_NAME)
    .distanceType('cosine')
    .limit(k)
    .toArray();
  return rows as Array<Record<string, unknown>>;
}
