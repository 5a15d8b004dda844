import { randomUUID } from 'node:crypto';
import path from 'node:path';
import { rm } from 'node:fs/promises';

import type { Connection } from '@lancedb/lancedb';
import { Field, FixedSizeList, Float32, Float64, Schema, Utf8 } from 'apache-arrow';

import { IngestionError, errorMessage } from '../errors.js';
import type { RecursiveTextChunker } from './chunker.js';
import type { Embedder } from './embedder.js';
import { appendRows, directoryExists, getOrCreateTable, hasTable, openDb, queryTopK } from './lancedb.js';

const CHUNKS_TABLE = 'chunks';

export interface DocumentUpload {
  filename: string;
  /** Raw document bytes (decoded as UTF-8) or already-decoded text. Form feeds separate pages. */
  bytes: Uint8Array | string;
  documentId?: string;
}

export type IngestResult =
  | { ok: true; documentId: string; chunkCount: number }
  | { ok: false; error: string };

export interface DocumentChunkMatch {
  id: string;
  documentId: string;
  source: string;
  page: number;
  chunkIndex: number;
  text: string;
  score: number;
}

/** An absent index is a normal outcome, not an error. */
export type DocumentQueryResult = { status: 'unavailable' } | { status: 'ok'; matches: DocumentChunkMatch[] };

export interface DocumentIndex {
  ingest(userId: string, upload: DocumentUpload, signal?: AbortSignal): Promise<IngestResult>;
  query(userId: string, text: string, k: number, signal?: AbortSignal): Promise<DocumentQueryResult>;
  hasIndex(userId: string): Promise<boolean>;
  deleteIndex(userId: string): Promise<boolean>;
  close(): Promise<void>;
}

export interface LanceDocumentIndexOptions {
  rootDir: string;
  chunker: RecursiveTextChunker;
  embedder: Embedder;
}

interface PageText {
  page: number;
  text: string;
}

export function splitPages(content: Uint8Array | string): PageText[] {
  const text = typeof content === 'string' ? content : new TextDecoder('utf-8').decode(content);

  return text
    .split('\f')
    .map((pageText, index) => ({ page: index + 1, text: pageText }))
    .filter((page) => page.text.trim().length > 0);
}

export function userIndexDirName(userId: string): string {
  return `user_${Buffer.from(userId, 'utf8').toString('hex')}`;
}

function readString(row: Record<string, unknown>, key: string): string {
  const value = row[key];
  return typeof value === 'string' ? value : '';
}

function readNumber(row: Record<string, unknown>, key: string): number {
  const value = row[key];
  return typeof value === 'number' ? value : Number.NaN;
}

function isSearchableVector(vector: number[]): boolean {
  return vector.some((value) => value !== 0);
}

/**
 * Per-user chunk store on LanceDB. Each user owns a separate database
 * directory, so one user's query can never see another user's rows.
 */
export class LanceDocumentIndex implements DocumentIndex {
  private readonly rootDir: string;
  private readonly chunker: RecursiveTextChunker;
  private readonly embedder: Embedder;
  private readonly connections = new Map<string, Promise<Connection>>();

  constructor(options: LanceDocumentIndexOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.chunker = options.chunker;
    this.embedder = options.embedder;
  }

  private userDir(userId: string): string {
    return path.join(this.rootDir, userIndexDirName(userId));
  }

  private schema(): Schema {
    return new Schema([
      new Field('id', new Utf8(), false),
      new Field('document_id', new Utf8(), false),
      new Field('source', new Utf8(), false),
      new Field('page', new Float64(), false),
      new Field('chunk_index', new Float64(), false),
      new Field('text', new Utf8(), false),
      new Field('created_at_ms', new Float64(), false),
      new Field('vector', new FixedSizeList(this.embedder.dimensions, new Field('item', new Float32(), true)), false),
    ]);
  }

  private connection(userId: string): Promise<Connection> {
    const dir = this.userDir(userId);
    let connection = this.connections.get(dir);
    if (!connection) {
      connection = openDb(dir);
      this.connections.set(dir, connection);
      void connection.catch(() => this.connections.delete(dir));
    }
    return connection;
  }

  async hasIndex(userId: string): Promise<boolean> {
    if (!(await directoryExists(this.userDir(userId)))) {
      return false;
    }

    return await hasTable(await this.connection(userId), CHUNKS_TABLE);
  }

  async ingest(userId: string, upload: DocumentUpload, signal?: AbortSignal): Promise<IngestResult> {
    const documentId = upload.documentId ?? randomUUID();

    try {
      const filename = upload.filename.trim();
      if (!filename) {
        throw new IngestionError('Document filename is required.');
      }

      const pieces: Array<{ page: number; chunkIndex: number; text: string }> = [];
      for (const page of splitPages(upload.bytes)) {
        for (const chunk of this.chunker.splitText(page.text)) {
          pieces.push({ page: page.page, chunkIndex: pieces.length, text: chunk });
        }
      }

      if (pieces.length === 0) {
        throw new IngestionError(`No text could be extracted from ${filename}.`);
      }

      const vectors = await this.embedder.embed(
        pieces.map((piece) => piece.text),
        signal,
      );
      const createdAtMs = Date.now();
      const rows = pieces.flatMap((piece, index) => {
        const vector = vectors[index];
        // A zero vector has no cosine distance to anything and could never be retrieved.
        if (!vector || !isSearchableVector(vector)) {
          return [];
        }

        return [
          {
            id: randomUUID(),
            document_id: documentId,
            source: filename,
            page: piece.page,
            chunk_index: piece.chunkIndex,
            text: piece.text,
            created_at_ms: createdAtMs,
            vector,
          },
        ];
      });

      if (rows.length === 0) {
        throw new IngestionError(`No searchable text could be extracted from ${filename}.`);
      }

      const table = await getOrCreateTable(await this.connection(userId), CHUNKS_TABLE, this.schema());
      try {
        const chunkCount = await appendRows(table, rows);
        console.log(`[agent] indexed ${chunkCount} chunks from ${filename} for user ${userId}`);
        return { ok: true, documentId, chunkCount };
      } finally {
        table.close();
      }
    } catch (error) {
      console.error(`[agent] document ingestion failed for user ${userId}: ${errorMessage(error)}`);
      return { ok: false, error: errorMessage(error) };
    }
  }

  async query(userId: string, text: string, k: number, signal?: AbortSignal): Promise<DocumentQueryResult> {
    if (!(await this.hasIndex(userId))) {
      return { status: 'unavailable' };
    }

    const [queryVector] = await this.embedder.embed([text], signal);
    if (!queryVector || !isSearchableVector(queryVector)) {
      return { status: 'ok', matches: [] };
    }

    const table = await (await this.connection(userId)).openTable(CHUNKS_TABLE);
    try {
      const rows = await queryTopK(table, queryVector, k);
      const matches = rows
        .map((row): DocumentChunkMatch => ({
          id: readString(row, 'id'),
          documentId: readString(row, 'document_id'),
          source: readString(row, 'source'),
          page: readNumber(row, 'page'),
          chunkIndex: readNumber(row, 'chunk_index'),
          text: readString(row, 'text'),
          score: 1 - readNumber(row, '_distance'),
        }))
        .filter((match) => match.text.length > 0 && Number.isFinite(match.score));

      return { status: 'ok', matches: matches.sort((a, b) => b.score - a.score) };
    } finally {
      table.close();
    }
  }

  async deleteIndex(userId: string): Promise<boolean> {
    const dir = this.userDir(userId);
    const connection = this.connections.get(dir);
    this.connections.delete(dir);
    if (connection) {
      (await connection).close();
    }

    if (!(await directoryExists(dir))) {
      return false;
    }

    await rm(dir, { recursive: true, force: true });
    console.log(`[agent] deleted document index for user ${userId}`);
    return true;
  }

  async close(): Promise<void> {
    const pending = Array.from(this.connections.values());
    this.connections.clear();

    const results = await Promise.allSettled(pending);
    for (const result of results) {
      if (result.status === 'fulfilled') {
        result.value.close();
      }
    }
  }
}
