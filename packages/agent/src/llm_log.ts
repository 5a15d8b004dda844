import path from 'node:path';
import { appendFile, mkdir, rename, rm, stat } from 'node:fs/promises';

import type { LlmLogConfig } from './config.js';
import { errorMessage } from './errors.js';

export type LlmTraceKind = 'chat' | 'memory';
export type LlmTracePhase = 'request' | 'response' | 'error';

interface LlmTraceModel {
  provider: string;
  id: string;
}

interface LlmTraceRecord {
  ts: string;
  kind: LlmTraceKind;
  phase: LlmTracePhase;
  trace_id: string;
  model: LlmTraceModel;
  payload: unknown;
}

export interface LlmTraceEntry {
  kind: LlmTraceKind;
  phase: LlmTracePhase;
  traceId: string;
  model: LlmTraceModel;
  payload: unknown;
}

export interface LlmTraceLogger {
  log(entry: LlmTraceEntry): Promise<void>;
}

export const disabledLlmTraceLogger: LlmTraceLogger = {
  log: async () => undefined,
};

function isMissingFileError(error: unknown): boolean {
  return Boolean(error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT');
}

function truncateString(value: string, maxChars: number): string {
  if (value.length <= maxChars) {
    return value;
  }

  const kept = Math.max(0, maxChars);
  return `${value.slice(0, kept)}… [truncated ${value.length - kept} chars]`;
}

export function sanitizeTracePayload(value: unknown, truncateChars: number, seen = new WeakSet<object>(), depth = 0): unknown {
  if (depth > 24) {
    return '[max_depth]';
  }

  if (typeof value === 'string') {
    return truncateString(value, truncateChars);
  }

  if (typeof value === 'number' || typeof value === 'boolean' || value === null) {
    return value;
  }

  if (typeof value === 'bigint') {
    return value.toString();
  }

  if (value === undefined) {
    return '[undefined]';
  }

  if (value instanceof Error) {
    return {
      name: value.name,
      message: truncateString(value.message, truncateChars),
    };
  }

  if (Array.isArray(value)) {
    return value.map((item) => sanitizeTracePayload(item, truncateChars, seen, depth + 1));
  }

  if (typeof value !== 'object') {
    return String(value);
  }

  if (seen.has(value)) {
    return '[circular]';
  }
  seen.add(value);

  const result: Record<string, unknown> = {};
  for (const [key, entryValue] of Object.entries(value)) {
    const normalizedKey = key.toLowerCase();

    if (normalizedKey.includes('apikey') || normalizedKey === 'api_key' || normalizedKey === 'authorization') {
      result[key] = '[omitted secret]';
      continue;
    }

    result[key] = sanitizeTracePayload(entryValue, truncateChars, seen, depth + 1);
  }

  seen.delete(value);
  return result;
}

function shouldLogPhase(config: LlmLogConfig, phase: LlmTracePhase): boolean {
  switch (phase) {
    case 'request':
      return config.includeRequest;
    case 'response':
      return config.includeResponse;
    case 'error':
      return config.includeErrors;
  }
}

async function maybeRotateLogFile(logFilePath: string, maxFileBytes: number, rotateCount: number, incomingBytes: number): Promise<void> {
  let size: number;
  try {
    const stats = await stat(logFilePath);
    if (!stats.isFile()) {
      return;
    }
    size = stats.size;
  } catch (error) {
    if (isMissingFileError(error)) {
      return;
    }

    throw error;
  }

  if (size + incomingBytes <= maxFileBytes) {
    return;
  }

  if (rotateCount <= 0) {
    await rm(logFilePath, { force: true });
    return;
  }

  for (let index = rotateCount; index >= 1; index -= 1) {
    const sourcePath = index === 1 ? logFilePath : `${logFilePath}.${index - 1}`;
    const targetPath = `${logFilePath}.${index}`;

    try {
      await stat(sourcePath);
    } catch {
      continue;
    }

    await rm(targetPath, { force: true });
    await rename(sourcePath, targetPath);
  }
}

/**
 * JSONL trace of model traffic. Records are sanitized (secrets dropped, long
 * strings truncated) and the file rotates by size. Write failures only warn.
 */
export function createLlmTraceLogger(config: LlmLogConfig, logFilePath: string): LlmTraceLogger {
  if (!config.enabled) {
    return disabledLlmTraceLogger;
  }

  return {
    async log(entry: LlmTraceEntry): Promise<void> {
      if (!shouldLogPhase(config, entry.phase)) {
        return;
      }

      const record: LlmTraceRecord = {
        ts: new Date().toISOString(),
        kind: entry.kind,
        phase: entry.phase,
        trace_id: entry.traceId,
        model: entry.model,
        payload: sanitizeTracePayload(entry.payload, config.truncateChars),
      };
      const line = `${JSON.stringify(record)}\n`;

      try {
        await mkdir(path.dirname(logFilePath), { recursive: true });
        await maybeRotateLogFile(logFilePath, config.maxFileBytes, config.rotateCount, Buffer.byteLength(line));
        await appendFile(logFilePath, line, 'utf8');
      } catch (error) {
        console.warn(`[agent] failed to write llm trace record to ${logFilePath}: ${errorMessage(error)}`);
      }
    },
  };
}
