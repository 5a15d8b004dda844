import { randomUUID } from 'node:crypto';
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';

import { z } from 'zod';

import type { AgentConfig } from './config.js';
import { errorMessage } from './errors.js';
import type { AgentRuntime } from './runtime.js';
import { SSE_DONE_FRAME, encodeSseChunk } from './stream/protocol.js';

const USER_ID_HEADER = 'x-user-id';
const THREAD_ID_HEADER = 'x-thread-id';

const ChatRequestSchema = z.object({
  message: z.string().trim().min(1),
  thread_id: z.string().trim().min(1).optional(),
});

const DocumentRequestSchema = z.object({
  filename: z.string().trim().min(1),
  text: z.string(),
  document_id: z.string().trim().min(1).optional(),
});

export interface AgentServerOptions {
  config: AgentConfig;
  runtime: AgentRuntime;
}

export class HttpRequestError extends Error {
  public readonly statusCode: number;
  public readonly code: string;

  constructor(statusCode: number, code: string, message: string) {
    super(message);
    this.name = 'HttpRequestError';
    this.statusCode = statusCode;
    this.code = code;
  }
}

function sendJson(res: ServerResponse, statusCode: number, payload: unknown): void {
  if (res.writableEnded) {
    return;
  }

  res.statusCode = statusCode;
  res.setHeader('content-type', 'application/json');
  res.end(JSON.stringify(payload));
}

function sendError(res: ServerResponse, statusCode: number, code: string, message: string): void {
  sendJson(res, statusCode, {
    error: {
      code,
      message,
    },
  });
}

async function readJsonBody(req: IncomingMessage, maxBodyBytes: number): Promise<unknown> {
  const contentType = String(req.headers['content-type'] ?? '').toLowerCase();
  if (!contentType.includes('application/json')) {
    throw new HttpRequestError(415, 'UNSUPPORTED_CONTENT_TYPE', 'Content-Type must be application/json.');
  }

  return await new Promise((resolve, reject) => {
    let totalBytes = 0;
    let tooLarge = false;
    const chunks: Buffer[] = [];

    req.on('data', (chunk: Buffer | string) => {
      const bufferChunk = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
      totalBytes += bufferChunk.length;

      if (totalBytes > maxBodyBytes) {
        tooLarge = true;
        return;
      }

      chunks.push(bufferChunk);
    });

    req.on('end', () => {
      if (tooLarge) {
        reject(
          new HttpRequestError(413, 'PAYLOAD_TOO_LARGE', `Request body exceeds maxBodyBytes (${maxBodyBytes} bytes).`),
        );
        return;
      }

      const rawBody = Buffer.concat(chunks).toString('utf8');
      if (rawBody.trim().length === 0) {
        reject(new HttpRequestError(400, 'EMPTY_BODY', 'Request body is required.'));
        return;
      }

      try {
        resolve(JSON.parse(rawBody) as unknown);
      } catch {
        reject(new HttpRequestError(400, 'INVALID_JSON', 'Request body must be valid JSON.'));
      }
    });

    req.on('error', (error) => {
      reject(new HttpRequestError(400, 'READ_ERROR', `Failed to read request body: ${errorMessage(error)}`));
    });
  });
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, label: string): T {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
    throw new HttpRequestError(400, 'INVALID_REQUEST', `Invalid ${label} payload: ${details}`);
  }

  return parsed.data;
}

function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new HttpRequestError(400, 'INVALID_PATH', `Malformed path segment: ${segment}`);
  }
}

function requireUserId(req: IncomingMessage): string {
  const raw = req.headers[USER_ID_HEADER];
  const userId = (Array.isArray(raw) ? raw[0] : raw)?.trim() ?? '';
  if (!userId) {
    throw new HttpRequestError(401, 'MISSING_USER', `The ${USER_ID_HEADER} header is required.`);
  }

  return userId;
}

async function streamChat(req: IncomingMessage, res: ServerResponse, options: AgentServerOptions): Promise<void> {
  const userId = requireUserId(req);
  const body = parseBody(ChatRequestSchema, await readJsonBody(req, options.config.server.maxBodyBytes), 'chat');
  const threadId = body.thread_id ?? randomUUID();

  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });

  res.statusCode = 200;
  res.setHeader('content-type', 'text/event-stream');
  res.setHeader('cache-control', 'no-cache');
  res.setHeader('connection', 'keep-alive');
  res.setHeader(THREAD_ID_HEADER, threadId);
  res.flushHeaders();

  console.log(`[agent] chat stream user=${userId} thread=${threadId}`);
  for await (const chunk of options.runtime.runTurn(userId, threadId, body.message, controller.signal)) {
    if (res.writableEnded) {
      break;
    }
    res.write(encodeSseChunk(chunk));
  }

  if (!res.writableEnded) {
    res.end(SSE_DONE_FRAME);
  }
}

async function route(
  req: IncomingMessage,
  res: ServerResponse,
  options: AgentServerOptions,
  startedAtMs: number,
): Promise<void> {
  const { runtime, config } = options;
  const method = req.method ?? 'GET';
  const requestUrl = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
  const pathname = requestUrl.pathname;

  if (method === 'GET' && pathname === '/health') {
    sendJson(res, 200, {
      service: 'agent',
      status: 'ok',
      model: runtime.modelLabel,
      uptime_ms: Date.now() - startedAtMs,
    });
    return;
  }

  if (method === 'POST' && pathname === '/chat/stream') {
    await streamChat(req, res, options);
    return;
  }

  if (method === 'GET' && pathname === '/threads') {
    const threads = runtime.listThreads(requireUserId(req));
    sendJson(res, 200, {
      threads: threads.map((thread) => ({
        thread_id: thread.threadId,
        title: thread.title,
        created_at_ms: thread.createdAtMs,
        updated_at_ms: thread.updatedAtMs,
      })),
    });
    return;
  }

  const messagesMatch = /^\/threads\/([^/]+)\/messages$/.exec(pathname);
  if (method === 'GET' && messagesMatch) {
    const threadId = decodePathSegment(messagesMatch[1] ?? '');
    sendJson(res, 200, { thread_id: threadId, messages: runtime.getHistory(requireUserId(req), threadId) });
    return;
  }

  if (method === 'GET' && pathname === '/memory') {
    const facts = runtime.listFacts(requireUserId(req));
    sendJson(res, 200, { facts: facts.map((fact) => ({ id: fact.id, text: fact.text, created_at_ms: fact.createdAtMs })) });
    return;
  }

  if (method === 'POST' && pathname === '/documents') {
    const userId = requireUserId(req);
    const body = parseBody(DocumentRequestSchema, await readJsonBody(req, config.server.maxBodyBytes), 'document');
    const result = await runtime.ingest(userId, {
      filename: body.filename,
      bytes: body.text,
      documentId: body.document_id,
    });

    if (!result.ok) {
      sendError(res, 422, 'INGESTION_ERROR', result.error);
      return;
    }

    sendJson(res, 201, { document_id: result.documentId, chunk_count: result.chunkCount });
    return;
  }

  if (method === 'DELETE' && pathname === '/documents') {
    const deleted = await runtime.deleteIndex(requireUserId(req));
    sendJson(res, 200, { deleted });
    return;
  }

  sendError(res, 404, 'NOT_FOUND', 'Route not found.');
}

export function createAgentServer(options: AgentServerOptions): Server {
  const startedAtMs = Date.now();

  return createServer((req, res) => {
    void route(req, res, options, startedAtMs).catch((error: unknown) => {
      if (error instanceof HttpRequestError) {
        sendError(res, error.statusCode, error.code, error.message);
        return;
      }

      console.error(`[agent] unhandled request error: ${errorMessage(error)}`);
      if (res.headersSent) {
        res.end();
        return;
      }
      sendError(res, 500, 'UNHANDLED_ERROR', errorMessage(error));
    });
  });
}

export function startAgentServer(options: AgentServerOptions): Server {
  const { config } = options;
  const server = createAgentServer(options);

  server.listen(config.server.port, () => {
    console.log(`[agent] listening on http://localhost:${config.server.port}`);
    console.log('[agent] health endpoint GET /health');
    console.log('[agent] chat endpoint POST /chat/stream (server-sent events)');
    console.log(`[agent] data dir: ${config.dataDirPath}`);
  });

  return server;
}
