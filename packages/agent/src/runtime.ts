import path from 'node:path';

import type { AgentConfig, AgentSecrets } from './config.js';
import { SqliteCheckpointStore, type CheckpointStore } from './checkpoint/sqlite_checkpointer.js';
import { ConversationEngine } from './graph/state_machine.js';
import { createLlmTraceLogger } from './llm_log.js';
import { MemoryExtractor, type MemoryDecision } from './memory/extractor.js';
import { SqliteFactStore, type FactStore, type MemoryFact } from './memory/fact_store.js';
import type { ChatModel } from './model/chat_model.js';
import { PiAiChatModel } from './model/pi_ai_model.js';
import { multiplexTurn } from './stream/multiplexer.js';
import type { StreamChunk } from './stream/protocol.js';
import { createCalculatorTool } from './tools/calculator.js';
import { createDocumentSearchTool } from './tools/document_search.js';
import { ToolExecutor } from './tools/executor.js';
import { createPageFetchTool } from './tools/page_fetch.js';
import type { AgentTool, FetchLike } from './tools/types.js';
import { createWebSearchTool } from './tools/web_search.js';
import { isFinalAssistantMessage, type HistoryEntry, type ThreadSummary } from './types.js';
import { RecursiveTextChunker } from './vectorstore/chunker.js';
import {
  LanceDocumentIndex,
  type DocumentIndex,
  type DocumentQueryResult,
  type DocumentUpload,
  type IngestResult,
} from './vectorstore/document_index.js';
import { HashedEmbedder, OpenAiEmbedder, type Embedder } from './vectorstore/embedder.js';

export { loadAgentConfig, loadAgentSecrets, parseAgentConfig } from './config.js';
export type { AgentConfig, AgentSecrets } from './config.js';
export type { StreamChunk } from './stream/protocol.js';
export type { DocumentQueryResult, DocumentUpload, IngestResult } from './vectorstore/document_index.js';

const CONVERSATIONS_DB_FILE = 'conversations.db';
const MEMORY_DB_FILE = 'memory.db';
const DOCUMENTS_DIR = 'documents';

/** Replacements for the externally backed services; used by tests and embedding hosts. */
export interface AgentRuntimeOverrides {
  model?: ChatModel;
  memoryModel?: ChatModel;
  embedder?: Embedder;
  fetch?: FetchLike;
  checkpoints?: CheckpointStore;
  factStore?: FactStore;
}

export interface AgentRuntimeOptions {
  config: AgentConfig;
  secrets: AgentSecrets;
  overrides?: AgentRuntimeOverrides;
}

export interface AgentRuntime {
  readonly modelLabel: string;
  init(): Promise<void>;
  shutdown(): Promise<void>;
  runTurn(userId: string, threadId: string, message: string, signal?: AbortSignal): AsyncGenerator<StreamChunk, void, undefined>;
  getHistory(userId: string, threadId: string): HistoryEntry[];
  listThreads(userId: string): ThreadSummary[];
  listFacts(userId: string): MemoryFact[];
  extract(existingFacts: string[], latestMessage: string, signal?: AbortSignal): Promise<MemoryDecision>;
  ingest(userId: string, upload: DocumentUpload, signal?: AbortSignal): Promise<IngestResult>;
  query(userId: string, text: string, k: number, signal?: AbortSignal): Promise<DocumentQueryResult>;
  deleteIndex(userId: string): Promise<boolean>;
}

interface RuntimeServices {
  checkpoints: CheckpointStore;
  factStore: FactStore;
  documentIndex: DocumentIndex;
  memoryExtractor: MemoryExtractor;
  engine: ConversationEngine;
}

function createEmbedder(config: AgentConfig, secrets: AgentSecrets, fetchImpl: FetchLike | undefined): Embedder {
  if (config.embeddings.provider === 'openai') {
    return new OpenAiEmbedder({
      endpoint: config.embeddings.endpoint,
      model: config.embeddings.model,
      apiKey: secrets.openaiApiKey,
      dimensions: config.embeddings.dimensions,
      fetch: fetchImpl,
    });
  }

  return new HashedEmbedder(config.embeddings.dimensions);
}

/**
 * Builds every long-lived service once. Stores open in `init()` and close in
 * `shutdown()`; both are safe to call more than once.
 */
export function createAgentRuntime(options: AgentRuntimeOptions): AgentRuntime {
  const { config, secrets } = options;
  const overrides = options.overrides ?? {};

  const traceLogger = createLlmTraceLogger(config.llmLog, config.llmLogFilePath);
  const model =
    overrides.model ?? new PiAiChatModel({ model: config.model, apiKey: secrets.openaiApiKey, traceLogger });
  const memoryModel =
    overrides.memoryModel ??
    (overrides.model || !config.memoryModel
      ? model
      : new PiAiChatModel({ model: config.memoryModel, apiKey: secrets.openaiApiKey, traceLogger }));

  let services: RuntimeServices | null = null;
  let initializing: Promise<void> | null = null;
  let shuttingDown: Promise<void> | null = null;

  const requireServices = (): RuntimeServices => {
    if (!services) {
      throw new Error('[agent] runtime is not initialized; call init() first');
    }
    return services;
  };

  const buildServices = async (): Promise<void> => {
    const checkpoints =
      overrides.checkpoints ?? new SqliteCheckpointStore(path.join(config.dataDirPath, CONVERSATIONS_DB_FILE));
    const factStore = overrides.factStore ?? new SqliteFactStore(path.join(config.dataDirPath, MEMORY_DB_FILE));
    const documentIndex = new LanceDocumentIndex({
      rootDir: path.join(config.dataDirPath, DOCUMENTS_DIR),
      chunker: new RecursiveTextChunker({
        chunkSize: config.documents.chunkSize,
        chunkOverlap: config.documents.chunkOverlap,
      }),
      embedder: overrides.embedder ?? createEmbedder(config, secrets, overrides.fetch),
    });

    const tools: AgentTool[] = [
      createCalculatorTool(),
      createDocumentSearchTool({ index: documentIndex, topK: config.agent.retrievalTopK }),
      createWebSearchTool({
        endpoint: config.webSearch.endpoint,
        maxResults: config.webSearch.maxResults,
        apiKey: secrets.googleApiKey,
        searchEngineId: secrets.googleCseId,
        fetch: overrides.fetch,
      }),
      createPageFetchTool({ maxChars: config.pageFetch.maxChars, fetch: overrides.fetch }),
    ];
    const executor = new ToolExecutor(tools);
    const memoryExtractor = new MemoryExtractor(memoryModel);

    services = {
      checkpoints,
      factStore,
      documentIndex,
      memoryExtractor,
      engine: new ConversationEngine({
        model,
        memoryExtractor,
        factStore,
        checkpoints,
        tools: executor,
        maxToolRounds: config.agent.maxToolRounds,
      }),
    };

    console.log(
      `[agent] runtime ready model=${model.label} tools=${executor.names.join(',')} data=${config.dataDirPath}`,
    );
  };

  return {
    modelLabel: model.label,

    async init() {
      if (services) {
        return;
      }
      if (shuttingDown) {
        throw new Error('[agent] runtime has been shut down');
      }
      initializing ??= buildServices();
      await initializing;
    },

    async shutdown() {
      shuttingDown ??= (async () => {
        if (initializing) {
          await initializing.catch(() => undefined);
        }
        const current = services;
        services = null;
        if (!current) {
          return;
        }

        await current.documentIndex.close();
        current.checkpoints.close();
        current.factStore.close();
        console.log('[agent] runtime stopped');
      })();
      await shuttingDown;
    },

    runTurn(userId, threadId, message, signal) {
      const { engine } = requireServices();
      return multiplexTurn(engine, { userId, threadId, message }, { signal });
    },

    getHistory(userId, threadId) {
      return requireServices()
        .checkpoints.loadMessages({ userId, threadId })
        .filter((message) => message.role === 'user' || isFinalAssistantMessage(message))
        .map((message): HistoryEntry => ({ role: message.role === 'user' ? 'user' : 'assistant', content: message.content }));
    },

    listThreads(userId) {
      return requireServices().checkpoints.listThreads(userId);
    },

    listFacts(userId) {
      return requireServices().factStore.listFacts(userId);
    },

    async extract(existingFacts, latestMessage, signal) {
      return await requireServices().memoryExtractor.extract(existingFacts, latestMessage, signal);
    },

    async ingest(userId, upload, signal) {
      return await requireServices().documentIndex.ingest(userId, upload, signal);
    },

    async query(userId, text, k, signal) {
      return await requireServices().documentIndex.query(userId, text, k, signal);
    },

    async deleteIndex(userId) {
      return await requireServices().documentIndex.deleteIndex(userId);
    },
  };
}
