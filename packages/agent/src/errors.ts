export type AgentErrorCode =
  | 'TRANSPORT_ERROR'
  | 'TOOL_EXECUTION_ERROR'
  | 'GENERATION_ERROR'
  | 'MEMORY_EXTRACTION_ERROR'
  | 'INGESTION_ERROR'
  | 'TURN_CANCELLED';

export class AgentError extends Error {
  public readonly code: AgentErrorCode;

  constructor(code: AgentErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AgentError';
    this.code = code;
  }
}

/** Network failure, timeout or non-2xx answer from an external backend. Never retried here. */
export class TransportError extends AgentError {
  public readonly service: string;
  public readonly statusCode: number | undefined;

  constructor(service: string, message: string, options?: { statusCode?: number; cause?: unknown }) {
    super('TRANSPORT_ERROR', `${service}: ${message}`, { cause: options?.cause });
    this.name = 'TransportError';
    this.service = service;
    this.statusCode = options?.statusCode;
  }
}

export class ToolExecutionError extends AgentError {
  public readonly toolName: string;

  constructor(toolName: string, message: string, options?: { cause?: unknown }) {
    super('TOOL_EXECUTION_ERROR', message, options);
    this.name = 'ToolExecutionError';
    this.toolName = toolName;
  }
}

export class GenerationError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('GENERATION_ERROR', message, options);
    this.name = 'GenerationError';
  }
}

export class MemoryExtractionError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MEMORY_EXTRACTION_ERROR', message, options);
    this.name = 'MemoryExtractionError';
  }
}

export class IngestionError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INGESTION_ERROR', message, options);
    this.name = 'IngestionError';
  }
}

export class TurnCancelledError extends AgentError {
  constructor(message = 'Turn cancelled by consumer.') {
    super('TURN_CANCELLED', message);
    this.name = 'TurnCancelledError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new TurnCancelledError();
  }
}
