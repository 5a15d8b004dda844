import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { cosmiconfigSync } from 'cosmiconfig';
import { z } from 'zod';

const packageRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

const ModelConfigSchema = z.object({
  provider: z.string().trim().min(1).default('openai'),
  id: z.string().trim().min(1).default('gpt-4o-mini'),
});

const AgentLoopConfigSchema = z.object({
  maxToolRounds: z.number().int().min(1).max(50).default(12),
  retrievalTopK: z.number().int().min(1).max(20).default(4),
});

const DocumentsConfigSchema = z
  .object({
    chunkSize: z.number().int().min(50).default(1000),
    chunkOverlap: z.number().int().nonnegative().default(200),
  })
  .refine((value) => value.chunkOverlap < value.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
  });

const EmbeddingsConfigSchema = z.object({
  provider: z.enum(['hashed', 'openai']).default('hashed'),
  model: z.string().trim().min(1).default('text-embedding-3-small'),
  endpoint: z.string().trim().url().default('https://api.openai.com/v1/embeddings'),
  dimensions: z.number().int().min(8).max(4096).default(64),
});

const WebSearchConfigSchema = z.object({
  endpoint: z.string().trim().url().default('https://www.googleapis.com/customsearch/v1'),
  maxResults: z.number().int().min(1).max(10).default(5),
});

const PageFetchConfigSchema = z.object({
  maxChars: z.number().int().positive().default(2000),
});

const LlmLogConfigSchema = z.object({
  enabled: z.boolean().default(false),
  file: z.string().trim().min(1).default('./data/llm_logs/model-requests.log'),
  includeRequest: z.boolean().default(true),
  includeResponse: z.boolean().default(true),
  includeErrors: z.boolean().default(true),
  truncateChars: z.number().int().positive().default(20_000),
  maxFileBytes: z.number().int().positive().default(20_000_000),
  rotateCount: z.number().int().nonnegative().default(3),
});

export const AgentConfigSchema = z.object({
  server: z.object({
    port: z.number().int().min(1).max(65_535),
    maxBodyBytes: z.number().int().positive().default(10_485_760),
  }),
  data: z.object({
    dir: z.string().trim().min(1),
  }),
  model: ModelConfigSchema.default({}),
  memoryModel: ModelConfigSchema.optional(),
  agent: AgentLoopConfigSchema.default({}),
  documents: DocumentsConfigSchema.default({}),
  embeddings: EmbeddingsConfigSchema.default({}),
  webSearch: WebSearchConfigSchema.default({}),
  pageFetch: PageFetchConfigSchema.default({}),
  llmLog: LlmLogConfigSchema.default({}),
  secretsFile: z.string().trim().min(1),
});

const AgentSecretsSchema = z.object({
  openaiApiKey: z.string().trim().min(1),
  googleApiKey: z.string().trim().min(1).optional(),
  googleCseId: z.string().trim().min(1).optional(),
});

type AgentConfigData = z.infer<typeof AgentConfigSchema>;

export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type LlmLogConfig = z.infer<typeof LlmLogConfigSchema>;

export type AgentConfig = AgentConfigData & {
  configFilePath: string;
  dataDirPath: string;
  llmLogFilePath: string;
  secretsFilePath: string;
};

export type AgentSecrets = z.infer<typeof AgentSecretsSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function resolveRelativeToConfig(rawPath: string, configFilePath: string): string {
  if (path.isAbsolute(rawPath)) {
    return path.normalize(rawPath);
  }

  return path.resolve(path.dirname(configFilePath), rawPath);
}

/**
 * Validates raw config data and resolves its paths against the file it came
 * from. Exposed separately from {@link loadAgentConfig} so callers holding an
 * in-memory config (tests, embedding hosts) get the same defaults.
 */
export function parseAgentConfig(raw: unknown, configFilePath: string): AgentConfig {
  const parsed = AgentConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`[agent] invalid config in ${configFilePath}: ${formatIssues(parsed.error)}`);
  }

  return {
    ...parsed.data,
    configFilePath,
    dataDirPath: resolveRelativeToConfig(parsed.data.data.dir, configFilePath),
    llmLogFilePath: resolveRelativeToConfig(parsed.data.llmLog.file, configFilePath),
    secretsFilePath: resolveRelativeToConfig(parsed.data.secretsFile, configFilePath),
  };
}

export function loadAgentConfig(): AgentConfig {
  const explorer = cosmiconfigSync('agent', {
    searchPlaces: ['agent.config.local.json', 'agent.config.json'],
    stopDir: packageRoot,
  });

  const result = explorer.search(packageRoot);

  if (!result || result.isEmpty) {
    throw new Error(
      '[agent] configuration file not found. Expected one of: agent.config.local.json or agent.config.json',
    );
  }

  return parseAgentConfig(result.config, result.filepath);
}

export function loadAgentSecrets(secretsFilePath: string): AgentSecrets {
  let raw: string;

  try {
    raw = readFileSync(secretsFilePath, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`[agent] failed to read secrets file ${secretsFilePath}: ${message}`);
  }

  let json: unknown;

  try {
    json = JSON.parse(raw) as unknown;
  } catch {
    throw new Error(`[agent] secrets file is not valid JSON: ${secretsFilePath}`);
  }

  const parsed = AgentSecretsSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`[agent] invalid secrets in ${secretsFilePath}: ${formatIssues(parsed.error)}`);
  }

  return parsed.data;
}
