/**
 * Service Configuration
 *
 * Reads the environment (after dotenv has loaded .env) into a typed config.
 * Defaults match the docker-compose deployment: postgres/pgvector for vectors,
 * neo4j for the graph, OpenAI-compatible endpoints for the LLM and embedder.
 *
 * Usage:
 *   const config = loadServiceConfig();
 *   const mem0Config = buildMem0Config(config);
 */

import { z } from 'zod';
import { LABEL_HEURISTICS, type LabelHeuristic } from '../services/graphSanitizer/index.js';

// Empty strings in .env mean "not set"
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const booleanFlag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === '' ? defaultValue : value.trim().toLowerCase() === 'true'));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().default('0.0.0.0'),
  API_KEY: optionalString,
  CORS_ORIGINS: optionalString,

  POSTGRES_HOST: z.string().default('postgres'),
  POSTGRES_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  POSTGRES_DB: z.string().default('postgres'),
  POSTGRES_USER: z.string().default('postgres'),
  POSTGRES_PASSWORD: z.string().default('postgres'),
  POSTGRES_COLLECTION_NAME: z.string().default('memories'),

  GRAPH_STORE_ENABLED: booleanFlag(true),
  NEO4J_URI: z.string().default('bolt://neo4j:7687'),
  NEO4J_USERNAME: z.string().default('neo4j'),
  NEO4J_PASSWORD: z.string().default('mem0graph'),
  GRAPH_LABEL_HEURISTIC: z
    .string()
    .optional()
    .transform((value) => value?.trim().toLowerCase() || 'multi-colon')
    .pipe(z.enum(LABEL_HEURISTICS)),

  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString,
  OPENAI_CHAT_MODEL: z.string().default('gpt-4o'),
  EMBEDDER_API_KEY: optionalString,
  EMBEDDER_BASE_URL: optionalString,
  OPENAI_EMBEDDING_MODEL: z.string().default('nvidia_embed'),
  // nvidia/NV-Embed-v2 produces 4096-dimensional vectors
  EMBEDDING_MODEL_DIMS: z.coerce.number().int().positive().default(4096),
  HISTORY_DB_PATH: z.string().default('/app/history/history.db'),
});

export interface ServiceConfig {
  port: number;
  host: string;
  apiKey?: string;
  corsOrigins?: string;
  postgres: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    collectionName: string;
  };
  graph: {
    enabled: boolean;
    url: string;
    username: string;
    password: string;
    labelHeuristic: LabelHeuristic;
  };
  llm: {
    apiKey?: string;
    baseURL?: string;
    model: string;
    temperature: number;
  };
  embedder: {
    apiKey?: string;
    baseURL?: string;
    model: string;
    dimensions: number;
  };
  historyDbPath: string;
}

export class ConfigError extends Error {
  constructor(message: string, readonly issues: z.ZodIssue[]) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const summary = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid environment configuration: ${summary}`, parsed.error.issues);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    host: e.HOST,
    apiKey: e.API_KEY,
    corsOrigins: e.CORS_ORIGINS,
    postgres: {
      host: e.POSTGRES_HOST,
      port: e.POSTGRES_PORT,
      database: e.POSTGRES_DB,
      user: e.POSTGRES_USER,
      password: e.POSTGRES_PASSWORD,
      collectionName: e.POSTGRES_COLLECTION_NAME,
    },
    graph: {
      enabled: e.GRAPH_STORE_ENABLED,
      url: e.NEO4J_URI,
      username: e.NEO4J_USERNAME,
      password: e.NEO4J_PASSWORD,
      labelHeuristic: e.GRAPH_LABEL_HEURISTIC,
    },
    llm: {
      apiKey: e.OPENAI_API_KEY,
      baseURL: e.OPENAI_BASE_URL,
      model: e.OPENAI_CHAT_MODEL,
      temperature: 0.2,
    },
    embedder: {
      // Separate embedder endpoint, falling back to the LLM's
      apiKey: e.EMBEDDER_API_KEY ?? e.OPENAI_API_KEY,
      baseURL: e.EMBEDDER_BASE_URL ?? e.OPENAI_BASE_URL,
      model: e.OPENAI_EMBEDDING_MODEL,
      dimensions: e.EMBEDDING_MODEL_DIMS,
    },
    historyDbPath: e.HISTORY_DB_PATH,
  };
}

/**
 * mem0 OSS configuration. mem0 gets no graph store: the service owns the Neo4j
 * connection and sanitizes relationship types before they are written.
 */
export function buildMem0Config(config: ServiceConfig): Record<string, unknown> {
  return {
    version: 'v1.1',
    vectorStore: {
      provider: 'pgvector',
      config: {
        host: config.postgres.host,
        port: config.postgres.port,
        dbname: config.postgres.database,
        user: config.postgres.user,
        password: config.postgres.password,
        collectionName: config.postgres.collectionName,
        embeddingModelDims: config.embedder.dimensions,
        // pgvector indexes support at most 2000 dimensions
        hnsw: false,
        diskann: false,
      },
    },
    llm: {
      provider: 'openai',
      config: {
        ...(config.llm.apiKey ? { apiKey: config.llm.apiKey } : {}),
        model: config.llm.model,
        temperature: config.llm.temperature,
        ...(config.llm.baseURL ? { baseURL: config.llm.baseURL } : {}),
      },
    },
    embedder: {
      provider: 'openai',
      config: {
        ...(config.embedder.apiKey ? { apiKey: config.embedder.apiKey } : {}),
        model: config.embedder.model,
        ...(config.embedder.baseURL ? { baseURL: config.embedder.baseURL } : {}),
      },
    },
    historyDbPath: config.historyDbPath,
    enableGraph: false,
  };
}
