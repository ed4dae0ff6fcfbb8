import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';

import { ConfigurationError } from './errors';

const configSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),

    // Structured assessment (chat completions)
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_BASE_URL: z.string().url().optional(),
    LLM_MODEL: z.string().min(1).default('gpt-4.1'),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    LLM_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),

    // Embeddings and vector store
    EMBEDDING_PROVIDER: z.enum(['openai', 'ollama']).default('openai'),
    EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
    EMBEDDING_DIM: z.coerce.number().int().positive().default(1536),
    OLLAMA_EMBED_URL: z.string().url().default('http://127.0.0.1:11434'),
    CHROMA_URL: z.string().url().default('http://127.0.0.1:8000'),
    CHROMA_COLLECTION: z.string().min(1).default('hr-agent-cvs'),
    VECTOR_BATCH_SIZE: z.coerce.number().int().min(1).max(100).default(100),

    // Chunking
    CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
    CHUNK_OVERLAP: z.coerce.number().int().min(0).default(200),

    // Sessions and uploads
    SESSION_DIR: z.string().min(1).default('temp_sessions'),
    SESSION_MAX_AGE_HOURS: z.coerce.number().positive().default(24),
    SESSION_SWEEP_INTERVAL_MINUTES: z.coerce.number().min(0).default(60),
    MAX_FILES: z.coerce.number().int().positive().default(50),
    MAX_FILE_SIZE_MB: z.coerce.number().positive().default(10),

    ANALYSIS_CONCURRENCY: z.coerce.number().int().min(1).default(4),
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP'],
  });

export type AppConfig = {
  port: number;
  llm: {
    apiKey?: string;
    baseUrl?: string;
    model: string;
    timeoutMs: number;
    maxAttempts: number;
  };
  embeddings: {
    provider: 'openai' | 'ollama';
    model: string;
    dimension: number;
    ollamaUrl: string;
  };
  vectorStore: {
    url: string;
    collection: string;
    batchSize: number;
  };
  chunking: {
    chunkSize: number;
    chunkOverlap: number;
  };
  sessions: {
    baseDir: string;
    maxAgeMs: number;
    sweepIntervalMs: number;
  };
  uploads: {
    maxFiles: number;
    maxFileSizeBytes: number;
  };
  analysisConcurrency: number;
};

export const loadConfig = (env: Record<string, string | undefined> = process.env): AppConfig => {
  const parsed = configSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment configuration: ${issues}`);
  }

  const data = parsed.data;

  return {
    port: data.PORT,
    llm: {
      apiKey: data.OPENAI_API_KEY || undefined,
      baseUrl: data.OPENAI_BASE_URL,
      model: data.LLM_MODEL,
      timeoutMs: data.LLM_TIMEOUT_MS,
      maxAttempts: data.LLM_MAX_ATTEMPTS,
    },
    embeddings: {
      provider: data.EMBEDDING_PROVIDER,
      model: data.EMBEDDING_MODEL,
      dimension: data.EMBEDDING_DIM,
      ollamaUrl: data.OLLAMA_EMBED_URL,
    },
    vectorStore: {
      url: data.CHROMA_URL,
      collection: data.CHROMA_COLLECTION,
      batchSize: data.VECTOR_BATCH_SIZE,
    },
    chunking: {
      chunkSize: data.CHUNK_SIZE,
      chunkOverlap: data.CHUNK_OVERLAP,
    },
    sessions: {
      baseDir: path.resolve(data.SESSION_DIR),
      maxAgeMs: data.SESSION_MAX_AGE_HOURS * 60 * 60 * 1000,
      sweepIntervalMs: data.SESSION_SWEEP_INTERVAL_MINUTES * 60 * 1000,
    },
    uploads: {
      maxFiles: data.MAX_FILES,
      maxFileSizeBytes: data.MAX_FILE_SIZE_MB * 1024 * 1024,
    },
    analysisConcurrency: data.ANALYSIS_CONCURRENCY,
  };
};

export const loadConfigFromDotenv = (): AppConfig => {
  dotenv.config();
  return loadConfig(process.env);
};
