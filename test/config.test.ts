import path from 'node:path';
import { describe, expect, it } from 'vitest';

import { loadConfig } from '../src/config';
import { ConfigurationError } from '../src/errors';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.llm.apiKey).toBeUndefined();
    expect(config.embeddings).toEqual({
      provider: 'openai',
      model: 'text-embedding-3-small',
      dimension: 1536,
      ollamaUrl: 'http://127.0.0.1:11434',
    });
    expect(config.chunking).toEqual({ chunkSize: 1000, chunkOverlap: 200 });
    expect(config.sessions).toEqual({
      baseDir: path.resolve('temp_sessions'),
      maxAgeMs: 24 * 60 * 60 * 1000,
      sweepIntervalMs: 60 * 60 * 1000,
    });
    expect(config.uploads).toEqual({ maxFiles: 50, maxFileSizeBytes: 10 * 1024 * 1024 });
    expect(config.vectorStore.batchSize).toBe(100);
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      OPENAI_API_KEY: 'test-key',
      EMBEDDING_PROVIDER: 'ollama',
      EMBEDDING_MODEL: 'nomic-embed-text',
      EMBEDDING_DIM: '768',
      CHUNK_SIZE: '500',
      CHUNK_OVERLAP: '50',
      MAX_FILE_SIZE_MB: '2',
    });

    expect(config.port).toBe(8080);
    expect(config.llm.apiKey).toBe('test-key');
    expect(config.embeddings.provider).toBe('ollama');
    expect(config.embeddings.dimension).toBe(768);
    expect(config.chunking).toEqual({ chunkSize: 500, chunkOverlap: 50 });
    expect(config.uploads.maxFileSizeBytes).toBe(2 * 1024 * 1024);
  });

  it('rejects invalid values with a configuration error', () => {
    expect(() => loadConfig({ EMBEDDING_PROVIDER: 'cohere' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ EMBEDDING_DIM: 'wide' })).toThrow(/EMBEDDING_DIM/);
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => loadConfig({ CHUNK_SIZE: '100', CHUNK_OVERLAP: '100' })).toThrow(
      'CHUNK_OVERLAP: CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    );
  });
});
