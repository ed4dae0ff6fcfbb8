import path from 'node:path';

import { SessionClosedError, VectorIndexError, describeError } from '../errors';
import { chunkArray } from '../util/concurrency';
import { exponentialBackoff } from '../util/retry';
import { TextChunker } from './chunker';
import type { ChunkRecord, EmbeddingCapability, Session, SourceDocument, VectorStore } from './schema';

const EXCERPT_LENGTH = 500;
const NAME_SCAN_LINES = 5;
const MAX_NAME_WORDS = 3;

type VectorIndexerOptions = {
  embeddings: EmbeddingCapability;
  store: VectorStore;
  chunker: TextChunker;
  batchSize?: number;
  maxBatchAttempts?: number;
  retryDelayMs?: number;
};

export const buildChunkId = (
  role: SourceDocument['role'],
  sessionId: string,
  documentKey: string,
  chunkIndex: number,
): string => `${role}_${sessionId}_${documentKey}_${chunkIndex}`;

export const toDocumentKey = (filePath: string): string =>
  path.parse(filePath).name.replace(/[^a-zA-Z0-9]+/g, '_').replace(/^_+|_+$/g, '').toLowerCase() || 'doc';

const titleCase = (value: string): string =>
  value.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_match, before: string, letter: string) => `${before}${letter.toUpperCase()}`);

const isAlphabetic = (value: string): boolean => /^\p{L}+$/u.test(value);

/**
 * Display name for a CV: a name-like filename stem, else a short name-shaped
 * line near the top of the text, else the raw stem.
 */
export const extractCandidateName = (filePath: string, text: string): string => {
  const stem = path.parse(filePath).name;
  const fromFilename = titleCase(stem.replace(/[_-]/g, ' ')).trim();
  const filenameWords = fromFilename.split(/\s+/).filter(Boolean);

  if (filenameWords.length <= MAX_NAME_WORDS && isAlphabetic(fromFilename.replace(/\s+/g, ''))) {
    return fromFilename;
  }

  const lines = text.split('\n').slice(0, NAME_SCAN_LINES);

  for (const rawLine of lines) {
    const line = rawLine.trim();
    const words = line.split(/\s+/).filter(Boolean);

    if (line && words.length <= MAX_NAME_WORDS && words.every((word) => isAlphabetic(word.replace(/\./g, '')))) {
      return line;
    }
  }

  return stem;
};

export class VectorIndexer {
  private readonly embeddings: EmbeddingCapability;

  private readonly store: VectorStore;

  private readonly chunker: TextChunker;

  private readonly batchSize: number;

  private readonly maxBatchAttempts: number;

  private readonly retryDelayMs: number;

  constructor({
    embeddings,
    store,
    chunker,
    batchSize = 100,
    maxBatchAttempts = 3,
    retryDelayMs = 500,
  }: VectorIndexerOptions) {
    this.embeddings = embeddings;
    this.store = store;
    this.chunker = chunker;
    this.batchSize = Math.max(1, batchSize);
    this.maxBatchAttempts = Math.max(1, maxBatchAttempts);
    this.retryDelayMs = retryDelayMs;
  }

  private assertOpen(session: Session): void {
    if (session.closed) {
      throw new SessionClosedError(session.id);
    }
  }

  private buildRecords(session: Session, document: SourceDocument, chunks: string[], vectors: number[][]): ChunkRecord[] {
    if (vectors.length !== chunks.length) {
      throw new VectorIndexError(
        `Received ${vectors.length} embedding(s) for ${chunks.length} chunk(s) of ${document.key}.`,
      );
    }

    return chunks.map((chunk, index) => {
      const vector = vectors[index];

      if (vector.length !== this.embeddings.dimension) {
        throw new VectorIndexError(
          `Chunk ${index} of ${document.key} embedded to ${vector.length} dimensions, expected ${this.embeddings.dimension}.`,
        );
      }

      return {
        id: buildChunkId(document.role, session.id, document.key, index),
        vector,
        metadata: {
          session_id: session.id,
          role: document.role,
          document_key: document.key,
          chunk_index: index,
          text: chunk.slice(0, EXCERPT_LENGTH),
          ...(document.filePath ? { file_path: document.filePath } : {}),
          ...(document.candidateName ? { candidate_name: document.candidateName } : {}),
        },
      };
    });
  }

  /**
   * Chunks, embeds and upserts one document. Batches are written in order; a
   * batch that still fails after its retries fails the whole ingest.
   */
  async ingest(session: Session, document: SourceDocument): Promise<string[]> {
    this.assertOpen(session);

    const chunks = this.chunker.split(document.text);

    if (!chunks.length) {
      console.warn(`[INGEST] No chunks generated for ${document.role} "${document.key}" in session ${session.id}.`);
      return [];
    }

    let vectors: number[][];

    try {
      vectors = await this.embeddings.embedBatch(chunks);
    } catch (error) {
      throw new VectorIndexError(`Failed to embed ${document.role} "${document.key}": ${describeError(error)}`, {
        cause: error,
      });
    }

    const records = this.buildRecords(session, document, chunks, vectors);
    const batches = chunkArray(records, this.batchSize);

    for (const [batchIndex, batch] of batches.entries()) {
      this.assertOpen(session);

      try {
        await exponentialBackoff(
          async () => {
            this.assertOpen(session);
            await this.store.upsert(batch);
          },
          {
            maxAttempts: this.maxBatchAttempts,
            initialDelayMs: this.retryDelayMs,
            label: `Vector upsert batch ${batchIndex + 1}/${batches.length} for "${document.key}"`,
            shouldRetry: (error) => !(error instanceof SessionClosedError),
          },
        );
      } catch (error) {
        if (error instanceof SessionClosedError) {
          throw error;
        }

        console.error(`[INGEST] Upsert failed for ${document.role} "${document.key}" in session ${session.id}.`, error);
        throw new VectorIndexError(
          `Failed to upsert batch ${batchIndex + 1}/${batches.length} for ${document.role} "${document.key}": ${describeError(error)}`,
          { cause: error },
        );
      }

      if (session.closed) {
        await this.discardLateWrites(session);
      }
    }

    console.info(
      `[INGEST] Ingested ${document.role} "${document.key}" with ${records.length} chunk(s) in ${batches.length} batch(es) for session ${session.id}.`,
    );

    return records.map((record) => record.id);
  }

  // The session was cleaned up while this batch was in flight; its write may
  // have landed after the cleanup's delete.
  private async discardLateWrites(session: Session): Promise<never> {
    console.warn(`[INGEST] Session ${session.id} closed during ingestion; removing late writes.`);
    await this.deleteSession(session.id);
    throw new SessionClosedError(session.id);
  }

  /**
   * Ingests documents in parallel and waits for every one to settle before
   * reporting the first failure, so nothing is still writing when the caller
   * cleans up.
   */
  async ingestMany(session: Session, documents: SourceDocument[]): Promise<Map<string, string[]>> {
    const settled = await Promise.allSettled(documents.map((document) => this.ingest(session, document)));
    const ids = new Map<string, string[]>();

    for (const [index, outcome] of settled.entries()) {
      if (outcome.status === 'rejected') {
        throw outcome.reason;
      }

      ids.set(documents[index].key, outcome.value);
    }

    return ids;
  }

  async deleteSession(sessionId: string): Promise<void> {
    try {
      await this.store.deleteBySession(sessionId);
    } catch (error) {
      console.error(`[INGEST] Failed to delete vectors for session ${sessionId}.`, error);
      throw new VectorIndexError(`Failed to delete vectors for session ${sessionId}: ${describeError(error)}`, {
        cause: error,
      });
    }

    console.info(`[INGEST] Cleaned up vectors for session ${sessionId}.`);
  }
}

export type { VectorIndexerOptions };
