import { ChromaClient } from 'chromadb';
import type { Collection, EmbeddingFunction } from 'chromadb';

import { ConfigurationError } from '../errors';
import type { ChunkMetadata, ChunkRecord, EmbeddingCapability, VectorStore } from './schema';

type ChromaStoreOptions = {
  url: string;
  collection: string;
  dimension: number;
  embeddings: EmbeddingCapability;
};

type FlatMetadata = Record<string, string | number | boolean>;

const toFlatMetadata = (metadata: ChunkMetadata): FlatMetadata => {
  const flat: FlatMetadata = {};

  Object.entries(metadata).forEach(([key, value]) => {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      flat[key] = value;
    }
  });

  return flat;
};

const buildClient = (url: string): ChromaClient => {
  let parsed: URL;

  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigurationError(`Invalid Chroma URL "${url}".`);
  }

  const ssl = parsed.protocol === 'https:';
  const port = parsed.port ? Number.parseInt(parsed.port, 10) : ssl ? 443 : 80;

  return new ChromaClient({ host: parsed.hostname, port, ssl });
};

/**
 * Lets Chroma embed on its own should it ever need to (it never does here:
 * every upsert carries its vectors).
 */
const toChromaEmbeddingFunction = (embeddings: EmbeddingCapability): EmbeddingFunction => ({
  generate: (texts: string[]) => embeddings.embedBatch(texts),
});

export class ChromaVectorStore implements VectorStore {
  private readonly client: ChromaClient;

  private readonly collectionName: string;

  private readonly dimension: number;

  private readonly embeddingFunction: EmbeddingFunction;

  private collectionPromise: Promise<Collection> | null = null;

  constructor({ url, collection, dimension, embeddings }: ChromaStoreOptions) {
    this.client = buildClient(url);
    this.collectionName = collection;
    this.dimension = dimension;
    this.embeddingFunction = toChromaEmbeddingFunction(embeddings);
  }

  private async getCollection(): Promise<Collection> {
    if (!this.collectionPromise) {
      this.collectionPromise = this.client
        .getOrCreateCollection({
          name: this.collectionName,
          metadata: { 'hnsw:space': 'cosine', dimension: this.dimension },
          embeddingFunction: this.embeddingFunction,
        })
        .catch((error: unknown) => {
          this.collectionPromise = null;
          throw error;
        });
    }

    return this.collectionPromise;
  }

  /** Dimension recorded on the collection when it was created, if any. */
  async getCollectionDimension(): Promise<number | undefined> {
    const collection = await this.getCollection();
    const recorded = collection.metadata?.dimension;

    return typeof recorded === 'number' ? recorded : undefined;
  }

  async upsert(records: ChunkRecord[]): Promise<void> {
    if (!records.length) {
      return;
    }

    const collection = await this.getCollection();

    await collection.upsert({
      ids: records.map((record) => record.id),
      embeddings: records.map((record) => record.vector),
      documents: records.map((record) => record.metadata.text),
      metadatas: records.map((record) => toFlatMetadata(record.metadata)),
    });
  }

  async deleteBySession(sessionId: string): Promise<void> {
    const collection = await this.getCollection();

    await collection.delete({ where: { session_id: sessionId } });
  }
}

/**
 * Fatal start-up check: the collection and the embedding model must agree
 * with the configured dimension before any ranking request is served.
 */
export const verifyDimension = async (
  store: Pick<ChromaVectorStore, 'getCollectionDimension'>,
  embeddings: EmbeddingCapability,
  expected: number,
): Promise<void> => {
  const collectionDimension = await store.getCollectionDimension();

  if (collectionDimension !== undefined && collectionDimension !== expected) {
    throw new ConfigurationError(
      `Vector store dimension (${collectionDimension}) does not match embedding dimension (${expected}). `
        + 'Recreate the collection with the configured dimension.',
    );
  }

  let probe: number[];

  try {
    probe = await embeddings.embed('dimension probe');
  } catch (error) {
    throw new ConfigurationError(
      `Embedding provider failed the start-up probe: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  if (probe.length !== expected) {
    throw new ConfigurationError(
      `Embedding model produces ${probe.length}-dimensional vectors, expected ${expected}.`,
    );
  }

  console.info(`[STARTUP] Vector dimension verified: ${expected}`);
};
