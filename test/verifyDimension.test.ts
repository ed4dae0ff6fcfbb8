import { describe, expect, it } from 'vitest';

import { ConfigurationError } from '../src/errors';
import { verifyDimension } from '../src/rag/client';
import { FakeEmbeddings } from './support/fakes';

const storeWithDimension = (dimension: number | undefined) => ({
  getCollectionDimension: async () => dimension,
});

describe('verifyDimension', () => {
  it('passes when the collection and the model agree', async () => {
    await expect(verifyDimension(storeWithDimension(8), new FakeEmbeddings(8), 8)).resolves.toBeUndefined();
  });

  it('passes for a collection without a recorded dimension', async () => {
    await expect(verifyDimension(storeWithDimension(undefined), new FakeEmbeddings(8), 8)).resolves.toBeUndefined();
  });

  it('fails when the collection was built with another dimension', async () => {
    await expect(verifyDimension(storeWithDimension(384), new FakeEmbeddings(8), 8)).rejects.toThrow(
      'Vector store dimension (384) does not match embedding dimension (8).',
    );
  });

  it('fails when the model produces vectors of another size', async () => {
    await expect(verifyDimension(storeWithDimension(16), new FakeEmbeddings(8), 16)).rejects.toBeInstanceOf(
      ConfigurationError,
    );
  });

  it('fails when the embedding provider is unreachable', async () => {
    const embeddings = new FakeEmbeddings(8);
    embeddings.embed = async () => {
      throw new Error('connect ECONNREFUSED');
    };

    await expect(verifyDimension(storeWithDimension(8), embeddings, 8)).rejects.toThrow(
      'Embedding provider failed the start-up probe: connect ECONNREFUSED',
    );
  });
});
