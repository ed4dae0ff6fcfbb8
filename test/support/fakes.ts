import type { StructuredAssessmentClient } from '../../src/llm/client';
import type { ChunkRecord, EmbeddingCapability, Session, VectorStore } from '../../src/rag/schema';

/**
 * Deterministic bag-of-letters embedding: counts of a-z folded into
 * `dimension` buckets. Similar texts get similar vectors.
 */
export class FakeEmbeddings implements EmbeddingCapability {
  readonly dimension: number;

  readonly calls: string[][] = [];

  constructor(dimension = 8) {
    this.dimension = dimension;
  }

  private vectorFor(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);

    for (const char of text.toLowerCase()) {
      const code = char.charCodeAt(0) - 97;
      if (code >= 0 && code < 26) {
        vector[code % this.dimension] += 1;
      }
    }

    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map((text) => this.vectorFor(text));
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }
}

/** Returns preset vectors by exact text; unknown texts map to a zero vector. */
export class FixedEmbeddings implements EmbeddingCapability {
  readonly dimension: number;

  private readonly vectors: Map<string, number[]>;

  constructor(vectors: Record<string, number[]>, dimension: number) {
    this.vectors = new Map(Object.entries(vectors));
    this.dimension = dimension;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.vectors.get(text) ?? new Array<number>(this.dimension).fill(0));
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }
}

export class InMemoryVectorStore implements VectorStore {
  readonly records = new Map<string, ChunkRecord>();

  readonly upsertCalls: ChunkRecord[][] = [];

  /** Number of upcoming upsert calls that should fail. */
  failNextUpserts = 0;

  failDeletes = false;

  async upsert(records: ChunkRecord[]): Promise<void> {
    this.upsertCalls.push(records);

    if (this.failNextUpserts > 0) {
      this.failNextUpserts -= 1;
      throw new Error('store unavailable');
    }

    records.forEach((record) => this.records.set(record.id, record));
  }

  async deleteBySession(sessionId: string): Promise<void> {
    if (this.failDeletes) {
      throw new Error('delete rejected');
    }

    for (const [id, record] of this.records) {
      if (record.metadata.session_id === sessionId) {
        this.records.delete(id);
      }
    }
  }

  countForSession(sessionId: string): number {
    return [...this.records.values()].filter((record) => record.metadata.session_id === sessionId).length;
  }
}

type Responder = (systemPrompt: string, input: Record<string, unknown>) => Promise<string> | string;

export class FakeAssessmentClient implements StructuredAssessmentClient {
  readonly inputs: Record<string, unknown>[] = [];

  private readonly responder: Responder;

  constructor(responder: Responder) {
    this.responder = responder;
  }

  async complete(systemPrompt: string, input: Record<string, unknown>): Promise<string> {
    this.inputs.push(input);
    return this.responder(systemPrompt, input);
  }
}

export const openSession = (id = 's1'): Session => ({ id, directory: `/tmp/${id}`, closed: false });

export const analysisJson = (overrides: Record<string, unknown> = {}): string =>
  JSON.stringify({
    candidate_name: 'Ada Lovelace',
    skill_match_score: 80,
    experience_score: 70,
    tool_tech_score: 90,
    seniority_score: 60,
    matched_skills: ['TypeScript'],
    missing_skills: ['Go'],
    explanation: 'Strong match.',
    ...overrides,
  });
