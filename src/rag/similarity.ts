import type { EmbeddingCapability } from './schema';

const DEFAULT_MAX_CHARS = 8000;

export const cosineSimilarity = (left: number[], right: number[]): number => {
  if (left.length !== right.length) {
    throw new Error(`Cannot compare vectors of different dimensions (${left.length} vs ${right.length}).`);
  }

  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;

  for (let index = 0; index < left.length; index += 1) {
    dot += left[index] * right[index];
    leftNorm += left[index] ** 2;
    rightNorm += right[index] ** 2;
  }

  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }

  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
};

/**
 * Document-level similarity between a job description and a CV. Negative
 * cosine values are floored to 0.
 */
export class SemanticScorer {
  private readonly embeddings: EmbeddingCapability;

  private readonly maxChars: number;

  constructor(embeddings: EmbeddingCapability, { maxChars = DEFAULT_MAX_CHARS }: { maxChars?: number } = {}) {
    this.embeddings = embeddings;
    this.maxChars = maxChars;
  }

  private truncate(text: string): string {
    return text.slice(0, this.maxChars);
  }

  private toScore(jobVector: number[], candidateVector: number[]): number {
    return Math.min(1, Math.max(0, cosineSimilarity(jobVector, candidateVector)));
  }

  async similarity(jobDescription: string, candidateText: string): Promise<number> {
    if (!jobDescription.trim() || !candidateText.trim()) {
      return 0;
    }

    const [jobVector, candidateVector] = await this.embeddings.embedBatch([
      this.truncate(jobDescription),
      this.truncate(candidateText),
    ]);

    return this.toScore(jobVector, candidateVector);
  }

  /** Embeds the job description once and scores every candidate against it. */
  async scoreCandidates(
    jobDescription: string,
    candidates: ReadonlyMap<string, string>,
  ): Promise<Map<string, number>> {
    const scores = new Map<string, number>();

    if (!candidates.size) {
      return scores;
    }

    // Blank documents have nothing to embed and score 0.
    const ids = [...candidates.keys()].filter((id) => candidates.get(id)?.trim());

    if (ids.length && jobDescription.trim()) {
      const [jobVector, ...candidateVectors] = await this.embeddings.embedBatch([
        this.truncate(jobDescription),
        ...ids.map((id) => this.truncate(candidates.get(id) ?? '')),
      ]);

      ids.forEach((id, index) => {
        scores.set(id, this.toScore(jobVector, candidateVectors[index]));
      });
    }

    candidates.forEach((_text, id) => {
      if (!scores.has(id)) {
        scores.set(id, 0);
      }
    });

    return scores;
  }
}
