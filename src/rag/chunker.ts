export type ChunkerOptions = {
  chunkSize?: number;
  chunkOverlap?: number;
  separators?: string[];
};

export const DEFAULT_SEPARATORS: readonly string[] = ['\n\n', '\n', '. ', ' ', ''];

/**
 * Recursive separator splitter. Each piece is kept whole when it fits,
 * otherwise it is split again on the next, finer separator. Adjacent pieces
 * are then merged up to `chunkSize`, carrying up to `chunkOverlap` characters
 * of the previous chunk's tail into the next one.
 */
export class TextChunker {
  readonly chunkSize: number;

  readonly chunkOverlap: number;

  private readonly separators: readonly string[];

  constructor({ chunkSize = 1000, chunkOverlap = 200, separators }: ChunkerOptions = {}) {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new Error(`chunkSize must be a positive integer, got ${chunkSize}.`);
    }

    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new Error(`chunkOverlap must be between 0 and chunkSize - 1, got ${chunkOverlap}.`);
    }

    this.chunkSize = chunkSize;
    this.chunkOverlap = chunkOverlap;
    this.separators = separators?.length ? separators : DEFAULT_SEPARATORS;
  }

  split(text: string): string[] {
    if (!text || !text.trim()) {
      return [];
    }

    return this.splitRecursive(text, this.separators);
  }

  splitDocuments(texts: string[]): string[][] {
    return texts.filter(Boolean).map((text) => this.split(text));
  }

  private splitRecursive(text: string, separators: readonly string[]): string[] {
    let separator = separators[separators.length - 1] ?? '';
    let finer: readonly string[] = [];

    for (let index = 0; index < separators.length; index += 1) {
      const candidate = separators[index];

      if (candidate === '') {
        separator = candidate;
        break;
      }

      if (text.includes(candidate)) {
        separator = candidate;
        finer = separators.slice(index + 1);
        break;
      }
    }

    const pieces = (separator === '' ? Array.from(text) : text.split(separator)).filter(
      (piece) => piece !== '',
    );

    const chunks: string[] = [];
    let pending: string[] = [];

    for (const piece of pieces) {
      if (piece.length < this.chunkSize) {
        pending.push(piece);
        continue;
      }

      if (pending.length) {
        chunks.push(...this.mergePieces(pending, separator));
        pending = [];
      }

      if (finer.length) {
        chunks.push(...this.splitRecursive(piece, finer));
      } else {
        chunks.push(piece);
      }
    }

    if (pending.length) {
      chunks.push(...this.mergePieces(pending, separator));
    }

    return chunks;
  }

  private mergePieces(pieces: string[], separator: string): string[] {
    const separatorLength = separator.length;
    const merged: string[] = [];
    let window: string[] = [];
    let total = 0;

    const joinedLengthWith = (length: number): number =>
      total + length + (window.length ? separatorLength : 0);

    for (const piece of pieces) {
      if (joinedLengthWith(piece.length) > this.chunkSize && window.length) {
        const chunk = window.join(separator).trim();
        if (chunk) {
          merged.push(chunk);
        }

        while (
          total > this.chunkOverlap
          || (total > 0 && joinedLengthWith(piece.length) > this.chunkSize)
        ) {
          total -= window[0].length + (window.length > 1 ? separatorLength : 0);
          window = window.slice(1);
        }
      }

      window.push(piece);
      total += piece.length + (window.length > 1 ? separatorLength : 0);
    }

    const last = window.join(separator).trim();
    if (last) {
      merged.push(last);
    }

    return merged;
  }
}
