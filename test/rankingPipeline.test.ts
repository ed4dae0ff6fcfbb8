import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { InvalidFileError, SessionClosedError, VectorIndexError } from '../src/errors';
import { AnalysisAdapter } from '../src/pipeline/analyze';
import { RankingEngine } from '../src/pipeline/rank';
import { RankingPipeline } from '../src/pipeline/rankCvs';
import type { UploadedFile } from '../src/pipeline/rankCvs';
import { TextChunker } from '../src/rag/chunker';
import { VectorIndexer } from '../src/rag/indexer';
import type { ChunkRecord, EmbeddingCapability } from '../src/rag/schema';
import { SemanticScorer } from '../src/rag/similarity';
import { SessionManager } from '../src/store/sessions';
import { FakeAssessmentClient, FakeEmbeddings, InMemoryVectorStore, analysisJson } from './support/fakes';

const upload = (originalname: string, text: string): UploadedFile => {
  const buffer = Buffer.from(text);
  return { originalname, size: buffer.length, buffer };
};

// Reads uploads back as plain text instead of parsing PDF or Word files.
const readAsText = async (filePaths: string[]): Promise<Map<string, string>> => {
  const texts = new Map<string, string>();

  for (const filePath of filePaths) {
    texts.set(filePath, await fs.readFile(filePath, 'utf8'));
  }

  return texts;
};

class UnavailableEmbeddings implements EmbeddingCapability {
  readonly dimension = 8;

  async embed(): Promise<number[]> {
    throw new Error('embedding service down');
  }

  async embedBatch(): Promise<number[][]> {
    throw new Error('embedding service down');
  }
}

// Job description batches always fail; the first CV batch fails slowly, then succeeds on retry.
class SlowRetryStore extends InMemoryVectorStore {
  cvAttempts = 0;

  async upsert(records: ChunkRecord[]): Promise<void> {
    if (records.some((record) => record.metadata.role === 'job_description')) {
      throw new Error('job description batch rejected');
    }

    this.cvAttempts += 1;

    if (this.cvAttempts === 1) {
      await new Promise((resolve) => {
        setTimeout(resolve, 20);
      });
      throw new Error('timed out');
    }

    await super.upsert(records);
  }
}

describe('RankingPipeline', () => {
  let baseDir: string;
  let sessions: SessionManager;
  let store: InMemoryVectorStore;
  let client: FakeAssessmentClient;

  const buildPipeline = (
    overrides: { scorerEmbeddings?: EmbeddingCapability; loader?: typeof readAsText; maxFiles?: number } = {},
  ) => {
    const embeddings = new FakeEmbeddings();

    return new RankingPipeline({
      sessions,
      indexer: new VectorIndexer({
        embeddings,
        store,
        chunker: new TextChunker({ chunkSize: 200, chunkOverlap: 20 }),
        retryDelayMs: 1,
      }),
      scorer: new SemanticScorer(overrides.scorerEmbeddings ?? embeddings),
      engine: new RankingEngine({ analyzer: new AnalysisAdapter({ client }) }),
      maxFiles: overrides.maxFiles ?? 5,
      maxFileSizeBytes: 1024,
      loader: overrides.loader ?? readAsText,
    });
  };

  beforeEach(async () => {
    baseDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cv-pipeline-'));
    sessions = new SessionManager(baseDir);
    store = new InMemoryVectorStore();
    client = new FakeAssessmentClient((_prompt, input) =>
      String(input.cvText).includes('Ada')
        ? analysisJson()
        : analysisJson({
          candidate_name: 'Unknown',
          skill_match_score: 20,
          experience_score: 20,
          tool_tech_score: 20,
          seniority_score: 20,
          matched_skills: [],
          missing_skills: ['TypeScript'],
          explanation: 'Weak match.',
        }));
  });

  afterEach(async () => {
    await fs.rm(baseDir, { recursive: true, force: true });
  });

  it('ranks uploaded CVs and keeps the session for follow-up requests', async () => {
    const pipeline = buildPipeline();

    const response = await pipeline.rank({
      jobDescription: 'TypeScript backend engineer',
      files: [upload('bob_smith.docx', 'Bob Smith\nPHP developer'), upload('ada.pdf', 'Ada Lovelace\nTypeScript')],
      topN: 1,
    });

    expect(response.total_candidates).toBe(2);
    expect(response.top_candidates).toHaveLength(1);

    const [top] = response.top_candidates;
    expect(top.candidate_name).toBe('Ada Lovelace');
    expect(top.file_path).toBe(path.join(baseDir, response.session_id, 'ada.pdf'));
    expect(top.matched_skills).toEqual(['TypeScript']);
    expect(top.detailed_scores.skill_match).toBe(80);
    expect(response.processing_time_seconds).toBeGreaterThanOrEqual(0);

    // JD plus two CVs, one chunk each.
    expect(store.countForSession(response.session_id)).toBe(3);
    await expect(fs.readdir(path.join(baseDir, response.session_id))).resolves.toHaveLength(2);
    expect(sessions.get(response.session_id)).toBeUndefined();
  });

  it('ranks every upload even when two share a filename', async () => {
    const response = await buildPipeline().rank({
      jobDescription: 'TypeScript backend engineer',
      files: [upload('cv.pdf', 'Ada Lovelace\nTypeScript'), upload('cv.pdf', 'PHP developer')],
    });

    expect(response.total_candidates).toBe(2);
    expect(response.top_candidates.map((candidate) => path.basename(candidate.file_path))).toEqual([
      'cv.pdf',
      'cv_2.pdf',
    ]);
  });

  it('names unknown candidates from their filename', async () => {
    const response = await buildPipeline().rank({
      jobDescription: 'TypeScript backend engineer',
      files: [upload('bob_smith.docx', 'PHP developer')],
    });

    expect(response.top_candidates.map((candidate) => candidate.candidate_name)).toEqual(['Bob Smith']);
  });

  it('rejects invalid requests before creating a session', async () => {
    const pipeline = buildPipeline({ maxFiles: 1 });

    await expect(pipeline.rank({ jobDescription: ' ', files: [upload('a.pdf', 'x')] })).rejects.toBeInstanceOf(
      InvalidFileError,
    );
    await expect(pipeline.rank({ jobDescription: 'JD', files: [] })).rejects.toBeInstanceOf(InvalidFileError);
    await expect(
      pipeline.rank({ jobDescription: 'JD', files: [upload('a.pdf', 'x'), upload('b.pdf', 'y')] }),
    ).rejects.toThrow('Maximum 1 CVs allowed per request');
    await expect(pipeline.rank({ jobDescription: 'JD', files: [upload('notes.txt', 'x')] })).rejects.toThrow(
      'file type not allowed',
    );
    await expect(
      pipeline.rank({ jobDescription: 'JD', files: [upload('big.pdf', 'x'.repeat(2048))] }),
    ).rejects.toThrow('file too large');

    await expect(fs.readdir(baseDir)).resolves.toEqual([]);
  });

  it('removes files and vectors when a later stage fails', async () => {
    const pipeline = buildPipeline({ scorerEmbeddings: new UnavailableEmbeddings() });

    await expect(
      pipeline.rank({ jobDescription: 'TypeScript engineer', files: [upload('ada.pdf', 'Ada Lovelace')] }),
    ).rejects.toThrow('embedding service down');

    expect(store.records.size).toBe(0);
    expect(store.upsertCalls.length).toBeGreaterThan(0);
    await expect(fs.readdir(baseDir)).resolves.toEqual([]);
  });

  it('waits for in-flight ingestion before cleaning up after a failure', async () => {
    const slowStore = new SlowRetryStore();
    store = slowStore;
    const pipeline = buildPipeline();

    await expect(
      pipeline.rank({ jobDescription: 'TypeScript engineer', files: [upload('ada.pdf', 'Ada Lovelace')] }),
    ).rejects.toBeInstanceOf(VectorIndexError);

    expect(slowStore.cvAttempts).toBe(2);
    expect(store.records.size).toBe(0);
    await expect(fs.readdir(baseDir)).resolves.toEqual([]);
  });

  it('fails closed when the session is deleted while candidates are analysed', async () => {
    let pipeline: RankingPipeline | undefined;
    client = new FakeAssessmentClient(async () => {
      const [sessionId] = await fs.readdir(baseDir);
      await pipeline?.cleanup(sessionId);
      return analysisJson();
    });
    pipeline = buildPipeline();

    await expect(
      pipeline.rank({ jobDescription: 'TypeScript engineer', files: [upload('ada.pdf', 'Ada Lovelace')] }),
    ).rejects.toBeInstanceOf(SessionClosedError);

    expect(store.records.size).toBe(0);
    await expect(fs.readdir(baseDir)).resolves.toEqual([]);
  });

  it('fails and cleans up when no CV could be read', async () => {
    const pipeline = buildPipeline({ loader: async () => new Map<string, string>() });

    await expect(pipeline.rank({ jobDescription: 'JD', files: [upload('ada.pdf', 'x')] })).rejects.toThrow(
      'Failed to load any CV files',
    );
    await expect(fs.readdir(baseDir)).resolves.toEqual([]);
  });

  it('cleans up a session on request, once', async () => {
    const pipeline = buildPipeline();
    const { session_id: sessionId } = await pipeline.rank({
      jobDescription: 'TypeScript engineer',
      files: [upload('ada.pdf', 'Ada Lovelace')],
    });

    await expect(pipeline.cleanup(sessionId)).resolves.toBe(true);
    expect(store.countForSession(sessionId)).toBe(0);
    await expect(pipeline.cleanup(sessionId)).resolves.toBe(false);
    await expect(pipeline.cleanup('../../etc')).rejects.toBeInstanceOf(InvalidFileError);
  });

  it('sweeps expired sessions, vectors included', async () => {
    const pipeline = buildPipeline();
    const { session_id: sessionId } = await pipeline.rank({
      jobDescription: 'TypeScript engineer',
      files: [upload('ada.pdf', 'Ada Lovelace')],
    });

    await expect(pipeline.sweep(60_000, Date.now())).resolves.toEqual([]);
    await expect(pipeline.sweep(60_000, Date.now() + 120_000)).resolves.toEqual([sessionId]);
    expect(store.records.size).toBe(0);
    await expect(fs.readdir(baseDir)).resolves.toEqual([]);
  });
});
