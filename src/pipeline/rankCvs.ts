import { InvalidFileError, SessionClosedError, describeError } from '../errors';
import { VectorIndexer, extractCandidateName, toDocumentKey } from '../rag/indexer';
import type { Session, SourceDocument } from '../rag/schema';
import { SemanticScorer } from '../rag/similarity';
import { SessionManager } from '../store/sessions';
import type { RankedCandidate, RankingResponse } from '../types';
import { loadDocuments, validateUpload } from './loadDocument';
import { RankingEngine } from './rank';
import type { CandidateScore } from './rank';

export type UploadedFile = {
  originalname: string;
  size: number;
  buffer: Uint8Array;
};

export type RankRequest = {
  jobDescription: string;
  files: UploadedFile[];
  topN?: number;
};

type RankingPipelineOptions = {
  sessions: SessionManager;
  indexer: VectorIndexer;
  scorer: SemanticScorer;
  engine: RankingEngine;
  maxFiles: number;
  maxFileSizeBytes: number;
  loader?: (filePaths: string[]) => Promise<Map<string, string>>;
};

export const JD_DOCUMENT_KEY = 'jd';

const toRankedCandidate = (candidate: CandidateScore): RankedCandidate => ({
  candidate_name: candidate.candidateName,
  file_path: candidate.filePath,
  match_score: candidate.matchScore,
  matched_skills: candidate.matchedSkills,
  missing_skills: candidate.missingSkills,
  explanation: candidate.explanation,
  detailed_scores: {
    skill_match: candidate.skillMatchScore,
    experience: candidate.experienceScore,
    tool_tech: candidate.toolTechScore,
    seniority: candidate.seniorityScore,
    semantic: candidate.semanticScore,
  },
});

/**
 * One ranking request end to end: session, upload, text extraction,
 * ingestion, semantic scoring, analysis and ranking. Any failure after the
 * session exists tears the session down (files and vectors) before rethrowing.
 */
export class RankingPipeline {
  private readonly sessions: SessionManager;

  private readonly indexer: VectorIndexer;

  private readonly scorer: SemanticScorer;

  private readonly engine: RankingEngine;

  private readonly maxFiles: number;

  private readonly maxFileSizeBytes: number;

  private readonly loader: (filePaths: string[]) => Promise<Map<string, string>>;

  constructor({ sessions, indexer, scorer, engine, maxFiles, maxFileSizeBytes, loader = loadDocuments }: RankingPipelineOptions) {
    this.sessions = sessions;
    this.indexer = indexer;
    this.scorer = scorer;
    this.engine = engine;
    this.maxFiles = maxFiles;
    this.maxFileSizeBytes = maxFileSizeBytes;
    this.loader = loader;
  }

  private validateRequest({ jobDescription, files }: RankRequest): void {
    if (!jobDescription?.trim()) {
      throw new InvalidFileError('Job description is required');
    }

    if (!files.length) {
      throw new InvalidFileError('At least one CV file is required');
    }

    if (files.length > this.maxFiles) {
      throw new InvalidFileError(`Maximum ${this.maxFiles} CVs allowed per request`);
    }

    files.forEach((file) => validateUpload(file.originalname, file.size, { maxFileSizeBytes: this.maxFileSizeBytes }));
  }

  private buildDocuments(jobDescription: string, cvTexts: Map<string, string>): {
    jobDocument: SourceDocument;
    cvDocuments: SourceDocument[];
    displayNames: Map<string, string>;
  } {
    const displayNames = new Map<string, string>();
    const usedKeys = new Set<string>([JD_DOCUMENT_KEY]);

    const cvDocuments = [...cvTexts.entries()].map(([filePath, text]) => {
      const candidateName = extractCandidateName(filePath, text);
      let key = toDocumentKey(filePath);

      // Distinct files can sanitise to the same key; keep their chunk ids apart.
      for (let suffix = 2; usedKeys.has(key); suffix += 1) {
        key = `${toDocumentKey(filePath)}_${suffix}`;
      }
      usedKeys.add(key);
      displayNames.set(filePath, candidateName);

      return { role: 'cv' as const, key, text, filePath, candidateName };
    });

    return {
      jobDocument: { role: 'job_description', key: JD_DOCUMENT_KEY, text: jobDescription },
      cvDocuments,
      displayNames,
    };
  }

  async rank(request: RankRequest): Promise<RankingResponse> {
    const startedAt = Date.now();
    const topN = request.topN ?? 3;

    this.validateRequest(request);

    const session = await this.sessions.create();

    try {
      const filePaths: string[] = [];

      for (const file of request.files) {
        filePaths.push(await this.sessions.save(session, file.originalname, file.buffer));
      }

      console.info(`[RANK] Processing ${filePaths.length} CV(s) for session ${session.id}`);

      const cvTexts = await this.loader(filePaths);

      if (!cvTexts.size) {
        throw new Error('Failed to load any CV files');
      }

      const { jobDocument, cvDocuments, displayNames } = this.buildDocuments(request.jobDescription, cvTexts);

      await this.indexer.ingestMany(session, [jobDocument, ...cvDocuments]);

      const semanticScores = await this.scorer.scoreCandidates(request.jobDescription, cvTexts);

      const ranked = await this.engine.rank({
        jobDescription: request.jobDescription,
        candidates: cvTexts,
        semanticScores,
        displayNames,
      });

      // A DELETE or sweep may have removed the session's files and vectors meanwhile.
      if (session.closed) {
        throw new SessionClosedError(session.id);
      }

      const topCandidates = this.engine.top(ranked, topN);
      const processingTimeSeconds = Math.round((Date.now() - startedAt) / 10) / 100;

      console.info(`[RANK] Ranking completed for session ${session.id} in ${processingTimeSeconds}s`);
      // Finished: downloads and DELETE work from the directory alone.
      this.sessions.release(session.id);

      return {
        session_id: session.id,
        top_candidates: topCandidates.map(toRankedCandidate),
        total_candidates: ranked.length,
        processing_time_seconds: processingTimeSeconds,
      };
    } catch (error) {
      console.error(`[RANK] Error processing session ${session.id}: ${describeError(error)}`);
      await this.cleanupQuietly(session);
      throw error;
    }
  }

  private async cleanupQuietly(session: Session): Promise<void> {
    try {
      await this.cleanup(session);
    } catch (cleanupError) {
      console.error(`[RANK] Cleanup after failure also failed for session ${session.id}: ${describeError(cleanupError)}`);
    }
  }

  /**
   * Closes the session first so in-flight ingestion fails closed, then
   * removes its vectors and files.
   */
  async cleanup(sessionOrId: Session | string): Promise<boolean> {
    const sessionId = typeof sessionOrId === 'string' ? sessionOrId : sessionOrId.id;
    const session = typeof sessionOrId === 'string' ? this.sessions.get(sessionId) : sessionOrId;

    // Validates the id before anything reaches the vector store.
    this.sessions.getSessionDir(sessionId);

    if (session) {
      session.closed = true;
    }

    await this.indexer.deleteSession(sessionId);
    return this.sessions.cleanup(session ?? sessionId);
  }

  /** Expires old sessions, vectors first so a failed delete leaves the session findable. */
  async sweep(maxAgeMs: number, now: number = Date.now()): Promise<string[]> {
    const removed: string[] = [];

    for (const sessionId of await this.sessions.findExpiredSessions(maxAgeMs, now)) {
      try {
        if (await this.cleanup(sessionId)) {
          removed.push(sessionId);
        }
      } catch (error) {
        console.error(`[SESSION] Expired session ${sessionId} could not be removed: ${describeError(error)}`);
      }
    }

    if (removed.length) {
      console.info(`[SESSION] Swept ${removed.length} expired session(s).`);
    }

    return removed;
  }
}
