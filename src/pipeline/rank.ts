import path from 'node:path';

import { describeError } from '../errors';
import { settleInGroups } from '../util/concurrency';
import { clamp, clampScore, toTwoDecimals } from '../util/numbers';
import { AnalysisAdapter, UNKNOWN_CANDIDATE, defaultAnalysis } from './analyze';
import type { AnalysisResult } from './analyze';

export type ScoreWeights = {
  skillMatch: number;
  experience: number;
  toolTech: number;
  seniority: number;
  semantic: number;
};

/** The single most consequential tunable: how the five signals combine. */
export const DEFAULT_WEIGHTS: Readonly<ScoreWeights> = Object.freeze({
  skillMatch: 0.4,
  experience: 0.25,
  toolTech: 0.2,
  seniority: 0.1,
  semantic: 0.05,
});

const WEIGHT_TOLERANCE = 1e-9;

export const validateWeights = (weights: ScoreWeights): Readonly<ScoreWeights> => {
  const values = Object.values(weights);

  if (values.some((value) => !Number.isFinite(value) || value < 0)) {
    throw new Error('Score weights must be finite, non-negative numbers.');
  }

  const total = values.reduce((sum, value) => sum + value, 0);

  if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
    throw new Error(`Score weights must sum to 1.0, got ${total}.`);
  }

  return Object.freeze({ ...weights });
};

export type CandidateScore = {
  candidateName: string;
  filePath: string;
  matchScore: number;
  skillMatchScore: number;
  experienceScore: number;
  toolTechScore: number;
  seniorityScore: number;
  semanticScore: number;
  matchedSkills: string[];
  missingSkills: string[];
  explanation: string;
};

export type RankInput = {
  jobDescription: string;
  /** Candidate identity (source file path) to extracted text, in upload order. */
  candidates: ReadonlyMap<string, string>;
  /** Identity to cosine similarity in [0, 1]. */
  semanticScores: ReadonlyMap<string, number>;
  displayNames?: ReadonlyMap<string, string>;
};

type RankingEngineOptions = {
  analyzer: AnalysisAdapter;
  weights?: ScoreWeights;
  concurrency?: number;
};

export const computeMatchScore = (
  analysis: Pick<AnalysisResult, 'skillMatchScore' | 'experienceScore' | 'toolTechScore' | 'seniorityScore'>,
  semanticScore: number,
  weights: ScoreWeights = DEFAULT_WEIGHTS,
): number =>
  clamp(
    analysis.skillMatchScore * weights.skillMatch
      + analysis.experienceScore * weights.experience
      + analysis.toolTechScore * weights.toolTech
      + analysis.seniorityScore * weights.seniority
      + semanticScore * weights.semantic,
    0,
    100,
  );

export class RankingEngine {
  readonly weights: Readonly<ScoreWeights>;

  private readonly analyzer: AnalysisAdapter;

  private readonly concurrency: number;

  constructor({ analyzer, weights = DEFAULT_WEIGHTS, concurrency = 4 }: RankingEngineOptions) {
    this.analyzer = analyzer;
    this.weights = validateWeights(weights);
    this.concurrency = Math.max(1, concurrency);
  }

  private resolveName(filePath: string, analysis: AnalysisResult, displayNames?: ReadonlyMap<string, string>): string {
    if (analysis.candidateName && analysis.candidateName !== UNKNOWN_CANDIDATE) {
      return analysis.candidateName;
    }

    return displayNames?.get(filePath) ?? path.parse(filePath).name;
  }

  private toCandidateScore(
    filePath: string,
    analysis: AnalysisResult,
    similarity: number,
    displayNames?: ReadonlyMap<string, string>,
  ): CandidateScore {
    const semanticScore = clampScore(similarity * 100);

    return {
      candidateName: this.resolveName(filePath, analysis, displayNames),
      filePath,
      matchScore: toTwoDecimals(computeMatchScore(analysis, semanticScore, this.weights)),
      skillMatchScore: toTwoDecimals(clampScore(analysis.skillMatchScore)),
      experienceScore: toTwoDecimals(clampScore(analysis.experienceScore)),
      toolTechScore: toTwoDecimals(clampScore(analysis.toolTechScore)),
      seniorityScore: toTwoDecimals(clampScore(analysis.seniorityScore)),
      semanticScore: toTwoDecimals(semanticScore),
      matchedSkills: analysis.matchedSkills,
      missingSkills: analysis.missingSkills,
      explanation: analysis.explanation,
    };
  }

  /**
   * Scores every candidate and sorts by match score, highest first. Ties keep
   * input order.
   */
  async rank({ jobDescription, candidates, semanticScores, displayNames }: RankInput): Promise<CandidateScore[]> {
    const entries = [...candidates.entries()];

    const settled = await settleInGroups(entries, this.concurrency, ([filePath, text]) => {
      console.info(`[RANK] Ranking candidate: ${filePath}`);
      return this.analyzer.analyze(jobDescription, text);
    });

    const scored = entries.map(([filePath], index) => {
      const outcome = settled[index];
      let analysis: AnalysisResult;

      if (outcome.status === 'fulfilled') {
        analysis = outcome.value;
      } else {
        console.error(`[RANK] Analysis task failed for ${filePath}: ${describeError(outcome.reason)}`);
        analysis = defaultAnalysis();
      }

      return this.toCandidateScore(filePath, analysis, semanticScores.get(filePath) ?? 0, displayNames);
    });

    // Array.prototype.sort is stable.
    scored.sort((left, right) => right.matchScore - left.matchScore);

    console.info(`[RANK] Ranked ${scored.length} candidate(s).`);

    return scored;
  }

  top(ranked: readonly CandidateScore[], n: number): CandidateScore[] {
    return ranked.slice(0, Math.max(0, Math.trunc(n)));
  }
}
