import { z } from 'zod';

import { describeError } from '../errors';
import type { StructuredAssessmentClient } from '../llm/client';
import { CV_MATCH_PROMPT, JD_REQUIREMENTS_PROMPT } from '../llm/prompts';
import { clampScore } from '../util/numbers';

export const UNKNOWN_CANDIDATE = 'Unknown';

export const FALLBACK_EXPLANATIONS = {
  missingJobDescription: 'Please provide a Job Description.',
  missingCv: 'Please provide a CV.',
  emptyResponse: 'LLM returned empty output. Please try again.',
  invalidResponse: 'Analysis could not be completed: the assessment response was not valid JSON.',
  callFailed: 'Analysis could not be completed. Please try again.',
} as const;

export type AnalysisResult = {
  candidateName: string;
  skillMatchScore: number;
  experienceScore: number;
  toolTechScore: number;
  seniorityScore: number;
  matchedSkills: string[];
  missingSkills: string[];
  explanation: string;
};

export type JobRequirements = {
  requiredSkills: string[];
  requiredTools: string[];
  requiredExperienceYears: number;
  seniorityLevel: string;
  keyResponsibilities: string[];
};

const score = z.coerce.number().catch(0);
const stringList = z.array(z.coerce.string()).catch([]);

const cvMatchSchema = z.object({
  candidate_name: z.string().trim().min(1).catch(UNKNOWN_CANDIDATE),
  skill_match_score: score,
  experience_score: score,
  tool_tech_score: score,
  seniority_score: score,
  matched_skills: stringList,
  missing_skills: stringList,
  explanation: z.string().trim().min(1).catch('Analysis completed.'),
});

const requirementsSchema = z.object({
  required_skills: stringList,
  required_tools: stringList,
  required_experience_years: z.coerce.number().min(0).catch(0),
  seniority_level: z.string().trim().min(1).catch('unknown'),
  key_responsibilities: stringList,
});

export const defaultAnalysis = (explanation: string = FALLBACK_EXPLANATIONS.callFailed): AnalysisResult => ({
  candidateName: UNKNOWN_CANDIDATE,
  skillMatchScore: 0,
  experienceScore: 0,
  toolTechScore: 0,
  seniorityScore: 0,
  matchedSkills: [],
  missingSkills: [],
  explanation,
});

export const defaultRequirements = (): JobRequirements => ({
  requiredSkills: [],
  requiredTools: [],
  requiredExperienceYears: 0,
  seniorityLevel: 'unknown',
  keyResponsibilities: [],
});

/** Removes a surrounding ```json / ``` fence, if the model added one. */
export const stripCodeFences = (raw: string): string => {
  let cleaned = raw.trim();

  if (cleaned.startsWith('```json')) {
    cleaned = cleaned.slice(7);
  } else if (cleaned.startsWith('```')) {
    cleaned = cleaned.slice(3);
  }

  if (cleaned.endsWith('```')) {
    cleaned = cleaned.slice(0, -3);
  }

  return cleaned.trim();
};

type ParseOutcome =
  | { ok: true; value: unknown }
  | { ok: false; reason: 'empty' | 'invalid' };

const parseJsonPayload = (raw: string): ParseOutcome => {
  const cleaned = stripCodeFences(raw);

  if (!cleaned) {
    return { ok: false, reason: 'empty' };
  }

  try {
    return { ok: true, value: JSON.parse(cleaned) };
  } catch {
    return { ok: false, reason: 'invalid' };
  }
};

type AnalysisAdapterOptions = {
  client: StructuredAssessmentClient;
  maxChars?: number;
  maxRequirementChars?: number;
};

export class AnalysisAdapter {
  private readonly client: StructuredAssessmentClient;

  private readonly maxChars: number;

  private readonly maxRequirementChars: number;

  constructor({ client, maxChars = 15_000, maxRequirementChars = 10_000 }: AnalysisAdapterOptions) {
    this.client = client;
    this.maxChars = maxChars;
    this.maxRequirementChars = maxRequirementChars;
  }

  /** Never throws: every failure becomes a zero-scored result with a reason. */
  async analyze(jobDescription: string, cvText: string): Promise<AnalysisResult> {
    if (!jobDescription?.trim()) {
      console.error('[ANALYSIS] Empty job description provided.');
      return defaultAnalysis(FALLBACK_EXPLANATIONS.missingJobDescription);
    }

    if (!cvText?.trim()) {
      console.error('[ANALYSIS] Empty CV text provided.');
      return defaultAnalysis(FALLBACK_EXPLANATIONS.missingCv);
    }

    let raw: string;

    try {
      raw = await this.client.complete(CV_MATCH_PROMPT, {
        jobDescription: jobDescription.slice(0, this.maxChars),
        cvText: cvText.slice(0, this.maxChars),
      });
    } catch (error) {
      console.error(`[ANALYSIS] Error analyzing CV: ${describeError(error)}`);
      return defaultAnalysis(FALLBACK_EXPLANATIONS.callFailed);
    }

    const outcome = parseJsonPayload(raw ?? '');

    if (!outcome.ok) {
      if (outcome.reason === 'empty') {
        console.error('[ANALYSIS] LLM returned empty output.');
        return defaultAnalysis(FALLBACK_EXPLANATIONS.emptyResponse);
      }

      console.error(`[ANALYSIS] Failed to parse JSON response. Raw response: ${raw.slice(0, 500)}`);
      return defaultAnalysis(FALLBACK_EXPLANATIONS.invalidResponse);
    }

    const parsed = cvMatchSchema.safeParse(outcome.value);

    if (!parsed.success) {
      console.error('[ANALYSIS] Assessment response was not a JSON object.');
      return defaultAnalysis(FALLBACK_EXPLANATIONS.invalidResponse);
    }

    const analysis = parsed.data;

    console.info(`[ANALYSIS] Analyzed CV for candidate: ${analysis.candidate_name}`);

    return {
      candidateName: analysis.candidate_name,
      skillMatchScore: clampScore(analysis.skill_match_score),
      experienceScore: clampScore(analysis.experience_score),
      toolTechScore: clampScore(analysis.tool_tech_score),
      seniorityScore: clampScore(analysis.seniority_score),
      matchedSkills: analysis.matched_skills,
      missingSkills: analysis.missing_skills,
      explanation: analysis.explanation,
    };
  }

  async extractRequirements(jobDescription: string): Promise<JobRequirements> {
    if (!jobDescription?.trim()) {
      console.error('[ANALYSIS] Empty job description provided for extraction.');
      return defaultRequirements();
    }

    let raw: string;

    try {
      raw = await this.client.complete(JD_REQUIREMENTS_PROMPT, {
        jobDescription: jobDescription.slice(0, this.maxRequirementChars),
      });
    } catch (error) {
      console.error(`[ANALYSIS] Error extracting JD requirements: ${describeError(error)}`);
      return defaultRequirements();
    }

    const outcome = parseJsonPayload(raw ?? '');

    if (!outcome.ok) {
      console.error(`[ANALYSIS] Unusable JD requirements response (${outcome.reason}).`);
      return defaultRequirements();
    }

    const parsed = requirementsSchema.safeParse(outcome.value);

    if (!parsed.success) {
      console.error('[ANALYSIS] JD requirements response was not a JSON object.');
      return defaultRequirements();
    }

    return {
      requiredSkills: parsed.data.required_skills,
      requiredTools: parsed.data.required_tools,
      requiredExperienceYears: parsed.data.required_experience_years,
      seniorityLevel: parsed.data.seniority_level,
      keyResponsibilities: parsed.data.key_responsibilities,
    };
  }
}
