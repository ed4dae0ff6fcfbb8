export interface DetailedScores {
    skill_match: number;
    experience: number;
    tool_tech: number;
    seniority: number;
    semantic: number;
}

export interface RankedCandidate {
    candidate_name: string;
    file_path: string;
    match_score: number; // 0..100
    matched_skills: string[];
    missing_skills: string[];
    explanation: string;
    detailed_scores: DetailedScores;
}

export interface RankingResponse {
    session_id: string;
    top_candidates: RankedCandidate[];
    total_candidates: number;
    processing_time_seconds: number;
}

export interface CleanupResponse {
    message: string;
}

export interface HealthResponse {
    status: "healthy";
    services: {
        ingestion: boolean;
        agent: boolean;
        ranking: boolean;
    };
}
