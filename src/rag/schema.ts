export type DocumentRole = 'job_description' | 'cv';

export interface Session {
  readonly id: string;
  readonly directory: string;
  closed: boolean;
}

export interface SourceDocument {
  role: DocumentRole;
  /** `jd` for the job description, the sanitised filename stem for a CV. */
  key: string;
  text: string;
  filePath?: string;
  candidateName?: string;
}

export type ChunkMetadata = {
  session_id: string;
  role: DocumentRole;
  document_key: string;
  chunk_index: number;
  text: string;
  file_path?: string;
  candidate_name?: string;
};

export interface ChunkRecord {
  id: string;
  vector: number[];
  metadata: ChunkMetadata;
}

export interface EmbeddingCapability {
  readonly dimension: number;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

/**
 * Session-partitioned, write-only index. Similarity is computed directly by
 * the semantic scorer, so no query operation is needed here.
 */
export interface VectorStore {
  upsert(records: ChunkRecord[]): Promise<void>;
  deleteBySession(sessionId: string): Promise<void>;
}
