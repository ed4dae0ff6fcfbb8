import type { AppConfig } from './config';
import { OpenAiAssessmentClient } from './llm/client';
import { AnalysisAdapter } from './pipeline/analyze';
import { RankingEngine } from './pipeline/rank';
import { RankingPipeline } from './pipeline/rankCvs';
import { TextChunker } from './rag/chunker';
import { ChromaVectorStore, verifyDimension } from './rag/client';
import { OllamaEmbeddings, OpenAiEmbeddings } from './rag/embeddings';
import { VectorIndexer } from './rag/indexer';
import type { EmbeddingCapability } from './rag/schema';
import { SemanticScorer } from './rag/similarity';
import { SessionManager } from './store/sessions';

export type Services = {
  config: AppConfig;
  sessions: SessionManager;
  indexer: VectorIndexer;
  analyzer: AnalysisAdapter;
  engine: RankingEngine;
  pipeline: RankingPipeline;
};

const buildEmbeddings = ({ embeddings, llm }: AppConfig): EmbeddingCapability => {
  if (embeddings.provider === 'ollama') {
    return new OllamaEmbeddings({
      baseUrl: embeddings.ollamaUrl,
      model: embeddings.model,
      dimension: embeddings.dimension,
    });
  }

  return new OpenAiEmbeddings({
    apiKey: llm.apiKey,
    baseUrl: llm.baseUrl,
    model: embeddings.model,
    dimension: embeddings.dimension,
  });
};

/**
 * Wires every component from configuration and runs the start-up dimension
 * check. A ConfigurationError from here must stop the process.
 */
export const createServices = async (config: AppConfig): Promise<Services> => {
  const embeddings = buildEmbeddings(config);
  const store = new ChromaVectorStore({
    url: config.vectorStore.url,
    collection: config.vectorStore.collection,
    dimension: config.embeddings.dimension,
    embeddings,
  });

  await verifyDimension(store, embeddings, config.embeddings.dimension);

  const sessions = new SessionManager(config.sessions.baseDir);
  const indexer = new VectorIndexer({
    embeddings,
    store,
    chunker: new TextChunker(config.chunking),
    batchSize: config.vectorStore.batchSize,
  });
  const analyzer = new AnalysisAdapter({
    client: new OpenAiAssessmentClient({
      apiKey: config.llm.apiKey,
      baseUrl: config.llm.baseUrl,
      model: config.llm.model,
      timeoutMs: config.llm.timeoutMs,
      maxAttempts: config.llm.maxAttempts,
    }),
  });
  const engine = new RankingEngine({ analyzer, concurrency: config.analysisConcurrency });
  const pipeline = new RankingPipeline({
    sessions,
    indexer,
    scorer: new SemanticScorer(embeddings),
    engine,
    maxFiles: config.uploads.maxFiles,
    maxFileSizeBytes: config.uploads.maxFileSizeBytes,
  });

  console.info(
    `[STARTUP] Services initialized: collection "${config.vectorStore.collection}", embeddings ${config.embeddings.provider}/${config.embeddings.model}, model ${config.llm.model}`,
  );

  return { config, sessions, indexer, analyzer, engine, pipeline };
};
