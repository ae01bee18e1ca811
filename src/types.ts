export type Category = 'work' | 'study' | 'personal' | 'reference' | 'research' | 'ideas';

export const CATEGORIES: readonly Category[] = ['work', 'study', 'personal', 'reference', 'research', 'ideas'];

export const DEFAULT_CATEGORY: Category = 'reference';

export type Priority = 'high' | 'medium' | 'low';

export const PRIORITIES: readonly Priority[] = ['high', 'medium', 'low'];

export type SearchMode = 'hybrid' | 'semantic' | 'keyword';

export const SEARCH_MODES: readonly SearchMode[] = ['hybrid', 'semantic', 'keyword'];

/** Open extension field for classifier or caller-specific annotations. */
export type ChunkCustomFields = Record<string, string | number | boolean>;

export interface ChunkMetadata {
  source_path: string;
  filename: string;
  chunk_index: number;
  chunk_count: number;
  file_type: string;
  file_size_mb: number;
  content_hash: string;
  category: Category;
  priority: Priority;
  tags: string[];
  summary: string;
  custom: ChunkCustomFields;
}

export interface Chunk {
  content: string;
  metadata: ChunkMetadata;
}

export interface StoredChunk extends Chunk {
  id: number;
}

export interface RetrievalResult extends StoredChunk {
  /** Raw Euclidean distance; null for keyword-only hits. */
  distance: number | null;
  vector_score: number;
  keyword_score: number;
  combined_score: number;
  relevance_score: number;
}

/** Metadata keys a filter may constrain; every given key must match exactly. */
export type FilterKey = 'filename' | 'source_path' | 'file_type' | 'category' | 'priority' | 'content_hash';

export type MetadataFilter = Partial<Record<FilterKey, string>>;

export interface SourceRef {
  filename: string;
  relevanceScore: number;
  chunkIndex: number;
}

export type ChatRole = 'user' | 'assistant';

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

export type AnswerMethod = 'llm' | 'template' | 'none';

export interface AnswerResult {
  answer: string;
  confidence: number;
  sources: SourceRef[];
  retrievedCount: number;
  method: AnswerMethod;
}

export interface IndexStats {
  recordCount: number;
  documentCount: number;
  dimension: number;
  strategyName: string;
}
