/**
 * Chunk Model Types
 * Retrieval-sized spans of text with hierarchical context
 */

import type { MetadataValue, SourceType } from './Record.js';

export interface ChunkMetadata {
  recordId: string;
  sourceType: SourceType;
  splitIndex: number;
  totalSplits: number;
  /** Character offset of the focal span within the record content */
  offset: number;
  contentHash: string;
  title?: string;
  url?: string;
  author?: string;
  category?: string;
  parentId?: string;
  modifiedAt: number;
  revision: number;
  qualityScore: number;
  truncated: boolean;
  contextDepth: number;
  [key: string]: MetadataValue | undefined;
}

export interface Chunk {
  chunkId: string;
  /** Full embeddable text: context header plus focal content */
  text: string;
  /** Focal span of the record this chunk covers */
  content: string;
  /** Ancestor snippets, nearest parent first */
  context: string[];
  metadata: ChunkMetadata;
}
