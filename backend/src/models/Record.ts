/**
 * Record Model Types
 * Raw captured items and their canonical, deduplicated form
 */

/**
 * Source families with their own field layouts
 */
export type SourceType = 'forum' | 'web' | 'tabular' | 'generic';

export const SOURCE_TYPES: readonly SourceType[] = ['forum', 'web', 'tabular', 'generic'];

export type MetadataValue = string | number | boolean | null | string[];

export type RecordMetadata = Record<string, MetadataValue>;

/**
 * One line of a capture file, as produced by a scraper.
 * Field names vary by source type; the normalizer maps them.
 */
export type RawItem = Record<string, unknown>;

/**
 * Deduplicated, schema-normalized record
 */
export interface CanonicalRecord {
  id: string;
  sourceType: SourceType;
  /** Epoch milliseconds */
  modifiedAt: number;
  revision: number;
  content: string;
  title?: string;
  url?: string;
  parentId?: string;
  author?: string;
  category?: string;
  qualityScore: number;
  metadata: RecordMetadata;
}

/**
 * A batch of canonical records from one capture file
 */
export interface RecordBatch {
  label: string;
  records: CanonicalRecord[];
}
