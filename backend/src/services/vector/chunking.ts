/**
 * Context-Aware Chunker
 * Splits canonical records into overlapping, retrieval-sized chunks that carry
 * their thread ancestry as a context header
 */

import { createHash } from 'crypto';
import { createLogger } from '../../lib/logger.js';
import type { ChunkingSettings } from '../../lib/config.js';
import type { CanonicalRecord } from '../../models/Record.js';
import type { Chunk, ChunkMetadata } from '../../models/Chunk.js';

const log = createLogger('chunking');

export const DEFAULT_CHUNKING_SETTINGS: ChunkingSettings = {
  maxSize: 1000,
  overlapSize: 200,
  minSize: 50,
  contextDepth: 2,
  contextMaxChars: 200,
};

export const CONTEXT_MARKER = '[Context]';
export const CONTENT_MARKER = '[Content]';

/**
 * Character span of the focal content covered by one chunk
 */
export interface ContentSpan {
  start: number;
  end: number;
  truncated: boolean;
}

// Priority order: paragraph, sentence, word
const BOUNDARIES: RegExp[] = [
  /\n\s*\n/g,
  /[.!?]["')\]]*\s+/g,
  /\s+/g,
];

/**
 * Last boundary (by match end) within [from, to], preferring paragraph, then
 * sentence, then whitespace. The returned position is always a token start.
 */
function lastBoundary(text: string, from: number, to: number, patterns: RegExp[]): number | undefined {
  for (const pattern of patterns) {
    const searchText = text.slice(from, Math.min(text.length, to + 1));
    let best: number | undefined;
    pattern.lastIndex = 0;

    let match: RegExpExecArray | null;
    while ((match = pattern.exec(searchText)) !== null) {
      const position = from + match.index + match[0].length;
      if (position > from && position <= to) {
        best = position;
      }
    }

    if (best !== undefined) {
      return best;
    }
  }
  return undefined;
}

/**
 * Find the best split point no later than `hardEnd`.
 * Boundaries close to the budget are preferred so chunks stay near max size.
 */
function findSplitPoint(text: string, minEnd: number, hardEnd: number, maxSize: number): number | undefined {
  const preferredFrom = Math.max(minEnd, hardEnd - Math.floor(maxSize * 0.3));

  return (
    lastBoundary(text, preferredFrom, hardEnd, BOUNDARIES) ??
    lastBoundary(text, minEnd, hardEnd, BOUNDARIES.slice(-1))
  );
}

/**
 * Move a split start back to the beginning of the token it falls in.
 * Gives up (and keeps the position) inside tokens longer than the search window.
 */
function alignToTokenStart(text: string, position: number, lowerBound: number, window: number): number {
  if (position <= 0 || /\s/.test(text[position - 1] ?? ' ')) {
    return position;
  }
  const floor = Math.max(lowerBound, position - window);
  for (let i = position - 1; i >= floor; i--) {
    if (/\s/.test(text[i] ?? '')) {
      return i + 1;
    }
  }
  return position;
}

/**
 * Split content into spans no longer than maxSize where consecutive spans
 * overlap by at least overlapSize characters. Content is never trimmed, so
 * the spans together cover every character.
 */
export function splitContent(content: string, settings: ChunkingSettings = DEFAULT_CHUNKING_SETTINGS): ContentSpan[] {
  const { maxSize, overlapSize, minSize } = settings;
  const length = content.length;

  if (length <= maxSize) {
    return [{ start: 0, end: length, truncated: false }];
  }

  const spans: ContentSpan[] = [];
  const tailReserve = Math.max(0, minSize - overlapSize);
  let start = 0;

  for (;;) {
    const hardEnd = Math.min(start + maxSize, length);
    if (hardEnd === length) {
      spans.push({ start, end: length, truncated: false });
      break;
    }

    // The split must land past the next overlap start so every step makes progress
    const minEnd = Math.min(hardEnd, start + Math.max(minSize, overlapSize + 1));
    const searchEnd = Math.max(minEnd, Math.min(hardEnd, length - tailReserve));

    const boundary =
      findSplitPoint(content, minEnd, searchEnd, maxSize) ??
      findSplitPoint(content, minEnd, hardEnd, maxSize);
    const end = boundary ?? hardEnd;
    spans.push({ start, end, truncated: boundary === undefined });

    start = alignToTokenStart(content, end - overlapSize, start + 1, overlapSize);
  }

  return spans;
}

/**
 * Generate content preview (first N characters, cut at a word boundary)
 */
export function generateContentPreview(content: string, maxLength: number = 200): string {
  const flattened = content.replace(/\s+/g, ' ').trim();
  if (flattened.length <= maxLength) {
    return flattened;
  }

  const truncated = flattened.slice(0, maxLength);
  const lastSpace = truncated.lastIndexOf(' ');

  if (lastSpace > maxLength * 0.8) {
    return truncated.slice(0, lastSpace) + '...';
  }

  return truncated + '...';
}

function sha256(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

/**
 * Deterministic chunk id from record id, split index and content hash
 */
export function generateChunkId(recordId: string, splitIndex: number, contentHash: string): string {
  return sha256(`${recordId}\u0000${splitIndex}\u0000${contentHash}`).slice(0, 32);
}

/**
 * Ancestor chain of a record, nearest parent first, bounded by depth.
 * Stops at missing parents and cycles.
 */
export function resolveAncestors(
  record: CanonicalRecord,
  lookup: ReadonlyMap<string, CanonicalRecord>,
  depth: number
): CanonicalRecord[] {
  const ancestors: CanonicalRecord[] = [];
  const visited = new Set<string>([record.id]);
  let parentId = record.parentId;

  while (parentId && ancestors.length < depth && !visited.has(parentId)) {
    const parent = lookup.get(parentId);
    if (!parent) break;
    ancestors.push(parent);
    visited.add(parentId);
    parentId = parent.parentId;
  }

  return ancestors;
}

function contextSnippet(ancestor: CanonicalRecord, maxChars: number): string {
  const text = ancestor.title ? `${ancestor.title}: ${ancestor.content}` : ancestor.content;
  return generateContentPreview(text, maxChars);
}

/**
 * Assemble the embeddable text. Context lines are printed outermost first
 * so the header reads in thread order.
 */
export function buildChunkText(context: string[], focal: string, title?: string): string {
  const body = title ? `Title: ${title}\n${focal}` : focal;
  if (context.length === 0) {
    return body;
  }

  const header = [...context].reverse().map((snippet) => `> ${snippet}`).join('\n');
  return `${CONTEXT_MARKER}\n${header}\n${CONTENT_MARKER}\n${body}`;
}

/**
 * Chunk one record. `lookup` resolves parent ids to records of the same run.
 */
export function chunkRecord(
  record: CanonicalRecord,
  lookup: ReadonlyMap<string, CanonicalRecord> = new Map(),
  settings: ChunkingSettings = DEFAULT_CHUNKING_SETTINGS
): Chunk[] {
  const ancestors = resolveAncestors(record, lookup, settings.contextDepth);
  const context = ancestors.map((ancestor) => contextSnippet(ancestor, settings.contextMaxChars));
  const spans = splitContent(record.content, settings);

  return spans.map((span, splitIndex) => {
    const focal = record.content.slice(span.start, span.end);
    const text = buildChunkText(context, focal, record.title);
    const contentHash = sha256(text).slice(0, 16);

    const metadata: ChunkMetadata = {
      ...record.metadata,
      recordId: record.id,
      sourceType: record.sourceType,
      splitIndex,
      totalSplits: spans.length,
      offset: span.start,
      contentHash,
      title: record.title,
      url: record.url,
      author: record.author,
      category: record.category,
      parentId: record.parentId,
      modifiedAt: record.modifiedAt,
      revision: record.revision,
      qualityScore: record.qualityScore,
      truncated: span.truncated,
      contextDepth: ancestors.length,
    };

    return {
      chunkId: generateChunkId(record.id, splitIndex, contentHash),
      text,
      content: focal,
      context,
      metadata,
    };
  });
}

/**
 * Chunk a merged record sequence. Ancestors are resolved within the sequence.
 */
export function chunkRecords(
  records: CanonicalRecord[],
  settings: ChunkingSettings = DEFAULT_CHUNKING_SETTINGS
): Chunk[] {
  const lookup = new Map(records.map((record) => [record.id, record]));
  const chunks = records.flatMap((record) => chunkRecord(record, lookup, settings));

  const truncated = chunks.filter((chunk) => chunk.metadata.truncated).length;
  log.debug(
    {
      records: records.length,
      chunksCreated: chunks.length,
      truncated,
      avgChunkSize: chunks.length > 0
        ? Math.round(chunks.reduce((sum, c) => sum + c.content.length, 0) / chunks.length)
        : 0,
    },
    'Record chunking complete'
  );

  return chunks;
}

/**
 * Rebuild a record's content from its chunks by dropping the overlaps
 */
export function reconstructContent(chunks: Chunk[]): string {
  const ordered = [...chunks].sort((a, b) => a.metadata.splitIndex - b.metadata.splitIndex);
  let result = '';
  for (const chunk of ordered) {
    const skip = result.length - chunk.metadata.offset;
    result += chunk.content.slice(Math.max(0, skip));
  }
  return result;
}
