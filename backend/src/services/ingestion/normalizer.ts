/**
 * Record Normalizer
 * Validates raw captured items and maps them into canonical records
 */

import { createLogger } from '../../lib/logger.js';
import { MalformedRecordError, type MalformedReason } from '../../lib/errors.js';
import type {
  CanonicalRecord,
  RawItem,
  RecordMetadata,
  SourceType,
} from '../../models/Record.js';
import { getSourceAdapter, toMetadataValue, type SourceAdapter } from './sourceAdapters.js';

const log = createLogger('normalizer');

// Epoch values below this are seconds rather than milliseconds
const EPOCH_SECONDS_LIMIT = 1e11;

export interface NormalizeBatchResult {
  records: CanonicalRecord[];
  malformed: number;
  malformedByReason: Partial<Record<MalformedReason, number>>;
}

function isRawItem(value: unknown): value is RawItem {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Lift a nested `metadata` object to the top level.
 * Top-level fields win over nested ones.
 */
function flattenItem(item: RawItem): RawItem {
  const nested = item.metadata;
  if (!isRawItem(nested)) {
    return item;
  }
  const { metadata: _nested, ...rest } = item;
  return { ...nested, ...rest };
}

function pickField(item: RawItem, aliases: string[]): { key: string; value: unknown } | undefined {
  for (const key of aliases) {
    const value = item[key];
    if (value !== undefined && value !== null && value !== '') {
      return { key, value };
    }
  }
  return undefined;
}

function pickString(item: RawItem, aliases: string[]): { key: string; value: string } | undefined {
  const picked = pickField(item, aliases);
  if (!picked) return undefined;
  if (typeof picked.value === 'string') {
    const trimmed = picked.value.trim();
    return trimmed ? { key: picked.key, value: trimmed } : undefined;
  }
  if (typeof picked.value === 'number' && Number.isFinite(picked.value)) {
    return { key: picked.key, value: String(picked.value) };
  }
  return undefined;
}

/**
 * Parse a timestamp given as ISO string, epoch seconds or epoch milliseconds
 */
export function parseTimestamp(value: unknown): number | undefined {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return undefined;
    return value < EPOCH_SECONDS_LIMIT ? Math.round(value * 1000) : Math.round(value);
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return undefined;
    if (/^-?\d+(\.\d+)?$/.test(trimmed)) {
      return parseTimestamp(Number(trimmed));
    }
    const parsed = Date.parse(trimmed);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isNaN(time) ? undefined : time;
  }
  return undefined;
}

function parseRevision(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return Number(value.trim());
  return undefined;
}

/**
 * Normalize one raw item. Throws MalformedRecordError on missing id,
 * missing content or an unusable timestamp.
 */
export function normalizeItem(raw: unknown, sourceType: SourceType = 'generic'): CanonicalRecord {
  if (!isRawItem(raw)) {
    throw new MalformedRecordError('not_an_object', 'Record is not a JSON object');
  }

  const adapter: SourceAdapter = getSourceAdapter(sourceType);
  const item = flattenItem(raw);
  const { fields } = adapter;

  const idField = pickString(item, fields.id);
  const id = idField?.value ?? adapter.deriveId?.(item);
  if (!id) {
    throw new MalformedRecordError('missing_id', 'Record has no id');
  }

  const contentField = pickString(item, fields.content);
  const content = contentField?.value ?? adapter.renderContent?.(item);
  if (!content || content.trim() === '') {
    throw new MalformedRecordError('missing_content', `Record ${id} has no content`, id);
  }

  const revisionField = pickField(item, fields.revision);
  const revision = revisionField ? parseRevision(revisionField.value) : undefined;

  const timestampField = pickField(item, fields.modifiedAt);
  let modifiedAt: number | undefined;
  if (timestampField) {
    modifiedAt = parseTimestamp(timestampField.value);
    if (modifiedAt === undefined) {
      throw new MalformedRecordError(
        'invalid_timestamp',
        `Record ${id} has an unparseable timestamp in '${timestampField.key}'`,
        id
      );
    }
  } else if (revision === undefined) {
    throw new MalformedRecordError(
      'invalid_timestamp',
      `Record ${id} has neither a timestamp nor a revision`,
      id
    );
  }

  const parentField = pickString(item, fields.parentId);
  let parentId = parentField?.value;
  if (parentId && adapter.normalizeParentId) {
    parentId = adapter.normalizeParentId(parentId);
  }
  if (parentId === id) {
    parentId = undefined;
  }

  const title = pickString(item, fields.title);
  const url = pickString(item, fields.url);
  const author = pickString(item, fields.author);
  const category = pickString(item, fields.category);

  // Everything not consumed as a canonical field is kept as opaque metadata
  const consumed = new Set(
    [idField, contentField, revisionField, timestampField, parentField, title, url, author, category]
      .filter((field): field is { key: string; value: unknown } => field !== undefined)
      .map((field) => field.key)
  );

  const metadata: RecordMetadata = {};
  for (const [key, value] of Object.entries(item)) {
    if (consumed.has(key)) continue;
    const converted = toMetadataValue(value);
    if (converted !== undefined) {
      metadata[key] = converted;
    }
  }

  return {
    id,
    sourceType,
    modifiedAt: modifiedAt ?? 0,
    revision: revision ?? 0,
    content,
    title: title?.value,
    url: url?.value,
    parentId,
    author: author?.value,
    category: category?.value,
    qualityScore: adapter.qualityScore(item),
    metadata,
  };
}

/**
 * Normalize a batch. Malformed items are counted and dropped.
 */
export function normalizeBatch(items: Iterable<unknown>, sourceType: SourceType = 'generic'): NormalizeBatchResult {
  const records: CanonicalRecord[] = [];
  const malformedByReason: Partial<Record<MalformedReason, number>> = {};
  let malformed = 0;

  for (const item of items) {
    try {
      records.push(normalizeItem(item, sourceType));
    } catch (error) {
      if (!(error instanceof MalformedRecordError)) {
        throw error;
      }
      malformed++;
      malformedByReason[error.reason] = (malformedByReason[error.reason] ?? 0) + 1;
      log.debug({ reason: error.reason, recordId: error.recordId }, error.message);
    }
  }

  if (malformed > 0) {
    log.warn({ sourceType, malformed, malformedByReason }, 'Dropped malformed records');
  }

  return { records, malformed, malformedByReason };
}
