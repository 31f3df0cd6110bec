/**
 * Source Adapters
 * Per-source-type field mappings from capture layouts to canonical records
 */

import type { MetadataValue, RawItem, SourceType } from '../../models/Record.js';

/**
 * Candidate field names for each canonical field, in lookup order
 */
export interface FieldAliases {
  id: string[];
  modifiedAt: string[];
  revision: string[];
  content: string[];
  title: string[];
  url: string[];
  parentId: string[];
  author: string[];
  category: string[];
}

export interface SourceAdapter {
  sourceType: SourceType;
  fields: FieldAliases;
  /** Derive an id when the capture has none of the id aliases */
  deriveId?(item: RawItem): string | undefined;
  /** Render content for sources that store it in structured columns */
  renderContent?(item: RawItem): string | undefined;
  normalizeParentId?(value: string): string;
  qualityScore(item: RawItem): number;
}

const BASE_FIELDS: FieldAliases = {
  id: ['id'],
  modifiedAt: ['modified_at', 'modifiedAt', 'updated_at', 'ingested_at'],
  revision: ['revision', 'rev', 'version'],
  content: ['content', 'text', 'body'],
  title: ['title'],
  url: ['url'],
  parentId: ['parent_id', 'parentId'],
  author: ['author'],
  category: ['category'],
};

function numberField(item: RawItem, key: string): number | undefined {
  const value = item[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return undefined;
}

function stringField(item: RawItem, key: string): string | undefined {
  const value = item[key];
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

// =============================================================================
// Forum threads
// =============================================================================

const forumAdapter: SourceAdapter = {
  sourceType: 'forum',
  fields: {
    ...BASE_FIELDS,
    id: ['id', 'name'],
    modifiedAt: ['modified_at', 'edited_utc', 'ingested_at', 'created_utc'],
    content: ['content', 'text', 'body', 'selftext'],
    url: ['url', 'permalink'],
    parentId: ['parent_id', 'link_id', 'parentId'],
    category: ['category', 'subreddit', 'flair'],
  },
  normalizeParentId(value) {
    return value.replace(/^t[13]_/, '');
  },
  qualityScore(item) {
    let score = 1.0;

    const upvotes = numberField(item, 'score');
    if (upvotes !== undefined) {
      score += Math.max(0, Math.min(upvotes / 10, 5.0));
    }

    const comments = numberField(item, 'num_comments');
    if (comments !== undefined) {
      score += Math.max(0, Math.min(comments / 5, 3.0));
    }

    const author = stringField(item, 'author');
    if (author && author !== '[deleted]') {
      score += 0.5;
    }

    if (item.post_type === 'submission') {
      score += 1.0;
    }

    return Math.min(score, 10.0);
  },
};

// =============================================================================
// Web pages
// =============================================================================

const webAdapter: SourceAdapter = {
  sourceType: 'web',
  fields: {
    ...BASE_FIELDS,
    id: ['id', 'url'],
    modifiedAt: ['modified_at', 'last_modified', 'ingested_at', 'crawled_at'],
    content: ['content', 'text', 'markdown'],
    category: ['category', 'section'],
  },
  qualityScore() {
    return 1.0;
  },
};

// =============================================================================
// Tabular rows (e.g. course grade distributions)
// =============================================================================

const GRADE_POINTS: Record<string, number> = {
  'A+': 4.33, A: 4.0, 'A-': 3.67,
  'B+': 3.33, B: 3.0, 'B-': 2.67,
  'C+': 2.33, C: 2.0, 'C-': 1.67,
  'D+': 1.33, D: 1.0, 'D-': 0.67,
  F: 0.0,
};

const FAILING_GRADES = new Set(['F', 'E', 'W']);

const RESERVED_TABULAR_KEYS = new Set([
  'id', 'modified_at', 'ingested_at', 'revision', ...Object.keys(GRADE_POINTS),
]);

/**
 * Summarize grade columns into totals, average and pass rate
 */
export function summarizeGrades(item: RawItem): {
  totalStudents: number;
  averageGrade: number | null;
  passRate: number | null;
} | null {
  const counts = Object.keys(GRADE_POINTS)
    .map((grade) => ({ grade, count: numberField(item, grade) }))
    .filter((entry): entry is { grade: string; count: number } => entry.count !== undefined);

  if (counts.length === 0) {
    return null;
  }

  const totalStudents = counts.reduce((sum, entry) => sum + entry.count, 0);
  if (totalStudents === 0) {
    return { totalStudents: 0, averageGrade: null, passRate: null };
  }

  const points = counts.reduce((sum, entry) => sum + entry.count * GRADE_POINTS[entry.grade], 0);
  const passing = counts
    .filter((entry) => !FAILING_GRADES.has(entry.grade))
    .reduce((sum, entry) => sum + entry.count, 0);

  return {
    totalStudents,
    averageGrade: Math.round((points / totalStudents) * 100) / 100,
    passRate: Math.round((passing / totalStudents) * 1000) / 10,
  };
}

const tabularAdapter: SourceAdapter = {
  sourceType: 'tabular',
  fields: {
    ...BASE_FIELDS,
    title: ['title', 'course', 'name'],
    category: ['category', 'subject', 'Subject'],
  },
  deriveId(item) {
    const parts = ['Subject', 'Catalog Nbr', 'Section', 'Term']
      .map((key) => stringField(item, key))
      .filter((part): part is string => part !== undefined);
    return parts.length >= 2 ? parts.join('-').replace(/\s+/g, '') : undefined;
  },
  renderContent(item) {
    const lines: string[] = [];

    const subject = stringField(item, 'Subject');
    const catalog = stringField(item, 'Catalog Nbr');
    if (subject && catalog) {
      const section = stringField(item, 'Section');
      lines.push(`Course: ${subject} ${catalog}${section ? ` Section ${section}` : ''}`);
    }

    for (const [key, value] of Object.entries(item)) {
      if (RESERVED_TABULAR_KEYS.has(key) || key === 'Subject' || key === 'Catalog Nbr' || key === 'Section') {
        continue;
      }
      if (typeof value === 'string' && value.trim() !== '') {
        lines.push(`${key}: ${value.trim()}`);
      } else if (typeof value === 'number' && Number.isFinite(value)) {
        lines.push(`${key}: ${value}`);
      }
    }

    const grades = summarizeGrades(item);
    if (grades) {
      lines.push(`Total Students: ${grades.totalStudents}`);
      lines.push(`Average Grade: ${grades.averageGrade ?? 'N/A'}`);
      lines.push(`Pass Rate: ${grades.passRate === null ? 'N/A' : `${grades.passRate}%`}`);
    }

    return lines.length > 0 ? lines.join('\n') : undefined;
  },
  qualityScore(item) {
    const grades = summarizeGrades(item);
    // Scaled by section size, capped at 5
    if (!grades || grades.totalStudents === 0) return 1.0;
    return Math.min(1.0 + grades.totalStudents / 50, 5.0);
  },
};

// =============================================================================
// Generic self-describing records
// =============================================================================

const genericAdapter: SourceAdapter = {
  sourceType: 'generic',
  fields: BASE_FIELDS,
  qualityScore() {
    return 1.0;
  },
};

export const SOURCE_ADAPTERS: Record<SourceType, SourceAdapter> = {
  forum: forumAdapter,
  web: webAdapter,
  tabular: tabularAdapter,
  generic: genericAdapter,
};

export function getSourceAdapter(sourceType: SourceType): SourceAdapter {
  return SOURCE_ADAPTERS[sourceType];
}

/**
 * Convert an arbitrary capture value to a storable metadata value.
 * Nested structures are serialized rather than dropped.
 */
export function toMetadataValue(value: unknown): MetadataValue | undefined {
  if (value === undefined) return undefined;
  if (value === null) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) {
    return value;
  }
  return JSON.stringify(value);
}
