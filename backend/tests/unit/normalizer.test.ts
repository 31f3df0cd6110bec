// =============================================================================
// Normalizer Tests
// =============================================================================

import { describe, it, expect } from 'vitest';
import { normalizeBatch, normalizeItem, parseTimestamp } from '../../src/services/ingestion/normalizer.js';
import { summarizeGrades, toMetadataValue } from '../../src/services/ingestion/sourceAdapters.js';
import { MalformedRecordError } from '../../src/lib/errors.js';

function reasonOf(raw: unknown, sourceType: 'forum' | 'web' | 'tabular' | 'generic' = 'generic'): string {
  try {
    normalizeItem(raw, sourceType);
  } catch (error) {
    if (error instanceof MalformedRecordError) return error.reason;
    throw error;
  }
  return 'accepted';
}

describe('parseTimestamp', () => {
  it('should treat small numbers as epoch seconds', () => {
    expect(parseTimestamp(1700000000)).toBe(1700000000000);
  });

  it('should keep epoch milliseconds', () => {
    expect(parseTimestamp(1700000000000)).toBe(1700000000000);
  });

  it('should parse numeric strings and ISO dates', () => {
    expect(parseTimestamp('1700000000')).toBe(1700000000000);
    expect(parseTimestamp('2024-03-01T12:00:00Z')).toBe(Date.UTC(2024, 2, 1, 12));
  });

  it('should reject unusable values', () => {
    expect(parseTimestamp('next tuesday')).toBeUndefined();
    expect(parseTimestamp('')).toBeUndefined();
    expect(parseTimestamp(Number.NaN)).toBeUndefined();
    expect(parseTimestamp({})).toBeUndefined();
  });
});

describe('normalizeItem', () => {
  // ---------------------------------------------------------------------------
  // Generic records
  // ---------------------------------------------------------------------------

  it('should map generic fields and keep the rest as metadata', () => {
    const record = normalizeItem({
      id: 'doc-1',
      content: '  Housing opens in May.  ',
      modified_at: '2024-01-02T00:00:00Z',
      revision: '3',
      title: 'Housing',
      tags: ['housing', 'dorms'],
      extra: { floor: 2 },
    });

    expect(record).toEqual({
      id: 'doc-1',
      sourceType: 'generic',
      modifiedAt: Date.UTC(2024, 0, 2),
      revision: 3,
      content: 'Housing opens in May.',
      title: 'Housing',
      url: undefined,
      parentId: undefined,
      author: undefined,
      category: undefined,
      qualityScore: 1,
      metadata: { tags: ['housing', 'dorms'], extra: '{"floor":2}' },
    });
  });

  it('should lift nested metadata with top-level fields winning', () => {
    const record = normalizeItem({
      id: 'doc-2',
      content: 'Body',
      revision: 1,
      metadata: { category: 'nested', title: 'From metadata' },
      category: 'top',
    });

    expect(record.category).toBe('top');
    expect(record.title).toBe('From metadata');
  });

  it('should accept a revision without a timestamp', () => {
    const record = normalizeItem({ id: 'doc-3', content: 'Body', revision: 2 });

    expect(record.modifiedAt).toBe(0);
    expect(record.revision).toBe(2);
  });

  it('should drop a parent id that points at the record itself', () => {
    const record = normalizeItem({ id: 'loop', content: 'Body', revision: 0, parent_id: 'loop' });

    expect(record.parentId).toBeUndefined();
  });

  // ---------------------------------------------------------------------------
  // Malformed input
  // ---------------------------------------------------------------------------

  it('should classify malformed items by reason', () => {
    expect(reasonOf(['not', 'an', 'object'])).toBe('not_an_object');
    expect(reasonOf({ content: 'no id', revision: 1 })).toBe('missing_id');
    expect(reasonOf({ id: 'x', content: '   ', revision: 1 })).toBe('missing_content');
    expect(reasonOf({ id: 'x', content: 'Body', modified_at: 'yesterday' })).toBe('invalid_timestamp');
    expect(reasonOf({ id: 'x', content: 'Body' })).toBe('invalid_timestamp');
  });

  // ---------------------------------------------------------------------------
  // Source adapters
  // ---------------------------------------------------------------------------

  it('should score forum submissions and strip parent prefixes', () => {
    const post = normalizeItem(
      {
        id: 'post1',
        title: 'Looking for on-campus jobs',
        selftext: 'Any leads?',
        author: 'student_a',
        score: 25,
        num_comments: 10,
        subreddit: 'asu',
        post_type: 'submission',
        created_utc: 1700000000,
      },
      'forum'
    );
    const comment = normalizeItem(
      { id: 'c1', body: 'Try the library.', score: 12, author: 'student_b', parent_id: 't3_post1', created_utc: 1700000100 },
      'forum'
    );

    expect(post.qualityScore).toBe(7);
    expect(post.category).toBe('asu');
    expect(post.content).toBe('Any leads?');
    expect(post.metadata).toEqual({ score: 25, num_comments: 10, post_type: 'submission' });
    expect(comment.parentId).toBe('post1');
    expect(comment.qualityScore).toBeCloseTo(2.7);
  });

  it('should not credit deleted authors', () => {
    const record = normalizeItem(
      { id: 'c2', body: 'Text', author: '[deleted]', score: 0, created_utc: 1710000100 },
      'forum'
    );

    expect(record.qualityScore).toBe(1);
  });

  it('should cap forum quality at ten', () => {
    const record = normalizeItem(
      {
        id: 'viral',
        body: 'Text',
        author: 'someone',
        score: 900,
        num_comments: 400,
        post_type: 'submission',
        created_utc: 1700000000,
      },
      'forum'
    );

    expect(record.qualityScore).toBe(10);
  });

  it('should use the url as id for web pages', () => {
    const record = normalizeItem(
      { url: 'https://example.edu/jobs', text: 'Page text', ingested_at: '2024-03-01T12:00:00Z' },
      'web'
    );

    expect(record.id).toBe('https://example.edu/jobs');
    expect(record.url).toBe('https://example.edu/jobs');
    expect(record.modifiedAt).toBe(Date.UTC(2024, 2, 1, 12));
  });

  it('should derive id and render content for tabular rows', () => {
    const record = normalizeItem(
      {
        Subject: 'CSE',
        'Catalog Nbr': '110',
        Section: '1',
        Term: 'Fall 2023',
        Instructor: 'Smith',
        A: 30,
        B: 15,
        C: 3,
        F: 2,
        ingested_at: 1700000000,
      },
      'tabular'
    );

    expect(record.id).toBe('CSE-110-1-Fall2023');
    expect(record.category).toBe('CSE');
    expect(record.qualityScore).toBe(2);
    expect(record.content).toBe(
      [
        'Course: CSE 110 Section 1',
        'Term: Fall 2023',
        'Instructor: Smith',
        'Total Students: 50',
        'Average Grade: 3.42',
        'Pass Rate: 96%',
      ].join('\n')
    );
  });
});

describe('summarizeGrades', () => {
  it('should return null without grade columns', () => {
    expect(summarizeGrades({ Subject: 'CSE' })).toBeNull();
  });

  it('should report N/A figures for empty sections', () => {
    expect(summarizeGrades({ A: 0, F: 0 })).toEqual({ totalStudents: 0, averageGrade: null, passRate: null });
  });
});

describe('toMetadataValue', () => {
  it('should serialize nested structures', () => {
    expect(toMetadataValue({ a: 1 })).toBe('{"a":1}');
    expect(toMetadataValue([1, 2])).toBe('[1,2]');
    expect(toMetadataValue(['a'])).toEqual(['a']);
    expect(toMetadataValue(Number.POSITIVE_INFINITY)).toBeNull();
    expect(toMetadataValue(undefined)).toBeUndefined();
  });
});

describe('normalizeBatch', () => {
  it('should count and drop malformed items', () => {
    const result = normalizeBatch([
      { id: 'a', content: 'A', revision: 0 },
      { content: 'missing id', revision: 0 },
      'not an object',
      { id: 'b', content: 'B', revision: 0 },
    ]);

    expect(result.records.map((r) => r.id)).toEqual(['a', 'b']);
    expect(result.malformed).toBe(2);
    expect(result.malformedByReason).toEqual({ missing_id: 1, not_an_object: 1 });
  });
});
