/**
 * Deduplicator / Merger
 * Combines capture batches into one duplicate-free, ordered record sequence
 */

import { createLogger } from '../../lib/logger.js';
import type { CanonicalRecord, RecordBatch } from '../../models/Record.js';

const log = createLogger('deduplicator');

export interface MergeReport {
  inputCount: number;
  uniqueCount: number;
  /** Records replaced by a later revision of the same id */
  supersededCount: number;
  /** Duplicate ids whose content differed between occurrences */
  conflictCount: number;
  perBatch: Array<{ label: string; count: number }>;
}

export interface MergeResult {
  records: CanonicalRecord[];
  report: MergeReport;
}

/**
 * True when `candidate` should replace `current`.
 * Latest modifiedAt wins, then highest revision, then the later occurrence.
 */
export function supersedes(candidate: CanonicalRecord, current: CanonicalRecord): boolean {
  if (candidate.modifiedAt !== current.modifiedAt) {
    return candidate.modifiedAt > current.modifiedAt;
  }
  if (candidate.revision !== current.revision) {
    return candidate.revision > current.revision;
  }
  return true;
}

/**
 * Merge batches given in priority order.
 *
 * Each id appears once, holding the whole winning record (no field-level
 * merge). Output order is the first appearance of each id across the
 * concatenated batches.
 */
export function mergeBatches(batches: RecordBatch[]): MergeResult {
  const firstSeen: string[] = [];
  const winners = new Map<string, CanonicalRecord>();
  let inputCount = 0;
  let supersededCount = 0;
  let conflictCount = 0;

  for (const batch of batches) {
    for (const record of batch.records) {
      inputCount++;
      const current = winners.get(record.id);

      if (!current) {
        firstSeen.push(record.id);
        winners.set(record.id, record);
        continue;
      }

      if (current.content !== record.content || current.sourceType !== record.sourceType) {
        conflictCount++;
      }

      if (supersedes(record, current)) {
        winners.set(record.id, record);
        supersededCount++;
      }
    }
  }

  const records: CanonicalRecord[] = [];
  for (const id of firstSeen) {
    const winner = winners.get(id);
    if (winner) {
      records.push(winner);
    }
  }

  const report: MergeReport = {
    inputCount,
    uniqueCount: records.length,
    supersededCount,
    conflictCount,
    perBatch: batches.map((batch) => ({ label: batch.label, count: batch.records.length })),
  };

  log.info(report, 'Batches merged');

  return { records, report };
}

/**
 * Convenience wrapper for plain record arrays
 */
export function mergeRecords(...sequences: CanonicalRecord[][]): CanonicalRecord[] {
  return mergeBatches(
    sequences.map((records, index) => ({ label: `batch-${index + 1}`, records }))
  ).records;
}
