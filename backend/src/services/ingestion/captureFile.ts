/**
 * Capture File IO
 * Reads JSON Lines capture files into record batches and writes merged output
 */

import { createReadStream, createWriteStream } from 'fs';
import { mkdir } from 'fs/promises';
import { basename, dirname } from 'path';
import { createInterface } from 'readline';
import { once } from 'events';
import { createLogger } from '../../lib/logger.js';
import type { MalformedReason } from '../../lib/errors.js';
import type { CanonicalRecord, RecordBatch, SourceType } from '../../models/Record.js';
import { normalizeBatch } from './normalizer.js';

const log = createLogger('capture-file');

export interface CaptureSource {
  path: string;
  sourceType: SourceType;
  label?: string;
}

export interface CaptureReadResult {
  batch: RecordBatch;
  lines: number;
  malformed: number;
  malformedByReason: Partial<Record<MalformedReason, number>>;
}

/**
 * Parse JSONL text. Blank lines are skipped, unparseable lines are counted.
 */
export function parseJsonLines(lines: Iterable<string>): { items: unknown[]; invalid: number; lines: number } {
  const items: unknown[] = [];
  let invalid = 0;
  let count = 0;

  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    count++;
    try {
      items.push(JSON.parse(trimmed));
    } catch {
      invalid++;
    }
  }

  return { items, invalid, lines: count };
}

async function readLines(path: string): Promise<string[]> {
  const lines: string[] = [];
  const reader = createInterface({
    input: createReadStream(path, { encoding: 'utf-8' }),
    crlfDelay: Infinity,
  });

  for await (const line of reader) {
    lines.push(line);
  }

  return lines;
}

/**
 * Read and normalize one capture file
 */
export async function readCaptureFile(source: CaptureSource): Promise<CaptureReadResult> {
  const label = source.label ?? basename(source.path);
  const rawLines = await readLines(source.path);
  const parsed = parseJsonLines(rawLines);
  const normalized = normalizeBatch(parsed.items, source.sourceType);

  const malformedByReason = { ...normalized.malformedByReason };
  if (parsed.invalid > 0) {
    malformedByReason.invalid_json = parsed.invalid;
  }

  log.info(
    {
      path: source.path,
      sourceType: source.sourceType,
      lines: parsed.lines,
      records: normalized.records.length,
      malformed: normalized.malformed + parsed.invalid,
    },
    'Capture file read'
  );

  return {
    batch: { label, records: normalized.records },
    lines: parsed.lines,
    malformed: normalized.malformed + parsed.invalid,
    malformedByReason,
  };
}

/**
 * Write canonical records as JSON Lines
 */
export async function writeCanonicalRecords(path: string, records: CanonicalRecord[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const stream = createWriteStream(path, { encoding: 'utf-8' });

  for (const record of records) {
    if (!stream.write(`${JSON.stringify(record)}\n`)) {
      await once(stream, 'drain');
    }
  }

  stream.end();
  await once(stream, 'finish');

  log.info({ path, count: records.length }, 'Canonical records written');
}
