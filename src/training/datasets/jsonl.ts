/**
 * JSONL dataset source.
 *
 * @module training/datasets/jsonl
 */

import { readFile } from 'fs/promises';
import { gunzipSync } from 'zlib';
import { createCollatorError, ERROR_CODES } from '../../errors/collator-error.js';
import { log } from '../../debug/index.js';
import { parseExample, type Example } from './example.js';

/**
 * Parse newline-delimited JSON. Blank lines are skipped.
 */
export function parseJsonl(text: string): unknown[] {
  const records: unknown[] = [];
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;
    try {
      records.push(JSON.parse(line));
    } catch (error) {
      throw createCollatorError(ERROR_CODES.INVALID_INPUT, `Invalid JSON on line ${i + 1}`, {
        line: i + 1,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }
  return records;
}

/**
 * Read a `.jsonl` (or gzipped `.jsonl.gz`) file.
 */
export async function loadJsonl(filePath: string): Promise<unknown[]> {
  let raw: Buffer;
  try {
    raw = await readFile(filePath);
  } catch (error) {
    throw createCollatorError(ERROR_CODES.INVALID_INPUT, `Cannot read dataset file ${filePath}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  const text = filePath.endsWith('.gz') ? gunzipSync(raw).toString('utf8') : raw.toString('utf8');
  return parseJsonl(text);
}

/**
 * Map records, dropping those the mapper returns null/undefined for.
 */
export function mapJsonl<T, U>(
  records: readonly T[],
  mapper: (record: T, index: number) => U | null | undefined
): U[] {
  const out: U[] = [];
  records.forEach((record, index) => {
    const mapped = mapper(record, index);
    if (mapped !== null && mapped !== undefined) out.push(mapped);
  });
  return out;
}

/**
 * Load and validate tokenized examples from a JSONL file.
 */
export async function loadExamples(filePath: string): Promise<Example[]> {
  const records = await loadJsonl(filePath);
  const examples = mapJsonl(records, (record, index) => parseExample(record, `${filePath}:${index + 1}`));
  log.verbose('Dataset', `Loaded ${examples.length} examples from ${filePath}`);
  return examples;
}
