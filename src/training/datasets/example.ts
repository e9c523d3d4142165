/**
 * Example records and boundary validation.
 *
 * Records arrive already tokenized. Anything read from disk goes through
 * `parseExample` before it reaches the collator.
 *
 * @module training/datasets/example
 */

import { createCollatorError, ERROR_CODES } from '../../errors/collator-error.js';
import { MAX_TOKEN_ID } from '../../config/schema/index.js';

export type TokenIds = readonly number[];

/**
 * One training/generation row.
 */
export interface Example {
  /** Encoder-side context (the change description); batched on its own */
  contextTokens: TokenIds;
  /** The utterance to learn or continue */
  currentTokens: TokenIds;
  /** Prior utterances by the same author, oldest first */
  historyTokens: readonly TokenIds[];
  /** Author key, used only for grouping when sampling */
  author?: string;
}

/** Key aliases accepted from dataset dumps */
const FIELD_ALIASES = {
  contextTokens: ['contextTokens', 'diff_input_ids'],
  currentTokens: ['currentTokens', 'msg_input_ids'],
  historyTokens: ['historyTokens', 'history_input_ids'],
} as const;

function invalid(path: string, message: string): Error {
  return createCollatorError(ERROR_CODES.INVALID_INPUT, `${path}: ${message}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pick(record: Record<string, unknown>, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (record[key] !== undefined) return record[key];
  }
  return undefined;
}

function assertTokenIds(value: unknown, path: string): asserts value is number[] {
  if (!Array.isArray(value)) {
    throw invalid(path, 'expected an array of token ids');
  }
  for (let i = 0; i < value.length; i++) {
    const id: unknown = value[i];
    if (typeof id !== 'number' || !Number.isInteger(id) || id < 0) {
      throw invalid(`${path}[${i}]`, `expected a non-negative integer token id, got ${JSON.stringify(id)}`);
    }
    if (id > MAX_TOKEN_ID) {
      throw invalid(`${path}[${i}]`, `token id ${id} exceeds ${MAX_TOKEN_ID}`);
    }
  }
}

function readTokenIds(value: unknown, path: string): number[] {
  assertTokenIds(value, path);
  return value.slice();
}

/**
 * Validate an untyped record and return a typed Example.
 *
 * `historyTokens` may be absent (treated as no history); the other two
 * token fields are required.
 */
export function parseExample(record: unknown, path = 'example'): Example {
  if (!isRecord(record)) {
    throw invalid(path, 'expected an object');
  }

  const context = pick(record, FIELD_ALIASES.contextTokens);
  const current = pick(record, FIELD_ALIASES.currentTokens);
  const history = pick(record, FIELD_ALIASES.historyTokens) ?? [];

  if (context === undefined) throw invalid(path, 'missing contextTokens');
  if (current === undefined) throw invalid(path, 'missing currentTokens');
  if (!Array.isArray(history)) throw invalid(`${path}.historyTokens`, 'expected an array of turns');

  const example: Example = {
    contextTokens: readTokenIds(context, `${path}.contextTokens`),
    currentTokens: readTokenIds(current, `${path}.currentTokens`),
    historyTokens: history.map((turn: unknown, i) => readTokenIds(turn, `${path}.historyTokens[${i}]`)),
  };

  const author = record.author;
  if (author !== undefined) {
    if (typeof author !== 'string') throw invalid(`${path}.author`, 'expected a string');
    example.author = author;
  }
  return example;
}

/**
 * Re-check an in-memory Example before assembly, without copying it.
 */
export function assertExample(example: Example, path = 'example'): void {
  if (!isRecord(example)) throw invalid(path, 'expected an object');
  assertTokenIds(example.contextTokens, `${path}.contextTokens`);
  assertTokenIds(example.currentTokens, `${path}.currentTokens`);
  if (!Array.isArray(example.historyTokens)) {
    throw invalid(`${path}.historyTokens`, 'expected an array of turns');
  }
  example.historyTokens.forEach((turn, i) => {
    assertTokenIds(turn, `${path}.historyTokens[${i}]`);
  });
}
