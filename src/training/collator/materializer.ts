/**
 * Batch Materializer
 *
 * Stacks padded fields into row-major 2-D integer arrays. Row i of every
 * field belongs to example i; nothing here reorders rows.
 *
 * @module training/collator/materializer
 */

import { createCollatorError, ERROR_CODES } from '../../errors/collator-error.js';
import type { PaddedField } from './padder.js';

/**
 * Row-major `[rows, cols]` integer array.
 */
export interface TokenMatrix {
  rows: number;
  cols: number;
  data: Int32Array;
}

export interface Batch {
  diffIds: TokenMatrix;
  diffMask: TokenMatrix;
  msgIds: TokenMatrix;
  msgMask: TokenMatrix;
  msgLabels: TokenMatrix;
  generationIds?: TokenMatrix;
  generationMask?: TokenMatrix;
}

export type BatchFieldName = 'diff' | 'msg' | 'labels' | 'generation';

/**
 * Padded inputs per field. The mask of `labels` is not emitted: it is
 * identical to the `msg` mask.
 */
export interface BatchFields {
  diff: PaddedField;
  msg: PaddedField;
  labels: PaddedField;
  generation?: PaddedField;
}

/**
 * Stack equal-length rows into a TokenMatrix.
 */
export function stackRows(rows: readonly (readonly number[])[], field: string): TokenMatrix {
  const cols = rows.length > 0 ? rows[0].length : 0;
  const data = new Int32Array(rows.length * cols);
  rows.forEach((row, i) => {
    if (row.length !== cols) {
      throw createCollatorError(
        ERROR_CODES.INVALID_INPUT,
        `${field}: row ${i} has length ${row.length}, expected ${cols}`
      );
    }
    data.set(row, i * cols);
  });
  return { rows: rows.length, cols, data };
}

/**
 * View of one row (shares storage with the matrix).
 */
export function getRow(matrix: TokenMatrix, row: number): Int32Array {
  if (!Number.isInteger(row) || row < 0 || row >= matrix.rows) {
    throw createCollatorError(
      ERROR_CODES.INVALID_INPUT,
      `Row ${row} out of range for a matrix with ${matrix.rows} rows`
    );
  }
  return matrix.data.subarray(row * matrix.cols, (row + 1) * matrix.cols);
}

export function toNestedArray(matrix: TokenMatrix): number[][] {
  const out: number[][] = [];
  for (let i = 0; i < matrix.rows; i++) {
    out.push(Array.from(getRow(matrix, i)));
  }
  return out;
}

export function materializeBatch(fields: BatchFields): Batch {
  const present: [BatchFieldName, PaddedField][] = [
    ['diff', fields.diff],
    ['msg', fields.msg],
    ['labels', fields.labels],
  ];
  if (fields.generation) present.push(['generation', fields.generation]);

  const batchSize = fields.msg.padded.length;
  for (const [name, field] of present) {
    if (field.padded.length !== batchSize || field.masks.length !== batchSize) {
      throw createCollatorError(
        ERROR_CODES.INVALID_INPUT,
        `Field "${name}" has ${field.padded.length} rows, expected ${batchSize}`
      );
    }
  }

  const batch: Batch = {
    diffIds: stackRows(fields.diff.padded, 'diffIds'),
    diffMask: stackRows(fields.diff.masks, 'diffMask'),
    msgIds: stackRows(fields.msg.padded, 'msgIds'),
    msgMask: stackRows(fields.msg.masks, 'msgMask'),
    msgLabels: stackRows(fields.labels.padded, 'msgLabels'),
  };
  if (batch.msgLabels.cols !== batch.msgIds.cols) {
    throw createCollatorError(
      ERROR_CODES.INVALID_INPUT,
      `msgLabels width ${batch.msgLabels.cols} does not match msgIds width ${batch.msgIds.cols}`
    );
  }
  if (fields.generation) {
    batch.generationIds = stackRows(fields.generation.padded, 'generationIds');
    batch.generationMask = stackRows(fields.generation.masks, 'generationMask');
  }
  return batch;
}
