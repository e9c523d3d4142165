/**
 * Evaluation targets.
 *
 * Recovers the current-utterance tokens from a collated batch using the
 * label sentinel.
 *
 * @module training/collator/targets
 */

import type { SpecialTokensSchema } from '../../config/schema/index.js';
import { getRow, type Batch, type TokenMatrix } from './materializer.js';

/**
 * Copy of `msgIds` with every position whose label is the sentinel
 * (history, separators, wrap tokens, padding) replaced by `padId`.
 */
export function stripHistoryTargets(
  batch: Batch,
  specialTokens: Pick<SpecialTokensSchema, 'padId' | 'ignoreLabel'>
): TokenMatrix {
  const { msgIds, msgLabels } = batch;
  const data = new Int32Array(msgIds.data.length);
  for (let i = 0; i < data.length; i++) {
    data[i] = msgLabels.data[i] === specialTokens.ignoreLabel ? specialTokens.padId : msgIds.data[i];
  }
  return { rows: msgIds.rows, cols: msgIds.cols, data };
}

/**
 * Real-label tokens of one row, in order: the truncated current utterance.
 */
export function extractTargetTokens(batch: Batch, row: number, ignoreLabel: number): number[] {
  return Array.from(getRow(batch.msgLabels, row)).filter((label) => label !== ignoreLabel);
}
