/**
 * Padder
 *
 * Pads one logical field of a batch to that field's own maximum length and
 * builds the matching 0/1 mask.
 *
 * - `right`: content, then fill. Training ids, labels and context ids.
 * - `left`: fill, then content. Generation prompts, so that the next
 *   generated token lands in the same column for every row.
 *
 * @module training/collator/padder
 */

import { createCollatorError, ERROR_CODES } from '../../errors/collator-error.js';
import type { TokenIds } from '../datasets/example.js';

export type PadSide = 'left' | 'right';

export interface PaddedField {
  /** Equal-length rows, in input order */
  padded: number[][];
  /** 1 on content, 0 on fill */
  masks: number[][];
  /** Common row length */
  width: number;
}

export interface PadOptions {
  /** Fail when every sequence is empty */
  requireContent?: boolean;
  /** Pad to this width instead of the field maximum (must not be shorter) */
  targetLength?: number;
}

export function padSequences(
  sequences: readonly TokenIds[],
  side: PadSide,
  fillValue: number,
  options: PadOptions = {}
): PaddedField {
  if (sequences.length === 0) {
    throw createCollatorError(
      ERROR_CODES.CONFIGURATION,
      'Cannot pad an empty list of sequences: the field width is undefined'
    );
  }

  let longest = 0;
  for (const sequence of sequences) {
    if (sequence.length > longest) longest = sequence.length;
  }

  const width = options.targetLength ?? longest;
  if (!Number.isInteger(width) || width < longest) {
    throw createCollatorError(
      ERROR_CODES.CONFIGURATION,
      `targetLength ${width} is shorter than the longest sequence (${longest})`
    );
  }
  if (options.requireContent && width === 0) {
    throw createCollatorError(ERROR_CODES.CONFIGURATION, 'Every sequence in the field is empty');
  }

  const padded: number[][] = [];
  const masks: number[][] = [];
  for (const sequence of sequences) {
    const fill = width - sequence.length;
    const row = new Array<number>(width);
    const mask = new Array<number>(width);
    const offset = side === 'left' ? fill : 0;
    const fillStart = side === 'left' ? 0 : sequence.length;

    row.fill(fillValue, fillStart, fillStart + fill);
    mask.fill(0, fillStart, fillStart + fill);
    for (let i = 0; i < sequence.length; i++) {
      row[offset + i] = sequence[i];
    }
    mask.fill(1, offset, offset + sequence.length);

    padded.push(row);
    masks.push(mask);
  }

  return { padded, masks, width };
}
