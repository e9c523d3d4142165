/**
 * Turn Assembler
 *
 * Merges as much recent history as fits under the token budget in front of
 * the current utterance. Walks history newest → oldest and stops at the
 * first turn that does not fit: older turns are never considered, even when
 * they would fit on their own.
 *
 * Layout (brackets only when `addSpecialTokens` is set):
 *
 *   trainingIds          [bos] h_1 sep ... h_k sep cur [eos]
 *   trainingLabels       [ign] ign ... ign ... ign cur [ign]
 *   generationPromptIds  bos h_1 sep ... h_k sep
 *
 * @module training/collator/turn-assembler
 */

import { WRAP_TOKEN_SLOTS, type CollatorConfigSchema } from '../../config/schema/index.js';
import type { Example, TokenIds } from '../datasets/example.js';

export interface AssembledExample {
  /** Decoder input for teacher-forced training */
  trainingIds: number[];
  /** Same length as `trainingIds`; real ids only on current-utterance positions */
  trainingLabels: number[];
  /** `bos` followed by the merged history; never contains the current utterance */
  generationPromptIds: number[];
  /** Number of history turns merged */
  mergedTurns: number;
  /** Whether the current utterance was cut to fit the budget */
  truncated: boolean;
}

/**
 * Write `source` so that it ends at `end`; returns the new start.
 */
function writeBackward(target: number[], end: number, source: TokenIds): number {
  const start = end - source.length;
  for (let i = 0; i < source.length; i++) {
    target[start + i] = source[i];
  }
  return start;
}

/**
 * Count how many of the most recent turns fit, stopping at the first miss.
 */
function countFittingTurns(
  history: readonly TokenIds[],
  separatorLength: number,
  usedLength: number,
  maxLength: number
): { turns: number; length: number } {
  let turns = 0;
  let length = 0;
  for (let i = history.length - 1; i >= 0; i--) {
    const extra = history[i].length + separatorLength;
    if (usedLength + length + extra > maxLength) break;
    length += extra;
    turns++;
  }
  return { turns, length };
}

/**
 * Assemble one example. Assumes a validated config (see
 * `assertValidCollatorConfig`).
 */
export function assembleTurns(example: Example, config: CollatorConfigSchema): AssembledExample {
  const { maxLength, separator, includeHistory, addSpecialTokens } = config;
  const { bosId, eosId, ignoreLabel } = config.specialTokens;

  const reserved = addSpecialTokens ? WRAP_TOKEN_SLOTS : 0;
  const currentBudget = Math.max(0, maxLength - reserved);
  const current = example.currentTokens.slice(0, currentBudget);
  const currentLength = current.length + reserved;

  const history = includeHistory
    ? countFittingTurns(example.historyTokens, separator.length, currentLength, maxLength)
    : { turns: 0, length: 0 };

  const totalLength = currentLength + history.length;
  const trainingIds = new Array<number>(totalLength);
  const trainingLabels = new Array<number>(totalLength);
  const generationPromptIds = new Array<number>(1 + history.length);

  let end = totalLength;
  if (addSpecialTokens) {
    end--;
    trainingIds[end] = eosId;
    trainingLabels[end] = ignoreLabel;
  }
  writeBackward(trainingLabels, end, current);
  end = writeBackward(trainingIds, end, current);

  let promptEnd = generationPromptIds.length;
  const turns = example.historyTokens;
  for (let k = 0; k < history.turns; k++) {
    const turn = turns[turns.length - 1 - k];
    promptEnd = writeBackward(generationPromptIds, promptEnd, separator);
    promptEnd = writeBackward(generationPromptIds, promptEnd, turn);

    const turnEnd = end;
    end = writeBackward(trainingIds, end, separator);
    end = writeBackward(trainingIds, end, turn);
    trainingLabels.fill(ignoreLabel, end, turnEnd);
  }

  if (addSpecialTokens) {
    end--;
    trainingIds[end] = bosId;
    trainingLabels[end] = ignoreLabel;
  }
  generationPromptIds[0] = bosId;

  return {
    trainingIds,
    trainingLabels,
    generationPromptIds,
    mergedTurns: history.turns,
    truncated: current.length < example.currentTokens.length,
  };
}
