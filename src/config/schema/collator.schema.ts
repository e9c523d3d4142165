/**
 * Collator Config Schema
 *
 * Special token ids, the turn separator and the token budget used when
 * history turns are merged into a training sequence. These values come
 * from the target (decoder) tokenizer and are never owned by the engine.
 *
 * @module config/schema/collator
 */

// =============================================================================
// Special Tokens
// =============================================================================

/**
 * Reserved token ids of the target tokenizer.
 *
 * `ignoreLabel` must lie outside the vocabulary: label positions holding it
 * are dropped from the loss reduction.
 */
export interface SpecialTokensSchema {
  /** Begin-of-sequence id; also the first token of every generation prompt */
  bosId: number;
  /** End-of-sequence id, appended when `addSpecialTokens` is set */
  eosId: number;
  /** Fill value for target-side id rows */
  padId: number;
  /** Label value excluded from the loss */
  ignoreLabel: number;
}

/**
 * GPT-2 style decoder: a single end-of-text token doubles as bos, eos and pad.
 */
export const DEFAULT_SPECIAL_TOKENS: SpecialTokensSchema = {
  bosId: 50256,
  eosId: 50256,
  padId: 50256,
  ignoreLabel: -100,
};

// =============================================================================
// Collator Config
// =============================================================================

export interface CollatorConfigSchema {
  /** Maximum length of an assembled training sequence (wrap tokens included) */
  maxLength: number;

  /** Token ids inserted after every merged history turn */
  separator: readonly number[];

  /** Reserved ids of the target tokenizer */
  specialTokens: SpecialTokensSchema;

  /** Merge prior turns of the same author in front of the current utterance */
  includeHistory: boolean;

  /** Produce the left-padded generation prompt fields */
  emitGenerationPrompt: boolean;

  /** Wrap the training sequence as `bos ... eos` (two budget slots) */
  addSpecialTokens: boolean;

  /** Fill value for the context (diff) rows, from the source tokenizer */
  contextPadId: number;
}

/** Encoded `" \n "` under the GPT-2 vocabulary */
export const DEFAULT_TURN_SEPARATOR: readonly number[] = [3467, 77, 220];

export const DEFAULT_COLLATOR_CONFIG: CollatorConfigSchema = {
  maxLength: 512,
  separator: DEFAULT_TURN_SEPARATOR,
  specialTokens: DEFAULT_SPECIAL_TOKENS,
  includeHistory: true,
  emitGenerationPrompt: true,
  addSpecialTokens: false,
  contextPadId: 1,
};

/** Largest id a batch row can hold (rows are Int32Array) */
export const MAX_TOKEN_ID = 0x7fffffff;

/** Smallest sentinel a label row can hold */
export const MIN_LABEL_SENTINEL = -0x80000000;

/** Budget slots taken by `bos`/`eos` when `addSpecialTokens` is set */
export const WRAP_TOKEN_SLOTS = 2;
