/**
 * History Collator
 *
 * Runs the full pipeline for one batch:
 *
 *   Example[] → assembleTurns ×N → padSequences ×4 → materializeBatch → Batch
 *
 * Assembly is per example and independent; padding waits for every row of
 * a field since the field width is the batch maximum.
 *
 * @module training/collator/collator
 */

import { log } from '../../debug/index.js';
import { createCollatorError, ERROR_CODES } from '../../errors/collator-error.js';
import { assertValidCollatorConfig } from '../../config/validate.js';
import {
  DEFAULT_COLLATOR_CONFIG,
  mergeCollatorConfig,
  type CollatorConfigOverrides,
  type CollatorConfigSchema,
} from '../../config/schema/index.js';
import { assertExample, type Example } from '../datasets/example.js';
import { assembleTurns, type AssembledExample } from './turn-assembler.js';
import { padSequences } from './padder.js';
import { materializeBatch, type Batch } from './materializer.js';

function buildBatch(examples: readonly Example[], config: CollatorConfigSchema): Batch {
  if (examples.length === 0) {
    throw createCollatorError(ERROR_CODES.INVALID_INPUT, 'Cannot collate an empty list of examples');
  }
  examples.forEach((example, i) => assertExample(example, `examples[${i}]`));

  const assembled: AssembledExample[] = examples.map((example) => assembleTurns(example, config));
  const { padId, ignoreLabel } = config.specialTokens;

  const diff = padSequences(
    examples.map((example) => example.contextTokens),
    'right',
    config.contextPadId
  );
  const msg = padSequences(
    assembled.map((item) => item.trainingIds),
    'right',
    padId
  );
  const labels = padSequences(
    assembled.map((item) => item.trainingLabels),
    'right',
    ignoreLabel
  );
  const generation = config.emitGenerationPrompt
    ? padSequences(
        assembled.map((item) => item.generationPromptIds),
        'left',
        padId
      )
    : undefined;

  const truncated = assembled.filter((item) => item.truncated).length;
  if (truncated > 0) {
    log.verbose('Collator', `Truncated ${truncated}/${examples.length} utterances to maxLength=${config.maxLength}`);
  }
  log.debug(
    'Collator',
    `batch=${examples.length} diff=${diff.width} msg=${msg.width} generation=${generation?.width ?? '-'}`,
    { mergedTurns: assembled.map((item) => item.mergedTurns) }
  );

  return materializeBatch({ diff, msg, labels, generation });
}

/**
 * Collate one batch with an explicit config. The config is validated on
 * every call; use `HistoryCollator` to validate once.
 */
export function collateBatch(examples: readonly Example[], config: CollatorConfigSchema): Batch {
  assertValidCollatorConfig(config);
  return buildBatch(examples, config);
}

/**
 * Collator bound to one validated, frozen config.
 */
export class HistoryCollator {
  readonly config: Readonly<CollatorConfigSchema>;

  constructor(overrides?: CollatorConfigOverrides, base: CollatorConfigSchema = DEFAULT_COLLATOR_CONFIG) {
    const config = mergeCollatorConfig(base, overrides);
    assertValidCollatorConfig(config);
    this.config = Object.freeze({
      ...config,
      separator: Object.freeze(config.separator.slice()),
      specialTokens: Object.freeze({ ...config.specialTokens }),
    });
  }

  /**
   * Assemble a single example (no padding).
   */
  assemble(example: Example): AssembledExample {
    assertExample(example);
    return assembleTurns(example, this.config);
  }

  collate(examples: readonly Example[]): Batch {
    return buildBatch(examples, this.config);
  }
}
