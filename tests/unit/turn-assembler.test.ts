import { describe, expect, it } from 'vitest';

import { assembleTurns } from '../../src/training/collator/turn-assembler.js';
import type { Example } from '../../src/training/datasets/example.js';
import { createRng } from '../../src/training/sampler.js';
import {
  DEFAULT_COLLATOR_CONFIG,
  type CollatorConfigSchema,
} from '../../src/config/schema/index.js';

const IGNORE = -100;

function makeConfig(overrides: Partial<CollatorConfigSchema> = {}): CollatorConfigSchema {
  return {
    ...DEFAULT_COLLATOR_CONFIG,
    maxLength: 10,
    separator: [100],
    specialTokens: { bosId: 1, eosId: 2, padId: 0, ignoreLabel: IGNORE },
    contextPadId: 0,
    ...overrides,
  };
}

function example(currentTokens: number[], historyTokens: number[][] = []): Example {
  return { contextTokens: [40], currentTokens, historyTokens };
}

describe('assembleTurns', () => {
  it('merges history newest-first while it fits the budget', () => {
    const result = assembleTurns(example([5, 6, 7], [[2, 3], [4]]), makeConfig());

    expect(result.trainingIds).toEqual([2, 3, 100, 4, 100, 5, 6, 7]);
    expect(result.trainingLabels).toEqual([IGNORE, IGNORE, IGNORE, IGNORE, IGNORE, 5, 6, 7]);
    expect(result.generationPromptIds).toEqual([1, 2, 3, 100, 4, 100]);
    expect(result.mergedTurns).toBe(2);
    expect(result.truncated).toBe(false);
  });

  it('truncates an over-long utterance and merges no history', () => {
    const current = [10, 11, 12, 13, 14, 15, 16, 17, 18, 19, 20];
    const result = assembleTurns(example(current, [[2]]), makeConfig());

    expect(result.trainingIds).toEqual([10, 11, 12, 13, 14, 15, 16, 17, 18, 19]);
    expect(result.trainingLabels).toEqual([10, 11, 12, 13, 14, 15, 16, 17, 18, 19]);
    expect(result.generationPromptIds).toEqual([1]);
    expect(result.mergedTurns).toBe(0);
    expect(result.truncated).toBe(true);
  });

  it('stops at the first turn that does not fit, even if older turns would', () => {
    const result = assembleTurns(
      example([5, 6, 7, 8, 9], [[21], [22, 23, 24, 25], [26]]),
      makeConfig()
    );

    expect(result.trainingIds).toEqual([26, 100, 5, 6, 7, 8, 9]);
    expect(result.generationPromptIds).toEqual([1, 26, 100]);
    expect(result.mergedTurns).toBe(1);
  });

  it('returns only bos as the prompt when there is no history', () => {
    const result = assembleTurns(example([5, 6]), makeConfig());

    expect(result.trainingIds).toEqual([5, 6]);
    expect(result.generationPromptIds).toEqual([1]);
  });

  it('ignores history when includeHistory is off', () => {
    const result = assembleTurns(
      example([5, 6, 7], [[2, 3], [4]]),
      makeConfig({ includeHistory: false })
    );

    expect(result.trainingIds).toEqual([5, 6, 7]);
    expect(result.trainingLabels).toEqual([5, 6, 7]);
    expect(result.generationPromptIds).toEqual([1]);
  });

  describe('with addSpecialTokens', () => {
    it('wraps the sequence and counts the wrap tokens against the budget', () => {
      const result = assembleTurns(
        example([5, 6, 7], [[2, 3], [4]]),
        makeConfig({ addSpecialTokens: true })
      );

      expect(result.trainingIds).toEqual([1, 2, 3, 100, 4, 100, 5, 6, 7, 2]);
      expect(result.trainingLabels).toEqual([
        IGNORE, IGNORE, IGNORE, IGNORE, IGNORE, IGNORE, 5, 6, 7, IGNORE,
      ]);
      expect(result.generationPromptIds).toEqual([1, 2, 3, 100, 4, 100]);
    });

    it('reserves two slots when truncating', () => {
      const result = assembleTurns(
        example([5, 6, 7, 8, 9]),
        makeConfig({ maxLength: 4, addSpecialTokens: true })
      );

      expect(result.trainingIds).toEqual([1, 5, 6, 2]);
      expect(result.trainingLabels).toEqual([IGNORE, 5, 6, IGNORE]);
      expect(result.truncated).toBe(true);
    });

    it('reduces an empty utterance to the wrap tokens', () => {
      const result = assembleTurns(example([]), makeConfig({ addSpecialTokens: true }));

      expect(result.trainingIds).toEqual([1, 2]);
      expect(result.trainingLabels).toEqual([IGNORE, IGNORE]);
    });
  });

  it('produces an empty training sequence for an empty unwrapped utterance', () => {
    const result = assembleTurns(example([]), makeConfig({ includeHistory: false }));

    expect(result.trainingIds).toEqual([]);
    expect(result.trainingLabels).toEqual([]);
  });

  it('uses a multi-token separator after every merged turn', () => {
    const result = assembleTurns(
      example([5], [[2], [3]]),
      makeConfig({ separator: [100, 101] })
    );

    expect(result.trainingIds).toEqual([2, 100, 101, 3, 100, 101, 5]);
    expect(result.generationPromptIds).toEqual([1, 2, 100, 101, 3, 100, 101]);
  });

  it('does not mutate its input', () => {
    const input = example([5, 6, 7], [[2, 3], [4]]);
    const snapshot = JSON.parse(JSON.stringify(input));
    assembleTurns(input, makeConfig());
    expect(input).toEqual(snapshot);
  });

  it('is deterministic', () => {
    const input = example([5, 6, 7], [[2, 3], [4]]);
    expect(assembleTurns(input, makeConfig())).toEqual(assembleTurns(input, makeConfig()));
  });

  describe('invariants over generated examples', () => {
    const rng = createRng(7);
    const randomTokens = (max: number) =>
      Array.from({ length: Math.floor(rng() * max) }, () => 3 + Math.floor(rng() * 500));

    const cases = Array.from({ length: 50 }, () => ({
      current: randomTokens(14),
      history: Array.from({ length: Math.floor(rng() * 5) }, () => randomTokens(5)),
      wrap: rng() < 0.5,
    }));

    it('keeps ids and labels aligned and within budget', () => {
      for (const { current, history, wrap } of cases) {
        const config = makeConfig({ addSpecialTokens: wrap });
        const result = assembleTurns(example(current, history), config);

        expect(result.trainingLabels.length).toBe(result.trainingIds.length);
        expect(result.trainingIds.length).toBeLessThanOrEqual(config.maxLength);
      }
    });

    it('labels exactly the truncated utterance', () => {
      for (const { current, history, wrap } of cases) {
        const config = makeConfig({ addSpecialTokens: wrap });
        const result = assembleTurns(example(current, history), config);
        const budget = config.maxLength - (wrap ? 2 : 0);

        expect(result.trainingLabels.filter((label) => label !== IGNORE)).toEqual(
          current.slice(0, budget)
        );
      }
    });

    it('merges a contiguous suffix of the history', () => {
      for (const { current, history, wrap } of cases) {
        const config = makeConfig({ addSpecialTokens: wrap });
        const result = assembleTurns(example(current, history), config);
        const merged = history.slice(history.length - result.mergedTurns);
        const expectedPrompt = [1, ...merged.flatMap((turn) => [...turn, 100])];

        expect(result.generationPromptIds).toEqual(expectedPrompt);

        if (result.mergedTurns < history.length) {
          const nextTurn = history[history.length - 1 - result.mergedTurns];
          expect(result.trainingIds.length + nextTurn.length + 1).toBeGreaterThan(config.maxLength);
        }
      }
    });
  });
});
