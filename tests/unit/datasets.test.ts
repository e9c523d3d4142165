import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { gzipSync } from 'zlib';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { parseExample } from '../../src/training/datasets/example.js';
import {
  loadExamples,
  loadJsonl,
  mapJsonl,
  parseJsonl,
} from '../../src/training/datasets/jsonl.js';
import { processDiff } from '../../src/training/datasets/diff.js';

describe('parseExample', () => {
  it('accepts camelCase fields', () => {
    expect(
      parseExample({ contextTokens: [1, 2], currentTokens: [3], historyTokens: [[4]], author: 'ana' })
    ).toEqual({ contextTokens: [1, 2], currentTokens: [3], historyTokens: [[4]], author: 'ana' });
  });

  it('accepts dataset dump field names', () => {
    expect(
      parseExample({
        diff_input_ids: [1, 2],
        msg_input_ids: [3],
        history_input_ids: [[4], [5, 6]],
      })
    ).toEqual({ contextTokens: [1, 2], currentTokens: [3], historyTokens: [[4], [5, 6]] });
  });

  it('treats missing history as no history', () => {
    expect(parseExample({ contextTokens: [], currentTokens: [3] }).historyTokens).toEqual([]);
  });

  it('copies token arrays', () => {
    const current = [3, 4];
    const example = parseExample({ contextTokens: [1], currentTokens: current });
    current.push(5);
    expect(example.currentTokens).toEqual([3, 4]);
  });

  it('rejects non-objects', () => {
    expect(() => parseExample([1, 2])).toThrow(/COLLATOR_INVALID_INPUT.*example: expected an object/);
  });

  it('rejects missing fields', () => {
    expect(() => parseExample({ currentTokens: [1] })).toThrow(/example: missing contextTokens/);
    expect(() => parseExample({ contextTokens: [1] })).toThrow(/example: missing currentTokens/);
  });

  it('rejects negative and non-integer ids with their path', () => {
    expect(() => parseExample({ contextTokens: [1], currentTokens: [3, -1] })).toThrow(
      /example\.currentTokens\[1\]: expected a non-negative integer token id, got -1/
    );
    expect(() =>
      parseExample({ contextTokens: [1], currentTokens: [3], historyTokens: [[1], ['a']] }, 'row')
    ).toThrow(/row\.historyTokens\[1\]\[0\]: expected a non-negative integer token id, got "a"/);
  });

  it('rejects ids that do not fit a 32-bit row', () => {
    expect(() => parseExample({ contextTokens: [1], currentTokens: [2 ** 31, 5] })).toThrow(
      /COLLATOR_INVALID_INPUT.*example\.currentTokens\[0\]: token id 2147483648 exceeds 2147483647/
    );
    expect(() => parseExample({ contextTokens: [2 ** 32 - 100], currentTokens: [5] })).toThrow(
      /example\.contextTokens\[0\]: token id 4294967196 exceeds 2147483647/
    );
    expect(parseExample({ contextTokens: [0x7fffffff], currentTokens: [5] }).contextTokens).toEqual([
      2147483647,
    ]);
  });

  it('rejects a non-string author', () => {
    expect(() => parseExample({ contextTokens: [1], currentTokens: [3], author: 7 })).toThrow(
      /example\.author: expected a string/
    );
  });
});

describe('jsonl', () => {
  it('parses records and skips blank lines', () => {
    expect(parseJsonl('{"a":1}\n\n{"b":2}\r\n')).toEqual([{ a: 1 }, { b: 2 }]);
  });

  it('reports the failing line', () => {
    expect(() => parseJsonl('{"a":1}\n{oops}\n')).toThrow(/Invalid JSON on line 2/);
  });

  it('drops records the mapper rejects', () => {
    expect(mapJsonl([1, 2, 3, 4], (n) => (n % 2 === 0 ? n * 10 : null))).toEqual([20, 40]);
  });

  describe('loadExamples', () => {
    let dir: string;
    const lines = [
      JSON.stringify({ diff_input_ids: [1], msg_input_ids: [2], history_input_ids: [], author: 'a' }),
      JSON.stringify({ contextTokens: [3], currentTokens: [4, 5], historyTokens: [[6]] }),
    ].join('\n');

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), 'history-collator-data-'));
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('loads plain JSONL', async () => {
      const file = join(dir, 'train.jsonl');
      await writeFile(file, lines);

      expect(await loadExamples(file)).toEqual([
        { contextTokens: [1], currentTokens: [2], historyTokens: [], author: 'a' },
        { contextTokens: [3], currentTokens: [4, 5], historyTokens: [[6]] },
      ]);
    });

    it('loads gzipped JSONL', async () => {
      const file = join(dir, 'train.jsonl.gz');
      await writeFile(file, gzipSync(Buffer.from(lines, 'utf8')));

      const examples = await loadExamples(file);
      expect(examples).toHaveLength(2);
      expect(examples[1].historyTokens).toEqual([[6]]);
    });

    it('wraps a missing file in an input error', async () => {
      const file = join(dir, 'missing.jsonl');

      await expect(loadJsonl(file)).rejects.toThrow(
        /COLLATOR_INVALID_INPUT.*Cannot read dataset file .*missing\.jsonl/
      );
      await expect(loadExamples(file)).rejects.toMatchObject({ code: 'COLLATOR_INVALID_INPUT' });
    });

    it('names the file and line of a bad record', async () => {
      const file = join(dir, 'bad.jsonl');
      await writeFile(file, '{"contextTokens":[1],"currentTokens":[-2]}\n');

      await expect(loadExamples(file)).rejects.toThrow(
        /bad\.jsonl:1\.currentTokens\[0\]: expected a non-negative integer token id, got -2/
      );
    });
  });
});

describe('processDiff', () => {
  it('keeps only changed lines and file headers', () => {
    const diff = [
      '<FILE> src / App . java',
      'index 3f26e45 . . 1a2b3c4',
      '- int x = 1 ;',
      '+ int x = 2 ;',
      'return x ;',
      '',
      'new file mode 100644',
      'deleted file mode 100644',
      'rename from a / b . txt',
      'rename to a / c . txt',
      'similarity index 90 %',
      'Binary files a / logo . png and / dev / null differ',
    ].join(' <nl> ');

    expect(processDiff(diff)).toBe(
      'src / App . java \\n - int x = 1 ; \\n + int x = 2 ; \\n new file mode 100644 \\n ' +
        'deleted file \\n rename from a / b . txt \\n rename to a / c . txt \\n ' +
        'Binary files a / logo . png and / dev / null differ \\n'
    );
  });

  it('returns an empty string when nothing changed', () => {
    expect(processDiff('context line <nl> index 1 . . 2')).toBe('');
  });
});
