export { parseExample, assertExample, type Example, type TokenIds } from './example.js';
export { parseJsonl, loadJsonl, mapJsonl, loadExamples } from './jsonl.js';
export { processDiff, tokenizeDiffLines } from './diff.js';
