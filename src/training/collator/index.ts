export { assembleTurns, type AssembledExample } from './turn-assembler.js';
export { padSequences, type PadSide, type PaddedField, type PadOptions } from './padder.js';
export {
  materializeBatch,
  stackRows,
  getRow,
  toNestedArray,
  type TokenMatrix,
  type Batch,
  type BatchFields,
  type BatchFieldName,
} from './materializer.js';
export { collateBatch, HistoryCollator } from './collator.js';
export { stripHistoryTargets, extractTargetTokens } from './targets.js';
