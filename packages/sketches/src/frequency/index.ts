// ---------------------------------------------------------------------------
// Frequency: Barrel export
// ---------------------------------------------------------------------------

export { MAX_TABLE_CELLS } from './table.js';

export {
  createCountSketch,
  createCountSketchWithDimensions,
  countSketchAdd,
  countSketchIncrement,
  countSketchDecrement,
  countSketchEstimate,
  countSketchIsEmpty,
  countSketchMerge,
  countSketchClear,
} from './count-sketch.js';

export {
  createMinMaxSketch,
  createMinMaxSketchWithDimensions,
  minMaxAdd,
  minMaxIncrement,
  minMaxEstimate,
  minMaxMaxEstimate,
  minMaxEstimateInterval,
  minMaxErrorBound,
  minMaxIsEmpty,
  minMaxMerge,
  minMaxClear,
} from './minmax-sketch.js';

export {
  createSpaceSaving,
  spaceSavingAdd,
  spaceSavingInsert,
  spaceSavingEstimate,
  spaceSavingEstimateWithError,
  spaceSavingLowerBound,
  spaceSavingTopK,
  spaceSavingIsEmpty,
  spaceSavingMerge,
  spaceSavingClear,
} from './space-saving.js';
