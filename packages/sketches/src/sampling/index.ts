// ---------------------------------------------------------------------------
// Sampling: Barrel export
// ---------------------------------------------------------------------------

export {
  createReservoir,
  reservoirAdd,
  reservoirExtend,
  reservoirSamples,
  reservoirSeen,
  reservoirIsEmpty,
  reservoirClear,
} from './reservoir.js';
