// Logic
export {
  alignBundles,
  applyShift,
  bisectLeft,
  computeShifts,
  findThresholdCrossing,
} from './core/logic.js';

// Types
export { ALIGNMENT_THRESHOLD } from './core/types.js';
export type { AlignedArea, AlignmentResult, AreaShift } from './core/types.js';
