/**
 * Receptive Field Engine - Main Export
 *
 * This module provides length propagation and window selection for chains of
 * strided/dilated stages.
 */

// Core types
export type {
  StageParams,
  ChainDescription,
  IndexRange,
  LengthPair,
  PassResult,
  ReconciledLengths,
  AlignmentStatus,
  StageRemainder,
  AlignmentReport,
  SubSelection,
  BatchRequest,
  InputSpan,
  Window,
  PredictionMask,
  BatchPlan,
} from './types';

// Errors
export { ChainError, isChainError } from './errors';
export type { ChainErrorKind } from './errors';

// Stages and chains
export { Stage } from './stage';
export { Chain } from './chain';

// Parser
export { parseChainDescription, chainToString } from './shapeParser';

// Propagation
export {
  backwardPass,
  requiredInputLength,
  forwardPass,
  achievableOutputLength,
  reconcile,
  receptiveField,
  outputRange,
  shadow,
} from './shapePropagation';

// Alignment validator
export { checkInputAlignment, computeStageRemainders } from './alignmentValidator';

// Window selection
export { selectWindows, planBatch } from './windowSelector';

// Chain loader
export {
  chainRegistry,
  validateChainDescription,
  loadChainsFromDirectory,
  loadChainsSync,
  getChainDescription,
  getAllChainDescriptions,
  buildChain,
} from './chainLoader';
