/**
 * Receptive Field Engine - Core Types
 *
 * This module defines the type system for length bookkeeping across a chain of
 * strided/dilated stages and for the training windows selected on top of it.
 */

// =============================================================================
// Stage Types
// =============================================================================

/**
 * Parameters of a single length-transforming stage
 */
export interface StageParams {
  kernelSize: number;
  stride: number;
  /** Defaults to 1 */
  dilation?: number;
  /** Optional label, e.g. the layer name in the model */
  name?: string;
  /**
   * Input offset of the key tap within one kernel placement, for kernels
   * whose wings are unequal. Defaults to the centre tap.
   */
  keyOffset?: number;
}

/**
 * A chain as supplied by the model-definition layer
 */
export interface ChainDescription {
  name?: string;
  description?: string;
  stages: StageParams[];
}

// =============================================================================
// Length Types
// =============================================================================

/**
 * A half-open index range [begin, end)
 */
export interface IndexRange {
  begin: number;
  end: number;
}

/**
 * Input and output counts that satisfy the chain's mapping
 */
export interface LengthPair {
  inputCount: number;
  outputCount: number;
}

/**
 * Result of a forward or backward traversal
 */
export interface PassResult extends LengthPair {
  /**
   * Count at every stage boundary: index i is the count entering stage i,
   * the last entry is the final output count.
   */
  boundaryCounts: number[];
}

/**
 * Self-consistent lengths derived from an available input length
 */
export interface ReconciledLengths {
  /** The input length that was offered */
  inputCount: number;
  /** The exact input length the achievable outputs consume */
  consumedInputCount: number;
  outputCount: number;
  /** inputCount - consumedInputCount */
  unusedInputCount: number;
}

// =============================================================================
// Alignment Types
// =============================================================================

export type AlignmentStatus = 'aligned' | 'trailing' | 'insufficient';

/**
 * Positions a stage drops on the forward pass
 */
export interface StageRemainder {
  stageIndex: number;
  stageName?: string;
  inputCount: number;
  outputCount: number;
  /** Input positions past the last complete kernel placement */
  droppedCount: number;
}

export interface AlignmentReport {
  status: AlignmentStatus;
  /** Whether at least one output can be produced */
  isValid: boolean;
  message?: string;
  lengths: ReconciledLengths;
  stageRemainders: StageRemainder[];
}

// =============================================================================
// Window Selection Types
// =============================================================================

/**
 * Which positions of each window count toward the primary loss
 */
export type SubSelection =
  | { kind: 'relative'; offsets: number[] }
  | { kind: 'absolute'; positions: number[] };

/**
 * Batch descriptor supplied by the training-loop configuration
 */
export interface BatchRequest {
  windowCount: number;
  windowOutputSpan: number;
  /**
   * Distance between consecutive window starts. Equal to the span for
   * consecutive selection, larger to spread windows. Defaults to the span.
   */
  strideBetweenWindows?: number;
  /** Start of the first window. Defaults to 0 */
  offset?: number;
  /** Explicit window starts; replaces stride placement when given */
  starts?: number[];
  /** Permit windows whose output ranges overlap. Defaults to false */
  allowOverlap?: boolean;
  subSelection?: SubSelection;
}

export interface InputSpan {
  start: number;
  length: number;
}

/**
 * A selected window of output positions and the input needed to produce it
 */
export interface Window {
  index: number;
  outputRange: IndexRange;
  /** Output positions in prediction order */
  outputIndices: number[];
  inputSpan: InputSpan;
  inRegister: number[];
  outOfRegister: number[];
}

/**
 * Boolean mask over [begin, begin + values.length) of the output sequence
 */
export interface PredictionMask {
  begin: number;
  values: boolean[];
}

export interface BatchPlan {
  windows: Window[];
  mask: PredictionMask;
  /** Sorted in-register output positions across all windows */
  activeIndices: number[];
  /** Output positions actually covered once the request is laid out */
  truncatedOutputCount: number;
  lengths: ReconciledLengths;
}
