/**
 * Shape Propagation Engine
 *
 * Propagates sequence lengths through a chain of stages:
 * 1. Backward pass: required raw input for a desired number of final outputs
 * 2. Forward pass: achievable final outputs from an available raw input
 * 3. Reconciliation: forward then backward, yielding the exact consumed input
 * 4. Range-level receptive fields and output ranges between the two ends
 */

import type { IndexRange, PassResult, ReconciledLengths } from './types';
import type { Chain } from './chain';
import { assertCount, assertRange } from './errors';

// =============================================================================
// Count Propagation
// =============================================================================

/**
 * Walk the chain from the last stage to the first, replacing the running
 * count with each stage's required input count
 */
export function backwardPass(chain: Chain, outputCount: number): PassResult {
  assertCount(outputCount, 'outputCount');

  const { stages } = chain;
  const boundaryCounts = new Array<number>(stages.length + 1);
  boundaryCounts[stages.length] = outputCount;

  for (let i = stages.length - 1; i >= 0; i--) {
    boundaryCounts[i] = stages[i].requiredInputCount(boundaryCounts[i + 1]);
  }

  return {
    inputCount: boundaryCounts[0],
    outputCount,
    boundaryCounts,
  };
}

/**
 * Minimum raw input length that realizes exactly `outputCount` final outputs
 */
export function requiredInputLength(chain: Chain, outputCount: number): number {
  return backwardPass(chain, outputCount).inputCount;
}

/**
 * Walk the chain from the first stage to the last, replacing the running
 * count with each stage's produced output count
 */
export function forwardPass(chain: Chain, inputCount: number): PassResult {
  assertCount(inputCount, 'inputCount');

  const { stages } = chain;
  const boundaryCounts = new Array<number>(stages.length + 1);
  boundaryCounts[0] = inputCount;

  for (let i = 0; i < stages.length; i++) {
    boundaryCounts[i + 1] = stages[i].producedOutputCount(boundaryCounts[i]);
  }

  return {
    inputCount,
    outputCount: boundaryCounts[stages.length],
    boundaryCounts,
  };
}

/**
 * Number of final outputs achievable from `inputCount` raw input positions
 */
export function achievableOutputLength(chain: Chain, inputCount: number): number {
  return forwardPass(chain, inputCount).outputCount;
}

/**
 * Reconcile an available input length with the chain: the returned consumed
 * length is the exact input the achievable outputs need, and whatever is
 * left over is reported as unused.
 */
export function reconcile(chain: Chain, inputCount: number): ReconciledLengths {
  const { outputCount } = forwardPass(chain, inputCount);
  const consumedInputCount = requiredInputLength(chain, outputCount);

  return {
    inputCount,
    consumedInputCount,
    outputCount,
    unusedInputCount: inputCount - consumedInputCount,
  };
}

// =============================================================================
// Range Propagation
// =============================================================================

const EMPTY_RANGE: Readonly<IndexRange> = Object.freeze({ begin: 0, end: 0 });

/**
 * Raw input range [begin, end) read by the final outputs in `range`
 */
export function receptiveField(chain: Chain, range: IndexRange): IndexRange {
  assertRange(range.begin, range.end, 'outputRange');
  if (range.begin === range.end) return { ...EMPTY_RANGE };

  let current = range;
  for (let i = chain.stages.length - 1; i >= 0; i--) {
    current = chain.stages[i].receptiveField(current);
  }
  return current;
}

/**
 * Maximal final output range whose receptive fields all lie inside the raw
 * input range. Returns [0, 0) when no output fits.
 */
export function outputRange(chain: Chain, range: IndexRange): IndexRange {
  assertRange(range.begin, range.end, 'inputRange');

  let current = range;
  for (const stage of chain.stages) {
    current = stage.outputRange(current);
    if (current.begin === current.end) return { ...EMPTY_RANGE };
  }
  return current;
}

/**
 * Input-coordinate span from the key tap of the first output produced by the
 * raw input range to the key tap of the last one. Lets final output positions
 * be lined up with labels on the input timeline.
 */
export function shadow(chain: Chain, range: IndexRange): IndexRange {
  assertRange(range.begin, range.end, 'inputRange');

  let current = range;
  let spacing = 1;
  let keyPosition = 0;

  for (const stage of chain.stages) {
    current = stage.outputRange(current);
    if (current.begin === current.end) return { ...EMPTY_RANGE };
    keyPosition += stage.keyOffset * spacing;
    spacing *= stage.stride;
  }

  return {
    begin: keyPosition + current.begin * spacing,
    end: keyPosition + (current.end - 1) * spacing + 1,
  };
}
