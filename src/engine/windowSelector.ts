/**
 * Window Selector - Lays out aligned training windows over a chain's outputs
 *
 * Window starts are placed `strideBetweenWindows` apart (or taken from an
 * explicit list), checked against the achievable output length, and mapped
 * back to the raw input through the chain's receptive field. Consecutive and
 * spread-out selection differ only in the stride value.
 */

import type {
  BatchPlan,
  BatchRequest,
  IndexRange,
  PredictionMask,
  ReconciledLengths,
  SubSelection,
  Window,
} from './types';
import type { Chain } from './chain';
import { ChainError, assertCount } from './errors';
import { receptiveField, reconcile, requiredInputLength } from './shapePropagation';

// =============================================================================
// Request Validation
// =============================================================================

function assertPositiveCount(value: number, label: string): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ChainError('InvalidArgument', `${label} must be a positive integer, got ${value}`, {
      [label]: value,
    });
  }
}

/**
 * Window starts in ascending order, rejecting coinciding or (unless allowed)
 * overlapping windows
 */
function layoutStarts(request: BatchRequest): number[] {
  const { windowCount, windowOutputSpan } = request;
  let starts: number[];

  if (request.starts) {
    if (request.starts.length !== windowCount) {
      throw new ChainError(
        'InvalidArgument',
        `Expected ${windowCount} window starts, got ${request.starts.length}`,
        { windowCount, starts: request.starts }
      );
    }
    request.starts.forEach((s, i) => assertCount(s, `starts[${i}]`));
    starts = [...request.starts].sort((a, b) => a - b);
  } else {
    const stride = request.strideBetweenWindows ?? windowOutputSpan;
    const offset = request.offset ?? 0;
    assertCount(stride, 'strideBetweenWindows');
    assertCount(offset, 'offset');
    starts = Array.from({ length: windowCount }, (_, w) => offset + w * stride);
  }

  for (let i = 1; i < starts.length; i++) {
    const prev = starts[i - 1];
    if (starts[i] === prev) {
      throw new ChainError('DuplicateWindow', `Window ${i} coincides with window ${i - 1} at output ${prev}`, {
        start: prev,
      });
    }
    if (!request.allowOverlap && starts[i] < prev + windowOutputSpan) {
      throw new ChainError(
        'DuplicateWindow',
        `Window at output ${starts[i]} overlaps window at output ${prev} (span ${windowOutputSpan})`,
        { start: starts[i], previousStart: prev }
      );
    }
  }

  return starts;
}

// =============================================================================
// Sub-selection
// =============================================================================

/**
 * Build a predicate telling whether an output position is in-register for the
 * window starting at `windowBegin`
 */
function resolveSubSelection(
  selection: SubSelection | undefined,
  windows: IndexRange[],
  span: number
): (position: number, windowBegin: number) => boolean {
  if (!selection) {
    return () => true;
  }

  if (selection.kind === 'relative') {
    selection.offsets.forEach((o, i) => {
      assertCount(o, `offsets[${i}]`);
      if (o >= span) {
        throw new ChainError('InvalidArgument', `Offset ${o} is outside a window of span ${span}`, {
          offset: o,
          span,
        });
      }
    });
    const offsets = new Set(selection.offsets);
    return (position, windowBegin) => offsets.has(position - windowBegin);
  }

  selection.positions.forEach((p, i) => {
    assertCount(p, `positions[${i}]`);
    if (!windows.some((w) => p >= w.begin && p < w.end)) {
      throw new ChainError('InvalidArgument', `Position ${p} is not inside any selected window`, {
        position: p,
      });
    }
  });
  const positions = new Set(selection.positions);
  return (position) => positions.has(position);
}

// =============================================================================
// Selection
// =============================================================================

/**
 * Select windows for a batch from lengths already reconciled against `chain`
 */
export function selectWindows(
  chain: Chain,
  lengths: ReconciledLengths,
  request: BatchRequest
): BatchPlan {
  assertPositiveCount(request.windowCount, 'windowCount');
  assertPositiveCount(request.windowOutputSpan, 'windowOutputSpan');
  assertCount(lengths.outputCount, 'outputCount');

  if (requiredInputLength(chain, lengths.outputCount) !== lengths.consumedInputCount) {
    throw new ChainError(
      'InvalidArgument',
      `Lengths (${lengths.consumedInputCount} -> ${lengths.outputCount}) are not reconciled against this chain`,
      { lengths }
    );
  }

  const span = request.windowOutputSpan;
  const starts = layoutStarts(request);
  const truncatedOutputCount = starts[starts.length - 1] + span;

  if (truncatedOutputCount > lengths.outputCount) {
    throw new ChainError(
      'InsufficientLength',
      `${request.windowCount} windows of span ${span} need ${truncatedOutputCount} outputs, only ${lengths.outputCount} achievable`,
      { required: truncatedOutputCount, available: lengths.outputCount }
    );
  }

  const ranges = starts.map((begin) => ({ begin, end: begin + span }));
  const isSelected = resolveSubSelection(request.subSelection, ranges, span);

  const maskBegin = ranges[0].begin;
  const mask: PredictionMask = {
    begin: maskBegin,
    values: new Array<boolean>(truncatedOutputCount - maskBegin).fill(false),
  };

  // Overlapping windows share positions, so the mask is settled first and
  // every window reads its register split back from it.
  for (const range of ranges) {
    for (let p = range.begin; p < range.end; p++) {
      if (isSelected(p, range.begin)) {
        mask.values[p - maskBegin] = true;
      }
    }
  }

  const windows: Window[] = ranges.map((range, index) => {
    const field = receptiveField(chain, range);
    const outputIndices: number[] = [];
    const inRegister: number[] = [];
    const outOfRegister: number[] = [];

    for (let p = range.begin; p < range.end; p++) {
      outputIndices.push(p);
      if (mask.values[p - maskBegin]) {
        inRegister.push(p);
      } else {
        outOfRegister.push(p);
      }
    }

    return {
      index,
      outputRange: range,
      outputIndices,
      inputSpan: { start: field.begin, length: field.end - field.begin },
      inRegister,
      outOfRegister,
    };
  });

  const activeIndices: number[] = [];
  mask.values.forEach((on, i) => {
    if (on) activeIndices.push(maskBegin + i);
  });

  return {
    windows,
    mask,
    activeIndices,
    truncatedOutputCount,
    lengths,
  };
}

/**
 * Reconcile an available input length and select windows from it
 */
export function planBatch(chain: Chain, inputCount: number, request: BatchRequest): BatchPlan {
  return selectWindows(chain, reconcile(chain, inputCount), request);
}
