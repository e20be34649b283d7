/**
 * Alignment Validator - Checks how well a raw input length fits a chain
 *
 * Provides three levels:
 * - Aligned: every input position is consumed by the achievable outputs
 * - Trailing: outputs are produced but a tail of the input is left unused
 * - Insufficient: the input is shorter than one receptive field
 */

import type { AlignmentReport, StageRemainder } from './types';
import type { Chain } from './chain';
import { forwardPass, reconcile } from './shapePropagation';

// =============================================================================
// Stage Breakdown
// =============================================================================

/**
 * Input positions each stage drops during the forward pass
 */
export function computeStageRemainders(chain: Chain, inputCount: number): StageRemainder[] {
  const { boundaryCounts } = forwardPass(chain, inputCount);

  return chain.stages.map((stage, i) => {
    const stageInput = boundaryCounts[i];
    const stageOutput = boundaryCounts[i + 1];
    const remainder: StageRemainder = {
      stageIndex: i,
      inputCount: stageInput,
      outputCount: stageOutput,
      droppedCount: stageInput - stage.requiredInputCount(stageOutput),
    };
    if (stage.name !== undefined) {
      remainder.stageName = stage.name;
    }
    return remainder;
  });
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Check a raw input length against the chain
 *
 * @param chain - The chain the input will be fed through
 * @param inputCount - Available raw input length
 * @returns Report with status, reconciled lengths and per-stage drops
 */
export function checkInputAlignment(chain: Chain, inputCount: number): AlignmentReport {
  const lengths = reconcile(chain, inputCount);
  const stageRemainders = computeStageRemainders(chain, inputCount);

  if (lengths.outputCount === 0) {
    return {
      status: 'insufficient',
      isValid: false,
      message: `Input length ${inputCount} is shorter than the receptive field (${chain.receptiveFieldSize})`,
      lengths,
      stageRemainders,
    };
  }

  if (lengths.unusedInputCount > 0) {
    const droppingStages = stageRemainders
      .filter((r) => r.droppedCount > 0)
      .map((r) => `${r.stageName ?? `stage ${r.stageIndex}`} drops ${r.droppedCount}`);

    return {
      status: 'trailing',
      isValid: true,
      message: `${lengths.unusedInputCount} trailing input positions unused (${droppingStages.join(', ')})`,
      lengths,
      stageRemainders,
    };
  }

  return {
    status: 'aligned',
    isValid: true,
    lengths,
    stageRemainders,
  };
}

