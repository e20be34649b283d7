/**
 * Chain - Ordered stack of stages from raw input to final output
 *
 * Index 0 is the stage nearest the raw input. Stages are held in a frozen
 * array and traversed by index in either direction.
 */

import type { ChainDescription, StageParams } from './types';
import { ChainError } from './errors';
import { Stage } from './stage';

export class Chain {
  readonly name?: string;
  readonly stages: readonly Stage[];

  constructor(stages: readonly (StageParams | Stage)[], name?: string) {
    if (stages.length === 0) {
      throw new ChainError('EmptyChain', `Chain${name ? ` "${name}"` : ''} has no stages`);
    }
    this.name = name;
    this.stages = Object.freeze(
      stages.map((s) => (s instanceof Stage ? s : new Stage(s)))
    );
    Object.freeze(this);
  }

  static fromDescription(description: ChainDescription): Chain {
    return new Chain(description.stages, description.name);
  }

  get length(): number {
    return this.stages.length;
  }

  /**
   * Product of all strides: output spacing measured in raw input positions
   */
  get totalStride(): number {
    return this.stages.reduce((acc, s) => acc * s.stride, 1);
  }

  /**
   * Raw input positions read by a single final output
   */
  get receptiveFieldSize(): number {
    let count = 1;
    for (let i = this.stages.length - 1; i >= 0; i--) {
      count = this.stages[i].requiredInputCount(count);
    }
    return count;
  }

  /**
   * Sub-chain of stages [from, to), for aligning intermediate feature maps
   */
  slice(from: number, to: number = this.stages.length): Chain {
    if (!Number.isInteger(from) || !Number.isInteger(to) || from < 0 || to > this.stages.length) {
      throw new ChainError(
        'InvalidArgument',
        `Stage slice [${from}, ${to}) is outside chain of ${this.stages.length} stages`,
        { from, to }
      );
    }
    return new Chain(this.stages.slice(from, to), this.name);
  }

  toDescription(): ChainDescription {
    const description: ChainDescription = {
      stages: this.stages.map((s) => s.toParams()),
    };
    if (this.name !== undefined) {
      description.name = this.name;
    }
    return description;
  }
}
