/**
 * Stage - Length mapping of a single strided/dilated transform
 *
 * A stage slides a kernel of `kernelSize` taps spaced `dilation` apart over
 * its input, `stride` positions at a time. Only complete kernel placements
 * yield an output, so trailing input that cannot fill a placement is dropped.
 */

import type { IndexRange, StageParams } from './types';
import { ChainError, assertCount, assertRange } from './errors';

function assertPositive(value: number, label: string, name?: string): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    const where = name ? ` in stage "${name}"` : '';
    throw new ChainError(
      'InvalidConfiguration',
      `${label} must be a positive integer${where}, got ${value}`,
      { [label]: value, stage: name }
    );
  }
}

export class Stage {
  readonly kernelSize: number;
  readonly stride: number;
  readonly dilation: number;
  readonly name?: string;
  /**
   * Input offset of the kernel's key tap. Defaults to the centre tap;
   * asymmetric kernels (e.g. causal ones) set it explicitly.
   */
  readonly keyOffset: number;
  private readonly customKeyOffset: boolean;

  constructor(params: StageParams) {
    const dilation = params.dilation ?? 1;
    assertPositive(params.kernelSize, 'kernelSize', params.name);
    assertPositive(params.stride, 'stride', params.name);
    assertPositive(dilation, 'dilation', params.name);

    this.kernelSize = params.kernelSize;
    this.stride = params.stride;
    this.dilation = dilation;
    this.name = params.name;

    const effectiveKernel = (params.kernelSize - 1) * dilation + 1;
    if (!Number.isSafeInteger(effectiveKernel)) {
      throw new ChainError('InvalidConfiguration', `Kernel span ${effectiveKernel} is too large`, {
        stage: params.name,
      });
    }

    if (params.keyOffset === undefined) {
      this.keyOffset = Math.floor((params.kernelSize - 1) / 2) * dilation;
      this.customKeyOffset = false;
    } else {
      const { keyOffset } = params;
      const onTap = Number.isInteger(keyOffset) && keyOffset % dilation === 0;
      if (!onTap || keyOffset < 0 || keyOffset >= effectiveKernel) {
        const where = params.name ? ` in stage "${params.name}"` : '';
        throw new ChainError(
          'InvalidConfiguration',
          `keyOffset must be a tap position in [0, ${effectiveKernel})${where}, got ${keyOffset}`,
          { keyOffset, stage: params.name }
        );
      }
      this.keyOffset = keyOffset;
      this.customKeyOffset = true;
    }
    Object.freeze(this);
  }

  /**
   * Number of input positions spanned by one kernel placement
   */
  get effectiveKernel(): number {
    return (this.kernelSize - 1) * this.dilation + 1;
  }

  /**
   * Number of outputs this stage yields from `inputCount` input positions
   */
  producedOutputCount(inputCount: number): number {
    assertCount(inputCount, 'inputCount');
    if (inputCount < this.effectiveKernel) {
      return 0;
    }
    return Math.floor((inputCount - this.effectiveKernel) / this.stride) + 1;
  }

  /**
   * Minimum number of input positions needed to yield exactly `outputCount`
   * outputs. Not a true inverse of producedOutputCount: the remainder a
   * stride leaves behind is never counted.
   */
  requiredInputCount(outputCount: number): number {
    assertCount(outputCount, 'outputCount');
    if (outputCount === 0) {
      return 0;
    }
    const required = (outputCount - 1) * this.stride + this.effectiveKernel;
    if (!Number.isSafeInteger(required)) {
      throw new ChainError(
        'InvalidArgument',
        `${outputCount} outputs need more input than can be counted exactly`,
        { outputCount }
      );
    }
    return required;
  }

  /**
   * Input range read by the outputs in `range`
   */
  receptiveField(range: IndexRange): IndexRange {
    assertRange(range.begin, range.end, 'outputRange');
    if (range.begin === range.end) {
      return { begin: 0, end: 0 };
    }
    return {
      begin: range.begin * this.stride,
      end: (range.end - 1) * this.stride + this.effectiveKernel,
    };
  }

  /**
   * Maximal output range whose receptive fields all lie inside `range`
   */
  outputRange(range: IndexRange): IndexRange {
    assertRange(range.begin, range.end, 'inputRange');
    if (range.end - range.begin < this.effectiveKernel) {
      return { begin: 0, end: 0 };
    }
    const begin = Math.ceil(range.begin / this.stride);
    const end = Math.floor((range.end - this.effectiveKernel) / this.stride) + 1;
    if (begin >= end) {
      return { begin: 0, end: 0 };
    }
    return { begin, end };
  }

  toParams(): StageParams {
    const params: StageParams = {
      kernelSize: this.kernelSize,
      stride: this.stride,
      dilation: this.dilation,
    };
    if (this.name !== undefined) {
      params.name = this.name;
    }
    if (this.customKeyOffset) {
      params.keyOffset = this.keyOffset;
    }
    return params;
  }

  toString(): string {
    const key = this.customKeyOffset ? ` key=${this.keyOffset}` : '';
    const body = `k=${this.kernelSize} s=${this.stride} d=${this.dilation}${key}`;
    return this.name ? `${this.name}: ${body}` : body;
  }
}
