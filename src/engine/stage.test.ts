import { describe, it, expect } from 'vitest';
import { Stage } from './stage';
import { isChainError } from './errors';

function kindOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return isChainError(error) ? error.kind : 'other';
  }
  return undefined;
}

describe('Stage', () => {
  const strided = new Stage({ kernelSize: 3, stride: 2 });

  it('defaults dilation to 1 and freezes itself', () => {
    expect(strided.dilation).toBe(1);
    expect(strided.effectiveKernel).toBe(3);
    expect(Object.isFrozen(strided)).toBe(true);
  });

  it('rejects non-positive parameters', () => {
    expect(kindOf(() => new Stage({ kernelSize: 0, stride: 1 }))).toBe('InvalidConfiguration');
    expect(kindOf(() => new Stage({ kernelSize: 3, stride: 0 }))).toBe('InvalidConfiguration');
    expect(kindOf(() => new Stage({ kernelSize: 3, stride: 1, dilation: 0 }))).toBe('InvalidConfiguration');
    expect(kindOf(() => new Stage({ kernelSize: 2.5, stride: 1 }))).toBe('InvalidConfiguration');
  });

  it('counts produced outputs from complete kernel placements only', () => {
    expect(strided.producedOutputCount(0)).toBe(0);
    expect(strided.producedOutputCount(2)).toBe(0);
    expect(strided.producedOutputCount(3)).toBe(1);
    expect(strided.producedOutputCount(4)).toBe(1);
    expect(strided.producedOutputCount(5)).toBe(2);
    expect(strided.producedOutputCount(8)).toBe(3);
  });

  it('computes the minimum input for an output count', () => {
    expect(strided.requiredInputCount(0)).toBe(0);
    expect(strided.requiredInputCount(1)).toBe(3);
    expect(strided.requiredInputCount(3)).toBe(7);
  });

  it('widens the kernel by the dilation', () => {
    const dilated = new Stage({ kernelSize: 3, stride: 1, dilation: 2 });
    expect(dilated.effectiveKernel).toBe(5);
    expect(dilated.keyOffset).toBe(2);
    expect(dilated.producedOutputCount(5)).toBe(1);
    expect(dilated.requiredInputCount(2)).toBe(6);
  });

  it('round-trips required counts and never over-reports consumed input', () => {
    for (let k = 1; k <= 4; k++) {
      for (let s = 1; s <= 3; s++) {
        for (let d = 1; d <= 3; d++) {
          const stage = new Stage({ kernelSize: k, stride: s, dilation: d });
          for (let n = 0; n <= 20; n++) {
            expect(stage.producedOutputCount(stage.requiredInputCount(n))).toBe(n);
            expect(stage.requiredInputCount(stage.producedOutputCount(n))).toBeLessThanOrEqual(n);
          }
        }
      }
    }
  });

  it('rejects negative and fractional counts', () => {
    expect(kindOf(() => strided.producedOutputCount(-1))).toBe('InvalidArgument');
    expect(kindOf(() => strided.requiredInputCount(-1))).toBe('InvalidArgument');
    expect(kindOf(() => strided.requiredInputCount(1.5))).toBe('InvalidArgument');
  });

  it('stays exact up to the largest safe integer', () => {
    const pair = new Stage({ kernelSize: 2, stride: 1 });
    const max = Number.MAX_SAFE_INTEGER;
    expect(pair.requiredInputCount(max - 1)).toBe(max);
    expect(pair.producedOutputCount(max)).toBe(max - 1);
    expect(kindOf(() => pair.requiredInputCount(max))).toBe('InvalidArgument');
    expect(kindOf(() => pair.requiredInputCount(2 ** 53))).toBe('InvalidArgument');
    expect(kindOf(() => pair.producedOutputCount(2 ** 53))).toBe('InvalidArgument');
    expect(kindOf(() => new Stage({ kernelSize: 2 ** 53, stride: 1 }))).toBe('InvalidConfiguration');
  });

  it('maps output ranges to receptive fields', () => {
    expect(strided.receptiveField({ begin: 1, end: 3 })).toEqual({ begin: 2, end: 7 });
    expect(strided.receptiveField({ begin: 4, end: 4 })).toEqual({ begin: 0, end: 0 });
    expect(kindOf(() => strided.receptiveField({ begin: 3, end: 1 }))).toBe('InvalidArgument');
  });

  it('finds the outputs fully covered by an input range', () => {
    expect(strided.outputRange({ begin: 0, end: 7 })).toEqual({ begin: 0, end: 3 });
    expect(strided.outputRange({ begin: 1, end: 7 })).toEqual({ begin: 1, end: 3 });
    expect(strided.outputRange({ begin: 1, end: 4 })).toEqual({ begin: 0, end: 0 });
    expect(strided.outputRange({ begin: 0, end: 2 })).toEqual({ begin: 0, end: 0 });
  });

  it('prints a compact form', () => {
    expect(new Stage({ kernelSize: 3, stride: 2, name: 'conv' }).toString()).toBe('conv: k=3 s=2 d=1');
    expect(strided.toString()).toBe('k=3 s=2 d=1');
  });

  it('places the key tap at the centre unless told otherwise', () => {
    expect(new Stage({ kernelSize: 4, stride: 1 }).keyOffset).toBe(1);
    const causal = new Stage({ kernelSize: 3, stride: 1, keyOffset: 2 });
    expect(causal.keyOffset).toBe(2);
    expect(causal.toParams()).toEqual({ kernelSize: 3, stride: 1, dilation: 1, keyOffset: 2 });
    expect(causal.toString()).toBe('k=3 s=1 d=1 key=2');
    expect(strided.toParams()).toEqual({ kernelSize: 3, stride: 2, dilation: 1 });
  });

  it('rejects key offsets that miss a tap', () => {
    expect(kindOf(() => new Stage({ kernelSize: 3, stride: 1, keyOffset: 3 }))).toBe('InvalidConfiguration');
    expect(kindOf(() => new Stage({ kernelSize: 3, stride: 1, keyOffset: -1 }))).toBe('InvalidConfiguration');
    expect(kindOf(() => new Stage({ kernelSize: 3, stride: 1, dilation: 2, keyOffset: 3 }))).toBe('InvalidConfiguration');
    expect(new Stage({ kernelSize: 3, stride: 1, dilation: 2, keyOffset: 4 }).keyOffset).toBe(4);
  });
});
