import { describe, it, expect } from 'vitest';
import { Chain } from './chain';
import { ChainError } from './errors';

describe('Chain', () => {
  const chain = new Chain([
    { kernelSize: 3, stride: 1 },
    { kernelSize: 3, stride: 2 },
  ]);

  it('summarizes stride and receptive field', () => {
    expect(chain.length).toBe(2);
    expect(chain.totalStride).toBe(2);
    expect(chain.receptiveFieldSize).toBe(5);
  });

  it('is frozen after construction', () => {
    expect(Object.isFrozen(chain)).toBe(true);
    expect(Object.isFrozen(chain.stages)).toBe(true);
  });

  it('rejects an empty stage list', () => {
    expect(() => new Chain([])).toThrow(ChainError);
    expect(() => new Chain([])).toThrow(/has no stages/);
  });

  it('rejects invalid stages', () => {
    expect(() => new Chain([{ kernelSize: 3, stride: -1 }])).toThrow(/stride must be a positive integer/);
  });

  it('slices sub-chains', () => {
    const tail = chain.slice(1);
    expect(tail.length).toBe(1);
    expect(tail.stages[0].stride).toBe(2);
    expect(() => chain.slice(1, 1)).toThrow(/has no stages/);
    expect(() => chain.slice(0, 3)).toThrow(/outside chain of 2 stages/);
  });

  it('round-trips through its description', () => {
    const named = new Chain([{ kernelSize: 3, stride: 1 }], 'frontend');
    expect(named.toDescription()).toEqual({
      name: 'frontend',
      stages: [{ kernelSize: 3, stride: 1, dilation: 1 }],
    });
    expect(Chain.fromDescription(named.toDescription()).receptiveFieldSize).toBe(3);
  });
});
