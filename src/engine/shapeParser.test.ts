import { describe, it, expect } from 'vitest';
import { Chain } from './chain';
import { isChainError } from './errors';
import { chainToString, parseChainDescription } from './shapeParser';

function parseErrorKind(text: string): string | undefined {
  try {
    parseChainDescription(text);
  } catch (error) {
    return isChainError(error) ? error.kind : 'other';
  }
  return undefined;
}

describe('parseChainDescription', () => {
  it('parses named stages with defaults', () => {
    expect(parseChainDescription('conv1: k=3 s=1 d=2, conv2: k=3 s=2', 'frontend')).toEqual({
      name: 'frontend',
      stages: [
        { name: 'conv1', kernelSize: 3, stride: 1, dilation: 2 },
        { name: 'conv2', kernelSize: 3, stride: 2, dilation: 1 },
      ],
    });
  });

  it('accepts long keys, semicolons and a trailing separator', () => {
    expect(parseChainDescription('kernel=5 stride=1; k=2 s=2,')).toEqual({
      stages: [
        { kernelSize: 5, stride: 1, dilation: 1 },
        { kernelSize: 2, stride: 2, dilation: 1 },
      ],
    });
  });

  it('prints chains back in the same form', () => {
    const chain = Chain.fromDescription(parseChainDescription('conv1: k=3 s=1 d=2, conv2: k=3 s=2'));
    expect(chainToString(chain)).toBe('conv1: k=3 s=1 d=2, conv2: k=3 s=2 d=1');
  });

  it('reads and prints an explicit key tap', () => {
    const description = parseChainDescription('k=3 s=1 key=2, k=3 s=2');
    expect(description.stages[0]).toEqual({ kernelSize: 3, stride: 1, dilation: 1, keyOffset: 2 });
    expect(chainToString(Chain.fromDescription(description))).toBe('k=3 s=1 d=1 key=2, k=3 s=2 d=1');
  });

  it('reports syntax errors as configuration errors', () => {
    expect(parseErrorKind('k=3')).toBe('InvalidConfiguration');
    expect(parseErrorKind('k=3 s=2 x=1')).toBe('InvalidConfiguration');
    expect(parseErrorKind('k=3 s=2 k=4')).toBe('InvalidConfiguration');
    expect(parseErrorKind('k=3 s=#')).toBe('InvalidConfiguration');
    expect(parseErrorKind('k=3 s=2 = 4')).toBe('InvalidConfiguration');
  });

  it('rejects an empty description', () => {
    expect(parseErrorKind('')).toBe('EmptyChain');
    expect(parseErrorKind('   ')).toBe('EmptyChain');
  });

  it('points at the offending character', () => {
    expect(() => parseChainDescription('k=3 s=#')).toThrow("Unexpected character '#' in chain description at position 6");
  });
});
