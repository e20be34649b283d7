/**
 * Chain Parser - Converts compact chain descriptions to stage parameters
 *
 * Supports parsing:
 * - Anonymous stages: k=3 s=2
 * - Named stages: conv1: k=3 s=1 d=2
 * - Long keys: kernel=3 stride=2 dilation=1
 * - Off-centre key taps: k=3 s=1 key=2
 * - Chains: stages separated by commas or semicolons
 */

import type { ChainDescription, StageParams } from './types';
import type { Chain } from './chain';
import { ChainError } from './errors';

// =============================================================================
// Tokenizer
// =============================================================================

type TokenType = 'number' | 'identifier' | 'equals' | 'colon' | 'separator';

interface Token {
  type: TokenType;
  value: string;
  position: number;
}

function syntaxError(message: string, position?: number): ChainError {
  const where = position === undefined ? '' : ` at position ${position}`;
  return new ChainError('InvalidConfiguration', `${message}${where}`, { position });
}

/**
 * Tokenize a chain description string
 */
function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (/\d/.test(ch)) {
      const start = i;
      while (i < text.length && /\d/.test(text[i])) i++;
      tokens.push({ type: 'number', value: text.slice(start, i), position: start });
      continue;
    }

    if (/[a-zA-Z_]/.test(ch)) {
      const start = i;
      while (i < text.length && /[a-zA-Z0-9_.-]/.test(text[i])) i++;
      tokens.push({ type: 'identifier', value: text.slice(start, i), position: start });
      continue;
    }

    if (ch === '=') {
      tokens.push({ type: 'equals', value: ch, position: i++ });
      continue;
    }
    if (ch === ':') {
      tokens.push({ type: 'colon', value: ch, position: i++ });
      continue;
    }
    if (ch === ',' || ch === ';') {
      tokens.push({ type: 'separator', value: ch, position: i++ });
      continue;
    }

    throw syntaxError(`Unexpected character '${ch}' in chain description`, i);
  }

  return tokens;
}

// =============================================================================
// Parser (Recursive Descent)
// =============================================================================

type ParamKey = 'kernelSize' | 'stride' | 'dilation' | 'keyOffset';

const PARAM_KEYS: Record<string, ParamKey> = {
  k: 'kernelSize',
  kernel: 'kernelSize',
  s: 'stride',
  stride: 'stride',
  d: 'dilation',
  dilation: 'dilation',
  key: 'keyOffset',
};

class Parser {
  private tokens: Token[];
  private pos: number = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  private peek(offset = 0): Token | undefined {
    return this.tokens[this.pos + offset];
  }

  private consume(): Token | undefined {
    return this.tokens[this.pos++];
  }

  private expect(type: TokenType): Token {
    const token = this.consume();
    if (!token || token.type !== type) {
      throw syntaxError(`Expected ${type}, got ${token?.type ?? 'end of input'}`, token?.position);
    }
    return token;
  }

  /**
   * Parse stages separated by commas
   */
  parseChain(): StageParams[] {
    const stages: StageParams[] = [this.parseStage()];

    while (this.peek()?.type === 'separator') {
      this.consume();
      // Tolerate a trailing separator
      if (!this.peek()) break;
      stages.push(this.parseStage());
    }

    const rest = this.peek();
    if (rest) {
      throw syntaxError(`Unexpected ${rest.type} '${rest.value}'`, rest.position);
    }
    return stages;
  }

  /**
   * Parse an optionally named stage: [name ':'] key '=' number ...
   */
  private parseStage(): StageParams {
    const start = this.peek()?.position;
    let name: string | undefined;

    if (this.peek()?.type === 'identifier' && this.peek(1)?.type === 'colon') {
      name = this.expect('identifier').value;
      this.consume();
    }

    const values: Partial<Record<ParamKey, number>> = {};
    while (this.peek()?.type === 'identifier') {
      const keyToken = this.expect('identifier');
      const key = PARAM_KEYS[keyToken.value.toLowerCase()];
      if (!key) {
        throw syntaxError(`Unknown stage parameter '${keyToken.value}'`, keyToken.position);
      }
      if (values[key] !== undefined) {
        throw syntaxError(`Parameter '${keyToken.value}' given twice`, keyToken.position);
      }
      this.expect('equals');
      values[key] = parseInt(this.expect('number').value, 10);
    }

    if (values.kernelSize === undefined || values.stride === undefined) {
      throw syntaxError(`Stage${name ? ` "${name}"` : ''} needs both k and s`, start);
    }

    const stage: StageParams = {
      kernelSize: values.kernelSize,
      stride: values.stride,
      dilation: values.dilation ?? 1,
    };
    if (name !== undefined) {
      stage.name = name;
    }
    if (values.keyOffset !== undefined) {
      stage.keyOffset = values.keyOffset;
    }
    return stage;
  }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Parse a compact chain description into a ChainDescription
 */
export function parseChainDescription(text: string, name?: string): ChainDescription {
  const tokens = tokenize(text);
  if (tokens.length === 0) {
    throw new ChainError('EmptyChain', 'Empty chain description');
  }

  const parser = new Parser(tokens);
  const description: ChainDescription = { stages: parser.parseChain() };
  if (name !== undefined) {
    description.name = name;
  }
  return description;
}

/**
 * Convert a chain back to its compact text form
 */
export function chainToString(chain: Chain): string {
  return chain.stages.map((s) => s.toString()).join(', ');
}
