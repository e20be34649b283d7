/**
 * Chain Loader - Loading of chain descriptions
 *
 * Reads chain descriptions from JSON files and keeps them in a registry
 * keyed by chain name.
 */

import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import type { ChainDescription, StageParams } from './types';
import { Chain } from './chain';
import { ChainError, isChainError } from './errors';

// =============================================================================
// Chain Registry
// =============================================================================

/**
 * Registry of named chain descriptions
 */
class ChainRegistry {
  private chains: Map<string, ChainDescription> = new Map();

  /**
   * Register a chain description under its name
   */
  register(description: ChainDescription & { name: string }): void {
    this.chains.set(description.name, description);
  }

  get(name: string): ChainDescription | undefined {
    return this.chains.get(name);
  }

  getAll(): ChainDescription[] {
    return Array.from(this.chains.values());
  }

  getNames(): string[] {
    return Array.from(this.chains.keys());
  }

  /**
   * Clear all chains (for testing)
   */
  clear(): void {
    this.chains.clear();
  }
}

export const chainRegistry = new ChainRegistry();

// =============================================================================
// Description Validation
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOptional(value: unknown, type: 'string' | 'number'): boolean {
  return value === undefined || typeof value === type;
}

function validateStageParams(stage: unknown): stage is StageParams {
  if (!isRecord(stage)) return false;
  if (typeof stage.kernelSize !== 'number') return false;
  if (typeof stage.stride !== 'number') return false;
  if (!isOptional(stage.dilation, 'number')) return false;
  if (!isOptional(stage.name, 'string')) return false;
  if (!isOptional(stage.keyOffset, 'number')) return false;
  return true;
}

/**
 * Validate the structure of a chain description
 */
export function validateChainDescription(value: unknown): value is ChainDescription {
  if (!isRecord(value)) return false;
  if (!isOptional(value.name, 'string')) return false;
  if (!isOptional(value.description, 'string')) return false;
  if (!Array.isArray(value.stages)) return false;
  return value.stages.every(validateStageParams);
}

/**
 * Check that a description builds a chain; returns the reason when it doesn't
 */
function checkBuildable(description: ChainDescription): string | undefined {
  try {
    Chain.fromDescription(description);
    return undefined;
  } catch (error) {
    if (isChainError(error)) return error.message;
    throw error;
  }
}

// =============================================================================
// Chain Loading
// =============================================================================

/**
 * Load every *.json chain description in a directory. Files without a name
 * are registered under their base name.
 */
export async function loadChainsFromDirectory(directory: string): Promise<number> {
  const entries = (await readdir(directory)).filter((f) => f.endsWith('.json')).sort();
  let loaded = 0;

  for (const file of entries) {
    const filePath = path.join(directory, file);
    let data: unknown;
    try {
      data = JSON.parse(await readFile(filePath, 'utf8'));
    } catch (error) {
      console.error(`[ChainLoader] Error reading chain from ${filePath}:`, error);
      continue;
    }

    if (!validateChainDescription(data)) {
      console.warn(`[ChainLoader] Invalid chain description in ${filePath}`);
      continue;
    }

    const reason = checkBuildable(data);
    if (reason) {
      console.warn(`[ChainLoader] Unusable chain in ${filePath}: ${reason}`);
      continue;
    }

    const name = data.name ?? path.basename(file, '.json');
    chainRegistry.register({ ...data, name });
    console.log(`[ChainLoader] Loaded chain: ${name}`);
    loaded++;
  }

  console.log(`[ChainLoader] Loaded ${loaded} of ${entries.length} chains from ${directory}`);
  return loaded;
}

/**
 * Register chains from pre-imported data
 */
export function loadChainsSync(descriptions: unknown[]): number {
  let loaded = 0;
  for (const description of descriptions) {
    if (
      validateChainDescription(description) &&
      description.name !== undefined &&
      checkBuildable(description) === undefined
    ) {
      chainRegistry.register({ ...description, name: description.name });
      loaded++;
    }
  }
  return loaded;
}

// =============================================================================
// Chain Access Helpers
// =============================================================================

export function getChainDescription(name: string): ChainDescription | undefined {
  return chainRegistry.get(name);
}

export function getAllChainDescriptions(): ChainDescription[] {
  return chainRegistry.getAll();
}

/**
 * Build a Chain from a registered description
 */
export function buildChain(name: string): Chain {
  const description = chainRegistry.get(name);
  if (!description) {
    throw new ChainError('InvalidConfiguration', `Unknown chain "${name}"`, {
      known: chainRegistry.getNames(),
    });
  }
  return Chain.fromDescription(description);
}
