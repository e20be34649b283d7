// =============================================================================
// Demo Chains - Static Import
// =============================================================================

import audioEncoder from './audio_encoder.json';
import dilatedStack from './dilated_stack.json';

import type { BatchRequest, ChainDescription } from '../engine/types';
import { Chain } from '../engine/chain';

// =============================================================================
// Chain Registration
// =============================================================================

export const demoChains: ChainDescription[] = [audioEncoder, dilatedStack];

// Map for quick lookup by name
export const demoChainsMap: Record<string, ChainDescription> = Object.fromEntries(
  demoChains.map((chain) => [chain.name ?? '', chain])
);

/**
 * Batch settings used with the demo chains: four consecutive windows of
 * eight frames, predicting the last half of each
 */
export const demoBatchRequest: BatchRequest = {
  windowCount: 4,
  windowOutputSpan: 8,
  strideBetweenWindows: 8,
  subSelection: { kind: 'relative', offsets: [4, 5, 6, 7] },
};

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Build a demo chain by name, throws if not found
 */
export function getDemoChain(name: string): Chain {
  const description = demoChainsMap[name];
  if (!description) {
    throw new Error(`Unknown demo chain: ${name}`);
  }
  return Chain.fromDescription(description);
}
