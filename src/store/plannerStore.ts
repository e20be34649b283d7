import { createStore } from 'zustand/vanilla';
import { subscribeWithSelector } from 'zustand/middleware';
import type {
  AlignmentReport,
  BatchPlan,
  BatchRequest,
  ChainDescription,
  StageParams,
} from '../engine/types';
import { Chain } from '../engine/chain';
import { isChainError, type ChainErrorKind } from '../engine/errors';
import { checkInputAlignment } from '../engine/alignmentValidator';
import { selectWindows } from '../engine/windowSelector';
import { buildChain } from '../engine/chainLoader';

// =============================================================================
// Store Types
// =============================================================================

export interface PlannerError {
  kind: ChainErrorKind;
  message: string;
}

export interface PlannerConfig {
  chainName: string | null;
  stages: StageParams[];
  availableInputLength: number;
  batchRequest: BatchRequest;
}

interface PlannerDerived {
  chain: Chain | null;
  alignment: AlignmentReport | null;
  plan: BatchPlan | null;
  error: PlannerError | null;
}

export interface PlannerState extends PlannerConfig, PlannerDerived {
  // Chain operations
  loadChain: (description: ChainDescription) => void;
  loadChainByName: (name: string) => void;
  setStages: (stages: StageParams[]) => void;
  updateStage: (index: number, params: Partial<StageParams>) => void;
  addStage: (params: StageParams, index?: number) => void;
  removeStage: (index: number) => void;

  // Batch operations
  setAvailableInputLength: (length: number) => void;
  setBatchRequest: (request: Partial<BatchRequest>) => void;

  // Session operations
  exportChain: () => ChainDescription;
  clear: () => void;
}

// =============================================================================
// Helper Functions
// =============================================================================

const defaultConfig: PlannerConfig = {
  chainName: null,
  stages: [],
  availableInputLength: 0,
  batchRequest: { windowCount: 1, windowOutputSpan: 1 },
};

/**
 * Rebuild the chain and plan from a configuration. Chain errors end up in
 * `error`; whatever was computed before the failure is kept.
 */
function derive(config: PlannerConfig): PlannerDerived {
  const derived: PlannerDerived = { chain: null, alignment: null, plan: null, error: null };

  // Nothing configured yet
  if (config.stages.length === 0 && config.chainName === null) {
    return derived;
  }

  try {
    derived.chain = new Chain(config.stages, config.chainName ?? undefined);
    derived.alignment = checkInputAlignment(derived.chain, config.availableInputLength);
    derived.plan = selectWindows(derived.chain, derived.alignment.lengths, config.batchRequest);
  } catch (error) {
    if (!isChainError(error)) throw error;
    derived.error = { kind: error.kind, message: error.message };
  }

  return derived;
}

function pickConfig(state: PlannerConfig): PlannerConfig {
  return {
    chainName: state.chainName,
    stages: state.stages,
    availableInputLength: state.availableInputLength,
    batchRequest: state.batchRequest,
  };
}

// =============================================================================
// Store Implementation
// =============================================================================

export function createPlannerStore(initial: Partial<PlannerConfig> = {}) {
  const initialConfig: PlannerConfig = { ...defaultConfig, ...initial };

  return createStore<PlannerState>()(
    subscribeWithSelector((set, get) => {
      const update = (changes: Partial<PlannerConfig>) => {
        const config = { ...pickConfig(get()), ...changes };
        set({ ...config, ...derive(config) });
      };

      return {
        // Initial state
        ...initialConfig,
        ...derive(initialConfig),

        // Chain operations
        loadChain: (description) => {
          update({
            chainName: description.name ?? null,
            stages: description.stages.map((s) => ({ ...s })),
          });
        },

        loadChainByName: (name) => {
          try {
            const chain = buildChain(name);
            update({ chainName: name, stages: chain.stages.map((s) => s.toParams()) });
          } catch (error) {
            if (!isChainError(error)) throw error;
            // Drop the previous chain so nothing derived from it outlives the failed load
            set({
              chainName: null,
              stages: [],
              chain: null,
              alignment: null,
              plan: null,
              error: { kind: error.kind, message: error.message },
            });
          }
        },

        setStages: (stages) => {
          update({ stages: stages.map((s) => ({ ...s })) });
        },

        updateStage: (index, params) => {
          update({
            stages: get().stages.map((stage, i) => (i === index ? { ...stage, ...params } : stage)),
          });
        },

        addStage: (params, index) => {
          const stages = [...get().stages];
          stages.splice(index ?? stages.length, 0, { ...params });
          update({ stages });
        },

        removeStage: (index) => {
          update({ stages: get().stages.filter((_, i) => i !== index) });
        },

        // Batch operations
        setAvailableInputLength: (length) => {
          update({ availableInputLength: length });
        },

        setBatchRequest: (request) => {
          update({ batchRequest: { ...get().batchRequest, ...request } });
        },

        // Session operations
        exportChain: () => {
          const { chainName, stages } = get();
          const description: ChainDescription = { stages: stages.map((s) => ({ ...s })) };
          if (chainName !== null) {
            description.name = chainName;
          }
          return description;
        },

        clear: () => {
          set({ ...defaultConfig, ...derive(defaultConfig) });
        },
      };
    })
  );
}

export type PlannerStore = ReturnType<typeof createPlannerStore>;

// =============================================================================
// Selectors
// =============================================================================

export const selectPlan = (state: PlannerState) => state.plan;

export const selectActiveIndices = (state: PlannerState) => state.plan?.activeIndices ?? [];

export const selectError = (state: PlannerState) => state.error;

export const selectUnusedInputLength = (state: PlannerState) =>
  state.alignment?.lengths.unusedInputCount ?? 0;

export const selectStageCount = (state: PlannerState) => state.stages.length;
