export * from './engine';
export {
  createPlannerStore,
  selectPlan,
  selectActiveIndices,
  selectError,
  selectUnusedInputLength,
  selectStageCount,
} from './store/plannerStore';
export type { PlannerStore, PlannerState, PlannerConfig, PlannerError } from './store/plannerStore';
export { demoChains, demoChainsMap, demoBatchRequest, getDemoChain } from './data';
