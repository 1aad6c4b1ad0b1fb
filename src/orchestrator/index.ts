/**
 * orchestrator/index.ts
 * Barrel export for the analysis orchestrator.
 */

export { AnalysisOrchestrator, STAGE_FAILURE_POLICY } from './analysis-orchestrator.js';
export type { AnalysisOrchestratorOptions } from './analysis-orchestrator.js';
