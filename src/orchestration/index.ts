/**
 * Orchestration module - wires core, io, process, ui and logging together
 */

export { createRuntime, createInstallOrchestrator } from './orchestrator-factory';
export type {
  Runtime,
  RuntimeOptions,
  RuntimeOverrides,
  InstallOrchestratorOptions,
} from './orchestrator-factory';
