export { substituteSettings, classifyExit, createCommandPhaseAction, buildCommandPhases } from './command-phase';
export type { CommandPhaseOptions } from './command-phase';
