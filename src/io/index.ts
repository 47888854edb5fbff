/**
 * IO module - filesystem abstraction for testability
 */

export { RealFileSystem, createRealFileSystem, errnoCode } from './real-file-system';
export { MemoryFileSystem, createMemoryFileSystem } from './memory-file-system';
export type { FailableOperation } from './memory-file-system';

// Deployment file
export { loadDeploymentPlan, DEFAULT_DEPLOYMENT_FILE } from './load-deployment-plan';
export type { LoadedDeploymentPlan } from './load-deployment-plan';
