/**
 * Logging module - structured logging implementations
 */

export { ConsoleLogger, createConsoleLogger } from './console-logger';
export { BufferLogger, createBufferLogger } from './buffer-logger';

// Run summary
export { toRunSummaryJson, formatRunSummary, formatStatePlan, formatDuration } from './run-summary';
export type { RunSummaryJson } from './run-summary';
