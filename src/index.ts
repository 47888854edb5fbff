/**
 * phaseguard: resumable, backup-protected phase orchestration for
 * multi-container deployments.
 *
 * Library entry point; the `phaseguard` binary lives in ./cli/main.
 */

export * from './types';
export * from './schemas';
export * from './core';
export * from './io';
export * from './logging';
export * from './config';
export * from './phases';
export * from './preflight';
export * from './orchestration';
export * from './ui';
export { RealProcessRunner, createRealProcessRunner } from './process/real-process-runner';
export { runCli, parseArgs } from './cli';
export type { CliEnvironment, ParsedArgs, CommandName } from './cli';
export { VERSION } from './version';
