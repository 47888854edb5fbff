/**
 * CLI Module
 *
 * Exports for argument parsing and command dispatch
 */

export { parseArgs } from './arg-parser';
export { getUsageText, printUsage } from './help';
export { runCli } from './run-cli';
export type { CliEnvironment } from './run-cli';
export type { ParsedArgs, ParseResult, CommandName } from './types';
export { DEFAULT_ARGS, COMMAND_NAMES } from './types';
