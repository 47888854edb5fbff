/**
 * CLI Argument Parser
 *
 * Parses command line arguments into structured ParsedArgs
 */

import { ParsedArgs, ParseResult, DEFAULT_ARGS, CommandName, COMMAND_NAMES } from './types';
import { PHASE_NAME_PATTERN } from '../schemas/validators';

type ArgValue = { ok: true; value: string; skip: number } | { ok: false; error: string };

function isCommandName(value: string): value is CommandName {
  return COMMAND_NAMES.some((name) => name === value);
}

/**
 * Parse a positive integer from a string
 */
function parsePositiveInt(value: string, name: string): { value: number } | { error: string } {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    return { error: `${name} must be a positive integer` };
  }
  return { value: parsed };
}

/**
 * Parse a comma-separated list of phase names
 */
function parsePhaseList(value: string, name: string): { value: string[] } | { error: string } {
  const names = value
    .split(',')
    .map((n) => n.trim())
    .filter((n) => n.length > 0);
  if (names.length === 0) {
    return { error: `${name} requires at least one phase name` };
  }
  const invalid = names.find((n) => !PHASE_NAME_PATTERN.test(n));
  if (invalid !== undefined) {
    return { error: `Invalid phase name "${invalid}" in ${name}` };
  }
  return { value: names };
}

/**
 * Get the value for an argument, handling both --arg value and --arg=value formats
 */
function getArgValue(args: string[], index: number, argName: string): ArgValue {
  const arg = args[index] ?? '';

  // Check for --arg=value format
  const eq = arg.indexOf('=');
  if (eq !== -1) {
    const value = arg.slice(eq + 1);
    if (!value) {
      return { ok: false, error: `${argName}= requires a value` };
    }
    return { ok: true, value, skip: 0 };
  }

  // Check for --arg value format
  const nextArg = args[index + 1];
  if (nextArg === undefined || nextArg.startsWith('--')) {
    return { ok: false, error: `${argName} requires a value` };
  }
  return { ok: true, value: nextArg, skip: 1 };
}

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): ParseResult {
  const args = argv.slice(2); // Remove node and script path
  const result: ParsedArgs = { ...DEFAULT_ARGS, positionals: [], forceRerun: [], skipPhases: [] };
  let commandSeen = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    const argBase = arg.split('=')[0]; // Get the base argument name

    switch (argBase) {
      case '--help':
      case '-h': {
        result.help = true;
        break;
      }

      case '--version':
      case '-v': {
        result.version = true;
        break;
      }

      case '--config':
      case '--state-dir': {
        const found = getArgValue(args, i, argBase);
        if (!found.ok) return { success: false, error: `Error: ${found.error}` };
        if (argBase === '--config') {
          result.configPath = found.value;
        } else {
          result.stateDir = found.value;
        }
        i += found.skip;
        break;
      }

      case '--force-rerun':
      case '--skip-phase': {
        const found = getArgValue(args, i, argBase);
        if (!found.ok) return { success: false, error: `Error: ${found.error}` };
        const parsed = parsePhaseList(found.value, argBase);
        if ('error' in parsed) return { success: false, error: `Error: ${parsed.error}` };
        if (argBase === '--force-rerun') {
          result.forceRerun.push(...parsed.value);
        } else {
          result.skipPhases.push(...parsed.value);
        }
        i += found.skip;
        break;
      }

      case '--keep':
      case '--max-age-days': {
        const found = getArgValue(args, i, argBase);
        if (!found.ok) return { success: false, error: `Error: ${found.error}` };
        const parsed = parsePositiveInt(found.value, argBase);
        if ('error' in parsed) return { success: false, error: `Error: ${parsed.error}` };
        if (argBase === '--keep') {
          result.keep = parsed.value;
        } else {
          result.maxAgeDays = parsed.value;
        }
        i += found.skip;
        break;
      }

      case '--resume': {
        result.resume = true;
        break;
      }

      case '--skip-checks': {
        result.skipChecks = true;
        break;
      }

      case '--latest': {
        result.latest = true;
        break;
      }

      case '--yes':
      case '-y': {
        result.yes = true;
        break;
      }

      case '--no-interactive': {
        result.noInteractive = true;
        break;
      }

      case '--verbose': {
        result.verbose = true;
        break;
      }

      case '--debug': {
        result.debug = true;
        break;
      }

      case '--json': {
        result.jsonOutput = true;
        break;
      }

      default: {
        // Check for unknown flags
        if (arg.startsWith('-')) {
          return { success: false, error: `Error: Unknown option: ${argBase}` };
        }
        if (!commandSeen && result.positionals.length === 0) {
          if (!isCommandName(arg)) {
            return { success: false, error: `Error: Unknown command: ${arg}` };
          }
          result.command = arg;
          commandSeen = true;
        } else {
          result.positionals.push(arg);
        }
      }
    }
  }

  const conflict = validateCombination(result);
  if (conflict) {
    return { success: false, error: `Error: ${conflict}` };
  }

  return { success: true, args: result };
}

function validateCombination(args: ParsedArgs): string | null {
  if (args.help || args.version) {
    return null;
  }
  const overlap = args.forceRerun.find((name) => args.skipPhases.includes(name));
  if (overlap !== undefined) {
    return `Phase "${overlap}" cannot be both force-rerun and skipped`;
  }
  switch (args.command) {
    case 'install':
    case 'status':
    case 'reset':
      if (args.positionals.length > 0) {
        return `Unexpected argument: ${args.positionals[0]}`;
      }
      return null;
    case 'backups': {
      const action = args.positionals[0] ?? 'list';
      if (action === 'verify') {
        return args.positionals.length === 2 ? null : 'Usage: backups verify <name>';
      }
      if (action === 'list' || action === 'prune') {
        return args.positionals.length <= 1 ? null : `Unexpected argument: ${args.positionals[1]}`;
      }
      return `Unknown backups action: ${action}`;
    }
    case 'restore':
      if (args.latest && args.positionals.length > 0) {
        return 'Give either a backup name or --latest, not both';
      }
      return args.positionals.length <= 1 ? null : `Unexpected argument: ${args.positionals[1]}`;
  }
}
