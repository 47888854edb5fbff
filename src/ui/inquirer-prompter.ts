/**
 * Inquirer-based Prompter
 */

import inquirer from 'inquirer';
import {
  Prompter,
  ConfirmOptions,
  SelectOptions,
  PrompterError,
  createPrompterError,
} from '../types/prompter';
import { Result, ok, err } from '../types/result';

export interface InquirerPrompterConfig {
  interactive: boolean;
  /** Whether stdout is a terminal (default: process.stdout.isTTY) */
  isTTY?: boolean;
}

export class InquirerPrompter implements Prompter {
  private config: InquirerPrompterConfig;

  constructor(config: Partial<InquirerPrompterConfig> = {}) {
    this.config = {
      interactive: config.interactive ?? true,
      isTTY: config.isTTY,
    };
  }

  isInteractive(): boolean {
    return this.config.interactive && (this.config.isTTY ?? process.stdout.isTTY ?? false);
  }

  setNonInteractive(nonInteractive: boolean): void {
    this.config.interactive = !nonInteractive;
  }

  async confirm(options: ConfirmOptions): Promise<Result<boolean, PrompterError>> {
    if (!this.isInteractive()) {
      if (options.default !== undefined) {
        return ok(options.default);
      }
      return err(
        createPrompterError('NON_INTERACTIVE', `Cannot ask "${options.message}" in non-interactive mode`)
      );
    }

    try {
      const response = await inquirer.prompt<{ value: boolean }>([
        {
          type: 'confirm',
          name: 'value',
          message: options.message,
          default: options.default ?? false,
        },
      ]);
      return ok(response.value);
    } catch (error) {
      return err(this.wrapError(error, 'confirm'));
    }
  }

  async select<T = string>(options: SelectOptions<T>): Promise<Result<T, PrompterError>> {
    if (!this.isInteractive()) {
      if (options.default !== undefined) {
        return ok(options.default);
      }
      return err(
        createPrompterError('NON_INTERACTIVE', `Cannot ask "${options.message}" in non-interactive mode`)
      );
    }

    try {
      const response = await inquirer.prompt<{ value: T }>([
        {
          type: 'list',
          name: 'value',
          message: options.message,
          choices: options.choices.map((c) => ({
            name: c.description ? `${c.name} - ${c.description}` : c.name,
            value: c.value,
          })),
          default: options.default,
        },
      ]);
      return ok(response.value);
    } catch (error) {
      return err(this.wrapError(error, 'select'));
    }
  }

  private wrapError(error: unknown, operation: string): PrompterError {
    if (
      error instanceof Error &&
      (error.message.includes('User force closed') || error.name === 'ExitPromptError')
    ) {
      return createPrompterError('CANCELLED');
    }
    return createPrompterError(
      'IO_ERROR',
      `${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined
    );
  }
}

export function createInquirerPrompter(config?: Partial<InquirerPrompterConfig>): Prompter {
  return new InquirerPrompter(config);
}
