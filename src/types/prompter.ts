/**
 * Prompter interface
 * Operator questions (restore selection, confirmations, pre-flight
 * override) behind an interface so non-interactive runs and tests never
 * block on stdin.
 */

import { Result } from './result';

export interface SelectChoice<T = string> {
  /** Display name */
  name: string;
  value: T;
  /** Shown after the name */
  description?: string;
}

export interface ConfirmOptions {
  message: string;
  /** Answer used on enter, and in non-interactive mode */
  default?: boolean;
}

export interface SelectOptions<T = string> {
  message: string;
  choices: SelectChoice<T>[];
  default?: T;
}

export type PrompterErrorCode = 'CANCELLED' | 'NON_INTERACTIVE' | 'IO_ERROR';

export interface PrompterError {
  code: PrompterErrorCode;
  message: string;
  cause?: Error;
}

export interface Prompter {
  confirm(options: ConfirmOptions): Promise<Result<boolean, PrompterError>>;

  select<T = string>(options: SelectOptions<T>): Promise<Result<T, PrompterError>>;

  /**
   * Whether questions can actually be asked (TTY and not disabled)
   */
  isInteractive(): boolean;

  setNonInteractive(nonInteractive: boolean): void;
}

export function createPrompterError(
  code: PrompterErrorCode,
  message?: string,
  cause?: Error
): PrompterError {
  const defaultMessages: Record<PrompterErrorCode, string> = {
    CANCELLED: 'User cancelled the prompt',
    NON_INTERACTIVE: 'Cannot prompt in non-interactive mode',
    IO_ERROR: 'IO error during prompt',
  };

  return {
    code,
    message: message ?? defaultMessages[code],
    cause,
  };
}
