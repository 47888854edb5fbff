/**
 * UI module - terminal progress and operator prompts
 */

export { InquirerPrompter, createInquirerPrompter } from './inquirer-prompter';
export type { InquirerPrompterConfig } from './inquirer-prompter';
export { SpinnerService, createSpinnerService } from './spinner-service';
export type { Spinner, SpinnerColor, SpinnerServiceConfig } from './spinner-service';
export { PhaseProgressReporter } from './phase-progress';
