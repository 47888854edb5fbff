/**
 * Pre-flight gate contract
 */

export interface CheckResult {
  name: string;
  passed: boolean;
  message: string;
  /** A warning passes the gate but is shown to the operator */
  warning?: boolean;
}

/** What a check reports; the runner attaches the check's name */
export type CheckOutcome = Omit<CheckResult, 'name'>;

export interface PreflightCheck {
  name: string;
  run(): Promise<CheckOutcome>;
}

export interface PreflightReport {
  passed: boolean;
  results: CheckResult[];
}
