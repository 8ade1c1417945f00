/**
 * Prompt Quality Check Type Definitions
 */

/**
 * Quality check result
 */
export interface QualityCheckResult {
  passed: boolean;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Quality check definition
 */
export interface QualityCheck {
  /** Unique name for the check */
  name: string;

  /** Human-readable description */
  description: string;

  /** Severity: error = must pass, warning = should pass */
  severity: 'error' | 'warning';

  /** Validator function */
  validator: (output: string) => QualityCheckResult;
}

/**
 * A check that did not pass
 */
export interface QualityCheckFailure {
  name: string;
  severity: 'error' | 'warning';
  message: string;
}
