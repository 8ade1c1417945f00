/**
 * Domain error classes
 */

/**
 * Raised when an Argument would be built outside the word band
 */
export class ArgumentValidationError extends Error {
  constructor(
    message: string,
    public readonly wordCount: number,
    public readonly minWords: number,
    public readonly maxWords: number
  ) {
    super(message);
    this.name = 'ArgumentValidationError';
  }
}

export class CaseNotFoundError extends Error {
  constructor(public readonly caseId: string) {
    super(`Case not found: ${caseId}`);
    this.name = 'CaseNotFoundError';
  }
}

export class DebateNotFoundError extends Error {
  constructor(public readonly debateId: string) {
    super(`Debate not found: ${debateId}`);
    this.name = 'DebateNotFoundError';
  }
}
