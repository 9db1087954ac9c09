export class ValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/** Raised by synthesis when none of the requested plants could be resolved. */
export class GenerationFailedError extends Error {
  readonly requested: string[];

  constructor(requested: string[]) {
    super(`No plant information could be retrieved for: ${requested.join(', ')}`);
    this.name = 'GenerationFailedError';
    this.requested = requested;
  }
}

export class GenerationTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Generation timed out after ${timeoutMs}ms`);
    this.name = 'GenerationTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class GenerationMalformedError extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = 'GenerationMalformedError';
  }
}

export class PersistenceError extends Error {
  constructor(message: string, cause: unknown) {
    super(`${message}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'PersistenceError';
  }
}

export class PlanNotFoundError extends Error {
  constructor(planId: string) {
    super(`Garden plan not found: ${planId}`);
    this.name = 'PlanNotFoundError';
  }
}
