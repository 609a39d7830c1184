/**
 * The request does not satisfy the input contract.
 * Raised before any rule runs; never a policy verdict.
 */
export class InputError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "InputError";
    this.issues = issues;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InputError);
    }
  }
}

/** A rule could not produce a result, e.g. because the reputation store is down. */
export class RuleEvaluationError extends Error {
  readonly ruleId: string;

  constructor(ruleId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RuleEvaluationError";
    this.ruleId = ruleId;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RuleEvaluationError);
    }
  }
}

/** The reputation store failed or did not answer in time. */
export class ReputationUnavailableError extends Error {
  readonly timedOut: boolean;

  constructor(message: string, options?: { cause?: unknown; timedOut?: boolean }) {
    super(message, { cause: options?.cause });
    this.name = "ReputationUnavailableError";
    this.timedOut = options?.timedOut ?? false;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ReputationUnavailableError);
    }
  }
}

/** The policy document is structurally invalid. */
export class PolicyError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "PolicyError";
    this.issues = issues;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PolicyError);
    }
  }
}
