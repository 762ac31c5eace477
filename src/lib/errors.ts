export type BayesNetErrorCode =
  | "CYCLIC_GRAPH"
  | "MISSING_CPT"
  | "INVALID_CPT"
  | "UNKNOWN_VARIABLE"
  | "INVALID_EVIDENCE"
  | "ZERO_EVIDENCE_PROBABILITY"
  | "INVALID_ARGUMENT"
  | "NETWORK_VALIDATION";

export type InvalidCPTRule =
  | "empty"
  | "probability-range"
  | "parent-mismatch"
  | "domain-mismatch"
  | "incomplete"
  | "conflict"
  | "distribution-sum";

export abstract class BayesNetError extends Error {
  abstract readonly code: BayesNetErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class CyclicGraphError extends BayesNetError {
  readonly code = "CYCLIC_GRAPH";

  /** Variables along the cycle, first variable repeated at the end. */
  readonly cycle: readonly string[];

  constructor(cycle: readonly string[]) {
    super(`Graph contains a cycle: ${cycle.join(" → ")}`);
    this.cycle = cycle;
  }
}

export class MissingCPTError extends BayesNetError {
  readonly code = "MISSING_CPT";

  constructor(readonly variable: string) {
    super(`No CPT defined for variable "${variable}"`);
  }
}

export class InvalidCPTError extends BayesNetError {
  readonly code = "INVALID_CPT";

  constructor(
    readonly variable: string,
    readonly rule: InvalidCPTRule,
    detail: string,
  ) {
    super(`Invalid CPT for "${variable}" (${rule}): ${detail}`);
  }
}

export class UnknownVariableError extends BayesNetError {
  readonly code = "UNKNOWN_VARIABLE";

  constructor(readonly variable: string) {
    super(`Unknown variable "${variable}"`);
  }
}

export class InvalidEvidenceError extends BayesNetError {
  readonly code = "INVALID_EVIDENCE";

  constructor(
    readonly variable: string,
    detail: string,
  ) {
    super(`Invalid evidence for "${variable}": ${detail}`);
  }
}

export class ZeroEvidenceProbabilityError extends BayesNetError {
  readonly code = "ZERO_EVIDENCE_PROBABILITY";

  constructor(detail = "evidence has zero probability under the network") {
    super(detail);
  }
}

export class InvalidArgumentError extends BayesNetError {
  readonly code = "INVALID_ARGUMENT";
}

export class NetworkValidationError extends BayesNetError {
  readonly code = "NETWORK_VALIDATION";

  constructor(readonly errors: readonly BayesNetError[]) {
    super(
      `Network failed validation with ${errors.length} errors:\n` +
        errors.map((e) => `  - ${e.message}`).join("\n"),
    );
  }
}

/**
 * Throws the collected preparation errors: a single error as itself,
 * several as one NetworkValidationError.
 */
export function throwCollected(errors: readonly BayesNetError[]): void {
  if (errors.length === 1) {
    throw errors[0];
  }
  if (errors.length > 1) {
    throw new NetworkValidationError(errors);
  }
}
