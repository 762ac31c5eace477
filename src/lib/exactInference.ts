import { getConfig } from "./config";
import type { Assignment, Distribution, DomainValue, Evidence } from "./domain";
import {
  InvalidArgumentError,
  InvalidEvidenceError,
  ZeroEvidenceProbabilityError,
} from "./errors";
import { formatDistribution } from "./formatProbability";
import { moduleLogger } from "./logger";
import { FREE, type PreparedNetwork } from "./prepare";

const log = moduleLogger("exact");

// Below the smallest normal double, normalizing loses all precision
export const MIN_NORMALIZER = 2.2250738585072014e-308;

export interface ExactQueryOptions {
  /** Upper bound on the number of joint states enumerated. */
  maxStates?: number;
}

/** Number of full assignments consistent with an encoded evidence state. */
export function countCompletions(
  prepared: PreparedNetwork,
  evidenceState: ArrayLike<number>,
): number {
  let count = 1;
  for (const variable of prepared.variables) {
    if (evidenceState[variable.index] === FREE) count *= variable.domain.length;
  }
  return count;
}

/**
 * Calls `visit` once per full assignment consistent with the evidence,
 * odometer-style over the free variables. The state passed to `visit` is
 * reused between calls. Returning `false` from `visit` stops the walk.
 */
export function forEachCompletion(
  prepared: PreparedNetwork,
  evidenceState: ArrayLike<number>,
  visit: (state: Int32Array, weight: number) => boolean | void,
): void {
  const state = Int32Array.from(evidenceState);
  const free: number[] = [];
  for (const variable of prepared.variables) {
    if (state[variable.index] === FREE) {
      free.push(variable.index);
      state[variable.index] = 0;
    }
  }

  for (;;) {
    if (visit(state, prepared.jointProbability(state)) === false) return;

    let k = free.length - 1;
    while (k >= 0) {
      const slot = free[k];
      state[slot]++;
      if (state[slot] < prepared.variables[slot].domain.length) break;
      state[slot] = 0;
      k--;
    }
    if (k < 0) return;
  }
}

/**
 * First completion of the evidence, in enumeration order, with positive
 * joint probability. Undefined when the evidence is impossible.
 */
export function findPossibleCompletion(
  prepared: PreparedNetwork,
  evidenceState: ArrayLike<number>,
  options: ExactQueryOptions = {},
): Int32Array | undefined {
  checkStateBudget(prepared, evidenceState, options);

  const found: Int32Array[] = [];
  forEachCompletion(prepared, evidenceState, (state, weight) => {
    if (weight > 0) {
      found.push(Int32Array.from(state));
      return false;
    }
  });
  return found[0];
}

function checkStateBudget(
  prepared: PreparedNetwork,
  evidenceState: ArrayLike<number>,
  options: ExactQueryOptions,
): void {
  const maxStates = options.maxStates ?? getConfig().maxEnumerationStates;
  const states = countCompletions(prepared, evidenceState);
  if (states > maxStates) {
    throw new InvalidArgumentError(
      `Exact enumeration would visit ${states} joint states (limit ${maxStates}). Use the gibbs algorithm for this network.`,
    );
  }
}

function normalize(
  domain: readonly DomainValue[],
  weights: readonly number[],
  total: number,
): Distribution {
  const distribution = new Map<DomainValue, number>();
  domain.forEach((value, i) => distribution.set(value, weights[i] / total));
  return distribution;
}

function requireNormalizer(total: number): void {
  if (!(total >= MIN_NORMALIZER) || !Number.isFinite(total)) {
    throw new ZeroEvidenceProbabilityError();
  }
}

/**
 * P(target | evidence) by enumerating the full joint over the free
 * variables. If the target is itself observed the answer is a point mass on
 * the observed value, provided the evidence is possible at all.
 */
export function exactQuery(
  prepared: PreparedNetwork,
  target: string,
  evidence: Evidence = {},
  options: ExactQueryOptions = {},
): Distribution {
  const started = performance.now();
  const targetVariable = prepared.variable(target);
  const evidenceState = prepared.encodeEvidence(evidence);
  checkStateBudget(prepared, evidenceState, options);

  const weights = new Array<number>(targetVariable.domain.length).fill(0);
  let total = 0;

  forEachCompletion(prepared, evidenceState, (state, weight) => {
    weights[state[targetVariable.index]] += weight;
    total += weight;
  });

  requireNormalizer(total);
  const distribution = normalize(targetVariable.domain, weights, total);

  log.debug(
    {
      target,
      evidence: Object.keys(evidence).length,
      result: formatDistribution(distribution),
      ms: Math.round(performance.now() - started),
    },
    "exact query",
  );
  return distribution;
}

/** Every variable's posterior marginal from a single enumeration pass. */
export function exactQueryAll(
  prepared: PreparedNetwork,
  evidence: Evidence = {},
  options: ExactQueryOptions = {},
): Map<string, Distribution> {
  const evidenceState = prepared.encodeEvidence(evidence);
  checkStateBudget(prepared, evidenceState, options);

  const weights = prepared.variables.map((v) =>
    new Array<number>(v.domain.length).fill(0),
  );
  let total = 0;

  forEachCompletion(prepared, evidenceState, (state, weight) => {
    if (weight === 0) return;
    for (const variable of prepared.variables) {
      weights[variable.index][state[variable.index]] += weight;
    }
    total += weight;
  });

  requireNormalizer(total);
  const marginals = new Map<string, Distribution>();
  for (const variable of prepared.variables) {
    marginals.set(
      variable.name,
      normalize(variable.domain, weights[variable.index], total),
    );
  }
  return marginals;
}

/** P(evidence): the joint summed over every consistent full assignment. */
export function evidenceProbability(
  prepared: PreparedNetwork,
  evidence: Evidence = {},
  options: ExactQueryOptions = {},
): number {
  const evidenceState = prepared.encodeEvidence(evidence);
  checkStateBudget(prepared, evidenceState, options);

  let total = 0;
  forEachCompletion(prepared, evidenceState, (_state, weight) => {
    total += weight;
  });
  return total;
}

/** Joint probability of a full assignment. */
export function exactJointProbability(
  prepared: PreparedNetwork,
  assignment: Assignment,
): number {
  const state = prepared.encodeEvidence(assignment);
  for (const variable of prepared.variables) {
    if (state[variable.index] === FREE) {
      throw new InvalidEvidenceError(
        variable.name,
        "a joint probability needs a value for every variable",
      );
    }
  }
  return prepared.jointProbability(state);
}
