import { type Assignment, type Evidence, argmax } from "./domain";
import { ZeroEvidenceProbabilityError } from "./errors";
import { type AlgorithmSpec, createInferenceAlgorithm } from "./inference";
import { moduleLogger } from "./logger";
import { FREE, type PreparedNetwork } from "./prepare";

const log = moduleLogger("imputer");

export interface ImputeOptions {
  algorithm?: AlgorithmSpec;
}

/**
 * Fills every missing (absent or null) variable with its most likely value.
 * Variables are filled one at a time in topological order, each conditioned
 * on the observed values and on everything imputed before it. Ties go to the
 * value listed first in the variable's domain.
 */
export function impute(
  prepared: PreparedNetwork,
  partial: Evidence,
  options: ImputeOptions = {},
): Assignment {
  const state = prepared.encodeEvidence(partial);
  const missing = prepared.variables.filter((v) => state[v.index] === FREE);

  if (missing.length === 0) {
    if (prepared.jointProbability(state) === 0) {
      throw new ZeroEvidenceProbabilityError(
        "The assignment has zero probability under the network",
      );
    }
    return prepared.decodeState(state);
  }

  const algorithm = createInferenceAlgorithm(
    prepared,
    options.algorithm ?? { kind: "exact" },
  );

  const known: Assignment = {};
  for (const variable of prepared.variables) {
    if (state[variable.index] !== FREE) {
      known[variable.name] = variable.domain[state[variable.index]];
    }
  }

  for (const variable of missing) {
    const { distribution } = algorithm.answer(variable.name, known);
    known[variable.name] = argmax(distribution);
  }

  log.debug(
    { imputed: missing.map((v) => v.name), algorithm: algorithm.kind },
    "imputed missing values",
  );

  const completed: Assignment = {};
  for (const name of prepared.order) {
    completed[name] = known[name];
  }
  return completed;
}
