import { priorTable } from "./cptStore";
import { type DomainValue, totalVariationDistance, valueKey } from "./domain";
import { InvalidEvidenceError } from "./errors";
import { type ExactQueryOptions, exactQuery } from "./exactInference";
import { type PreparedNetwork, prepare } from "./prepare";

const SENSITIVITY_THRESHOLD = 0.0001;

/**
 * The network under do(variable = value) for each intervention: the
 * variable's incoming edges are cut and its CPT becomes a point mass on the
 * forced value. Downstream CPTs are untouched.
 */
export function intervene(
  prepared: PreparedNetwork,
  interventions: Readonly<Record<string, DomainValue>>,
): PreparedNetwork {
  const structure = prepared.structure;
  const cpts = prepared.cpts;

  for (const [name, forced] of Object.entries(interventions)) {
    const variable = prepared.variable(name);
    const forcedIndex = prepared.indexOfValue(name, forced);
    if (forcedIndex < 0) {
      throw new InvalidEvidenceError(
        name,
        `cannot intervene with ${valueKey(forced)}: not in the variable's domain`,
      );
    }

    for (const parent of structure.parentsOf(name)) {
      structure.removeEdge(parent, name);
    }
    cpts.setCPT(
      name,
      priorTable(
        variable.domain.map((value, i): [DomainValue, number] => [
          value,
          i === forcedIndex ? 1 : 0,
        ]),
      ),
    );
  }

  return prepare(structure, cpts);
}

function ancestorsOf(prepared: PreparedNetwork, target: string): Set<string> {
  const ancestors = new Set<string>();
  const queue = [...prepared.parentsOf(target)];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined || ancestors.has(current)) continue;
    ancestors.add(current);
    queue.push(...prepared.parentsOf(current));
  }

  return ancestors;
}

/**
 * Causal sensitivity of `target` to each of its ancestors: the largest
 * total-variation distance between P(target | do(A = a)) and
 * P(target | do(A = a')) over pairs of A's values. Ancestors with no
 * measurable effect are left out.
 */
export function computeSensitivity(
  prepared: PreparedNetwork,
  target: string,
  options: ExactQueryOptions = {},
): Map<string, number> {
  prepared.variable(target);
  const sensitivities = new Map<string, number>();

  for (const ancestor of Array.from(ancestorsOf(prepared, target)).sort()) {
    const outcomes = prepared
      .domainOf(ancestor)
      .map((value) =>
        exactQuery(intervene(prepared, { [ancestor]: value }), target, {}, options),
      );

    let sensitivity = 0;
    for (let i = 0; i < outcomes.length; i++) {
      for (let j = i + 1; j < outcomes.length; j++) {
        sensitivity = Math.max(
          sensitivity,
          totalVariationDistance(outcomes[i], outcomes[j]),
        );
      }
    }

    if (sensitivity > SENSITIVITY_THRESHOLD) {
      sensitivities.set(ancestor, sensitivity);
    }
  }

  return sensitivities;
}
