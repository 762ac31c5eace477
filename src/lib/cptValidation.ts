import { type DomainValue, tupleKey, valueKey } from "./domain";
import { InvalidCPTError } from "./errors";
import { formatProbability } from "./formatProbability";

export type CPTEntry = {
  /** Value of the variable this entry gives a probability for. */
  value: DomainValue;
  /** Parent values; `null` matches every value of that parent. */
  parentStates: Record<string, DomainValue | null>;
  probability: number;
};

/** Distinct entry values in order of first appearance. */
export function inferDomain(entries: readonly CPTEntry[]): DomainValue[] {
  const seen = new Set<DomainValue>();
  const domain: DomainValue[] = [];
  for (const entry of entries) {
    if (!seen.has(entry.value)) {
      seen.add(entry.value);
      domain.push(entry.value);
    }
  }
  return domain;
}

/**
 * Every concrete parent-value tuple an entry covers. Wildcards expand to the
 * whole parent domain.
 */
export function expandEntry(
  entry: CPTEntry,
  parentIds: readonly string[],
  parentDomains: ReadonlyMap<string, readonly DomainValue[]>,
): DomainValue[][] {
  let combinations: DomainValue[][] = [[]];

  for (const parentId of parentIds) {
    const state = entry.parentStates[parentId];
    const options: readonly DomainValue[] =
      state === null || state === undefined
        ? (parentDomains.get(parentId) ?? [])
        : [state];

    const next: DomainValue[][] = [];
    for (const prefix of combinations) {
      for (const option of options) {
        next.push([...prefix, option]);
      }
    }
    combinations = next;
  }

  return combinations;
}

/** Cartesian product of the parent domains, first parent varying slowest. */
export function enumerateParentCombinations(
  parentIds: readonly string[],
  parentDomains: ReadonlyMap<string, readonly DomainValue[]>,
): DomainValue[][] {
  const wildcard: CPTEntry = { value: "", parentStates: {}, probability: 0 };
  for (const id of parentIds) wildcard.parentStates[id] = null;
  return expandEntry(wildcard, parentIds, parentDomains);
}

function describeCombination(
  parentIds: readonly string[],
  combination: readonly DomainValue[],
): string {
  if (parentIds.length === 0) return "(no parents)";
  return (
    "(" +
    parentIds.map((id, i) => `${id}=${String(combination[i])}`).join(", ") +
    ")"
  );
}

function sameKeys(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false;
  const set = new Set(a);
  return b.every((key) => set.has(key));
}

function summarize(items: readonly string[]): string {
  return `${items.slice(0, 3).join(", ")}${items.length > 3 ? "..." : ""}`;
}

/**
 * Checks one variable's entries against its structural parents and their
 * domains. Returns every problem found; later checks are skipped when an
 * earlier one makes them meaningless.
 */
export function validateCPTEntries(
  variable: string,
  entries: readonly CPTEntry[],
  structuralParents: readonly string[],
  parentDomains: ReadonlyMap<string, readonly DomainValue[]>,
  tolerance: number,
): InvalidCPTError[] {
  if (entries.length === 0) {
    return [new InvalidCPTError(variable, "empty", "CPT entries cannot be empty")];
  }

  const errors: InvalidCPTError[] = [];

  for (const entry of entries) {
    if (
      !Number.isFinite(entry.probability) ||
      entry.probability < 0 ||
      entry.probability > 1
    ) {
      errors.push(
        new InvalidCPTError(
          variable,
          "probability-range",
          `Invalid probability value: ${entry.probability}. Must be between 0 and 1.`,
        ),
      );
    }
  }

  const parentIds = Object.keys(entries[0].parentStates).sort();
  const consistent = entries.every((entry) =>
    sameKeys(Object.keys(entry.parentStates), parentIds),
  );
  if (!consistent) {
    errors.push(
      new InvalidCPTError(
        variable,
        "parent-mismatch",
        "All CPT entries must have the same parent variables",
      ),
    );
    return errors;
  }
  if (!sameKeys(parentIds, structuralParents)) {
    errors.push(
      new InvalidCPTError(
        variable,
        "parent-mismatch",
        `CPT is conditioned on [${parentIds.join(", ")}] but the graph gives parents [${[...structuralParents].sort().join(", ")}]`,
      ),
    );
    return errors;
  }

  // Parents without a domain are reported as missing CPTs elsewhere
  if (parentIds.some((id) => !parentDomains.has(id))) {
    return errors;
  }

  const badStates: string[] = [];
  for (const entry of entries) {
    for (const parentId of parentIds) {
      const state = entry.parentStates[parentId];
      if (state === null) continue;
      const domain = parentDomains.get(parentId) ?? [];
      if (!domain.includes(state)) {
        badStates.push(`${parentId}=${valueKey(state)}`);
      }
    }
  }
  if (badStates.length > 0) {
    errors.push(
      new InvalidCPTError(
        variable,
        "domain-mismatch",
        `Parent values outside the parent's domain: ${summarize(Array.from(new Set(badStates)))}`,
      ),
    );
    return errors;
  }
  if (errors.length > 0) return errors;

  const domain = inferDomain(entries);
  const coverage = new Map<string, number>();
  const mass = new Map<string, number>();

  for (const entry of entries) {
    for (const combo of expandEntry(entry, parentIds, parentDomains)) {
      const rowKey = tupleKey(combo);
      const cellKey = `${rowKey}|${valueKey(entry.value)}`;
      coverage.set(cellKey, (coverage.get(cellKey) ?? 0) + 1);
      mass.set(rowKey, (mass.get(rowKey) ?? 0) + entry.probability);
    }
  }

  const combinations = enumerateParentCombinations(parentIds, parentDomains);
  const uncovered: string[] = [];
  const multiCovered: string[] = [];

  for (const combo of combinations) {
    const rowKey = tupleKey(combo);
    for (const value of domain) {
      const count = coverage.get(`${rowKey}|${valueKey(value)}`) ?? 0;
      const label = `${describeCombination(parentIds, combo)}→${String(value)}`;
      if (count === 0) uncovered.push(label);
      else if (count > 1) multiCovered.push(label);
    }
  }

  const cellCount = combinations.length * domain.length;
  if (uncovered.length > 0) {
    errors.push(
      new InvalidCPTError(
        variable,
        "incomplete",
        `CPT is incomplete: ${uncovered.length} of ${cellCount} cells not covered. Missing: ${summarize(uncovered)}`,
      ),
    );
  }
  if (multiCovered.length > 0) {
    errors.push(
      new InvalidCPTError(
        variable,
        "conflict",
        `CPT has conflicts: ${multiCovered.length} cells covered by multiple entries. Conflicting: ${summarize(multiCovered)}`,
      ),
    );
  }
  if (errors.length > 0) return errors;

  for (const combo of combinations) {
    const total = mass.get(tupleKey(combo)) ?? 0;
    if (Math.abs(total - 1) > tolerance) {
      errors.push(
        new InvalidCPTError(
          variable,
          "distribution-sum",
          `Distribution for ${describeCombination(parentIds, combo)} sums to ${formatProbability(total, 6)}, expected 1`,
        ),
      );
    }
  }

  return errors;
}
