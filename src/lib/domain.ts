export type DomainValue = string | number | boolean;

/** A full assignment of values to variables. */
export type Assignment = Record<string, DomainValue>;

/** Observed values; `null` and `undefined` both mean unobserved. */
export type Evidence = Readonly<Record<string, DomainValue | null | undefined>>;

/** Probability per domain value, in domain order. */
export type Distribution = ReadonlyMap<DomainValue, number>;

// JSON keeps "1", 1 and true apart, which String() would not
export function valueKey(value: DomainValue): string {
  return JSON.stringify(value);
}

export function tupleKey(values: readonly DomainValue[]): string {
  return JSON.stringify(values);
}

export function observedEntries(
  evidence: Evidence,
): Array<[string, DomainValue]> {
  const observed: Array<[string, DomainValue]> = [];
  for (const [variable, value] of Object.entries(evidence)) {
    if (value !== null && value !== undefined) {
      observed.push([variable, value]);
    }
  }
  return observed;
}

/** Total-variation distance between two distributions over the same domain. */
export function totalVariationDistance(a: Distribution, b: Distribution): number {
  const values = new Set<DomainValue>([...a.keys(), ...b.keys()]);
  let sum = 0;
  for (const value of values) {
    sum += Math.abs((a.get(value) ?? 0) - (b.get(value) ?? 0));
  }
  return sum / 2;
}

/** Most likely value; ties go to the value that comes first in the map. */
export function argmax(distribution: Distribution): DomainValue {
  let best: DomainValue | undefined;
  let bestProbability = -Infinity;
  for (const [value, probability] of distribution) {
    if (probability > bestProbability) {
      best = value;
      bestProbability = probability;
    }
  }
  if (best === undefined) {
    throw new RangeError("argmax of an empty distribution");
  }
  return best;
}
