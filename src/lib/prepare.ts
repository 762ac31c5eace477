import { getConfig } from "./config";
import type { CPTStore } from "./cptStore";
import { type CPTEntry, expandEntry } from "./cptValidation";
import {
  type Assignment,
  type DomainValue,
  type Evidence,
  observedEntries,
  valueKey,
} from "./domain";
import {
  type BayesNetError,
  CyclicGraphError,
  InvalidEvidenceError,
  UnknownVariableError,
  throwCollected,
} from "./errors";
import { moduleLogger } from "./logger";
import type { NetworkStructure } from "./network";
import { computeProbabilisticFingerprint } from "./probabilisticFingerprint";

const log = moduleLogger("prepare");

/** Marks a free (unobserved) slot in an encoded state. */
export const FREE = -1;

export interface PreparedVariable {
  readonly name: string;
  /** Position in the topological order; also the slot in encoded states. */
  readonly index: number;
  readonly domain: readonly DomainValue[];
  /** Parent slots, parents sorted by name. */
  readonly parents: readonly number[];
  readonly children: readonly number[];
  readonly markovBlanket: readonly string[];
  readonly strides: readonly number[];
  /** Row per parent combination (first parent slowest), column per domain value. */
  readonly table: readonly number[];
}

export interface PrepareOptions {
  tolerance?: number;
}

/**
 * Query-ready, immutable view of a network. Encoded states are arrays of
 * domain indices, one slot per variable in topological order.
 */
export class PreparedNetwork {
  readonly variables: readonly PreparedVariable[];
  readonly order: readonly string[];
  readonly fingerprint: string;

  private readonly byName: ReadonlyMap<string, PreparedVariable>;
  private readonly valueIndex: ReadonlyMap<string, ReadonlyMap<string, number>>;
  private readonly structureSnapshot: NetworkStructure;
  private readonly cptSnapshot: CPTStore;

  constructor(
    variables: readonly PreparedVariable[],
    fingerprint: string,
    structure: NetworkStructure,
    cpts: CPTStore,
  ) {
    this.variables = Object.freeze(variables.map((v) => Object.freeze(v)));
    this.order = Object.freeze(variables.map((v) => v.name));
    this.fingerprint = fingerprint;
    this.byName = new Map(variables.map((v) => [v.name, v]));
    this.valueIndex = new Map(
      variables.map((v) => [
        v.name,
        new Map(v.domain.map((value, i) => [valueKey(value), i])),
      ]),
    );
    this.structureSnapshot = structure.clone();
    this.cptSnapshot = cpts.clone();
    Object.freeze(this);
  }

  /** Copy of the structure this network was prepared from. */
  get structure(): NetworkStructure {
    return this.structureSnapshot.clone();
  }

  /** Copy of the CPTs this network was prepared from. */
  get cpts(): CPTStore {
    return this.cptSnapshot.clone();
  }

  hasVariable(name: string): boolean {
    return this.byName.has(name);
  }

  variable(name: string): PreparedVariable {
    const variable = this.byName.get(name);
    if (!variable) {
      throw new UnknownVariableError(name);
    }
    return variable;
  }

  domainOf(name: string): readonly DomainValue[] {
    return this.variable(name).domain;
  }

  parentsOf(name: string): string[] {
    return this.variable(name).parents.map((i) => this.variables[i].name);
  }

  childrenOf(name: string): string[] {
    return this.variable(name).children.map((i) => this.variables[i].name);
  }

  markovBlanketOf(name: string): readonly string[] {
    return this.variable(name).markovBlanket;
  }

  /** Domain index of `value`, or -1 when it is not in the domain. */
  indexOfValue(name: string, value: DomainValue): number {
    return this.valueIndex.get(name)?.get(valueKey(value)) ?? -1;
  }

  /** Table row selected by the parents' values in `state`. */
  rowOffset(variable: PreparedVariable, state: ArrayLike<number>): number {
    let row = 0;
    for (let i = 0; i < variable.parents.length; i++) {
      row += state[variable.parents[i]] * variable.strides[i];
    }
    return row * variable.domain.length;
  }

  /** P(variable = state[variable] | parents = state[parents]). */
  conditional(variable: PreparedVariable, state: ArrayLike<number>): number {
    return variable.table[this.rowOffset(variable, state) + state[variable.index]];
  }

  /** Product of every variable's conditional under a full encoded state. */
  jointProbability(state: ArrayLike<number>): number {
    let p = 1;
    for (const variable of this.variables) {
      p *= this.conditional(variable, state);
      if (p === 0) return 0;
    }
    return p;
  }

  /**
   * Encodes evidence as a state with FREE slots. Unknown variables and
   * out-of-domain values are InvalidEvidenceError.
   */
  encodeEvidence(evidence: Evidence): Int32Array {
    const state = new Int32Array(this.variables.length).fill(FREE);
    for (const [name, value] of observedEntries(evidence)) {
      const variable = this.byName.get(name);
      if (!variable) {
        throw new InvalidEvidenceError(name, "not a variable of this network");
      }
      const index = this.indexOfValue(name, value);
      if (index < 0) {
        throw new InvalidEvidenceError(
          name,
          `value ${valueKey(value)} is not in domain [${variable.domain.map(valueKey).join(", ")}]`,
        );
      }
      state[variable.index] = index;
    }
    return state;
  }

  decodeState(state: ArrayLike<number>): Assignment {
    const assignment: Assignment = {};
    for (const variable of this.variables) {
      assignment[variable.name] = variable.domain[state[variable.index]];
    }
    return assignment;
  }
}

export function validateNetwork(
  structure: NetworkStructure,
  cpts: CPTStore,
  options: PrepareOptions = {},
): BayesNetError[] {
  const tolerance = options.tolerance ?? getConfig().probabilityTolerance;
  const errors: BayesNetError[] = [];

  const cycle = structure.findCycle();
  if (cycle) {
    errors.push(new CyclicGraphError(cycle));
  }
  errors.push(...cpts.validate(structure, tolerance));
  return errors;
}

function buildTable(
  entries: readonly CPTEntry[],
  domain: readonly DomainValue[],
  parentNames: readonly string[],
  parentDomains: ReadonlyMap<string, readonly DomainValue[]>,
  strides: readonly number[],
): number[] {
  const rows = parentNames.reduce(
    (n, name) => n * (parentDomains.get(name)?.length ?? 1),
    1,
  );
  const table = new Array<number>(rows * domain.length).fill(0);
  const valuePosition = new Map(domain.map((value, i) => [valueKey(value), i]));
  const parentPositions = parentNames.map(
    (name) =>
      new Map((parentDomains.get(name) ?? []).map((value, i) => [valueKey(value), i])),
  );

  for (const entry of entries) {
    const column = valuePosition.get(valueKey(entry.value)) ?? 0;
    for (const combo of expandEntry(entry, parentNames, parentDomains)) {
      let row = 0;
      combo.forEach((value, i) => {
        row += (parentPositions[i].get(valueKey(value)) ?? 0) * strides[i];
      });
      table[row * domain.length + column] = entry.probability;
    }
  }

  return table;
}

/**
 * Validates the structure and CPTs and compiles them into a PreparedNetwork.
 * Every problem found is reported in one throw.
 */
export function prepare(
  structure: NetworkStructure,
  cpts: CPTStore,
  options: PrepareOptions = {},
): PreparedNetwork {
  const started = performance.now();
  throwCollected(validateNetwork(structure, cpts, options));

  const order = structure.topologicalOrder();
  const slot = new Map(order.map((name, i) => [name, i]));
  const domains = cpts.domains();

  const variables: PreparedVariable[] = order.map((name, index) => {
    const parentNames = structure.parentsOf(name);
    const childNames = structure.childrenOf(name);

    const strides = new Array<number>(parentNames.length);
    let stride = 1;
    for (let i = parentNames.length - 1; i >= 0; i--) {
      strides[i] = stride;
      stride *= domains.get(parentNames[i])?.length ?? 1;
    }

    const blanket = new Set<string>([...parentNames, ...childNames]);
    for (const child of childNames) {
      for (const coParent of structure.parentsOf(child)) blanket.add(coParent);
    }
    blanket.delete(name);

    const domain = domains.get(name) ?? [];
    return {
      name,
      index,
      domain: Object.freeze([...domain]),
      parents: parentNames.map((p) => slot.get(p) ?? FREE),
      children: childNames.map((c) => slot.get(c) ?? FREE),
      markovBlanket: Array.from(blanket).sort(),
      strides,
      table: buildTable(cpts.getCPT(name) ?? [], domain, parentNames, domains, strides),
    };
  });

  const fingerprint = computeProbabilisticFingerprint(
    order.map((name) => ({
      variable: name,
      parents: structure.parentsOf(name),
      entries: cpts.getCPT(name) ?? [],
    })),
  );

  const prepared = new PreparedNetwork(variables, fingerprint, structure, cpts);
  log.debug(
    {
      variables: order.length,
      edges: structure.edges.length,
      ms: Math.round(performance.now() - started),
    },
    "prepared network",
  );
  return prepared;
}
