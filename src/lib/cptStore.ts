import { type CPTEntry, inferDomain, validateCPTEntries } from "./cptValidation";
import type { DomainValue } from "./domain";
import {
  type BayesNetError,
  InvalidArgumentError,
  MissingCPTError,
  UnknownVariableError,
} from "./errors";
import type { NetworkStructure } from "./network";

export type DistributionInput = Iterable<readonly [DomainValue, number]>;

export interface ConditionalRow {
  /** Parent values in the order of the table's `parents`; `null` is a wildcard. */
  when: ReadonlyArray<DomainValue | null>;
  distribution: DistributionInput;
}

/** `[[true, p], [false, 1 - p]]` */
export function bernoulli(p: number): Array<[boolean, number]> {
  return [
    [true, p],
    [false, 1 - p],
  ];
}

/** Unconditional table for a root variable. */
export function priorTable(distribution: DistributionInput): CPTEntry[] {
  return Array.from(distribution, ([value, probability]) => ({
    value,
    parentStates: {},
    probability,
  }));
}

export function conditionalTable(
  parents: readonly string[],
  rows: readonly ConditionalRow[],
): CPTEntry[] {
  const entries: CPTEntry[] = [];
  for (const row of rows) {
    if (row.when.length !== parents.length) {
      throw new InvalidArgumentError(
        `Row has ${row.when.length} parent values but the table has ${parents.length} parents`,
      );
    }
    const parentStates: Record<string, DomainValue | null> = {};
    parents.forEach((parent, i) => {
      parentStates[parent] = row.when[i];
    });
    for (const [value, probability] of row.distribution) {
      entries.push({ value, parentStates: { ...parentStates }, probability });
    }
  }
  return entries;
}

export class CPTStore {
  private readonly tables = new Map<string, readonly CPTEntry[]>();
  private _revision = 0;

  get revision(): number {
    return this._revision;
  }

  get variables(): string[] {
    return Array.from(this.tables.keys()).sort();
  }

  setCPT(variable: string, table: readonly CPTEntry[]): this {
    // Copy so later edits by the caller cannot reach a prepared network
    this.tables.set(
      variable,
      table.map((entry) => ({
        value: entry.value,
        parentStates: { ...entry.parentStates },
        probability: entry.probability,
      })),
    );
    this._revision++;
    return this;
  }

  getCPT(variable: string): readonly CPTEntry[] | undefined {
    return this.tables.get(variable);
  }

  hasCPT(variable: string): boolean {
    return this.tables.has(variable);
  }

  deleteCPT(variable: string): boolean {
    const deleted = this.tables.delete(variable);
    if (deleted) this._revision++;
    return deleted;
  }

  /** Each variable's domain, inferred from the values its own CPT lists. */
  domains(): Map<string, DomainValue[]> {
    const domains = new Map<string, DomainValue[]>();
    for (const [variable, entries] of this.tables) {
      domains.set(variable, inferDomain(entries));
    }
    return domains;
  }

  /** All problems with these tables against `structure`; empty when valid. */
  validate(structure: NetworkStructure, tolerance: number): BayesNetError[] {
    const errors: BayesNetError[] = [];
    const domains = this.domains();

    for (const variable of this.variables) {
      if (!structure.hasVariable(variable)) {
        errors.push(new UnknownVariableError(variable));
      }
    }

    for (const variable of structure.variables) {
      const entries = this.tables.get(variable);
      if (!entries) {
        errors.push(new MissingCPTError(variable));
        continue;
      }
      errors.push(
        ...validateCPTEntries(
          variable,
          entries,
          structure.parentsOf(variable),
          domains,
          tolerance,
        ),
      );
    }

    return errors;
  }

  clone(): CPTStore {
    const copy = new CPTStore();
    for (const [variable, entries] of this.tables) copy.setCPT(variable, entries);
    return copy;
  }
}
