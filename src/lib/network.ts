import {
  CyclicGraphError,
  InvalidArgumentError,
  UnknownVariableError,
} from "./errors";

export interface Edge {
  parent: string;
  child: string;
}

/**
 * Mutable DAG of variables. Edges that would close a cycle are rejected
 * when they are added, so a structure is acyclic at every point in time.
 */
export class NetworkStructure {
  private readonly parents = new Map<string, Set<string>>();
  private readonly children = new Map<string, Set<string>>();
  private _revision = 0;

  /** Bumped on every mutation; `BayesianNetwork` re-prepares when it moves. */
  get revision(): number {
    return this._revision;
  }

  get variables(): string[] {
    return Array.from(this.parents.keys()).sort();
  }

  get edges(): Edge[] {
    const edges: Edge[] = [];
    for (const child of this.variables) {
      for (const parent of this.parentsOf(child)) {
        edges.push({ parent, child });
      }
    }
    return edges;
  }

  hasVariable(name: string): boolean {
    return this.parents.has(name);
  }

  addVariable(name: string): this {
    if (name.length === 0) {
      throw new InvalidArgumentError("Variable name cannot be empty");
    }
    if (!this.parents.has(name)) {
      this.parents.set(name, new Set());
      this.children.set(name, new Set());
      this._revision++;
    }
    return this;
  }

  removeVariable(name: string): this {
    this.requireVariable(name);
    for (const parent of this.parentsOf(name)) {
      this.children.get(parent)?.delete(name);
    }
    for (const child of this.childrenOf(name)) {
      this.parents.get(child)?.delete(name);
    }
    this.parents.delete(name);
    this.children.delete(name);
    this._revision++;
    return this;
  }

  addEdge(parent: string, child: string): this {
    this.requireVariable(parent);
    this.requireVariable(child);

    if (this.parents.get(child)?.has(parent)) {
      throw new InvalidArgumentError(`Edge ${parent} → ${child} already exists`);
    }

    // The new edge closes a cycle iff the parent is already reachable from the child
    const path = this.pathBetween(child, parent);
    if (path) {
      throw new CyclicGraphError([parent, ...path]);
    }

    this.parents.get(child)?.add(parent);
    this.children.get(parent)?.add(child);
    this._revision++;
    return this;
  }

  removeEdge(parent: string, child: string): this {
    this.requireVariable(parent);
    this.requireVariable(child);
    if (!this.parents.get(child)?.delete(parent)) {
      throw new InvalidArgumentError(`Edge ${parent} → ${child} does not exist`);
    }
    this.children.get(parent)?.delete(child);
    this._revision++;
    return this;
  }

  /** Parents in lexical order. */
  parentsOf(variable: string): string[] {
    return Array.from(this.requireVariable(variable)).sort();
  }

  /** Children in lexical order. */
  childrenOf(variable: string): string[] {
    this.requireVariable(variable);
    return Array.from(this.children.get(variable) ?? []).sort();
  }

  /**
   * Kahn's algorithm. Among variables whose parents are all placed, the
   * lexically smallest goes first, so the order is stable across runs.
   */
  topologicalOrder(): string[] {
    const remaining = new Map<string, number>();
    for (const [variable, parents] of this.parents) {
      remaining.set(variable, parents.size);
    }

    const ready = this.variables.filter((v) => remaining.get(v) === 0);
    const order: string[] = [];

    while (ready.length > 0) {
      ready.sort();
      const next = ready.shift();
      if (next === undefined) break;
      order.push(next);

      for (const child of this.childrenOf(next)) {
        const count = (remaining.get(child) ?? 0) - 1;
        remaining.set(child, count);
        if (count === 0) ready.push(child);
      }
    }

    if (order.length !== this.parents.size) {
      const cycle = this.findCycle();
      throw new CyclicGraphError(cycle ?? this.variables);
    }

    return order;
  }

  /** A cycle as a closed path (first variable repeated last), or null. */
  findCycle(): string[] | null {
    const WHITE = 0;
    const GRAY = 1;
    const BLACK = 2;
    const color = new Map<string, number>();
    const stack: string[] = [];

    const visit = (variable: string): string[] | null => {
      color.set(variable, GRAY);
      stack.push(variable);
      for (const child of this.childrenOf(variable)) {
        const c = color.get(child) ?? WHITE;
        if (c === GRAY) {
          return [...stack.slice(stack.indexOf(child)), child];
        }
        if (c === WHITE) {
          const found = visit(child);
          if (found) return found;
        }
      }
      stack.pop();
      color.set(variable, BLACK);
      return null;
    };

    for (const variable of this.variables) {
      if ((color.get(variable) ?? WHITE) === WHITE) {
        const found = visit(variable);
        if (found) return found;
      }
    }
    return null;
  }

  clone(): NetworkStructure {
    const copy = new NetworkStructure();
    for (const variable of this.variables) copy.addVariable(variable);
    for (const { parent, child } of this.edges) copy.addEdge(parent, child);
    return copy;
  }

  private requireVariable(variable: string): Set<string> {
    const parents = this.parents.get(variable);
    if (!parents) {
      throw new UnknownVariableError(variable);
    }
    return parents;
  }

  // BFS along child links; returns the path from `from` to `to` inclusive
  private pathBetween(from: string, to: string): string[] | null {
    const previous = new Map<string, string | null>([[from, null]]);
    const queue: string[] = [from];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;

      if (current === to) {
        const path: string[] = [];
        let step: string | null = current;
        while (step !== null) {
          path.unshift(step);
          step = previous.get(step) ?? null;
        }
        return path;
      }

      for (const child of this.children.get(current) ?? []) {
        if (!previous.has(child)) {
          previous.set(child, current);
          queue.push(child);
        }
      }
    }

    return null;
  }
}

/** Builds a structure from an edge list, adding every endpoint as a variable. */
export function defineNetwork(
  edges: ReadonlyArray<Edge | readonly [string, string]>,
  variables: readonly string[] = [],
): NetworkStructure {
  const structure = new NetworkStructure();
  for (const variable of variables) structure.addVariable(variable);

  const normalized = edges.map((edge): Edge =>
    "parent" in edge ? edge : { parent: edge[0], child: edge[1] },
  );
  for (const { parent, child } of normalized) {
    structure.addVariable(parent).addVariable(child);
  }
  for (const { parent, child } of normalized) {
    structure.addEdge(parent, child);
  }
  return structure;
}
