import type { NetworkDocument } from "../types/networkDocument";
import { getConfig } from "./config";
import { CPTStore } from "./cptStore";
import type { CPTEntry } from "./cptValidation";
import {
  type Assignment,
  type Distribution,
  type DomainValue,
  type Evidence,
  observedEntries,
  valueKey,
} from "./domain";
import { InvalidArgumentError } from "./errors";
import { type SampleStream, forwardSample } from "./forwardSampler";
import { impute } from "./imputer";
import {
  type AlgorithmKind,
  type AlgorithmSpec,
  type InferenceReport,
  createInferenceAlgorithm,
} from "./inference";
import { moduleLogger } from "./logger";
import { LRUCache } from "./lruCache";
import { type Edge, NetworkStructure, defineNetwork } from "./network";
import { parseNetworkDocument, serializeNetwork } from "./networkDocument";
import { type PreparedNetwork, type PrepareOptions, prepare } from "./prepare";
import { type SeededRandom, createRandom } from "./random";
import { computeSensitivity, intervene } from "./sensitivity";

const log = moduleLogger("network");

export interface BayesianNetworkOptions extends PrepareOptions {
  /** Seed for every sampling operation run through this network. */
  seed?: number;
  queryCacheSize?: number;
}

function evidenceCacheKey(evidence: Evidence): string {
  return observedEntries(evidence)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, value]) => `${name}=${valueKey(value)}`)
    .join("&");
}

/**
 * Builder plus query front end. Edits invalidate the prepared network,
 * including edits made directly on the structure or store passed in; the
 * next query prepares again.
 */
export class BayesianNetwork {
  private prepared: PreparedNetwork | null = null;
  private preparedRevisions = { structure: -1, cpts: -1 };
  private readonly random: SeededRandom;
  private readonly exactCache: LRUCache<string, Distribution>;

  constructor(
    private readonly structure: NetworkStructure = new NetworkStructure(),
    private readonly cpts: CPTStore = new CPTStore(),
    private readonly options: BayesianNetworkOptions = {},
  ) {
    this.random = createRandom(options.seed);
    this.exactCache = new LRUCache(
      options.queryCacheSize ?? getConfig().queryCacheSize,
    );
  }

  static defineNetwork(
    edges: ReadonlyArray<Edge | readonly [string, string]>,
    options: BayesianNetworkOptions = {},
  ): BayesianNetwork {
    return new BayesianNetwork(defineNetwork(edges), new CPTStore(), options);
  }

  static fromJSON(
    document: unknown,
    options: BayesianNetworkOptions = {},
  ): BayesianNetwork {
    const { structure, cpts } = parseNetworkDocument(document);
    return new BayesianNetwork(structure, cpts, options);
  }

  get variables(): string[] {
    return this.structure.variables;
  }

  get edges(): Edge[] {
    return this.structure.edges;
  }

  get isPrepared(): boolean {
    return this.prepared !== null && !this.isStale();
  }

  parentsOf(variable: string): string[] {
    return this.structure.parentsOf(variable);
  }

  childrenOf(variable: string): string[] {
    return this.structure.childrenOf(variable);
  }

  topologicalOrder(): string[] {
    return this.structure.topologicalOrder();
  }

  addVariable(name: string): this {
    this.structure.addVariable(name);
    return this.invalidate();
  }

  removeVariable(name: string): this {
    this.structure.removeVariable(name);
    this.cpts.deleteCPT(name);
    return this.invalidate();
  }

  addEdge(parent: string, child: string): this {
    this.structure.addEdge(parent, child);
    return this.invalidate();
  }

  removeEdge(parent: string, child: string): this {
    this.structure.removeEdge(parent, child);
    return this.invalidate();
  }

  setCPT(variable: string, table: readonly CPTEntry[]): this {
    this.cpts.setCPT(variable, table);
    return this.invalidate();
  }

  getCPT(variable: string): readonly CPTEntry[] | undefined {
    return this.cpts.getCPT(variable);
  }

  /** Validates and compiles the network; cached until the next edit. */
  prepare(): PreparedNetwork {
    if (!this.prepared || this.isStale()) {
      const revisions = {
        structure: this.structure.revision,
        cpts: this.cpts.revision,
      };
      this.prepared = prepare(this.structure, this.cpts, this.options);
      this.preparedRevisions = revisions;
      log.debug({ revisions }, "network ready");
    }
    return this.prepared;
  }

  query(
    target: string,
    evidence: Evidence = {},
    algorithm: AlgorithmKind = "exact",
    iterations?: number,
  ): Distribution {
    if (algorithm === "exact") {
      if (iterations !== undefined) {
        throw new InvalidArgumentError(
          "iterations only apply to the gibbs algorithm",
        );
      }
      return this.exactQuery(target, evidence);
    }
    return this.queryReport(target, evidence, { kind: "gibbs", iterations })
      .distribution;
  }

  queryReport(
    target: string,
    evidence: Evidence,
    spec: AlgorithmSpec,
  ): InferenceReport {
    const algorithmSpec: AlgorithmSpec =
      spec.kind === "gibbs" && spec.random === undefined && spec.seed === undefined
        ? { ...spec, random: this.random }
        : spec;
    return createInferenceAlgorithm(this.prepare(), algorithmSpec).answer(
      target,
      evidence,
    );
  }

  sample(): Assignment;
  sample(n: number): Assignment[];
  sample(n?: number): Assignment | Assignment[] {
    if (n === undefined) {
      return this.sampleStream(1).toArray()[0];
    }
    return this.sampleStream(n).toArray();
  }

  sampleStream(n: number): SampleStream {
    return forwardSample(this.prepare(), n, this.random.fork());
  }

  impute(partial: Evidence, algorithm: AlgorithmKind = "exact"): Assignment {
    const spec: AlgorithmSpec =
      algorithm === "exact"
        ? { kind: "exact" }
        : { kind: "gibbs", random: this.random.fork() };
    return impute(this.prepare(), partial, { algorithm: spec });
  }

  /** A new network under do(variable = value) for each intervention. */
  intervene(interventions: Readonly<Record<string, DomainValue>>): BayesianNetwork {
    const intervened = intervene(this.prepare(), interventions);
    return new BayesianNetwork(intervened.structure, intervened.cpts, {
      ...this.options,
      seed: this.random.fork().seed,
    });
  }

  sensitivity(target: string): Map<string, number> {
    return computeSensitivity(this.prepare(), target);
  }

  toJSON(): NetworkDocument {
    return serializeNetwork(this.structure, this.cpts);
  }

  private exactQuery(target: string, evidence: Evidence): Distribution {
    const prepared = this.prepare();
    const key = `${prepared.fingerprint}\u0000${target}\u0000${evidenceCacheKey(evidence)}`;
    const cached = this.exactCache.get(key);
    if (cached) return new Map(cached);

    const { distribution } = createInferenceAlgorithm(prepared, {
      kind: "exact",
    }).answer(target, evidence);
    this.exactCache.set(key, new Map(distribution));
    return distribution;
  }

  private isStale(): boolean {
    return (
      this.preparedRevisions.structure !== this.structure.revision ||
      this.preparedRevisions.cpts !== this.cpts.revision
    );
  }

  private invalidate(): this {
    this.prepared = null;
    return this;
  }
}
