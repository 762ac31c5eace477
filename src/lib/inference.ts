import type { Distribution, Evidence } from "./domain";
import { type ExactQueryOptions, exactQuery } from "./exactInference";
import { type GibbsOptions, gibbsQuery } from "./gibbsSampler";
import type { PreparedNetwork } from "./prepare";
import { createRandom } from "./random";

export type AlgorithmKind = "exact" | "gibbs";

export type AlgorithmSpec =
  | ({ kind: "exact" } & ExactQueryOptions)
  | ({ kind: "gibbs" } & GibbsOptions);

export interface InferenceReport {
  algorithm: AlgorithmKind;
  distribution: Distribution;
  /** Counted Gibbs sweeps; absent for exact answers. */
  iterations?: number;
  truncated: boolean;
}

export interface InferenceAlgorithm {
  readonly kind: AlgorithmKind;
  answer(target: string, evidence: Evidence): InferenceReport;
}

class ExactInference implements InferenceAlgorithm {
  readonly kind = "exact";

  constructor(
    private readonly prepared: PreparedNetwork,
    private readonly options: ExactQueryOptions,
  ) {}

  answer(target: string, evidence: Evidence): InferenceReport {
    return {
      algorithm: this.kind,
      distribution: exactQuery(this.prepared, target, evidence, this.options),
      truncated: false,
    };
  }
}

class GibbsInference implements InferenceAlgorithm {
  readonly kind = "gibbs";
  private readonly options: GibbsOptions;

  constructor(
    private readonly prepared: PreparedNetwork,
    options: GibbsOptions,
  ) {
    // One master stream per instance, so repeated answers do not replay the same chain
    this.options = {
      ...options,
      random: options.random ?? createRandom(options.seed),
    };
  }

  answer(target: string, evidence: Evidence): InferenceReport {
    const report = gibbsQuery(this.prepared, target, evidence, this.options);
    return {
      algorithm: this.kind,
      distribution: report.distribution,
      iterations: report.iterations,
      truncated: report.truncated,
    };
  }
}

export function createInferenceAlgorithm(
  prepared: PreparedNetwork,
  spec: AlgorithmSpec,
): InferenceAlgorithm {
  switch (spec.kind) {
    case "exact": {
      const { kind: _kind, ...options } = spec;
      return new ExactInference(prepared, options);
    }
    case "gibbs": {
      const { kind: _kind, ...options } = spec;
      return new GibbsInference(prepared, options);
    }
  }
}
