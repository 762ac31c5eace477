import { getConfig } from "./config";
import type { Distribution, DomainValue, Evidence } from "./domain";
import { InvalidArgumentError, ZeroEvidenceProbabilityError } from "./errors";
import { formatDistribution } from "./formatProbability";
import { countCompletions, findPossibleCompletion } from "./exactInference";
import { drawInto } from "./forwardSampler";
import { moduleLogger } from "./logger";
import { FREE, type PreparedNetwork, type PreparedVariable } from "./prepare";
import { type RandomSource, SeededRandom, createRandom, sampleIndex } from "./random";

const log = moduleLogger("gibbs");

const MAX_INIT_ATTEMPTS = 100;

export interface GibbsOptions {
  /** Counted sweeps per chain. */
  iterations?: number;
  /** Discarded sweeps per chain before counting starts. */
  burnIn?: number;
  chains?: number;
  seed?: number;
  random?: SeededRandom;
  /** Wall-clock budget; the run stops early and reports `truncated`. */
  maxDurationMs?: number;
  now?: () => number;
}

export interface GibbsReport {
  distribution: Distribution;
  /** Counted sweeps over all chains. */
  iterations: number;
  burnIn: number;
  chains: number;
  truncated: boolean;
}

function requireInteger(name: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidArgumentError(
      `${name} must be an integer >= ${min}, got ${value}`,
    );
  }
  return value;
}

/**
 * Starting state for a chain: evidence clamped, everything else drawn
 * ancestrally. Retries until the joint is positive so every later Gibbs
 * step has a non-zero local distribution; if the draws keep missing, the
 * completions of the evidence are searched in order instead.
 */
export function initialState(
  prepared: PreparedNetwork,
  evidenceState: Int32Array,
  random: RandomSource,
): Int32Array {
  for (let attempt = 0; attempt < MAX_INIT_ATTEMPTS; attempt++) {
    const state = drawInto(prepared, Int32Array.from(evidenceState), random);
    if (prepared.jointProbability(state) > 0) {
      return state;
    }
  }

  const maxStates = getConfig().maxEnumerationStates;
  if (countCompletions(prepared, evidenceState) > maxStates) {
    throw new ZeroEvidenceProbabilityError(
      `No state consistent with the evidence found after ${MAX_INIT_ATTEMPTS} draws, and the network is too large to search (limit ${maxStates} states)`,
    );
  }
  const found = findPossibleCompletion(prepared, evidenceState, { maxStates });
  if (!found) {
    throw new ZeroEvidenceProbabilityError();
  }
  log.debug({ attempts: MAX_INIT_ATTEMPTS }, "gibbs start state found by search");
  return found;
}

/**
 * Resamples one variable from P(v | parents) * prod over children of
 * P(child | its parents), everything else held fixed.
 */
export function resample(
  prepared: PreparedNetwork,
  variable: PreparedVariable,
  state: Int32Array,
  random: RandomSource,
): void {
  const weights = new Array<number>(variable.domain.length);
  for (let value = 0; value < variable.domain.length; value++) {
    state[variable.index] = value;
    let w = prepared.conditional(variable, state);
    for (const child of variable.children) {
      if (w === 0) break;
      w *= prepared.conditional(prepared.variables[child], state);
    }
    weights[value] = w;
  }

  const drawn = sampleIndex(weights, random);
  if (drawn < 0) {
    throw new ZeroEvidenceProbabilityError(
      `Local distribution of "${variable.name}" has no probability mass`,
    );
  }
  state[variable.index] = drawn;
}

/**
 * P(target | evidence) estimated by Gibbs sampling. Each chain sweeps the
 * free variables round-robin in topological order; one counted sweep adds
 * one observation of the target's value.
 */
export function gibbsQuery(
  prepared: PreparedNetwork,
  target: string,
  evidence: Evidence = {},
  options: GibbsOptions = {},
): GibbsReport {
  const config = getConfig();
  const iterations = requireInteger(
    "iterations",
    options.iterations ?? config.gibbsIterations,
    1,
  );
  const burnIn = requireInteger("burnIn", options.burnIn ?? config.gibbsBurnIn, 0);
  const chains = requireInteger("chains", options.chains ?? config.gibbsChains, 1);
  if (options.maxDurationMs !== undefined && !(options.maxDurationMs > 0)) {
    throw new InvalidArgumentError(
      `maxDurationMs must be positive, got ${options.maxDurationMs}`,
    );
  }

  const targetVariable = prepared.variable(target);
  const evidenceState = prepared.encodeEvidence(evidence);
  const master = options.random ?? createRandom(options.seed);
  const now = options.now ?? (() => performance.now());
  const started = now();
  const deadline =
    options.maxDurationMs === undefined ? undefined : started + options.maxDurationMs;

  const counts = new Array<number>(targetVariable.domain.length).fill(0);
  let counted = 0;
  let truncated = false;

  const free = prepared.variables.filter((v) => evidenceState[v.index] === FREE);

  for (let chain = 0; chain < chains && !truncated; chain++) {
    const random = master.fork();
    const state = initialState(prepared, evidenceState, random);

    for (let sweep = 0; sweep < burnIn + iterations; sweep++) {
      for (const variable of free) {
        resample(prepared, variable, state, random);
      }
      if (sweep >= burnIn) {
        counts[state[targetVariable.index]]++;
        counted++;
      }
      // The budget is only checked once something has been counted
      if (deadline !== undefined && counted > 0 && now() >= deadline) {
        truncated = sweep < burnIn + iterations - 1 || chain < chains - 1;
        break;
      }
    }
  }

  const distribution = new Map<DomainValue, number>();
  targetVariable.domain.forEach((value, i) => {
    distribution.set(value, counts[i] / counted);
  });

  const elapsed = Math.round(now() - started);
  if (truncated) {
    log.warn(
      { target, counted, requested: iterations * chains, ms: elapsed },
      "gibbs run hit its time budget; returning partial estimate",
    );
  } else {
    log.debug(
      { target, counted, chains, result: formatDistribution(distribution), ms: elapsed },
      "gibbs query",
    );
  }

  return { distribution, iterations: counted, burnIn, chains, truncated };
}
