export { BayesianNetwork, type BayesianNetworkOptions } from "@/lib/bayesianNetwork";
export { loadConfig, getConfig, type EngineConfig, type LogLevel } from "@/lib/config";
export {
  CPTStore,
  bernoulli,
  conditionalTable,
  priorTable,
  type ConditionalRow,
  type DistributionInput,
} from "@/lib/cptStore";
export type { CPTEntry } from "@/lib/cptValidation";
export {
  argmax,
  totalVariationDistance,
  type Assignment,
  type Distribution,
  type DomainValue,
  type Evidence,
} from "@/lib/domain";
export * from "@/lib/errors";
export {
  evidenceProbability,
  exactJointProbability,
  exactQuery,
  exactQueryAll,
  findPossibleCompletion,
  type ExactQueryOptions,
} from "@/lib/exactInference";
export {
  formatDistribution,
  formatProbability,
  formatProbabilityAsPercentage,
} from "@/lib/formatProbability";
export { SampleStream, forwardSample } from "@/lib/forwardSampler";
export { gibbsQuery, type GibbsOptions, type GibbsReport } from "@/lib/gibbsSampler";
export { impute, type ImputeOptions } from "@/lib/imputer";
export {
  createInferenceAlgorithm,
  type AlgorithmKind,
  type AlgorithmSpec,
  type InferenceAlgorithm,
  type InferenceReport,
} from "@/lib/inference";
export { NetworkStructure, defineNetwork, type Edge } from "@/lib/network";
export { parseNetworkDocument, serializeNetwork } from "@/lib/networkDocument";
export {
  PreparedNetwork,
  prepare,
  validateNetwork,
  type PrepareOptions,
  type PreparedVariable,
} from "@/lib/prepare";
export { SeededRandom, createRandom, type RandomSource } from "@/lib/random";
export { computeSensitivity, intervene } from "@/lib/sensitivity";
export type { NetworkDocument } from "@/types/networkDocument";
