import { z } from "zod";
import { InvalidArgumentError } from "./errors";

const logLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

// Empty strings are treated as unset so `FOO= npm test` falls back to the default.
function fromEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (val) => (typeof val === "string" && val.trim() === "" ? undefined : val),
    schema,
  );
}

const envSchema = z.object({
  BAYESNET_LOG_LEVEL: fromEnv(logLevelSchema.default("info")),
  BAYESNET_GIBBS_ITERATIONS: fromEnv(
    z.coerce.number().int().positive().default(10_000),
  ),
  BAYESNET_GIBBS_BURN_IN: fromEnv(z.coerce.number().int().min(0).default(500)),
  BAYESNET_GIBBS_CHAINS: fromEnv(z.coerce.number().int().positive().default(1)),
  BAYESNET_SEED: fromEnv(z.coerce.number().int().optional()),
  BAYESNET_PROBABILITY_TOLERANCE: fromEnv(
    z.coerce.number().positive().max(0.1).default(1e-6),
  ),
  BAYESNET_MAX_ENUMERATION_STATES: fromEnv(
    z.coerce.number().int().positive().default(2 ** 24),
  ),
  BAYESNET_QUERY_CACHE_SIZE: fromEnv(z.coerce.number().int().min(0).default(100)),
});

export type LogLevel = z.infer<typeof logLevelSchema>;

export interface EngineConfig {
  readonly logLevel: LogLevel;
  readonly gibbsIterations: number;
  readonly gibbsBurnIn: number;
  readonly gibbsChains: number;
  readonly seed: number | undefined;
  readonly probabilityTolerance: number;
  readonly maxEnumerationStates: number;
  readonly queryCacheSize: number;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new InvalidArgumentError(`Invalid configuration: ${problems}`);
  }

  const data = parsed.data;
  return Object.freeze({
    logLevel: data.BAYESNET_LOG_LEVEL,
    gibbsIterations: data.BAYESNET_GIBBS_ITERATIONS,
    gibbsBurnIn: data.BAYESNET_GIBBS_BURN_IN,
    gibbsChains: data.BAYESNET_GIBBS_CHAINS,
    seed: data.BAYESNET_SEED,
    probabilityTolerance: data.BAYESNET_PROBABILITY_TOLERANCE,
    maxEnumerationStates: data.BAYESNET_MAX_ENUMERATION_STATES,
    queryCacheSize: data.BAYESNET_QUERY_CACHE_SIZE,
  });
}

let cachedConfig: EngineConfig | null = null;

/** Process-wide config, parsed from the environment on first use. */
export function getConfig(): EngineConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
