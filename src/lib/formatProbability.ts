import type { Distribution } from "./domain";

/** Rounds to `sigFigs` significant figures, without trailing zeros. */
export function formatProbability(
  probability: number,
  sigFigs: number = 2,
): string {
  if (probability === 0) return "0";
  if (probability === 1) return "1";
  if (!Number.isFinite(probability)) return String(probability);

  return Number(probability.toPrecision(sigFigs)).toString();
}

export function formatProbabilityAsPercentage(
  probability: number,
  sigFigs: number = 2,
): string {
  const percentage = probability * 100;

  if (percentage === 0) return "0%";
  if (percentage === 100) return "100%";

  return Number(percentage.toPrecision(sigFigs)).toString() + "%";
}

/** `{true: 0.28, false: 0.72}` style, in the distribution's own order. */
export function formatDistribution(
  distribution: Distribution,
  sigFigs: number = 4,
): string {
  const parts: string[] = [];
  for (const [value, probability] of distribution) {
    parts.push(`${String(value)}: ${formatProbability(probability, sigFigs)}`);
  }
  return `{${parts.join(", ")}}`;
}
