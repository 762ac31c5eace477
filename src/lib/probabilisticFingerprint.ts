import type { CPTEntry } from "./cptValidation";
import { valueKey } from "./domain";

interface FingerprintInput {
  variable: string;
  parents: readonly string[];
  entries: readonly CPTEntry[];
}

/**
 * Canonical string for a network's structure and CPTs. Two networks with
 * the same fingerprint answer every query identically.
 */
export function computeProbabilisticFingerprint(
  variables: readonly FingerprintInput[],
): string {
  return variables
    .slice()
    .sort((a, b) => a.variable.localeCompare(b.variable))
    .map((node) => {
      const entriesStr = node.entries
        .map((entry) => {
          const parentsStr = Object.keys(entry.parentStates)
            .sort()
            .map((pid) => {
              const state = entry.parentStates[pid];
              return `${pid}:${state === null ? "*" : valueKey(state)}`;
            })
            .join(",");
          return `${parentsStr}|${valueKey(entry.value)}=${entry.probability}`;
        })
        .join(";");
      return `${node.variable}<${node.parents.join(",")}>:${entriesStr}`;
    })
    .join("|");
}
