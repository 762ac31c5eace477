import {
  type NetworkDocument,
  networkDocumentSchema,
} from "../types/networkDocument";
import { CPTStore } from "./cptStore";
import { InvalidArgumentError } from "./errors";
import { NetworkStructure } from "./network";

export function serializeNetwork(
  structure: NetworkStructure,
  cpts: CPTStore,
): NetworkDocument {
  const tables: NetworkDocument["cpts"] = {};
  for (const variable of cpts.variables) {
    tables[variable] = (cpts.getCPT(variable) ?? []).map((entry) => ({
      value: entry.value,
      parentStates: { ...entry.parentStates },
      probability: entry.probability,
    }));
  }

  return {
    version: 1,
    variables: structure.variables,
    edges: structure.edges,
    cpts: tables,
  };
}

/**
 * Rebuilds a structure and CPT store from a document, e.g. parsed JSON.
 * Shape errors are InvalidArgumentError; graph errors (unknown endpoints,
 * cycles) surface from the structure as usual. CPTs are not validated here,
 * that is `prepare`'s job.
 */
export function parseNetworkDocument(input: unknown): {
  structure: NetworkStructure;
  cpts: CPTStore;
} {
  const parsed = networkDocumentSchema.safeParse(input);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new InvalidArgumentError(`Invalid network document: ${problems}`);
  }

  const document = parsed.data;
  const structure = new NetworkStructure();
  for (const variable of document.variables) structure.addVariable(variable);
  for (const { parent, child } of document.edges) structure.addEdge(parent, child);

  const cpts = new CPTStore();
  for (const [variable, entries] of Object.entries(document.cpts)) {
    cpts.setCPT(variable, entries);
  }

  return { structure, cpts };
}
