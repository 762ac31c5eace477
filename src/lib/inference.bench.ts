import { bench, describe } from "vitest";
import { BayesianNetwork } from "./bayesianNetwork";
import {
  type ConditionalRow,
  bernoulli,
  conditionalTable,
  priorTable,
} from "./cptStore";
import { enumerateParentCombinations } from "./cptValidation";
import type { DomainValue } from "./domain";
import { SeededRandom } from "./random";

const BOOLEAN: DomainValue[] = [true, false];

function countStats(network: BayesianNetwork): {
  edges: number;
  cptEntries: number;
} {
  let cptEntries = 0;
  for (const variable of network.variables) {
    cptEntries += network.getCPT(variable)?.length ?? 0;
  }
  return { edges: network.edges.length, cptEntries };
}

function createChain(nodeCount: number): BayesianNetwork {
  const network = new BayesianNetwork(undefined, undefined, { seed: 1 });
  network.addVariable("n0").setCPT("n0", priorTable(bernoulli(0.6)));

  for (let i = 1; i < nodeCount; i++) {
    const parent = `n${i - 1}`;
    network
      .addVariable(`n${i}`)
      .addEdge(parent, `n${i}`)
      .setCPT(
        `n${i}`,
        conditionalTable(
          [parent],
          [
            { when: [true], distribution: bernoulli(0.7) },
            { when: [false], distribution: bernoulli(0.3) },
          ],
        ),
      );
  }

  return network;
}

function createNetwork(nodeCount: number, avgParents: number): BayesianNetwork {
  const random = new SeededRandom(nodeCount * 31 + avgParents);
  const network = new BayesianNetwork(undefined, undefined, { seed: 1 });
  const names: string[] = [];
  const numRoots = Math.max(2, Math.ceil(nodeCount / 15));

  for (let i = 0; i < numRoots; i++) {
    network.addVariable(`n${i}`).setCPT(`n${i}`, priorTable(bernoulli(0.5)));
    names.push(`n${i}`);
  }

  for (let i = numRoots; i < nodeCount; i++) {
    const numParents = Math.max(1, Math.min(avgParents - 1 + (i % 3), names.length));
    const available = names.slice(Math.max(0, names.length - 10));
    const parents = available.slice(0, Math.min(numParents, available.length)).sort();
    const name = `n${i}`;

    network.addVariable(name);
    for (const parent of parents) network.addEdge(parent, name);

    const rows: ConditionalRow[] = enumerateParentCombinations(
      parents,
      new Map(parents.map((parent): [string, DomainValue[]] => [parent, BOOLEAN])),
    ).map((when) => ({
      when,
      distribution: bernoulli(0.3 + random.next() * 0.4),
    }));
    network.setCPT(name, conditionalTable(parents, rows));
    names.push(name);
  }

  return network;
}

const smallNetwork = createNetwork(10, 4);
const mediumNetwork = createNetwork(30, 4);
const largeNetwork = createNetwork(100, 4);
const mediumSparseNetwork = createChain(30);
const mediumDenseNetwork = createNetwork(30, 8);

const mediumStats = countStats(mediumNetwork);
const mediumSparseStats = countStats(mediumSparseNetwork);
const mediumDenseStats = countStats(mediumDenseNetwork);

function lastVariable(network: BayesianNetwork): string {
  const order = network.topologicalOrder();
  return order[order.length - 1];
}

for (const network of [
  smallNetwork,
  mediumNetwork,
  largeNetwork,
  mediumSparseNetwork,
  mediumDenseNetwork,
]) {
  network.prepare();
}

describe("Exact enumeration", () => {
  bench("10 nodes, no evidence", () => {
    smallNetwork.queryReport(lastVariable(smallNetwork), {}, { kind: "exact" });
  });

  bench("10 nodes, root observed", () => {
    smallNetwork.queryReport(lastVariable(smallNetwork), { n0: true }, { kind: "exact" });
  });
});

describe("Node scaling (gibbs, 4x edges/node, 2k sweeps)", () => {
  bench("10 nodes", () => {
    smallNetwork.query(lastVariable(smallNetwork), { n0: true }, "gibbs", 2_000);
  });

  bench("30 nodes", () => {
    mediumNetwork.query(lastVariable(mediumNetwork), { n0: true }, "gibbs", 2_000);
  });

  bench("100 nodes", () => {
    largeNetwork.query(lastVariable(largeNetwork), { n0: true }, "gibbs", 2_000);
  });
});

describe("Edge density scaling (gibbs, 30 nodes, 2k sweeps)", () => {
  bench(`${mediumSparseStats.edges} edges`, () => {
    mediumSparseNetwork.query("n29", { n0: true }, "gibbs", 2_000);
  });

  bench(`${mediumStats.edges} edges`, () => {
    mediumNetwork.query(lastVariable(mediumNetwork), { n0: true }, "gibbs", 2_000);
  });

  bench(`${mediumDenseStats.edges} edges (${(mediumDenseStats.cptEntries / 30).toFixed(1)} CPT/node)`, () => {
    mediumDenseNetwork.query(lastVariable(mediumDenseNetwork), { n0: true }, "gibbs", 2_000);
  });
});

describe("Forward sampling (30 nodes, 4x edges/node)", () => {
  bench("10k samples", () => {
    mediumNetwork.sample(10_000);
  });

  bench("100k samples", () => {
    mediumNetwork.sample(100_000);
  });
});
