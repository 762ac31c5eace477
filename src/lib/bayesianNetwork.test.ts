import { describe, it, expect } from "vitest";
import { alarmNetwork } from "@/test/networks";
import { BayesianNetwork } from "./bayesianNetwork";
import { bernoulli, conditionalTable, priorTable } from "./cptStore";
import { totalVariationDistance } from "./domain";
import {
  InvalidArgumentError,
  InvalidCPTError,
  ZeroEvidenceProbabilityError,
} from "./errors";

const BOTH_CALLED = { "John calls": true, "Mary calls": true };

function buildAlarm(seed = 1): BayesianNetwork {
  return BayesianNetwork.defineNetwork(
    [
      ["Burglary", "Alarm"],
      ["Earthquake", "Alarm"],
      ["Alarm", "John calls"],
      ["Alarm", "Mary calls"],
    ],
    { seed },
  )
    .setCPT("Burglary", priorTable(bernoulli(0.001)))
    .setCPT("Earthquake", priorTable(bernoulli(0.002)))
    .setCPT(
      "Alarm",
      conditionalTable(
        ["Burglary", "Earthquake"],
        [
          { when: [true, true], distribution: bernoulli(0.95) },
          { when: [true, false], distribution: bernoulli(0.94) },
          { when: [false, true], distribution: bernoulli(0.29) },
          { when: [false, false], distribution: bernoulli(0.001) },
        ],
      ),
    )
    .setCPT(
      "John calls",
      conditionalTable(
        ["Alarm"],
        [
          { when: [true], distribution: bernoulli(0.9) },
          { when: [false], distribution: bernoulli(0.05) },
        ],
      ),
    )
    .setCPT(
      "Mary calls",
      conditionalTable(
        ["Alarm"],
        [
          { when: [true], distribution: bernoulli(0.7) },
          { when: [false], distribution: bernoulli(0.01) },
        ],
      ),
    );
}

describe("BayesianNetwork", () => {
  it("answers the burglary query exactly", () => {
    const network = buildAlarm();
    network.prepare();

    const distribution = network.query("Burglary", BOTH_CALLED, "exact");

    expect(distribution.get(false)).toBeCloseTo(0.7158, 4);
    expect(distribution.get(true)).toBeCloseTo(0.2842, 4);
  });

  it("prepares on first query and caches exact answers", () => {
    const network = buildAlarm();
    expect(network.isPrepared).toBe(false);

    const first = network.query("Burglary", BOTH_CALLED);
    const second = network.query("Burglary", {
      "Mary calls": true,
      "John calls": true,
    });

    expect(network.isPrepared).toBe(true);
    expect(second).toEqual(first);
  });

  it("hands each caller its own copy of a cached answer", () => {
    const network = buildAlarm();
    const first = network.query("Burglary", BOTH_CALLED);
    const second = network.query("Burglary", BOTH_CALLED);
    const third = network.query("Burglary", BOTH_CALLED);

    expect(second).not.toBe(first);
    expect(third).not.toBe(second);
    expect(third.get(true)).toBeCloseTo(0.2842, 4);
  });

  it("re-prepares after edits made directly on its inputs", () => {
    const { structure, cpts } = alarmNetwork();
    const network = new BayesianNetwork(structure, cpts);
    expect(network.query("Burglary").get(true)).toBeCloseTo(0.001, 12);

    cpts.setCPT("Burglary", priorTable(bernoulli(0.5)));

    expect(network.isPrepared).toBe(false);
    expect(network.query("Burglary").get(true)).toBeCloseTo(0.5, 12);

    structure.removeEdge("Alarm", "Mary calls");

    expect(() => network.query("Burglary")).toThrow(InvalidCPTError);
  });

  it("re-prepares after an edit", () => {
    const network = buildAlarm();
    const prepared = network.prepare();
    expect(network.prepare()).toBe(prepared);

    network.setCPT("Burglary", priorTable(bernoulli(0.5)));

    expect(network.isPrepared).toBe(false);
    expect(network.query("Burglary").get(true)).toBeCloseTo(0.5, 12);
  });

  it("approximates the same answer with gibbs", () => {
    const network = buildAlarm(42);
    const exact = network.query("Burglary", BOTH_CALLED);

    const approximate = network.query("Burglary", BOTH_CALLED, "gibbs", 20_000);

    expect(totalVariationDistance(approximate, exact)).toBeLessThan(0.05);
  });

  it("reports gibbs runs", () => {
    const report = buildAlarm().queryReport("Alarm", BOTH_CALLED, {
      kind: "gibbs",
      iterations: 300,
      burnIn: 0,
      seed: 4,
    });

    expect(report.algorithm).toBe("gibbs");
    expect(report.iterations).toBe(300);
    expect(report.truncated).toBe(false);
  });

  it("only takes iterations for gibbs", () => {
    expect(() => buildAlarm().query("Alarm", {}, "exact", 100)).toThrow(
      InvalidArgumentError,
    );
  });

  it("samples one or many assignments", () => {
    const network = buildAlarm();

    const one = network.sample();
    const many = network.sample(5);

    expect(Object.keys(one)).toEqual(network.topologicalOrder());
    expect(many).toHaveLength(5);
    expect(network.sampleStream(3).remaining).toBe(3);
  });

  it("samples reproducibly for a fixed seed", () => {
    expect(buildAlarm(8).sample(10)).toEqual(buildAlarm(8).sample(10));
  });

  it("imputes missing values", () => {
    expect(buildAlarm().impute(BOTH_CALLED)).toEqual({
      Burglary: false,
      Earthquake: false,
      Alarm: true,
      "John calls": true,
      "Mary calls": true,
    });
  });

  it("rejects a CPT whose rows sum to 0.9", () => {
    const network = buildAlarm().setCPT(
      "John calls",
      conditionalTable(
        ["Alarm"],
        [
          { when: [true], distribution: bernoulli(0.9) },
          {
            when: [false],
            distribution: [
              [true, 0.05],
              [false, 0.85],
            ],
          },
        ],
      ),
    );

    expect(() => network.prepare()).toThrow(InvalidCPTError);
  });

  it("rejects evidence that is impossible given its only cause", () => {
    const network = BayesianNetwork.defineNetwork([["Cause", "Effect"]])
      .setCPT("Cause", priorTable(bernoulli(0.3)))
      .setCPT(
        "Effect",
        conditionalTable(
          ["Cause"],
          [
            { when: [true], distribution: bernoulli(0.8) },
            { when: [false], distribution: bernoulli(0) },
          ],
        ),
      );

    expect(() =>
      network.query("Cause", { Cause: false, Effect: true }),
    ).toThrow(ZeroEvidenceProbabilityError);
  });

  it("restores from its JSON document", () => {
    const network = buildAlarm();
    const restored = BayesianNetwork.fromJSON(
      JSON.parse(JSON.stringify(network.toJSON())),
    );

    expect(restored.edges).toEqual(network.edges);
    expect(restored.query("Burglary", BOTH_CALLED)).toEqual(
      network.query("Burglary", BOTH_CALLED),
    );
  });

  it("answers interventional queries", () => {
    const network = buildAlarm();
    const forced = network.intervene({ Alarm: true });

    expect(forced.parentsOf("Alarm")).toEqual([]);
    expect(forced.query("Burglary").get(true)).toBeCloseTo(0.001, 12);
    expect(forced.query("John calls").get(true)).toBeCloseTo(0.9, 12);
    expect(network.parentsOf("Alarm")).toEqual(["Burglary", "Earthquake"]);
  });

  it("ranks causal sensitivity", () => {
    const sensitivities = buildAlarm().sensitivity("Mary calls");

    expect(sensitivities.get("Alarm")).toBeCloseTo(0.69, 12);
    expect(sensitivities.has("Burglary")).toBe(true);
  });

  it("drops a removed variable's CPT", () => {
    const network = buildAlarm().removeVariable("Mary calls");

    expect(network.getCPT("Mary calls")).toBeUndefined();
    expect(network.childrenOf("Alarm")).toEqual(["John calls"]);
    expect(network.query("Alarm", { "John calls": true }).get(true)).toBeGreaterThan(0);
  });
});
