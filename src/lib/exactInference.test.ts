import { describe, it, expect } from "vitest";
import { alarmNetwork, chainNetwork, weatherNetwork } from "@/test/networks";
import { CPTStore, bernoulli, conditionalTable, priorTable } from "./cptStore";
import {
  InvalidArgumentError,
  InvalidEvidenceError,
  UnknownVariableError,
  ZeroEvidenceProbabilityError,
} from "./errors";
import {
  countCompletions,
  evidenceProbability,
  exactJointProbability,
  exactQuery,
  exactQueryAll,
  findPossibleCompletion,
} from "./exactInference";
import { defineNetwork } from "./network";
import { prepare } from "./prepare";

const PRECISION = 9;

function sum(distribution: ReadonlyMap<unknown, number>): number {
  let total = 0;
  for (const p of distribution.values()) total += p;
  return total;
}

describe("exactQuery", () => {
  const alarm = (() => {
    const { structure, cpts } = alarmNetwork();
    return prepare(structure, cpts);
  })();

  it("matches the textbook burglary posterior given both calls", () => {
    const distribution = exactQuery(alarm, "Burglary", {
      "John calls": true,
      "Mary calls": true,
    });

    expect(distribution.get(true)).toBeCloseTo(0.2842, 4);
    expect(distribution.get(false)).toBeCloseTo(0.7158, 4);
  });

  it("returns a root's CPT when there is no evidence", () => {
    expect(exactQuery(alarm, "Burglary").get(true)).toBeCloseTo(0.001, 15);
    expect(exactQuery(alarm, "Earthquake").get(true)).toBeCloseTo(0.002, 15);
  });

  it("returns distributions that sum to one", () => {
    for (const variable of alarm.order) {
      const distribution = exactQuery(alarm, variable, { "Mary calls": true });
      expect(sum(distribution)).toBeCloseTo(1, PRECISION);
    }
  });

  it("keeps the target's domain order", () => {
    const { structure, cpts } = weatherNetwork();
    const prepared = prepare(structure, cpts);

    const distribution = exactQuery(prepared, "Weather", { Traffic: "heavy" });

    expect(Array.from(distribution.keys())).toEqual(["sun", "rain", "snow"]);
    expect(distribution.get("sun")).toBeCloseTo(0.25, PRECISION);
    expect(distribution.get("rain")).toBeCloseTo(0.5, PRECISION);
    expect(distribution.get("snow")).toBeCloseTo(0.25, PRECISION);
  });

  it("computes marginals through a chain", () => {
    const { structure, cpts } = chainNetwork();
    const prepared = prepare(structure, cpts);

    const expectedB = 0.5 * 0.9 + 0.5 * 0.2;
    const expectedC = expectedB * 0.8 + (1 - expectedB) * 0.1;

    expect(exactQuery(prepared, "B").get(true)).toBeCloseTo(expectedB, PRECISION);
    expect(exactQuery(prepared, "C").get(true)).toBeCloseTo(expectedC, PRECISION);
  });

  it("explains away in a v-structure", () => {
    const given = { Alarm: true };
    const withoutQuake = exactQuery(alarm, "Burglary", given).get(true) ?? 0;
    const withQuake =
      exactQuery(alarm, "Burglary", { ...given, Earthquake: true }).get(true) ?? 0;

    expect(withQuake).toBeLessThan(withoutQuake);
  });

  it("returns a point mass when the target is observed", () => {
    const distribution = exactQuery(alarm, "Alarm", { Alarm: false });

    expect(distribution.get(false)).toBe(1);
    expect(distribution.get(true)).toBe(0);
  });

  it("ignores null and undefined evidence", () => {
    expect(
      exactQuery(alarm, "Burglary", { Alarm: null, "John calls": undefined }),
    ).toEqual(exactQuery(alarm, "Burglary"));
  });

  it("rejects impossible evidence", () => {
    const structure = defineNetwork([["Cause", "Effect"]]);
    const cpts = new CPTStore()
      .setCPT("Cause", priorTable(bernoulli(0.5)))
      .setCPT(
        "Effect",
        conditionalTable(
          ["Cause"],
          [
            { when: [true], distribution: bernoulli(0.7) },
            { when: [false], distribution: bernoulli(0) },
          ],
        ),
      );
    const prepared = prepare(structure, cpts);

    expect(() =>
      exactQuery(prepared, "Cause", { Cause: false, Effect: true }),
    ).toThrow(ZeroEvidenceProbabilityError);
    expect(() =>
      exactQuery(prepared, "Effect", { Cause: false, Effect: true }),
    ).toThrow(ZeroEvidenceProbabilityError);
    expect(exactQuery(prepared, "Cause", { Effect: true }).get(true)).toBe(1);
  });

  it("rejects unknown targets and bad evidence", () => {
    expect(() => exactQuery(alarm, "Cat")).toThrow(UnknownVariableError);
    expect(() => exactQuery(alarm, "Alarm", { Cat: true })).toThrow(
      InvalidEvidenceError,
    );
    expect(() => exactQuery(alarm, "Alarm", { Burglary: 1 })).toThrow(
      InvalidEvidenceError,
    );
  });

  it("refuses joint spaces above the state limit", () => {
    expect(countCompletions(alarm, alarm.encodeEvidence({ Alarm: true }))).toBe(16);
    expect(() =>
      exactQuery(alarm, "Burglary", { Alarm: true }, { maxStates: 15 }),
    ).toThrow(InvalidArgumentError);
    expect(() =>
      exactQuery(alarm, "Burglary", { Alarm: true }, { maxStates: 16 }),
    ).not.toThrow();
  });
});

describe("exactQueryAll", () => {
  it("matches single queries for every variable", () => {
    const { structure, cpts } = alarmNetwork();
    const prepared = prepare(structure, cpts);
    const evidence = { "John calls": true };

    const marginals = exactQueryAll(prepared, evidence);

    expect(Array.from(marginals.keys())).toEqual(prepared.order);
    for (const variable of prepared.order) {
      const single = exactQuery(prepared, variable, evidence);
      expect(marginals.get(variable)?.get(true)).toBeCloseTo(
        single.get(true) ?? NaN,
        PRECISION,
      );
    }
    expect(marginals.get("Burglary")?.get(true)).toBeCloseTo(0.016284, 6);
  });
});

describe("evidenceProbability and exactJointProbability", () => {
  const { structure, cpts } = alarmNetwork();
  const prepared = prepare(structure, cpts);

  it("computes P(evidence)", () => {
    expect(
      evidenceProbability(prepared, { "John calls": true, "Mary calls": true }),
    ).toBeCloseTo(0.0020841, 7);
    expect(evidenceProbability(prepared)).toBeCloseTo(1, PRECISION);
  });

  it("multiplies the CPT entries of a full assignment", () => {
    const p = exactJointProbability(prepared, {
      Burglary: false,
      Earthquake: false,
      Alarm: true,
      "John calls": true,
      "Mary calls": true,
    });

    expect(p).toBeCloseTo(0.999 * 0.998 * 0.001 * 0.9 * 0.7, 15);
  });

  it("requires every variable", () => {
    expect(() => exactJointProbability(prepared, { Burglary: true })).toThrow(
      InvalidEvidenceError,
    );
  });
});

describe("findPossibleCompletion", () => {
  const { structure, cpts } = alarmNetwork();
  const prepared = prepare(structure, cpts);

  it("returns the first completion with positive probability", () => {
    const state = findPossibleCompletion(
      prepared,
      prepared.encodeEvidence({ "John calls": true, "Mary calls": true }),
    );

    expect(state && prepared.decodeState(state)).toEqual({
      Burglary: true,
      Earthquake: true,
      Alarm: true,
      "John calls": true,
      "Mary calls": true,
    });
  });

  it("returns undefined for impossible evidence", () => {
    const impossible = prepare(
      defineNetwork([["Cause", "Effect"]]),
      new CPTStore()
        .setCPT("Cause", priorTable(bernoulli(0.5)))
        .setCPT(
          "Effect",
          conditionalTable(
            ["Cause"],
            [
              { when: [true], distribution: bernoulli(1) },
              { when: [false], distribution: bernoulli(0) },
            ],
          ),
        ),
    );

    expect(
      findPossibleCompletion(
        impossible,
        impossible.encodeEvidence({ Cause: false, Effect: true }),
      ),
    ).toBeUndefined();
  });

  it("respects the enumeration budget", () => {
    expect(() =>
      findPossibleCompletion(prepared, prepared.encodeEvidence({}), { maxStates: 4 }),
    ).toThrow(InvalidArgumentError);
  });
});
