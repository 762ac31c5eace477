import type { Assignment } from "./domain";
import { InvalidArgumentError, InvalidCPTError } from "./errors";
import { FREE, type PreparedNetwork } from "./prepare";
import { type RandomSource, createRandom, sampleIndex } from "./random";

/**
 * Ancestral sampling into an encoded state: every FREE slot is drawn from its
 * CPT row in topological order, already-set slots are left as they are.
 */
export function drawInto(
  prepared: PreparedNetwork,
  state: Int32Array,
  random: RandomSource,
): Int32Array {
  for (const variable of prepared.variables) {
    if (state[variable.index] !== FREE) continue;

    const offset = prepared.rowOffset(variable, state);
    const row = variable.table.slice(offset, offset + variable.domain.length);
    const drawn = sampleIndex(row, random);
    if (drawn < 0) {
      throw new InvalidCPTError(
        variable.name,
        "distribution-sum",
        "CPT row has no probability mass",
      );
    }
    state[variable.index] = drawn;
  }
  return state;
}

/**
 * Finite, single-pass stream of independent joint samples. Iterating a
 * consumed stream yields nothing; a fresh stream needs a fresh random source.
 */
export class SampleStream implements IterableIterator<Assignment> {
  private produced = 0;

  constructor(
    private readonly prepared: PreparedNetwork,
    readonly size: number,
    private readonly random: RandomSource,
  ) {}

  get remaining(): number {
    return this.size - this.produced;
  }

  next(): IteratorResult<Assignment> {
    if (this.produced >= this.size) {
      return { done: true, value: undefined };
    }
    this.produced++;
    const state = new Int32Array(this.prepared.variables.length).fill(FREE);
    return {
      done: false,
      value: this.prepared.decodeState(drawInto(this.prepared, state, this.random)),
    };
  }

  [Symbol.iterator](): this {
    return this;
  }

  take(count: number): Assignment[] {
    const samples: Assignment[] = [];
    while (samples.length < count) {
      const result = this.next();
      if (result.done) break;
      samples.push(result.value);
    }
    return samples;
  }

  toArray(): Assignment[] {
    return this.take(this.remaining);
  }
}

export function forwardSample(
  prepared: PreparedNetwork,
  n: number,
  random: RandomSource = createRandom(),
): SampleStream {
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError(
      `Sample count must be a non-negative integer, got ${n}`,
    );
  }
  return new SampleStream(prepared, n, random);
}
