import { describe, it, expect } from "vitest";
import { ConfigurationError, SeededRng } from "@seqaug/core";
import { CpuRefBackend } from "@seqaug/tensor";
import {
  randint,
  randomSequence,
  randomSequences,
  sampleInts,
  sampleMask,
  sampleSigns,
  sampleWithoutReplacement,
} from "@seqaug/augment";
import { decode, isOneHot } from "./helpers.js";

const B = new CpuRefBackend();

describe("random sequence generator", () => {
  it("stacks independent one-hot fragments", () => {
    const t = randomSequences(B, new SeededRng(3), 5, 4, 40);
    expect(t.shape).toEqual([5, 4, 40]);
    expect(isOneHot(t)).toBe(true);
    const rows = decode(t);
    expect(new Set(rows).size).toBe(5);
  });

  it("covers the whole alphabet", () => {
    const row = decode(randomSequences(B, new SeededRng(11), 1, 4, 400))[0];
    expect([...new Set(row)].sort()).toEqual(["A", "C", "G", "T"]);
  });

  it("is reproducible under a fixed seed", () => {
    const a = randomSequences(B, new SeededRng(8), 2, 4, 10);
    const b = randomSequences(B, new SeededRng(8), 2, 4, 10);
    expect(B.equal(a, b)).toBe(true);
  });

  it("supports zero-length fragments", () => {
    expect(randomSequences(B, new SeededRng(1), 3, 4, 0).shape).toEqual([3, 4, 0]);
  });

  it("returns a single [A, length] fragment", () => {
    const t = randomSequence(B, new SeededRng(2), 4, 6);
    expect(t.shape).toEqual([4, 6]);
    for (let p = 0; p < 6; p++) {
      let ones = 0;
      for (let c = 0; c < 4; c++) ones += t.data[c * 6 + p];
      expect(ones).toBe(1);
    }
  });

  it("rejects a negative length", () => {
    expect(() => randomSequences(B, new SeededRng(1), 1, 4, -1)).toThrow(ConfigurationError);
  });
});

describe("per-example sampler", () => {
  it("randint is inclusive on both ends", () => {
    const rng = new SeededRng(4);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) {
      const v = randint(rng, 2, 5);
      expect(v).toBeGreaterThanOrEqual(2);
      expect(v).toBeLessThanOrEqual(5);
      seen.add(v);
    }
    expect(seen.size).toBe(4);
  });

  it("sampleInts draws one value per example", () => {
    const v = sampleInts(new SeededRng(4), 6, 3, 3);
    expect(Array.from(v)).toEqual([3, 3, 3, 3, 3, 3]);
  });

  it("sampleMask honours the extremes", () => {
    expect(sampleMask(new SeededRng(1), 4, 0)).toEqual([false, false, false, false]);
    expect(sampleMask(new SeededRng(1), 4, 1)).toEqual([true, true, true, true]);
  });

  it("sampleSigns returns +1 or -1", () => {
    const signs = Array.from(sampleSigns(new SeededRng(6), 200));
    expect(signs.every((s) => s === 1 || s === -1)).toBe(true);
    expect(signs).toContain(1);
    expect(signs).toContain(-1);
  });

  it("sampleWithoutReplacement returns distinct indices", () => {
    const picks = Array.from(sampleWithoutReplacement(new SeededRng(5), 50, 20));
    expect(picks).toHaveLength(20);
    expect(new Set(picks).size).toBe(20);
    expect(picks.every((p) => p >= 0 && p < 50)).toBe(true);
  });

  it("sampleWithoutReplacement caps k at n", () => {
    const picks = Array.from(sampleWithoutReplacement(new SeededRng(5), 4, 10)).sort();
    expect(picks).toEqual([0, 1, 2, 3]);
  });
});
