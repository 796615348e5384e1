import { describe, it, expect } from "vitest";
import { SeededRng } from "@seqaug/core";
import { CpuRefBackend } from "@seqaug/tensor";
import { RandomTranslocation, batchDims } from "@seqaug/augment";
import { decode, encode, isOneHot } from "./helpers.js";

const B = new CpuRefBackend();

describe("RandomTranslocation", () => {
  const aug = new RandomTranslocation({ shiftMin: 0, shiftMax: 3 });

  it("rotates each example by its own shift", () => {
    const x = encode(B, ["AACGT", "AACGT"]);
    const out = aug.edit(x, { shifts: Int32Array.from([2, -1]) }, B);
    expect(decode(out)).toEqual(["GTAAC", "ACGTA"]);
  });

  it("shifting by s then -s restores the batch", () => {
    const x = encode(B, ["ACGGTCAT", "TTGACCAG"]);
    for (const s of [0, 1, 5, 8, 13, -3]) {
      const there = aug.edit(x, { shifts: Int32Array.from([s, s]) }, B);
      const back = aug.edit(there, { shifts: Int32Array.from([-s, -s]) }, B);
      expect(B.equal(back, x)).toBe(true);
    }
  });

  it("draws magnitudes in bounds with both signs", () => {
    const x = encode(B, Array.from({ length: 64 }, () => "ACGTACGT"));
    const p = new RandomTranslocation({ shiftMin: 2, shiftMax: 4 })
      .sample(x, batchDims(x), { rng: new SeededRng(9), backend: B });
    const shifts = Array.from(p.shifts);
    expect(shifts.every((s) => Math.abs(s) >= 2 && Math.abs(s) <= 4)).toBe(true);
    expect(shifts.some((s) => s < 0)).toBe(true);
    expect(shifts.some((s) => s > 0)).toBe(true);
  });

  it("keeps the shape and the symbol composition", () => {
    const x = encode(B, ["AAAACCCGGT"]);
    const out = new RandomTranslocation().apply(x, { rng: new SeededRng(4), backend: B });
    expect(out.shape).toEqual([1, 4, 10]);
    expect(isOneHot(out)).toBe(true);
    expect(decode(out)[0].split("").sort().join("")).toBe("AAAACCCGGT");
  });
});
