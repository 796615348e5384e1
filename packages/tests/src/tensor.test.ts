import { describe, it, expect } from "vitest";
import { BackendError, SeededRng, ShapeError } from "@seqaug/core";
import { CpuRefBackend, backendRegistry } from "@seqaug/tensor";

describe("CpuRefBackend", () => {
  const B = new CpuRefBackend();

  it("zeros", () => {
    const t = B.zeros([2, 3]);
    expect(t.shape).toEqual([2, 3]);
    expect(Array.from(t.data)).toEqual([0, 0, 0, 0, 0, 0]);
  });

  it("full", () => {
    expect(Array.from(B.full([3], 2).data)).toEqual([2, 2, 2]);
  });

  it("fromArray rejects a size mismatch", () => {
    expect(() => B.fromArray([1, 2, 3], [2, 2])).toThrow(ShapeError);
  });

  it("add and sub", () => {
    const a = B.fromArray([1, 2, 3], [3]);
    const b = B.fromArray([4, 5, 6], [3]);
    expect(Array.from(B.add(a, b).data)).toEqual([5, 7, 9]);
    expect(Array.from(B.sub(b, a).data)).toEqual([3, 3, 3]);
  });

  it("add broadcasts a trailing row", () => {
    const a = B.fromArray([1, 2, 3, 4], [2, 2]);
    const b = B.fromArray([10, 20], [2]);
    const c = B.add(a, b);
    expect(c.shape).toEqual([2, 2]);
    expect(Array.from(c.data)).toEqual([11, 22, 13, 24]);
  });

  it("normal draws from the given rng", () => {
    const a = B.normal([4], 1, 0, new SeededRng(1));
    expect(Array.from(a.data)).toEqual([1, 1, 1, 1]);
    const x = B.normal([3], 0, 1, new SeededRng(9));
    const y = B.normal([3], 0, 1, new SeededRng(9));
    expect(B.equal(x, y)).toBe(true);
  });

  it("oneHot appends the depth axis", () => {
    const idx = B.fromArray([2, 0], [2], "i32");
    const t = B.oneHot(idx, 3);
    expect(t.shape).toEqual([2, 3]);
    expect(Array.from(t.data)).toEqual([0, 0, 1, 1, 0, 0]);
    expect(() => B.oneHot(B.fromArray([3], [1], "i32"), 3)).toThrow(BackendError);
  });

  it("transpose", () => {
    const a = B.fromArray([1, 2, 3, 4, 5, 6], [2, 3]);
    const t = B.transpose(a, 0, 1);
    expect(t.shape).toEqual([3, 2]);
    expect(Array.from(t.data)).toEqual([1, 4, 2, 5, 3, 6]);
  });

  it("reshape", () => {
    const a = B.fromArray([1, 2, 3, 4, 5, 6], [2, 3]);
    const r = B.reshape(a, [3, 2]);
    expect(r.shape).toEqual([3, 2]);
    expect(Array.from(r.data)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(() => B.reshape(a, [4])).toThrow(ShapeError);
  });

  it("slice, including empty windows", () => {
    const a = B.fromArray([1, 2, 3, 4, 5, 6], [2, 3]);
    const s = B.slice(a, [0, 1], [2, 3]);
    expect(s.shape).toEqual([2, 2]);
    expect(Array.from(s.data)).toEqual([2, 3, 5, 6]);
    expect(B.slice(a, [0, 2], [2, 2]).shape).toEqual([2, 0]);
    expect(() => B.slice(a, [0, 2], [2, 4])).toThrow(ShapeError);
  });

  it("cat along the last axis", () => {
    const a = B.fromArray([1, 2, 3, 4], [2, 2]);
    const b = B.fromArray([5, 6], [2, 1]);
    const empty = B.zeros([2, 0]);
    const c = B.cat([a, empty, b], 1);
    expect(c.shape).toEqual([2, 3]);
    expect(Array.from(c.data)).toEqual([1, 2, 5, 3, 4, 6]);
    expect(() => B.cat([a, B.zeros([3, 1])], 1)).toThrow(ShapeError);
  });

  it("flip one and two axes", () => {
    const a = B.fromArray([1, 2, 3, 4, 5, 6], [2, 3]);
    expect(Array.from(B.flip(a, [1]).data)).toEqual([3, 2, 1, 6, 5, 4]);
    expect(Array.from(B.flip(a, [0, 1]).data)).toEqual([6, 5, 4, 3, 2, 1]);
    expect(Array.from(B.flip(a, [-2]).data)).toEqual([4, 5, 6, 1, 2, 3]);
  });

  it("roll moves elements toward higher indices", () => {
    const a = B.fromArray([1, 2, 3, 4, 5], [1, 5]);
    expect(Array.from(B.roll(a, 2, 1).data)).toEqual([4, 5, 1, 2, 3]);
    expect(Array.from(B.roll(a, -1, 1).data)).toEqual([2, 3, 4, 5, 1]);
    expect(Array.from(B.roll(a, 7, 1).data)).toEqual([4, 5, 1, 2, 3]);
  });

  it("rejects an out-of-range axis", () => {
    expect(() => B.roll(B.zeros([2]), 1, 1)).toThrow(BackendError);
  });

  it("clone copies the data", () => {
    const a = B.fromArray([1, 2], [2]);
    const c = B.clone(a);
    c.data[0] = 9;
    expect(a.data[0]).toBe(1);
  });

  it("equal and allClose", () => {
    const a = B.fromArray([1, 2], [2]);
    expect(B.equal(a, B.fromArray([1, 2], [2]))).toBe(true);
    expect(B.equal(a, B.fromArray([1, 2], [1, 2]))).toBe(false);
    expect(B.allClose(a, B.fromArray([1, 2.000001], [2]))).toBe(true);
    expect(B.allClose(a, B.fromArray([1, 2.1], [2]))).toBe(false);
  });

  it("is registered as cpu_ref", () => {
    expect(backendRegistry.list()).toEqual(["cpu_ref"]);
    expect(backendRegistry.get("cpu_ref").name).toBe("cpu_ref");
  });
});
