import { describe, it, expect } from "vitest";
import { ConfigurationError, SeededRng, type TensorData } from "@seqaug/core";
import { CpuRefBackend } from "@seqaug/tensor";
import { RandomNoise, randomSequences } from "@seqaug/augment";

const B = new CpuRefBackend();

function stats(t: TensorData): { mean: number; std: number } {
  const n = t.data.length;
  let sum = 0;
  for (let i = 0; i < n; i++) sum += t.data[i];
  const mean = sum / n;
  let sq = 0;
  for (let i = 0; i < n; i++) sq += (t.data[i] - mean) ** 2;
  return { mean, std: Math.sqrt(sq / (n - 1)) };
}

describe("RandomNoise", () => {
  const x = randomSequences(B, new SeededRng(1), 16, 4, 200);

  it("adds noise with the configured standard deviation", () => {
    const out = new RandomNoise({ noiseMean: 0, noiseStd: 0.2 }).apply(x, { rng: new SeededRng(2), backend: B });
    expect(out.shape).toEqual([16, 4, 200]);
    const { mean, std } = stats(B.sub(out, x));
    expect(Math.abs(mean)).toBeLessThan(0.01);
    expect(Math.abs(std - 0.2)).toBeLessThan(0.01);
  });

  it("shifts by the configured mean", () => {
    const out = new RandomNoise({ noiseMean: 1, noiseStd: 0.5 }).apply(x, { rng: new SeededRng(3), backend: B });
    const { mean, std } = stats(B.sub(out, x));
    expect(Math.abs(mean - 1)).toBeLessThan(0.02);
    expect(Math.abs(std - 0.5)).toBeLessThan(0.02);
  });

  it("zero std adds exactly the mean", () => {
    const small = randomSequences(B, new SeededRng(4), 2, 4, 5);
    const out = new RandomNoise({ noiseMean: 0.5, noiseStd: 0 }).apply(small, { rng: new SeededRng(5), backend: B });
    expect(Array.from(out.data)).toEqual(Array.from(small.data).map((v) => v + 0.5));
  });

  it("rejects a negative standard deviation", () => {
    expect(() => new RandomNoise({ noiseStd: -1 })).toThrow(ConfigurationError);
    expect(() => new RandomNoise({ noiseMean: Number.NaN })).toThrow(ConfigurationError);
  });
});
