/**
 * Seeded PRNG (xorshift128+) behind every augmentation draw: edit lengths
 * and offsets, shift signs, mutation positions, filler symbols and noise.
 * The same seed over the same batch replays the same edits.
 */
import type { Rng } from "./interfaces.js";

export class SeededRng implements Rng {
  private _s0 = 0;
  private _s1 = 0;
  private _seed = 0;
  private _hasSpare = false;
  private _spare = 0;

  constructor(seed = 42) {
    this.seed(seed);
  }

  seed(s: number): void {
    this._seed = s;
    this._s0 = s;
    this._s1 = s ^ 0xdeadbeef;
    this._hasSpare = false;
    // Warm up
    for (let i = 0; i < 20; i++) this.next();
  }

  state(): number {
    return this._seed;
  }

  setState(s: number): void {
    this.seed(s);
  }

  /** Returns a number in [0, 1). */
  next(): number {
    let s1 = this._s0;
    const s0 = this._s1;
    this._s0 = s0;
    s1 ^= s1 << 23;
    s1 ^= s1 >>> 17;
    s1 ^= s0;
    s1 ^= s0 >>> 26;
    this._s1 = s1;
    return ((this._s0 + this._s1) >>> 0) / 0x100000000;
  }

  /** Uniform integer in [0, n). */
  nextInt(n: number): number {
    return Math.floor(this.next() * n);
  }

  /** Marsaglia polar method; the second sample is cached for the next call. */
  nextGauss(): number {
    if (this._hasSpare) {
      this._hasSpare = false;
      return this._spare;
    }
    let u: number, v: number, s: number;
    do {
      u = this.next() * 2 - 1;
      v = this.next() * 2 - 1;
      s = u * u + v * v;
    } while (s >= 1 || s === 0);
    const mul = Math.sqrt(-2.0 * Math.log(s) / s);
    this._spare = v * mul;
    this._hasSpare = true;
    return u * mul;
  }
}
