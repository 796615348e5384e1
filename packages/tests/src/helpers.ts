/**
 * Fixtures: one-hot batches built from ACGT strings, and the reverse.
 */
import type { Backend, TensorData } from "@seqaug/core";

export const ALPHABET = "ACGT";

export function encode(backend: Backend, seqs: readonly string[]): TensorData {
  const n = seqs.length;
  const l = n === 0 ? 0 : seqs[0].length;
  const a = ALPHABET.length;
  const data = new Array<number>(n * a * l).fill(0);
  seqs.forEach((seq, i) => {
    if (seq.length !== l) throw new Error(`fixture lengths differ: ${seq}`);
    for (let p = 0; p < l; p++) {
      const c = ALPHABET.indexOf(seq[p]);
      if (c < 0) throw new Error(`fixture symbol ${seq[p]} not in ${ALPHABET}`);
      data[(i * a + c) * l + p] = 1;
    }
  });
  return backend.fromArray(data, [n, a, l]);
}

/** Argmax per position; "?" where a position is not exactly one-hot. */
export function decode(x: TensorData): string[] {
  const [n, a, l] = x.shape;
  const out: string[] = [];
  for (let i = 0; i < n; i++) {
    let s = "";
    for (let p = 0; p < l; p++) {
      let hot = -1;
      let ones = 0;
      for (let c = 0; c < a; c++) {
        const v = x.data[(i * a + c) * l + p];
        if (v === 1) { hot = c; ones++; }
        else if (v !== 0) ones = 2;
      }
      s += ones === 1 ? ALPHABET[hot] : "?";
    }
    out.push(s);
  }
  return out;
}

export function isOneHot(x: TensorData): boolean {
  return decode(x).every((s) => !s.includes("?"));
}
