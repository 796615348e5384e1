/**
 * Random one-hot sequence fragments, used as filler by deletion and
 * insertion and as replacement symbols by mutation.
 */
import {
  type Backend,
  type Dtype,
  type Rng,
  type TensorData,
  ConfigurationError,
} from "@seqaug/core";

function checkCount(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError({ message: `${name} must be an integer >= ${min}, got ${value}` });
  }
}

/**
 * `count` independent fragments of shape [A, length], stacked to
 * [count, A, length]. Each position is uniform over the alphabet.
 */
export function randomSequences(
  backend: Backend,
  rng: Rng,
  count: number,
  alphabetSize: number,
  length: number,
  dtype: Dtype = "f32",
): TensorData {
  checkCount("count", count, 0);
  checkCount("alphabetSize", alphabetSize, 1);
  checkCount("length", length, 0);

  const symbols = new Int32Array(count * length);
  for (let i = 0; i < symbols.length; i++) symbols[i] = rng.nextInt(alphabetSize);
  const indices = backend.fromArray(symbols, [count, length], "i32");
  // [count, length, A] -> [count, A, length]
  return backend.transpose(backend.oneHot(indices, alphabetSize, dtype), 1, 2);
}

/** A single [A, length] fragment. */
export function randomSequence(
  backend: Backend,
  rng: Rng,
  alphabetSize: number,
  length: number,
  dtype: Dtype = "f32",
): TensorData {
  const batch = randomSequences(backend, rng, 1, alphabetSize, length, dtype);
  return backend.reshape(batch, [alphabetSize, length]);
}
