export type Rng = Readonly<{
  /** Float in [0, 1). */
  next: () => number;
  /** Integer in [0, 256). */
  nextByte: () => number;
}>;

/** xorshift32; the same seed always yields the same sequence. */
export function createRng(seed: number): Rng {
  let x = seed >>> 0 || 0x6b33_17f5;
  const step = (): number => {
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    return x >>> 0;
  };
  return Object.freeze({
    next: () => step() / 0x1_0000_0000,
    nextByte: () => step() & 0xff,
  });
}

export function deterministicBytes(length: number, seed: number): Uint8Array {
  const rng = createRng(seed);
  const out = new Uint8Array(length);
  for (let i = 0; i < length; i++) out[i] = rng.nextByte();
  return out;
}
