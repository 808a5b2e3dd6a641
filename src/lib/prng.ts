// ABOUTME: Seeded random source for palette generation
// ABOUTME: Mulberry32 generator seeded from a string or number

/** Returns a float in [0, 1). Palette code only ever reads randomness through this. */
export type RandomSource = () => number;

function hashSeed(seed: string): number {
  let h = 9;
  for (let i = 0; i < seed.length; ) {
    h = Math.imul(h ^ seed.charCodeAt(i++), 9 ** 9);
  }
  return (h ^ (h >>> 9)) >>> 0;
}

/**
 * Creates a deterministic random source. Equal seeds give equal sequences, which is
 * what makes a "random" palette reproducible in tests and from the command line.
 */
export function createRandom(seed: string | number): RandomSource {
  let a = hashSeed(String(seed));

  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), a | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
