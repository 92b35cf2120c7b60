import alea from 'alea';
import random from 'random';

// any source of uniform numbers in [0, 1)
export type Rng = () => number;

export function createSeed(): string {
  return random.int(0, 0x7fffffff).toString(16);
}

// every worker (and every sequential render) owns its generator,
// nothing is shared across threads
export function createRng(seed: string = createSeed()): Rng {
  let prng = alea(seed);
  return () => prng();
}
