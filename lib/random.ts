export type RandomSource = () => number;

export function mulberry32(seed: number): RandomSource {
  let value = seed >>> 0;
  return () => {
    value += 0x6d2b79f5;
    let t = Math.imul(value ^ (value >>> 15), 1 | value);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRandom(seed?: number): RandomSource {
  if (typeof seed === 'number' && Number.isFinite(seed)) return mulberry32(seed);
  return mulberry32(Math.floor(Math.random() * 4294967296));
}

export function uniform(random: RandomSource, min: number, max: number): number {
  return min + (max - min) * random();
}

export function symmetric(random: RandomSource, magnitude: number): number {
  return uniform(random, -magnitude, magnitude);
}

export function bernoulli(random: RandomSource, probability: number): boolean {
  return random() < probability;
}

/** Picks a state in [1, count] other than `current`; holds when there is nothing else to pick. */
export function pickOtherState(random: RandomSource, count: number, current: number): number {
  if (count <= 1) return current;
  const offset = 1 + Math.floor(random() * (count - 1));
  return ((current - 1 + offset) % count) + 1;
}
