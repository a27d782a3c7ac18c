export interface RandomSource {
  /** Float in [0, 1). */
  next(): number;
}

export const mathRandomSource: RandomSource = {
  next: () => Math.random(),
};

/** mulberry32; deterministic sequences for reproducible simulations. */
export const createSeededRandom = (seed: number): RandomSource => {
  let state = seed | 0;
  return {
    next: () => {
      state = (state + 0x6d2b79f5) | 0;
      let t = Math.imul(state ^ (state >>> 15), 1 | state);
      t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
};

export const uniform = (random: RandomSource, min: number, max: number): number =>
  min + random.next() * (max - min);

/** Integer in [min, max] inclusive. */
export const randomInt = (random: RandomSource, min: number, max: number): number =>
  min + Math.floor(random.next() * (max - min + 1));

export type WeightedOptions<T> = readonly [readonly [T, number], ...(readonly [T, number])[]];

export const weightedChoice = <T>(random: RandomSource, options: WeightedOptions<T>): T => {
  const totalWeight = options.reduce((sum, [, weight]) => sum + weight, 0);
  let remaining = random.next() * totalWeight;
  let chosen = options[0][0];
  for (const [value, weight] of options) {
    chosen = value;
    if (remaining < weight) break;
    remaining -= weight;
  }
  return chosen;
};
