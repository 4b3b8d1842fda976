/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

/** Small deterministic generator (mulberry32) for reproducible fixtures. */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Integer in [min, max], both inclusive. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function uniform(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min);
}

export function pick<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) throw new Error('Cannot pick from an empty list');
  return items[Math.min(items.length - 1, Math.floor(random() * items.length))];
}

export function weightedPick<T>(random: RandomSource, items: readonly T[], weights: readonly number[]): T {
  if (items.length === 0 || items.length !== weights.length) {
    throw new Error('weightedPick needs one weight per item');
  }
  const total = weights.reduce((sum, w) => sum + w, 0);
  let threshold = random() * total;
  for (let i = 0; i < items.length; i++) {
    threshold -= weights[i];
    if (threshold < 0) return items[i];
  }
  return items[items.length - 1];
}

export function randomDigits(random: RandomSource, count: number): string {
  let digits = '';
  for (let i = 0; i < count; i++) digits += String(randomInt(random, 0, 9));
  return digits;
}
