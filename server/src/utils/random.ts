/** Returns a float in [0, 1), like Math.random */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/** Fisher-Yates shuffle into a new array */
export function shuffle<T>(items: readonly T[], random: RandomSource = defaultRandom): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/** Up to `limit` items chosen uniformly without replacement */
export function sample<T>(items: readonly T[], limit: number, random: RandomSource = defaultRandom): T[] {
  if (limit <= 0) return [];
  return shuffle(items, random).slice(0, limit);
}
