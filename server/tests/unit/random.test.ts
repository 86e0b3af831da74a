import { sample, shuffle } from '../../src/utils/random';

describe('random helpers', () => {
  it('should shuffle with the given random source', () => {
    // j is always 0: swaps positions 3,0 then 2,0 then 1,0
    expect(shuffle(['a', 'b', 'c', 'd'], () => 0)).toEqual(['b', 'c', 'd', 'a']);
  });

  it('should leave the input untouched', () => {
    const items = [1, 2, 3];
    shuffle(items, () => 0.5);
    expect(items).toEqual([1, 2, 3]);
  });

  it('should keep every element when shuffling', () => {
    const result = shuffle([1, 2, 3, 4, 5, 6]);
    expect([...result].sort()).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('should sample at most limit distinct items', () => {
    const result = sample(['a', 'b', 'c', 'd', 'e'], 3, () => 0.99);
    expect(result).toHaveLength(3);
    expect(new Set(result).size).toBe(3);
  });

  it('should return everything when the limit exceeds the pool', () => {
    expect(sample(['a', 'b'], 8, () => 0)).toHaveLength(2);
  });

  it('should return nothing for a non-positive limit', () => {
    expect(sample(['a', 'b'], 0)).toEqual([]);
  });
});
