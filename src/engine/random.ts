import seedrandom from 'seedrandom';

// Uniform draw in [0, 1)
export type RandomSource = () => number;

export function createRandomSource(seed?: string): RandomSource {
  return seed ? seedrandom(seed) : Math.random;
}

// Replays the given values in order, then repeats the last one
export function sequenceSource(values: number[]): RandomSource {
  let idx = 0;
  return () => {
    const value = values[Math.min(idx, values.length - 1)] ?? 0;
    idx++;
    return value;
  };
}
