import { WordSource } from "../src/freq";
import type { Rng } from "../src/types";

export function sourceOf(weights: Record<string, number>): WordSource {
  return new WordSource(Object.entries(weights).map(([word, weight]) => ({ word, weight })));
}

export function cycle(values: number[]): Rng {
  let i = 0;
  return () => values[i++ % values.length];
}
