import type { CompletedLine, LetterStat, WordRequest } from "./types";
import { isWord } from "./freq";

export type TrackerOptions = {
  refillThreshold: number;
  refillBatch: number;
  focusLetters: number;
};

export type TrackerRecord = Record<string, LetterStat>;

export const NEUTRAL_RATIO = 1.0;

export function cleanRatio(stat: LetterStat | undefined): number {
  if (!stat) return NEUTRAL_RATIO;
  const total = stat.clean + stat.dirty;
  return total > 0 ? stat.clean / total : NEUTRAL_RATIO;
}

function byCodePoint(a: string, b: string): number {
  return (a.codePointAt(0) ?? 0) - (b.codePointAt(0) ?? 0);
}

export class ProficiencyTracker {
  private readonly options: TrackerOptions;
  private letters = new Map<string, LetterStat>();

  constructor(options: TrackerOptions, record: TrackerRecord = {}) {
    this.options = options;
    for (const [c, stat] of Object.entries(record)) {
      this.letters.set(c, { clean: stat.clean, dirty: stat.dirty });
    }
  }

  addLine(line: CompletedLine, inventory: number): WordRequest | null {
    for (const hit of line.hits) {
      const stat = this.letters.get(hit.target) ?? { clean: 0, dirty: 0 };
      if (hit.dirty) stat.dirty += 1;
      else stat.clean += 1;
      this.letters.set(hit.target, stat);
    }
    if (inventory >= this.options.refillThreshold) return null;
    return { count: this.options.refillBatch, focus: this.weakestLetters(this.options.focusLetters) };
  }

  stat(c: string): LetterStat {
    const stat = this.letters.get(c);
    return stat ? { ...stat } : { clean: 0, dirty: 0 };
  }

  ratio(c: string): number {
    return cleanRatio(this.letters.get(c));
  }

  cleanLetters(): Array<[string, number]> {
    return [...this.letters.keys()].sort(byCodePoint).map((c) => [c, this.ratio(c)]);
  }

  weakestLetters(k: number): string[] {
    if (k <= 0) return [];
    return this.cleanLetters()
      .filter(([c, ratio]) => isWord(c) && ratio < NEUTRAL_RATIO)
      .sort((a, b) => a[1] - b[1] || byCodePoint(a[0], b[0]))
      .slice(0, k)
      .map(([c]) => c);
  }

  toRecord(): TrackerRecord {
    const out: TrackerRecord = {};
    for (const [c] of this.cleanLetters()) out[c] = this.stat(c);
    return out;
  }
}
