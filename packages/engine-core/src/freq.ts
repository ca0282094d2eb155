import type { Rng, Word } from "./types";
import { createLogger } from "./log";

const log = createLogger("freq");

export const FREQ_HEADER = "# keyline-freq v1";

export const FALLBACK_WORDS: readonly Word[] = [
  "the", "and", "that", "have", "for", "not", "with", "you",
  "this", "but", "from", "they", "say", "her", "she", "will",
  "one", "all", "would", "there", "their", "what", "out", "about"
];

// Candidates drawn per slot when a request favours some characters.
const FOCUS_TRIES = 8;

const wordRe = /^[\p{L}\p{N}]+$/u;

export function isWord(value: string): boolean {
  return wordRe.test(value);
}

export type FreqEntry = {
  word: Word;
  weight: number;
};

export class WordSource {
  private words: Word[] = [];
  private cumulative: number[] = [];
  private total = 0;
  readonly skipped: number;

  constructor(entries: Iterable<FreqEntry> = [], skipped = 0) {
    const merged = new Map<Word, number>();
    let rejected = skipped;
    for (const { word, weight } of entries) {
      if (!isWord(word) || !Number.isFinite(weight) || weight < 0) {
        rejected++;
        continue;
      }
      merged.set(word, (merged.get(word) ?? 0) + weight);
    }
    for (const [word, weight] of merged) {
      if (weight <= 0) continue;
      // The running total must stay finite for the cumulative search.
      if (!Number.isFinite(this.total + weight)) {
        rejected++;
        continue;
      }
      this.total += weight;
      this.words.push(word);
      this.cumulative.push(this.total);
    }
    this.skipped = rejected;
  }

  static default(): WordSource {
    return new WordSource();
  }

  get size(): number {
    return this.words.length;
  }

  get isEmpty(): boolean {
    return this.total <= 0;
  }

  entries(): FreqEntry[] {
    return this.words.map((word, i) => ({
      word,
      weight: this.cumulative[i] - (i > 0 ? this.cumulative[i - 1] : 0)
    }));
  }

  randomWord(rng: Rng = Math.random): Word {
    if (this.isEmpty) {
      return FALLBACK_WORDS[Math.min(FALLBACK_WORDS.length - 1, Math.floor(rng() * FALLBACK_WORDS.length))];
    }
    const r = rng() * this.total;
    let lo = 0;
    let hi = this.cumulative.length - 1;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if (this.cumulative[mid] > r) hi = mid;
      else lo = mid + 1;
    }
    return this.words[lo];
  }

  sampleWords(count: number, focus: readonly string[] = [], rng: Rng = Math.random): Word[] {
    const out: Word[] = [];
    for (let i = 0; i < count; i++) {
      let word = this.randomWord(rng);
      if (focus.length > 0) {
        for (let tries = 1; tries < FOCUS_TRIES && !focus.some((c) => word.includes(c)); tries++) {
          word = this.randomWord(rng);
        }
      }
      out.push(word);
    }
    return out;
  }
}

export function parseFreqTable(text: string): WordSource {
  const entries: FreqEntry[] = [];
  let skipped = 0;
  for (const raw of text.split(/\r?\n/g)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;
    const fields = line.split(/\s+/);
    if (fields.length !== 2) {
      skipped++;
      continue;
    }
    const [word, weightRaw] = fields;
    const weight = Number(weightRaw);
    if (!isWord(word) || !Number.isFinite(weight) || weight < 0) {
      skipped++;
      continue;
    }
    entries.push({ word, weight });
  }
  const source = new WordSource(entries, skipped);
  if (source.skipped > 0) log.debug(`skipped ${source.skipped} malformed entries`);
  return source;
}

export function formatFreqTable(entries: Iterable<FreqEntry>): string {
  const rows = [FREQ_HEADER];
  for (const { word, weight } of entries) rows.push(`${word}\t${weight}`);
  return rows.join("\n") + "\n";
}

export function countWords(lines: Iterable<string>): Map<Word, number> {
  const counts = new Map<Word, number>();
  for (const line of lines) {
    const tokens = line.normalize("NFKC").match(/[\p{L}\p{N}]+/gu) ?? [];
    for (const token of tokens) {
      const word = token.toLowerCase();
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }
  }
  return counts;
}
