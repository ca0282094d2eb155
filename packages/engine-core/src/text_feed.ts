import type { Line, Rng, Word } from "./types";
import { FALLBACK_WORDS, WordSource, isWord } from "./freq";

// Consecutive unplaceable words tolerated before a fallback word is used.
const MAX_DISCARDS = 32;

// Column width in code points, the unit the session splits targets by.
function columns(word: Word): number {
  return [...word].length;
}

export type TextFeedOptions = {
  charsPerLine: number;
  rng?: Rng;
};

export class TextFeed {
  private readonly source: WordSource;
  private readonly charsPerLine: number;
  private readonly rng: Rng;
  private queue: Word[] = [];
  private carry: Word | null = null;
  private lines: Line[] = [];

  constructor(source: WordSource, options: TextFeedOptions) {
    this.source = source;
    this.charsPerLine = options.charsPerLine;
    this.rng = options.rng ?? Math.random;
  }

  get nextLines(): readonly Line[] {
    return this.lines;
  }

  get pendingWords(): number {
    return this.queue.length;
  }

  updateWords(words: readonly Word[]): void {
    this.queue.push(...words);
  }

  fillNextLines(minDepth: number): void {
    while (this.lines.length < minDepth) {
      this.lines.push(this.assembleLine());
    }
  }

  advanceLine(minDepth: number): Line {
    const line = this.lines.shift() ?? this.assembleLine();
    this.fillNextLines(minDepth);
    return line;
  }

  private nextWord(): Word {
    for (let discards = 0; discards < MAX_DISCARDS; discards++) {
      const word = this.takeCarry() ?? this.queue.shift() ?? this.source.randomWord(this.rng);
      if (isWord(word) && columns(word) <= this.charsPerLine) return word;
    }
    const fits = FALLBACK_WORDS.filter((w) => columns(w) <= this.charsPerLine);
    return fits[Math.floor(this.rng() * fits.length)] ?? FALLBACK_WORDS[0].slice(0, this.charsPerLine);
  }

  private takeCarry(): Word | null {
    const word = this.carry;
    this.carry = null;
    return word;
  }

  private assembleLine(): Line {
    const words: Word[] = [];
    let length = 0;
    for (;;) {
      const word = this.nextWord();
      const extra = words.length === 0 ? columns(word) : columns(word) + 1;
      if (length + extra > this.charsPerLine) {
        // Overflowing word opens the next line.
        this.carry = word;
        break;
      }
      words.push(word);
      length += extra;
    }
    return words.join(" ");
  }
}
