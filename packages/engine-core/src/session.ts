import type { CompletedLine, Hit, Line, SessionSnapshot, SessionStep, Word } from "./types";
import { TextFeed } from "./text_feed";

export type SessionOptions = {
  maxErrors: number;
  nextLines: number;
  scoreLineEnd: boolean;
};

const IN_PROGRESS: SessionStep = { status: "in_progress" };

const typeableRe = /^[\p{L}\p{N} ]$/u;

export function isTypeable(c: string): boolean {
  return typeableRe.test(c);
}

/**
 * Keystroke state machine for one profile.
 *
 * The active line is split into committed `hits`, pending mistakes for the
 * current target (`errors`) and the remaining `targets`, whose head is the
 * active target. Completing a line loads the next one from the feed.
 */
export class Session {
  private readonly feed: TextFeed;
  private readonly options: SessionOptions;
  private text: Line = "";
  private committed: Hit[] = [];
  private pending: string[] = [];
  // Set by any mistake on the active target, including dropped or erased ones.
  private mistaken = false;
  private queue: string[] = [];

  constructor(feed: TextFeed, options: SessionOptions) {
    this.feed = feed;
    this.options = options;
    this.loadLine();
  }

  get line(): Line {
    return this.text;
  }

  get hits(): readonly Hit[] {
    return this.committed;
  }

  get errors(): readonly string[] {
    return this.pending;
  }

  get targets(): readonly string[] {
    return this.queue;
  }

  get activeTarget(): string | null {
    return this.queue[0] ?? null;
  }

  get nextLines(): readonly Line[] {
    return this.feed.nextLines;
  }

  get pendingWords(): number {
    return this.feed.pendingWords;
  }

  get errorBound(): number {
    return Math.max(0, this.options.maxErrors - 1);
  }

  applyChar(c: string): SessionStep {
    if (!isTypeable(c)) return IN_PROGRESS;
    const target = this.queue[0];
    if (target === undefined) {
      this.loadLine();
      return IN_PROGRESS;
    }
    if (c !== target) {
      this.mistaken = true;
      if (this.pending.length < this.errorBound) this.pending.push(c);
      return IN_PROGRESS;
    }
    this.committed.push({ target, dirty: this.mistaken });
    this.pending = [];
    this.mistaken = false;
    this.queue.shift();
    if (this.queue.length > 0) return IN_PROGRESS;

    const line: CompletedLine = { text: this.text, hits: this.committed };
    this.loadLine();
    return { status: "completed", line };
  }

  backspace(): void {
    this.pending.pop();
  }

  fillNextLines(): void {
    this.feed.fillNextLines(this.options.nextLines);
  }

  updateWords(words: readonly Word[]): void {
    this.feed.updateWords(words);
  }

  snapshot(): SessionSnapshot {
    return {
      line: this.text,
      hits: this.committed.map((hit) => ({ ...hit })),
      errors: [...this.pending],
      activeTarget: this.activeTarget,
      targets: [...this.queue],
      nextLines: [...this.feed.nextLines]
    };
  }

  private loadLine(): void {
    this.text = this.feed.advanceLine(this.options.nextLines);
    this.committed = [];
    this.pending = [];
    this.mistaken = false;
    this.queue = [...(this.options.scoreLineEnd ? `${this.text} ` : this.text)];
  }
}
