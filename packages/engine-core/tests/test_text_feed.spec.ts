import { describe, it, expect } from "vitest";
import { TextFeed } from "../src/text_feed";
import { FALLBACK_WORDS } from "../src/freq";
import { sourceOf } from "./helpers";

describe("text feed", () => {
  it("keeps every line within the column budget and fills to depth", () => {
    const feed = new TextFeed(sourceOf({ a: 5, to: 4, the: 3, word: 2, extraordinarily: 1, seven: 1 }), { charsPerLine: 10 });
    feed.fillNextLines(5);
    expect(feed.nextLines).toHaveLength(5);
    for (const line of feed.nextLines) {
      expect(line.length).toBeLessThanOrEqual(10);
      expect(line.length).toBeGreaterThan(0);
      expect(line.split(" ")).not.toContain("extraordinarily");
    }
  });

  it("is idempotent once depth is reached", () => {
    const feed = new TextFeed(sourceOf({ cat: 1, dog: 1 }), { charsPerLine: 12 });
    feed.fillNextLines(3);
    const before = [...feed.nextLines];
    feed.fillNextLines(3);
    feed.fillNextLines(2);
    expect(feed.nextLines).toEqual(before);
  });

  it("packs queued words greedily and defers overflow to the next line", () => {
    const feed = new TextFeed(sourceOf({ zz: 1 }), { charsPerLine: 8 });
    feed.updateWords(["abc", "defg", "hi"]);
    expect(feed.pendingWords).toBe(3);
    feed.fillNextLines(2);
    expect(feed.nextLines).toEqual(["abc defg", "hi zz zz"]);
    expect(feed.pendingWords).toBe(0);
  });

  it("places injected words ahead of sampled ones", () => {
    const feed = new TextFeed(sourceOf({ zz: 1 }), { charsPerLine: 13 });
    feed.updateWords(["one", "two", "three"]);
    feed.fillNextLines(1);
    expect(feed.nextLines).toEqual(["one two three"]);
  });

  it("advances to the first buffered line and refills", () => {
    const feed = new TextFeed(sourceOf({ cat: 1, dog: 1 }), { charsPerLine: 12 });
    feed.fillNextLines(2);
    const first = feed.nextLines[0];
    const second = feed.nextLines[1];
    expect(feed.advanceLine(2)).toBe(first);
    expect(feed.nextLines).toHaveLength(2);
    expect(feed.nextLines[0]).toBe(second);
  });

  it("falls back when no sampled word fits", () => {
    const feed = new TextFeed(sourceOf({ abcdefghijkl: 1 }), { charsPerLine: 8 });
    feed.fillNextLines(2);
    for (const line of feed.nextLines) {
      expect(line.length).toBeLessThanOrEqual(8);
      for (const word of line.split(" ")) expect(FALLBACK_WORDS).toContain(word);
    }
  });

  it("skips injected words that cannot be typed", () => {
    const feed = new TextFeed(sourceOf({ zz: 1 }), { charsPerLine: 8 });
    feed.updateWords(["don't", "ab"]);
    feed.fillNextLines(1);
    expect(feed.nextLines).toEqual(["ab zz zz"]);
    expect(feed.pendingWords).toBe(0);
  });

  it("measures the column budget in code points", () => {
    const word = "\u{1D49C}".repeat(3);
    const feed = new TextFeed(sourceOf({ [word]: 1 }), { charsPerLine: 8 });
    feed.fillNextLines(1);
    expect(feed.nextLines).toEqual([`${word} ${word}`]);
  });
});
