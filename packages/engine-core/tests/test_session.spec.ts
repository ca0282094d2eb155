import { describe, it, expect } from "vitest";
import { Session } from "../src/session";
import { TextFeed } from "../src/text_feed";
import { sourceOf } from "./helpers";

function catSession(scoreLineEnd = false, maxErrors = 5): Session {
  const feed = new TextFeed(sourceOf({ cat: 1 }), { charsPerLine: 3 });
  return new Session(feed, { maxErrors, nextLines: 2, scoreLineEnd });
}

describe("session", () => {
  it("loads a line and fills the lookahead on creation", () => {
    const s = catSession();
    expect(s.line).toBe("cat");
    expect(s.activeTarget).toBe("c");
    expect(s.targets).toEqual(["c", "a", "t"]);
    expect(s.nextLines).toEqual(["cat", "cat"]);
  });

  it("completes a cleanly typed line with clean hits", () => {
    const s = catSession();
    expect(s.applyChar("c")).toEqual({ status: "in_progress" });
    expect(s.applyChar("a")).toEqual({ status: "in_progress" });
    const step = s.applyChar("t");
    expect(step).toEqual({
      status: "completed",
      line: {
        text: "cat",
        hits: [
          { target: "c", dirty: false },
          { target: "a", dirty: false },
          { target: "t", dirty: false }
        ]
      }
    });
    expect(s.hits).toEqual([]);
    expect(s.activeTarget).toBe("c");
    expect(s.nextLines).toHaveLength(2);
  });

  it("marks a hit dirty after a mistake and clears the error buffer", () => {
    const s = catSession();
    s.applyChar("x");
    expect(s.errors).toEqual(["x"]);
    s.applyChar("c");
    expect(s.hits).toEqual([{ target: "c", dirty: true }]);
    expect(s.errors).toEqual([]);
    expect(s.activeTarget).toBe("a");
  });

  it("drops mistakes beyond maxErrors - 1", () => {
    const s = catSession(false, 5);
    for (let i = 0; i < 10; i++) s.applyChar("x");
    expect(s.errors).toEqual(["x", "x", "x", "x"]);
    expect(s.errorBound).toBe(4);
  });

  it("marks a hit dirty even when the mistake was not buffered", () => {
    const s = catSession(false, 1);
    expect(s.errorBound).toBe(0);
    s.applyChar("x");
    expect(s.errors).toEqual([]);
    s.applyChar("c");
    expect(s.hits).toEqual([{ target: "c", dirty: true }]);
    s.applyChar("a");
    expect(s.hits[1]).toEqual({ target: "a", dirty: false });
  });

  it("keeps a hit dirty after its mistake is erased", () => {
    const s = catSession();
    s.applyChar("x");
    s.backspace();
    s.applyChar("c");
    expect(s.hits).toEqual([{ target: "c", dirty: true }]);
  });

  it("records a space typed in place of a letter as a mistake", () => {
    const s = catSession();
    s.applyChar(" ");
    expect(s.errors).toEqual([" "]);
  });

  it("ignores characters that are neither alphanumeric nor space", () => {
    const s = catSession();
    const before = s.snapshot();
    for (const c of ["!", "\n", "\t", "-", "ab", ""]) expect(s.applyChar(c)).toEqual({ status: "in_progress" });
    expect(s.snapshot()).toEqual(before);
  });

  it("backspace removes the most recent pending mistake", () => {
    const s = catSession();
    s.applyChar("x");
    s.applyChar("y");
    s.backspace();
    expect(s.errors).toEqual(["x"]);
  });

  it("backspace on an empty error buffer changes nothing", () => {
    const s = catSession();
    s.applyChar("c");
    const before = s.snapshot();
    s.backspace();
    s.backspace();
    expect(s.snapshot()).toEqual(before);
    expect(s.hits).toEqual([{ target: "c", dirty: false }]);
  });

  it("scores the trailing space when line ends are scored", () => {
    const s = catSession(true);
    expect(s.targets).toEqual(["c", "a", "t", " "]);
    s.applyChar("c");
    s.applyChar("a");
    expect(s.applyChar("t")).toEqual({ status: "in_progress" });
    expect(s.activeTarget).toBe(" ");
    const step = s.applyChar(" ");
    expect(step.status).toBe("completed");
    if (step.status === "completed") {
      expect(step.line.hits).toHaveLength(4);
      expect(step.line.hits[3]).toEqual({ target: " ", dirty: false });
    }
  });

  it("snapshots are copies", () => {
    const s = catSession();
    const snap = s.snapshot();
    s.applyChar("x");
    expect(snap.errors).toEqual([]);
    expect(snap).toEqual({
      line: "cat",
      hits: [],
      errors: [],
      activeTarget: "c",
      targets: ["c", "a", "t"],
      nextLines: ["cat", "cat"]
    });
  });
});
