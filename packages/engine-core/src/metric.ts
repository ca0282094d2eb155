import { InvalidRangeError } from "./errors";

function lerp(x: number, from: number, to: number, outFrom: number, outTo: number): number {
  if (to <= from) return outTo;
  return outFrom + ((x - from) / (to - from)) * (outTo - outFrom);
}

/**
 * Three-breakpoint normalisation of a ratio in [0, 1] onto a display
 * severity in [0, 1]: `lo` maps to 0, `mid` to 0.5 and `hi` to 1.
 */
export class TriplePoint {
  readonly lo: number;
  readonly mid: number;
  readonly hi: number;

  private constructor(lo: number, mid: number, hi: number) {
    this.lo = lo;
    this.mid = mid;
    this.hi = hi;
  }

  static create(lo: number, mid: number, hi: number): TriplePoint {
    // Negated so NaN fails too.
    if (!(0 <= lo && lo <= mid && mid <= hi && hi <= 1)) {
      throw new InvalidRangeError(lo, mid, hi);
    }
    return new TriplePoint(lo, mid, hi);
  }

  static default(): TriplePoint {
    return new TriplePoint(0.25, 0.5, 0.75);
  }

  static orDefault(lo: number, mid: number, hi: number): TriplePoint {
    try {
      return TriplePoint.create(lo, mid, hi);
    } catch (err) {
      if (err instanceof InvalidRangeError) return TriplePoint.default();
      throw err;
    }
  }

  value(x: number): number {
    if (x <= this.lo) return 0;
    if (x <= this.mid) return lerp(x, this.lo, this.mid, 0, 0.5);
    if (x <= this.hi) return lerp(x, this.mid, this.hi, 0.5, 1);
    return 1;
  }
}
