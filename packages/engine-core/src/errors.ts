export class IOError extends Error {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`cannot read ${path}`, { cause });
    this.name = "IOError";
    this.path = path;
  }
}

export class FormatError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "FormatError";
  }
}

export class InvalidRangeError extends Error {
  constructor(lo: number, mid: number, hi: number) {
    super(`breakpoints must satisfy 0 <= lo <= mid <= hi <= 1, got (${lo}, ${mid}, ${hi})`);
    this.name = "InvalidRangeError";
  }
}

// Thrown only when the profile store lost its non-empty invariant.
export class NoActiveProfileError extends Error {
  constructor(index: number, size: number) {
    super(`no active profile at index ${index} of ${size}`);
    this.name = "NoActiveProfileError";
  }
}
