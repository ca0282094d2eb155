export type Word = string;

export type Line = string;

export type Rng = () => number;

export type Hit = {
  target: string;
  dirty: boolean;
};

export type CompletedLine = {
  text: Line;
  hits: Hit[];
};

export type SessionStep =
  | { status: "in_progress" }
  | { status: "completed"; line: CompletedLine };

export type LetterStat = {
  clean: number;
  dirty: number;
};

export type WordRequest = {
  count: number;
  focus: string[];
};

export type SessionSnapshot = {
  line: Line;
  hits: Hit[];
  errors: string[];
  activeTarget: string | null;
  targets: string[];
  nextLines: Line[];
};

export type ProfileSummary = {
  name: string;
  layout: string;
};
