import { createStore } from "zustand/vanilla";
import type { StoreApi } from "zustand/vanilla";
import type { ProfileSummary, Rng } from "./types";
import type { TEngineConfig } from "./config";
import type { TrackerRecord } from "./tracker";
import { ProficiencyTracker } from "./tracker";
import { Session } from "./session";
import { TextFeed } from "./text_feed";
import { WordSource } from "./freq";
import { NoActiveProfileError } from "./errors";

export const DEFAULT_PROFILE: ProfileSeed = { name: "default", layout: "qwerty", letters: {} };

export type ProfileSeed = ProfileSummary & {
  letters: TrackerRecord;
};

export type Profile = ProfileSummary & {
  tracker: ProficiencyTracker;
  session: Session;
};

export type ProfileState = {
  profiles: Profile[];
  activeIndex: number;
  revision: number;
};

export type ProfileStoreOptions = {
  rng?: Rng;
};

export function createProfile(source: WordSource, config: TEngineConfig, seed: ProfileSeed, rng?: Rng): Profile {
  const feed = new TextFeed(source, { charsPerLine: config.charsPerLine, rng });
  return {
    name: seed.name,
    layout: seed.layout,
    tracker: new ProficiencyTracker(config, seed.letters),
    session: new Session(feed, config)
  };
}

export class ProfileStore {
  private readonly source: WordSource;
  private readonly config: TEngineConfig;
  private readonly rng: Rng | undefined;
  private readonly store: StoreApi<ProfileState>;

  constructor(source: WordSource, config: TEngineConfig, seeds: ProfileSeed[] = [], activeIndex = 0, options: ProfileStoreOptions = {}) {
    this.source = source;
    this.config = config;
    this.rng = options.rng;
    const profiles = (seeds.length > 0 ? seeds : [DEFAULT_PROFILE]).map((seed) => createProfile(source, config, seed, this.rng));
    const index = Number.isInteger(activeIndex) && activeIndex >= 0 && activeIndex < profiles.length ? activeIndex : 0;
    this.store = createStore<ProfileState>()(() => ({ profiles, activeIndex: index, revision: 0 }));
  }

  get activeIndex(): number {
    return this.store.getState().activeIndex;
  }

  get revision(): number {
    return this.store.getState().revision;
  }

  list(): ProfileSummary[] {
    return this.store.getState().profiles.map(({ name, layout }) => ({ name, layout }));
  }

  active(): Profile {
    const { profiles, activeIndex } = this.store.getState();
    const profile = profiles[activeIndex];
    if (!profile) throw new NoActiveProfileError(activeIndex, profiles.length);
    return profile;
  }

  session(): Session {
    return this.active().session;
  }

  select(index: number): boolean {
    const { profiles } = this.store.getState();
    if (!Number.isInteger(index) || index < 0 || index >= profiles.length) return false;
    this.store.setState((s) => ({ activeIndex: index, revision: s.revision + 1 }));
    return true;
  }

  add(name: string, layout: string): Profile {
    const profile = createProfile(this.source, this.config, { name, layout, letters: {} }, this.rng);
    this.store.setState((s) => ({ profiles: [...s.profiles, profile], revision: s.revision + 1 }));
    return profile;
  }

  touch(): void {
    this.store.setState((s) => ({ revision: s.revision + 1 }));
  }

  subscribe(listener: (state: ProfileState) => void): () => void {
    return this.store.subscribe((state) => listener(state));
  }

  toSeeds(): ProfileSeed[] {
    return this.store.getState().profiles.map((p) => ({ name: p.name, layout: p.layout, letters: p.tracker.toRecord() }));
  }
}
