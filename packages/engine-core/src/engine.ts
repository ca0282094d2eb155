import type { Profile, ProfileState, ProfileStoreOptions } from "./profile";
import type { EngineConfigInput, TEngineConfig } from "./config";
import type { ProfileSummary, Rng, SessionSnapshot, SessionStep } from "./types";
import { ProfileStore } from "./profile";
import { WordSource } from "./freq";
import { TriplePoint } from "./metric";
import { createConfig } from "./config";
import { loadProfilesOrDefault, loadWordSourceOrDefault, saveProfiles } from "./storage";
import { createLogger } from "./log";

const log = createLogger("engine");

export type EngineLoadOptions = {
  corpusPath: string;
  profilesPath: string;
  config?: EngineConfigInput;
  rng?: Rng;
};

export type EngineOptions = {
  rng?: Rng;
};

export function metricFromConfig(config: TEngineConfig): TriplePoint {
  const { lo, mid, hi } = config.metric;
  const metric = TriplePoint.orDefault(lo, mid, hi);
  if (metric.lo !== lo || metric.mid !== mid || metric.hi !== hi) {
    log.warn(`invalid metric breakpoints (${lo}, ${mid}, ${hi}), using default`);
  }
  return metric;
}

export class Engine {
  readonly config: TEngineConfig;
  readonly source: WordSource;
  readonly profiles: ProfileStore;
  readonly metric: TriplePoint;
  private readonly rng: Rng;

  constructor(source: WordSource, profiles: ProfileStore, config: TEngineConfig = createConfig(), options: EngineOptions = {}) {
    this.source = source;
    this.profiles = profiles;
    this.config = config;
    this.metric = metricFromConfig(config);
    this.rng = options.rng ?? Math.random;
  }

  static create(source: WordSource = WordSource.default(), config: EngineConfigInput = {}, options: ProfileStoreOptions = {}): Engine {
    const resolved = createConfig(config);
    return new Engine(source, new ProfileStore(source, resolved, [], 0, options), resolved, options);
  }

  static async load(options: EngineLoadOptions): Promise<Engine> {
    const config = createConfig(options.config);
    const source = await loadWordSourceOrDefault(options.corpusPath);
    const profiles = await loadProfilesOrDefault(options.profilesPath, source, config, { rng: options.rng });
    return new Engine(source, profiles, config, { rng: options.rng });
  }

  active(): Profile {
    return this.profiles.active();
  }

  applyChar(c: string): SessionStep {
    const { session, tracker } = this.profiles.active();
    const step = session.applyChar(c);
    if (step.status === "completed") {
      const request = tracker.addLine(step.line, session.pendingWords);
      if (request) {
        const words = this.source.sampleWords(request.count, request.focus, this.rng);
        log.debug(`refill ${words.length} words`, request.focus);
        session.updateWords(words);
      }
      session.fillNextLines();
    }
    this.profiles.touch();
    return step;
  }

  backspace(): void {
    this.profiles.session().backspace();
    this.profiles.touch();
  }

  fillNextLines(): void {
    this.profiles.session().fillNextLines();
    this.profiles.touch();
  }

  snapshot(): SessionSnapshot {
    return this.profiles.session().snapshot();
  }

  cleanLetters(): Array<[string, number]> {
    return this.profiles.active().tracker.cleanLetters();
  }

  severity(ratio: number): number {
    return this.metric.value(ratio);
  }

  listProfiles(): ProfileSummary[] {
    return this.profiles.list();
  }

  selectProfile(index: number): boolean {
    return this.profiles.select(index);
  }

  addProfile(name: string, layout: string): ProfileSummary {
    const { name: added, layout: addedLayout } = this.profiles.add(name, layout);
    return { name: added, layout: addedLayout };
  }

  subscribe(listener: (state: ProfileState) => void): () => void {
    return this.profiles.subscribe(listener);
  }

  async save(profilesPath: string): Promise<void> {
    await saveProfiles(profilesPath, this.profiles);
    log.info(`saved ${this.profiles.list().length} profiles to ${profilesPath}`);
  }
}
