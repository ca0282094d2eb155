import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { TEngineConfig } from "./config";
import type { ProfileStoreOptions } from "./profile";
import { ProfileStore } from "./profile";
import { WordSource, parseFreqTable } from "./freq";
import { FormatError, IOError } from "./errors";
import { createLogger } from "./log";

const log = createLogger("storage");

export const PROFILES_VERSION = 1;

const LetterStatRecord = z.object({
  clean: z.number().int().nonnegative(),
  dirty: z.number().int().nonnegative()
});

export const ProfileRecord = z.object({
  name: z.string().min(1),
  layout: z.string().min(1),
  letters: z.record(z.string().refine((k) => [...k].length === 1, "letter keys are single characters"), LetterStatRecord).default({})
});

export const ProfilesFile = z.object({
  version: z.literal(PROFILES_VERSION),
  active: z.number().int().nonnegative().default(0),
  profiles: z.array(ProfileRecord)
});

export type TProfilesFile = z.infer<typeof ProfilesFile>;

async function readText(file: string): Promise<string> {
  try {
    return await fs.readFile(file, "utf8");
  } catch (err) {
    throw new IOError(file, err);
  }
}

export async function loadWordSource(file: string): Promise<WordSource> {
  const source = parseFreqTable(await readText(file));
  log.info(`corpus ${file}: ${source.size} words, ${source.skipped} skipped`);
  return source;
}

export async function loadWordSourceOrDefault(file: string): Promise<WordSource> {
  try {
    return await loadWordSource(file);
  } catch (err) {
    if (!(err instanceof IOError)) throw err;
    log.warn(`corpus unavailable, using fallback vocabulary: ${err.message}`);
    return WordSource.default();
  }
}

export function parseProfiles(text: string): TProfilesFile {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new FormatError("profile store is not valid JSON", err);
  }
  const parsed = ProfilesFile.safeParse(json);
  if (!parsed.success) {
    throw new FormatError(`profile store does not match schema v${PROFILES_VERSION}: ${parsed.error.issues[0]?.message ?? "invalid"}`, parsed.error);
  }
  return parsed.data;
}

export function storeFromRecord(record: TProfilesFile, source: WordSource, config: TEngineConfig, options?: ProfileStoreOptions): ProfileStore {
  return new ProfileStore(source, config, record.profiles, record.active, options);
}

export function storeToRecord(store: ProfileStore): TProfilesFile {
  return { version: PROFILES_VERSION, active: store.activeIndex, profiles: store.toSeeds() };
}

export async function loadProfiles(file: string, source: WordSource, config: TEngineConfig, options?: ProfileStoreOptions): Promise<ProfileStore> {
  const record = parseProfiles(await readText(file));
  log.info(`profiles ${file}: ${record.profiles.length} loaded`);
  return storeFromRecord(record, source, config, options);
}

export async function loadProfilesOrDefault(file: string, source: WordSource, config: TEngineConfig, options?: ProfileStoreOptions): Promise<ProfileStore> {
  try {
    return await loadProfiles(file, source, config, options);
  } catch (err) {
    if (!(err instanceof IOError || err instanceof FormatError)) throw err;
    log.warn(`profiles unavailable, starting with default profile: ${err.message}`);
    return new ProfileStore(source, config, [], 0, options);
  }
}

export async function saveProfiles(file: string, store: ProfileStore): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, JSON.stringify(storeToRecord(store), null, 2) + "\n", "utf8");
}
