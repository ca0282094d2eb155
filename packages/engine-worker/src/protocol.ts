import { z } from "zod";

export type Port = {
  postMessage(value: unknown): void;
  on(event: "message", listener: (value: unknown) => void): unknown;
  off(event: "message", listener: (value: unknown) => void): unknown;
};

const id = z.number().int();

export const EngineRequest = z.discriminatedUnion("type", [
  z.object({ id, type: z.literal("key"), payload: z.object({ char: z.string() }) }),
  z.object({ id, type: z.literal("backspace") }),
  z.object({ id, type: z.literal("snapshot") }),
  z.object({ id, type: z.literal("letters") }),
  z.object({ id, type: z.literal("profiles") }),
  z.object({ id, type: z.literal("select"), payload: z.object({ index: z.number().int() }) }),
  z.object({ id, type: z.literal("add_profile"), payload: z.object({ name: z.string().min(1), layout: z.string().min(1) }) }),
  z.object({ id, type: z.literal("save"), payload: z.object({ path: z.string().min(1) }) })
]);

export type TEngineRequest = z.infer<typeof EngineRequest>;

type WithoutId<T> = T extends unknown ? Omit<T, "id"> : never;

export type EngineRequestBody = WithoutId<TEngineRequest>;

export const EngineResponse = z.union([
  z.object({ id, ok: z.literal(true), payload: z.unknown() }),
  z.object({ id, ok: z.literal(false), error: z.string() })
]);

export type TEngineResponse = z.infer<typeof EngineResponse>;

const Hit = z.object({ target: z.string(), dirty: z.boolean() });

export const StepResult = z.discriminatedUnion("status", [
  z.object({ status: z.literal("in_progress") }),
  z.object({ status: z.literal("completed"), line: z.object({ text: z.string(), hits: z.array(Hit) }) })
]);

export const SnapshotResult = z.object({
  line: z.string(),
  hits: z.array(Hit),
  errors: z.array(z.string()),
  activeTarget: z.string().nullable(),
  targets: z.array(z.string()),
  nextLines: z.array(z.string())
});

export const LettersResult = z.array(z.tuple([z.string(), z.number()]));

export const ProfileResult = z.object({ name: z.string(), layout: z.string() });

export const ProfilesResult = z.array(ProfileResult);

export function requestId(data: unknown): number {
  if (typeof data === "object" && data !== null && "id" in data && typeof data.id === "number") return data.id;
  return -1;
}
