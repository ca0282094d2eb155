import type { ProfileSummary, SessionSnapshot, SessionStep } from "@keyline/engine-core/src/types";
import type { EngineRequestBody, Port } from "./protocol";
import { EngineResponse, LettersResult, ProfileResult, ProfilesResult, SnapshotResult, StepResult } from "./protocol";

type Pending = {
  resolve: (payload: unknown) => void;
  reject: (err: Error) => void;
};

export class EngineWorkerClient {
  private port: Port;
  private nextId = 1;
  private pending = new Map<number, Pending>();

  constructor(port: Port) {
    this.port = port;
    this.port.on("message", this.onMessage);
  }

  async applyChar(char: string): Promise<SessionStep> {
    return StepResult.parse(await this.rpc({ type: "key", payload: { char } }));
  }

  async backspace(): Promise<SessionSnapshot> {
    return SnapshotResult.parse(await this.rpc({ type: "backspace" }));
  }

  async snapshot(): Promise<SessionSnapshot> {
    return SnapshotResult.parse(await this.rpc({ type: "snapshot" }));
  }

  async cleanLetters(): Promise<Array<[string, number]>> {
    return LettersResult.parse(await this.rpc({ type: "letters" }));
  }

  async profiles(): Promise<ProfileSummary[]> {
    return ProfilesResult.parse(await this.rpc({ type: "profiles" }));
  }

  async selectProfile(index: number): Promise<boolean> {
    const selected = await this.rpc({ type: "select", payload: { index } });
    return selected === true;
  }

  async addProfile(name: string, layout: string): Promise<ProfileSummary> {
    return ProfileResult.parse(await this.rpc({ type: "add_profile", payload: { name, layout } }));
  }

  async save(path: string): Promise<void> {
    await this.rpc({ type: "save", payload: { path } });
  }

  close(): void {
    this.port.off("message", this.onMessage);
    for (const { reject } of this.pending.values()) reject(new Error("engine client closed"));
    this.pending.clear();
  }

  private onMessage = (data: unknown): void => {
    const parsed = EngineResponse.safeParse(data);
    if (!parsed.success) return;
    const response = parsed.data;
    const entry = this.pending.get(response.id);
    if (!entry) return;
    this.pending.delete(response.id);
    if (response.ok) entry.resolve(response.payload);
    else entry.reject(new Error(response.error));
  };

  private rpc(body: EngineRequestBody): Promise<unknown> {
    const id = this.nextId++;
    return new Promise<unknown>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      this.port.postMessage({ id, ...body });
    });
  }
}
