import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { ServiceErrorKind, ServiceOutcome, ServiceState } from "./types";

export interface ServiceRecord {
  state: ServiceState;
  reason?: ServiceErrorKind;
  message?: string;
  pid?: number;
  updated_at: string;
}

export interface StateSnapshot {
  manifest?: string;
  services: Record<string, ServiceRecord>;
}

const STATE_FILE = "state.json";

const timestamp = (): string => new Date().toISOString();

/**
 * What the CLI remembers between invocations: the last known state of each
 * service and the pid the process runtime started it under.
 */
export class StateStore {
  readonly dir: string;
  private snapshot: StateSnapshot = { services: {} };

  constructor(dir: string) {
    this.dir = dir;
  }

  get path(): string {
    return join(this.dir, STATE_FILE);
  }

  get logDir(): string {
    return join(this.dir, "logs");
  }

  async load(): Promise<StateSnapshot> {
    let contents: string;
    try {
      contents = await readFile(this.path, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        this.snapshot = { services: {} };
        return this.current();
      }
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(contents);
      this.snapshot = isSnapshot(parsed) ? parsed : { services: {} };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`State file ${this.path} is corrupt: ${message}`);
    }
    return this.current();
  }

  current(): StateSnapshot {
    return {
      ...this.snapshot,
      services: Object.fromEntries(
        Object.entries(this.snapshot.services).map(([name, record]) => [name, { ...record }]),
      ),
    };
  }

  get(name: string): ServiceRecord | undefined {
    return this.snapshot.services[name];
  }

  setManifest(path: string): void {
    this.snapshot.manifest = path;
  }

  recordOutcome(name: string, outcome: ServiceOutcome): void {
    const previous = this.snapshot.services[name];
    this.snapshot.services[name] = {
      state: outcome.state,
      reason: outcome.reason,
      message: outcome.message,
      pid: outcome.state === "STOPPED" ? undefined : previous?.pid,
      updated_at: timestamp(),
    };
  }

  recordPid(name: string, pid: number | undefined): void {
    const previous = this.snapshot.services[name];
    this.snapshot.services[name] = {
      state: previous?.state ?? "STARTING",
      reason: previous?.reason,
      message: previous?.message,
      pid,
      updated_at: timestamp(),
    };
  }

  async save(): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const temp = `${this.path}.tmp`;
    await writeFile(temp, `${JSON.stringify(this.snapshot, null, 2)}\n`, "utf8");
    await rename(temp, this.path);
  }
}

const isSnapshot = (value: unknown): value is StateSnapshot =>
  typeof value === "object" &&
  value !== null &&
  "services" in value &&
  typeof value.services === "object" &&
  value.services !== null;
