import { spawn, type ChildProcess } from "node:child_process";
import { mkdir, open } from "node:fs/promises";
import { join } from "node:path";
import { systemClock, type Clock } from "./clock";
import { normalizeCommand, probeCommand } from "./command";
import { moduleLogger, type Logger } from "./logger";
import type { RuntimeAdapter } from "./runtime";
import type { StateStore } from "./state-store";
import type { HealthCheck, ServiceConfig } from "./types";

export interface ProcessRuntimeOptions {
  store: StateStore;
  clock?: Clock;
  logger?: Logger;
  /** How long a fresh process must survive before Start counts as successful. */
  settleMs?: number;
  stopGraceMs?: number;
  baseEnv?: NodeJS.ProcessEnv;
}

const POLL_MS = 50;
const KILL_WAIT_MS = 1_000;

export const isProcessAlive = (pid: number): boolean => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: alive but owned by someone else
    return error instanceof Error && "code" in error && error.code === "EPERM";
  }
};

const spawned = (child: ChildProcess): Promise<void> =>
  new Promise((resolve, reject) => {
    child.once("spawn", () => resolve());
    child.once("error", reject);
  });

/** Resolves with the exit code, or `null` if the process is still running after `ms`. */
const exitWithin = (child: ChildProcess, ms: number, clock: Clock): Promise<number | null> => {
  const controller = new AbortController();
  return Promise.race([
    new Promise<number | null>((resolve) => {
      child.once("exit", (code) => resolve(code ?? 1));
    }),
    clock.sleep(ms, controller.signal).then(() => null),
  ]).finally(() => controller.abort());
};

/** Runs services as detached local processes, one log file per service. */
export class ProcessRuntime implements RuntimeAdapter {
  private readonly store: StateStore;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly settleMs: number;
  private readonly stopGraceMs: number;
  private readonly baseEnv: NodeJS.ProcessEnv;

  constructor(options: ProcessRuntimeOptions) {
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? moduleLogger("process-runtime");
    this.settleMs = options.settleMs ?? 250;
    this.stopGraceMs = options.stopGraceMs ?? 10_000;
    this.baseEnv = options.baseEnv ?? process.env;
  }

  async start(spec: ServiceConfig): Promise<void> {
    const existing = this.store.get(spec.name)?.pid;
    if (existing !== undefined && isProcessAlive(existing)) {
      this.log.info({ service: spec.name, pid: existing }, "already running");
      return;
    }

    const [file, ...args] = normalizeCommand(spec.command);
    await mkdir(this.store.logDir, { recursive: true });
    const output = await open(join(this.store.logDir, `${spec.name}.log`), "a");

    try {
      const child = spawn(file, args, {
        cwd: spec.working_dir,
        env: { ...this.baseEnv, ...spec.env },
        detached: true,
        stdio: ["ignore", output.fd, output.fd],
      });
      const exited = exitWithin(child, this.settleMs, this.clock);
      await spawned(child);

      const code = await exited;
      if (code !== null && code !== 0) {
        throw new Error(`${spec.name} exited with code ${code}`);
      }

      child.unref();
      this.store.recordPid(spec.name, code === null ? child.pid : undefined);
      this.log.debug({ service: spec.name, pid: child.pid, argv: [file, ...args] }, "started");
    } finally {
      await output.close();
    }
  }

  async stop(spec: ServiceConfig): Promise<void> {
    const pid = this.store.get(spec.name)?.pid;
    if (pid === undefined || !isProcessAlive(pid)) {
      this.store.recordPid(spec.name, undefined);
      return;
    }

    this.signal(pid, "SIGTERM");
    if (await this.waitForExit(pid, this.stopGraceMs)) {
      this.store.recordPid(spec.name, undefined);
      return;
    }

    this.log.warn({ service: spec.name, pid }, "did not stop within grace period, killing");
    this.signal(pid, "SIGKILL");
    if (!(await this.waitForExit(pid, KILL_WAIT_MS))) {
      throw new Error(`${spec.name} (pid ${pid}) is still running after SIGKILL`);
    }
    this.store.recordPid(spec.name, undefined);
  }

  async probe(spec: ServiceConfig, check: HealthCheck, signal: AbortSignal): Promise<boolean> {
    const [file, ...args] = probeCommand(check.test);
    const child = spawn(file, args, {
      cwd: spec.working_dir,
      env: { ...this.baseEnv, ...spec.env },
      stdio: "ignore",
      signal,
    });

    return new Promise<boolean>((resolve, reject) => {
      child.once("exit", (code) => resolve(code === 0));
      child.once("error", (error) => {
        if (signal.aborted) {
          resolve(false);
          return;
        }
        reject(error);
      });
    });
  }

  private async waitForExit(pid: number, ms: number): Promise<boolean> {
    const deadline = this.clock.now() + ms;
    while (this.clock.now() < deadline) {
      if (!isProcessAlive(pid)) return true;
      await this.clock.sleep(POLL_MS);
    }
    return !isProcessAlive(pid);
  }

  private signal(pid: number, signal: NodeJS.Signals) {
    try {
      // detached children lead their own process group
      process.kill(-pid, signal);
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "ESRCH")) {
        throw error;
      }
    }
  }
}
