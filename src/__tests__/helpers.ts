import pino from "pino";
import type { Clock } from "../clock";
import type { RuntimeAdapter } from "../runtime";
import type { HealthCheck, ServiceConfig } from "../types";

export const silentLogger = pino({ level: "silent" });

export const service = (name: string, overrides: Partial<ServiceConfig> = {}): ServiceConfig => ({
  name,
  command: ["run", name],
  depends_on: [],
  env: {},
  restart_policy: "no",
  ...overrides,
});

export const healthcheck = (overrides: Partial<HealthCheck> = {}): HealthCheck => ({
  test: ["CMD", "ping"],
  interval: 1_000,
  timeout: 5_000,
  retries: 3,
  start_period: 0,
  ...overrides,
});

const abortError = () => Object.assign(new Error("The operation was aborted"), { name: "AbortError" });

interface Timer {
  at: number;
  seq: number;
  fire: () => void;
}

/**
 * Virtual time. Pending sleeps fire one at a time, earliest first, once
 * everything else in flight has settled, so concurrent tasks interleave the
 * way they would on a real clock without any real waiting.
 */
export class ManualClock implements Clock {
  private current = 0;
  private seq = 0;
  private timers: Timer[] = [];
  private scheduled = false;

  now(): number {
    return this.current;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortError());
        return;
      }
      const onAbort = () => {
        this.timers = this.timers.filter((timer) => timer !== entry);
        reject(abortError());
      };
      const entry: Timer = {
        at: this.current + ms,
        seq: this.seq++,
        fire: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.timers.push(entry);
      this.schedule();
    });
  }

  private schedule() {
    if (this.scheduled) return;
    this.scheduled = true;
    setImmediate(() => this.fireNext());
  }

  private fireNext() {
    this.scheduled = false;
    this.timers.sort((a, b) => a.at - b.at || a.seq - b.seq);
    const next = this.timers.shift();
    if (!next) return;
    this.current = Math.max(this.current, next.at);
    next.fire();
    if (this.timers.length > 0) this.schedule();
  }
}

export interface FakeScript {
  startDelayMs?: number;
  /** Fail this many start attempts before succeeding. */
  startFailures?: number;
  failStart?: boolean;
  /** Result of each probe in turn; the last entry repeats. `"error"` rejects, `"hang"` never settles. */
  probes?: Array<boolean | "error" | "hang">;
  stopDelayMs?: number;
  failStop?: boolean;
}

export interface FakeCall {
  op: "start" | "started" | "probe" | "stop" | "stopped";
  name: string;
  at: number;
}

export class FakeRuntime implements RuntimeAdapter {
  readonly calls: FakeCall[] = [];
  private readonly clock: ManualClock;
  private readonly scripts: Record<string, FakeScript>;
  private readonly startCounts = new Map<string, number>();
  private readonly probeCounts = new Map<string, number>();

  constructor(clock: ManualClock, scripts: Record<string, FakeScript> = {}) {
    this.clock = clock;
    this.scripts = scripts;
  }

  callsOf(op: FakeCall["op"]): FakeCall[] {
    return this.calls.filter((call) => call.op === op);
  }

  async start(spec: ServiceConfig): Promise<void> {
    const script = this.scripts[spec.name] ?? {};
    const count = (this.startCounts.get(spec.name) ?? 0) + 1;
    this.startCounts.set(spec.name, count);
    this.record("start", spec.name);
    if (script.startDelayMs) {
      await this.clock.sleep(script.startDelayMs);
    }
    if (script.failStart || count <= (script.startFailures ?? 0)) {
      throw new Error(`${spec.name} failed to start`);
    }
    this.record("started", spec.name);
  }

  async stop(spec: ServiceConfig): Promise<void> {
    const script = this.scripts[spec.name] ?? {};
    this.record("stop", spec.name);
    if (script.stopDelayMs) {
      await this.clock.sleep(script.stopDelayMs);
    }
    if (script.failStop) {
      throw new Error(`${spec.name} refused to stop`);
    }
    this.record("stopped", spec.name);
  }

  async probe(spec: ServiceConfig): Promise<boolean> {
    const probes = this.scripts[spec.name]?.probes ?? [true];
    const count = (this.probeCounts.get(spec.name) ?? 0) + 1;
    this.probeCounts.set(spec.name, count);
    this.record("probe", spec.name);

    const result = probes[Math.min(count, probes.length) - 1];
    if (result === "error") {
      throw new Error(`${spec.name} probe is broken`);
    }
    if (result === "hang") {
      return new Promise<boolean>(() => undefined);
    }
    return result ?? true;
  }

  private record(op: FakeCall["op"], name: string) {
    this.calls.push({ op, name, at: this.clock.now() });
  }
}
