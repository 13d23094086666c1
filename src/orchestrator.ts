import { systemClock, type Clock } from "./clock";
import type { ServiceGraph } from "./graph";
import { moduleLogger, type Logger } from "./logger";
import type { RuntimeAdapter } from "./runtime";
import type {
  HealthCheck,
  OrchestrationResult,
  ServiceConfig,
  ServiceOutcome,
  ServiceState,
} from "./types";

export type OrchestratorEvent =
  | { type: "state"; name: string; outcome: ServiceOutcome }
  | { type: "probe"; name: string; attempt: number; healthy: boolean };

type OrchestratorSubscriber = (event: OrchestratorEvent) => void;

export interface OrchestratorOptions {
  clock?: Clock;
  logger?: Logger;
  /** Start attempts for services whose restart policy retries. */
  maxStartAttempts?: number;
  restartDelayMs?: number;
}

export interface UpOptions {
  signal?: AbortSignal;
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class Orchestrator {
  private readonly graph: ServiceGraph;
  private readonly runtime: RuntimeAdapter;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly maxStartAttempts: number;
  private readonly restartDelayMs: number;
  private readonly outcomes = new Map<string, ServiceOutcome>();
  private readonly subscribers: Set<OrchestratorSubscriber> = new Set();

  constructor(graph: ServiceGraph, runtime: RuntimeAdapter, options: OrchestratorOptions = {}) {
    this.graph = graph;
    this.runtime = runtime;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? moduleLogger("orchestrator");
    this.maxStartAttempts = Math.max(1, options.maxStartAttempts ?? 3);
    this.restartDelayMs = options.restartDelayMs ?? 1_000;
    for (const name of graph.order) {
      this.outcomes.set(name, { state: "PENDING" });
    }
  }

  subscribe(handler: OrchestratorSubscriber): () => void {
    this.subscribers.add(handler);
    return () => this.subscribers.delete(handler);
  }

  getOutcome(name: string): ServiceOutcome | undefined {
    const outcome = this.outcomes.get(name);
    return outcome ? { ...outcome } : undefined;
  }

  /**
   * Starts every service once its dependencies are ready. Independent
   * services start concurrently; failures stay local to the failing
   * service and whatever depends on it.
   */
  async up(options: UpOptions = {}): Promise<OrchestrationResult> {
    const { signal } = options;
    for (const name of this.graph.order) {
      this.setOutcome(name, { state: "PENDING" });
    }

    const tasks = new Map<string, Promise<ServiceOutcome>>();
    const bringUp = (name: string): Promise<ServiceOutcome> => {
      const existing = tasks.get(name);
      if (existing) return existing;
      const task = this.bringUpService(this.spec(name), bringUp, signal);
      tasks.set(name, task);
      return task;
    };

    await Promise.all(this.graph.order.map(bringUp));
    return this.result("READY");
  }

  /**
   * Stops services in reverse dependency order: a service is stopped only
   * after everything that depends on it has been stopped. Stop failures are
   * recorded and teardown carries on.
   */
  async down(): Promise<OrchestrationResult> {
    const tasks = new Map<string, Promise<void>>();
    const tearDown = (name: string): Promise<void> => {
      const existing = tasks.get(name);
      if (existing) return existing;
      const task = this.tearDownService(name, tearDown);
      tasks.set(name, task);
      return task;
    };

    await Promise.all([...this.graph.order].reverse().map(tearDown));
    return this.result("STOPPED");
  }

  private async bringUpService(
    spec: ServiceConfig,
    bringUp: (name: string) => Promise<ServiceOutcome>,
    signal: AbortSignal | undefined,
  ): Promise<ServiceOutcome> {
    const dependencies = await Promise.all(
      spec.depends_on.map(async (name) => ({ name, outcome: await bringUp(name) })),
    );

    if (signal?.aborted) {
      return this.cancel(spec.name);
    }

    const blocked = dependencies.find(({ outcome }) => outcome.state !== "READY");
    if (blocked) {
      if (blocked.outcome.state === "CANCELLED") {
        return this.cancel(spec.name);
      }
      return this.setOutcome(spec.name, {
        state: "FAILED",
        reason: "DependencyFailed",
        message: `dependency ${blocked.name} is ${blocked.outcome.state}`,
      });
    }

    const started = await this.startService(spec, signal);
    if (started.state !== "STARTING") {
      return started;
    }

    if (!spec.healthcheck) {
      return this.setOutcome(spec.name, { state: "READY", attempts: started.attempts });
    }
    return this.awaitHealthy(spec, spec.healthcheck, signal);
  }

  private async startService(
    spec: ServiceConfig,
    signal: AbortSignal | undefined,
  ): Promise<ServiceOutcome> {
    const maxAttempts = spec.restart_policy === "no" ? 1 : this.maxStartAttempts;

    for (let attempt = 1; ; attempt += 1) {
      this.setOutcome(spec.name, { state: "STARTING", attempts: attempt });
      try {
        await this.runtime.start(spec, signal);
      } catch (error) {
        if (signal?.aborted) {
          return this.cancel(spec.name);
        }
        if (attempt >= maxAttempts) {
          return this.setOutcome(spec.name, {
            state: "FAILED",
            reason: "StartFailed",
            message: errorMessage(error),
            attempts: attempt,
          });
        }
        this.log.warn(
          { service: spec.name, attempt, err: errorMessage(error) },
          "start failed, retrying",
        );
        if (!(await this.pause(this.restartDelayMs, signal))) {
          return this.cancel(spec.name);
        }
        continue;
      }

      if (signal?.aborted) {
        return this.cancel(spec.name);
      }
      return { state: "STARTING", attempts: attempt };
    }
  }

  private async awaitHealthy(
    spec: ServiceConfig,
    check: HealthCheck,
    signal: AbortSignal | undefined,
  ): Promise<ServiceOutcome> {
    this.setOutcome(spec.name, { state: "HEALTH_CHECKING", attempts: 0 });
    if (check.start_period > 0 && !(await this.pause(check.start_period, signal))) {
      return this.cancel(spec.name);
    }

    for (let attempt = 1; attempt <= check.retries; attempt += 1) {
      if (!(await this.pause(check.interval, signal))) {
        return this.cancel(spec.name);
      }

      let healthy: boolean;
      try {
        healthy = await this.probeOnce(spec, check, signal);
      } catch (error) {
        if (signal?.aborted) {
          return this.cancel(spec.name);
        }
        return this.setOutcome(spec.name, {
          state: "FAILED",
          reason: "HealthCheckFailed",
          message: errorMessage(error),
          attempts: attempt,
        });
      }

      this.emit({ type: "probe", name: spec.name, attempt, healthy });
      if (signal?.aborted) {
        return this.cancel(spec.name);
      }
      if (healthy) {
        return this.setOutcome(spec.name, { state: "READY", attempts: attempt });
      }
      this.setOutcome(spec.name, { state: "HEALTH_CHECKING", attempts: attempt });
    }

    return this.setOutcome(spec.name, {
      state: "TIMED_OUT",
      reason: "HealthTimedOut",
      message: `not healthy after ${check.retries} probes`,
      attempts: check.retries,
    });
  }

  /** One probe bounded by the check's timeout; a timed-out probe counts as unhealthy. */
  private async probeOnce(
    spec: ServiceConfig,
    check: HealthCheck,
    signal: AbortSignal | undefined,
  ): Promise<boolean> {
    const controller = new AbortController();
    const forward = () => controller.abort();
    signal?.addEventListener("abort", forward, { once: true });
    try {
      return await Promise.race([
        this.runtime.probe(spec, check, controller.signal),
        this.clock.sleep(check.timeout, controller.signal).then(() => false),
      ]);
    } finally {
      signal?.removeEventListener("abort", forward);
      controller.abort();
    }
  }

  private async tearDownService(
    name: string,
    tearDown: (name: string) => Promise<void>,
  ): Promise<void> {
    await Promise.all((this.graph.dependents.get(name) ?? []).map(tearDown));

    this.setOutcome(name, { state: "STOPPING" });
    try {
      await this.runtime.stop(this.spec(name));
      this.setOutcome(name, { state: "STOPPED" });
    } catch (error) {
      this.setOutcome(name, {
        state: "FAILED",
        reason: "StopFailed",
        message: errorMessage(error),
      });
    }
  }

  /** Sleeps on the injected clock; false when the signal aborted first. */
  private async pause(ms: number, signal: AbortSignal | undefined): Promise<boolean> {
    if (signal?.aborted) return false;
    try {
      await this.clock.sleep(ms, signal);
      return true;
    } catch (error) {
      if (signal?.aborted) return false;
      throw error;
    }
  }

  private cancel(name: string): ServiceOutcome {
    return this.setOutcome(name, { state: "CANCELLED", reason: "Cancelled", message: "cancelled" });
  }

  private spec(name: string): ServiceConfig {
    const spec = this.graph.services.get(name);
    if (!spec) {
      throw new Error(`Service ${name} is not part of the graph`);
    }
    return spec;
  }

  private result(success: ServiceState): OrchestrationResult {
    const services: Record<string, ServiceOutcome> = {};
    for (const name of this.graph.order) {
      services[name] = { ...(this.outcomes.get(name) ?? { state: "PENDING" }) };
    }
    const ok = Object.values(services).every((outcome) => outcome.state === success);
    return { ok, services };
  }

  private setOutcome(name: string, outcome: ServiceOutcome): ServiceOutcome {
    this.outcomes.set(name, outcome);
    const level = outcome.reason && outcome.reason !== "Cancelled" ? "warn" : "debug";
    this.log[level](
      { service: name, state: outcome.state, reason: outcome.reason, detail: outcome.message },
      `${name} ${outcome.state}`,
    );
    this.emit({ type: "state", name, outcome: { ...outcome } });
    return outcome;
  }

  private emit(event: OrchestratorEvent) {
    for (const subscriber of this.subscribers) {
      subscriber(event);
    }
  }
}

export const up = (
  graph: ServiceGraph,
  runtime: RuntimeAdapter,
  options: OrchestratorOptions & UpOptions = {},
): Promise<OrchestrationResult> => new Orchestrator(graph, runtime, options).up(options);

export const down = (
  graph: ServiceGraph,
  runtime: RuntimeAdapter,
  options: OrchestratorOptions = {},
): Promise<OrchestrationResult> => new Orchestrator(graph, runtime, options).down();
