import type { HealthCheck, ServiceConfig } from "./types";

/**
 * What the orchestrator asks of whatever actually runs services. Each call
 * rejects on failure; the orchestrator turns rejections into per-service
 * outcomes.
 */
export interface RuntimeAdapter {
  start(spec: ServiceConfig, signal?: AbortSignal): Promise<void>;
  stop(spec: ServiceConfig): Promise<void>;
  /**
   * Resolves `true` once the service is healthy and `false` when it is not
   * yet; a rejection means the probe itself is broken.
   */
  probe(spec: ServiceConfig, check: HealthCheck, signal: AbortSignal): Promise<boolean>;
}
