export type RestartPolicy = "no" | "on-failure" | "always" | "unless-stopped";

export type ServiceState =
  | "PENDING"
  | "STARTING"
  | "HEALTH_CHECKING"
  | "READY"
  | "FAILED"
  | "TIMED_OUT"
  | "CANCELLED"
  | "STOPPING"
  | "STOPPED";

export type ServiceErrorKind =
  | "StartFailed"
  | "HealthTimedOut"
  | "HealthCheckFailed"
  | "DependencyFailed"
  | "Cancelled"
  | "StopFailed";

export type CommandSpec = string | string[];

/** Values the orchestrator carries through untouched (image, ports, volumes, build). */
export type OpaqueValue =
  | string
  | number
  | boolean
  | Date
  | OpaqueValue[]
  | { [key: string]: OpaqueValue };

export interface HealthCheck {
  test: CommandSpec;
  /** Delay before each probe, in milliseconds. */
  interval: number;
  /** Upper bound for a single probe, in milliseconds. */
  timeout: number;
  retries: number;
  /** Grace period before the first probe, in milliseconds. */
  start_period: number;
}

export interface ServiceConfig {
  name: string;
  command: CommandSpec;
  depends_on: string[];
  healthcheck?: HealthCheck;
  env: Record<string, string>;
  working_dir?: string;
  restart_policy: RestartPolicy;
  image?: string;
  build?: OpaqueValue;
  ports?: OpaqueValue[];
  volumes?: OpaqueValue[];
}

export interface ServiceOutcome {
  state: ServiceState;
  reason?: ServiceErrorKind;
  message?: string;
  /** Start attempts, or probe attempts once health checking began. */
  attempts?: number;
}

export interface OrchestrationResult {
  ok: boolean;
  services: Record<string, ServiceOutcome>;
}
