import { readFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import dotenv from "dotenv";
import { parse, stringify } from "smol-toml";
import { isDisabledProbe, normalizeCommand, probeCommand } from "./command";
import { DEFAULT_MANIFEST } from "./config";
import { parseDuration } from "./duration";
import { GraphError, ManifestError } from "./errors";
import { buildGraph, type ServiceGraph } from "./graph";
import {
  escapeInterpolation,
  interpolate,
  type MissingEnvPolicy,
} from "./interpolate";
import { moduleLogger, type Logger } from "./logger";
import type {
  CommandSpec,
  HealthCheck,
  OpaqueValue,
  RestartPolicy,
  ServiceConfig,
} from "./types";

export interface Manifest {
  services: ServiceConfig[];
  graph: ServiceGraph;
  path: string;
}

export interface ParseOptions {
  variables: Record<string, string | undefined>;
  missingEnv?: MissingEnvPolicy;
  logger?: Logger;
}

export interface LoadOptions {
  envFile?: string;
  missingEnv?: MissingEnvPolicy;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

type Table = Record<string, unknown>;

const HEALTHCHECK_DEFAULTS = {
  interval: 30_000,
  timeout: 30_000,
  retries: 3,
  start_period: 0,
};

const validServiceKeys = new Set([
  "name",
  "command",
  "depends_on",
  "healthcheck",
  "env",
  "working_dir",
  "restart_policy",
  "image",
  "build",
  "ports",
  "volumes",
]);

const validHealthcheckKeys = new Set(["test", "interval", "timeout", "retries", "start_period"]);

const validRestartPolicies = new Set<string>(["no", "on-failure", "always", "unless-stopped"]);

const isTable = (value: unknown): value is Table =>
  value !== null && typeof value === "object" && !Array.isArray(value) && !(value instanceof Date);

const isOpaque = (value: unknown): value is OpaqueValue => {
  if (["string", "number", "boolean"].includes(typeof value) || value instanceof Date) return true;
  if (Array.isArray(value)) return value.every(isOpaque);
  if (isTable(value)) return Object.values(value).every(isOpaque);
  return false;
};

const isStringList = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const isRestartPolicy = (value: unknown): value is RestartPolicy =>
  typeof value === "string" && validRestartPolicies.has(value);

const rejectUnknownKeys = (raw: Table, valid: Set<string>, where: string) => {
  const unknownKeys = Object.keys(raw).filter((key) => !valid.has(key));
  if (unknownKeys.length > 0) {
    throw new ManifestError(`${where} has unknown keys: ${unknownKeys.join(", ")}`);
  }
};

const normalizeCommandSpec = (value: unknown, where: string): CommandSpec => {
  if (typeof value === "string") return value;
  if (isStringList(value)) return value;
  throw new ManifestError(`${where} must be string or string[]`);
};

const normalizeEnv = (env: unknown, where: string): Record<string, string> => {
  if (env === undefined) return {};
  if (!isTable(env)) {
    throw new ManifestError(`${where} must be a table of string values`);
  }
  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined) continue;
    if (value === null) {
      normalized[key] = "";
      continue;
    }
    if (typeof value === "string") {
      normalized[key] = value;
      continue;
    }
    if (typeof value === "number" || typeof value === "boolean") {
      normalized[key] = String(value);
      continue;
    }
    throw new ManifestError(`${where}.${key} must be string | number | boolean`);
  }
  return normalized;
};

const normalizeHealthcheck = (raw: unknown, where: string): HealthCheck | undefined => {
  if (raw === undefined) return undefined;
  if (!isTable(raw)) {
    throw new ManifestError(`${where} must be a table`);
  }
  rejectUnknownKeys(raw, validHealthcheckKeys, where);

  const test = normalizeCommandSpec(raw.test, `${where}.test`);
  if (isDisabledProbe(test)) return undefined;
  try {
    probeCommand(test);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ManifestError(`${where}.test: ${message}`);
  }

  const retries = raw.retries ?? HEALTHCHECK_DEFAULTS.retries;
  if (typeof retries !== "number" || !Number.isInteger(retries) || retries < 1) {
    throw new ManifestError(`${where}.retries must be a positive integer`);
  }

  return {
    test,
    interval: parseDuration(raw.interval ?? HEALTHCHECK_DEFAULTS.interval, `${where}.interval`),
    timeout: parseDuration(raw.timeout ?? HEALTHCHECK_DEFAULTS.timeout, `${where}.timeout`),
    retries,
    start_period: parseDuration(
      raw.start_period ?? HEALTHCHECK_DEFAULTS.start_period,
      `${where}.start_period`,
    ),
  };
};

const optionalOpaqueList = (value: unknown, where: string): OpaqueValue[] | undefined => {
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every(isOpaque)) {
    throw new ManifestError(`${where} must be an array`);
  }
  return value;
};

const normalizeService = (raw: unknown, index: number): ServiceConfig => {
  const where = `service[${index}]`;
  if (!isTable(raw)) {
    throw new ManifestError(`${where} must be a table`);
  }
  rejectUnknownKeys(raw, validServiceKeys, where);

  if (typeof raw.name !== "string" || raw.name.length === 0) {
    throw new ManifestError(`${where}.name must be a string`);
  }

  const command = normalizeCommandSpec(raw.command, `${where}.command`);
  try {
    normalizeCommand(command);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ManifestError(`${where}.command: ${message}`);
  }

  if (raw.depends_on !== undefined && !isStringList(raw.depends_on)) {
    throw new ManifestError(`${where}.depends_on must be string[]`);
  }

  if (raw.working_dir !== undefined && typeof raw.working_dir !== "string") {
    throw new ManifestError(`${where}.working_dir must be a string`);
  }

  if (raw.restart_policy !== undefined && !isRestartPolicy(raw.restart_policy)) {
    throw new ManifestError(
      `${where}.restart_policy must be one of no | on-failure | always | unless-stopped`,
    );
  }

  if (raw.image !== undefined && typeof raw.image !== "string") {
    throw new ManifestError(`${where}.image must be a string`);
  }

  if (raw.build !== undefined && !isOpaque(raw.build)) {
    throw new ManifestError(`${where}.build must be a string or table`);
  }

  return {
    name: raw.name,
    command,
    depends_on: raw.depends_on ?? [],
    healthcheck: normalizeHealthcheck(raw.healthcheck, `${where}.healthcheck`),
    env: normalizeEnv(raw.env, `${where}.env`),
    working_dir: raw.working_dir,
    restart_policy: raw.restart_policy ?? "no",
    image: raw.image,
    build: raw.build,
    ports: optionalOpaqueList(raw.ports, `${where}.ports`),
    volumes: optionalOpaqueList(raw.volumes, `${where}.volumes`),
  };
};

const resolveEnv = (service: ServiceConfig, options: ParseOptions): Record<string, string> => {
  const log = options.logger ?? moduleLogger("manifest");
  const resolved: Record<string, string> = {};

  for (const [key, template] of Object.entries(service.env)) {
    const onMissing = (variable: string): string => {
      if (options.missingEnv === "empty") {
        log.warn({ service: service.name, key, variable }, "variable is not set, substituting empty string");
        return "";
      }
      throw new GraphError(
        "MissingEnv",
        `Service ${service.name}: env.${key} references unset variable ${variable}`,
        [service.name],
      );
    };

    try {
      resolved[key] = interpolate(template, {
        lookup: (variable) => options.variables[variable],
        onMissing,
      });
    } catch (error) {
      if (error instanceof GraphError && error.services.length === 0) {
        throw new GraphError(error.kind, `Service ${service.name}: env.${key} ${error.message}`, [
          service.name,
        ]);
      }
      throw error;
    }
  }
  return resolved;
};

/** Parses manifest text into validated services with `env` already interpolated. */
export const parseManifest = (contents: string, options: ParseOptions): ServiceConfig[] => {
  let parsed: Table;
  try {
    parsed = parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ManifestError(`Invalid TOML: ${message}`);
  }

  rejectUnknownKeys(parsed, new Set(["service"]), "manifest");
  const services = parsed.service ?? [];
  if (!Array.isArray(services)) {
    throw new ManifestError("service must be an array of tables");
  }

  return services
    .map((service, index) => normalizeService(service, index))
    .map((service) => ({ ...service, env: resolveEnv(service, options) }));
};

const readEnvFile = async (path: string, required: boolean): Promise<Record<string, string>> => {
  try {
    return dotenv.parse(await readFile(path, "utf8"));
  } catch (error) {
    if (!required && error instanceof Error && "code" in error && error.code === "ENOENT") {
      return {};
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ManifestError(`Cannot read env file ${path}: ${message}`);
  }
};

export const loadManifest = async (
  path: string = DEFAULT_MANIFEST,
  options: LoadOptions = {},
): Promise<Manifest> => {
  const manifestPath = resolve(path);
  let contents: string;
  try {
    contents = await readFile(manifestPath, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ManifestError(`Manifest not found: ${path} (${message})`);
  }

  const fileVariables = await readEnvFile(
    options.envFile ?? join(dirname(manifestPath), ".env"),
    options.envFile !== undefined,
  );

  const services = parseManifest(contents, {
    variables: { ...fileVariables, ...(options.env ?? process.env) },
    missingEnv: options.missingEnv,
    logger: options.logger,
  });

  return {
    services,
    graph: buildGraph(services),
    path: manifestPath,
  };
};

const serviceToTable = (service: ServiceConfig): Table => {
  const table: Table = {
    name: service.name,
    command: service.command,
    depends_on: service.depends_on,
    restart_policy: service.restart_policy,
  };
  if (service.working_dir !== undefined) table.working_dir = service.working_dir;
  if (service.image !== undefined) table.image = service.image;
  if (service.build !== undefined) table.build = service.build;
  if (service.ports !== undefined) table.ports = service.ports;
  if (service.volumes !== undefined) table.volumes = service.volumes;
  table.env = Object.fromEntries(
    Object.entries(service.env).map(([key, value]) => [key, escapeInterpolation(value)]),
  );
  if (service.healthcheck) table.healthcheck = { ...service.healthcheck };
  return table;
};

/** Renders resolved services back to manifest TOML; `parseManifest` reads it back unchanged. */
export const serializeManifest = (services: readonly ServiceConfig[]): string =>
  stringify({ service: services.map(serviceToTable) });
