import { parseMissingEnvPolicy, type MissingEnvPolicy } from "./interpolate";

export interface LineupConfig {
  manifestPath: string;
  /** Unset means `.env` beside the manifest, if present. */
  envFile?: string;
  stateDir: string;
  missingEnv: MissingEnvPolicy;
  stopGraceMs: number;
  logLevel: string;
}

export const DEFAULT_MANIFEST = "lineup.toml";
export const DEFAULT_STATE_DIR = ".lineup";

const readInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): LineupConfig => ({
  manifestPath: env.LINEUP_FILE ?? DEFAULT_MANIFEST,
  envFile: env.LINEUP_ENV_FILE,
  stateDir: env.LINEUP_STATE_DIR ?? DEFAULT_STATE_DIR,
  missingEnv: parseMissingEnvPolicy(env.LINEUP_MISSING_ENV),
  stopGraceMs: readInt(env.LINEUP_STOP_GRACE_MS, 10_000),
  logLevel: env.LOG_LEVEL ?? "info",
});
