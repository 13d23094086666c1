import { Command, Option } from "commander";
import { resolve } from "node:path";
import type { Clock } from "./clock";
import { loadConfig, type LineupConfig } from "./config";
import { selectServices, serviceList } from "./graph";
import { parseMissingEnvPolicy } from "./interpolate";
import { logger, moduleLogger } from "./logger";
import { loadManifest, serializeManifest, type Manifest } from "./manifest";
import { Orchestrator } from "./orchestrator";
import { isProcessAlive, ProcessRuntime } from "./process-runtime";
import { formatTable, rowsFromResult, rowsFromSnapshot } from "./report";
import type { RuntimeAdapter } from "./runtime";
import { StateStore } from "./state-store";

export interface CliIo {
  stdout: (text: string) => void;
  setExitCode: (code: number) => void;
  color: boolean;
}

export interface CliDeps {
  io: CliIo;
  env: NodeJS.ProcessEnv;
  clock?: Clock;
  createRuntime: (store: StateStore, config: LineupConfig) => RuntimeAdapter;
  isAlive: (pid: number) => boolean;
  /** Wire SIGINT/SIGTERM to cancel a running `up`. */
  handleSignals: boolean;
}

type GlobalOptions = {
  file?: string;
  envFile?: string;
  missingEnv?: string;
  stateDir?: string;
  verbose?: boolean;
};

const defaultDeps = (): CliDeps => ({
  io: {
    stdout: (text) => console.log(text),
    setExitCode: (code) => {
      process.exitCode = code;
    },
    color: Boolean(process.stdout.isTTY),
  },
  env: process.env,
  createRuntime: (store, config) => new ProcessRuntime({ store, stopGraceMs: config.stopGraceMs }),
  isAlive: isProcessAlive,
  handleSignals: true,
});

const resolveConfig = (options: GlobalOptions, env: NodeJS.ProcessEnv): LineupConfig => {
  const base = loadConfig(env);
  const config: LineupConfig = {
    ...base,
    manifestPath: options.file ?? base.manifestPath,
    envFile: options.envFile ?? base.envFile,
    stateDir: options.stateDir ?? base.stateDir,
    missingEnv:
      options.missingEnv !== undefined ? parseMissingEnvPolicy(options.missingEnv) : base.missingEnv,
  };
  logger.level = options.verbose ? "debug" : config.logLevel;
  return config;
};

const openManifest = (config: LineupConfig, env: NodeJS.ProcessEnv): Promise<Manifest> =>
  loadManifest(config.manifestPath, {
    envFile: config.envFile,
    missingEnv: config.missingEnv,
    env,
  });

/** For commands that only need names and edges: unset variables never fail the load. */
const openGraphOnly = (config: LineupConfig, env: NodeJS.ProcessEnv): Promise<Manifest> =>
  loadManifest(config.manifestPath, {
    envFile: config.envFile,
    missingEnv: "empty",
    env,
    logger: moduleLogger("manifest").child({}, { level: "error" }),
  });

/** Cancels `up` on the first SIGINT/SIGTERM; returns the detach function. */
const cancelOnSignals = (controller: AbortController): (() => void) => {
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn({ signal }, "cancelling startup");
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  return () => {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  };
};

export const createProgram = (overrides: Partial<CliDeps> = {}): Command => {
  const deps: CliDeps = { ...defaultDeps(), ...overrides };
  const { io } = deps;
  const program = new Command();

  program
    .name("lineup")
    .description("Bring services up in dependency order, gated on health checks")
    .option("-f, --file <path>", "manifest path")
    .option("--env-file <path>", "variables for interpolation (default: .env beside the manifest)")
    .addOption(
      new Option("--missing-env <policy>", "what an unset variable becomes").choices([
        "error",
        "empty",
      ]),
    )
    .option("--state-dir <dir>", "where state and service logs are kept")
    .option("-v, --verbose", "debug logging");

  const setup = async (open: typeof openManifest = openManifest) => {
    const config = resolveConfig(program.opts<GlobalOptions>(), deps.env);
    const manifest = await open(config, deps.env);
    const store = new StateStore(resolve(config.stateDir));
    await store.load();
    store.setManifest(manifest.path);
    return { config, manifest, store };
  };

  program
    .command("up")
    .description("start services and wait until they are ready")
    .argument("[services...]", "only these services and their dependencies")
    .action(async (names: string[]) => {
      const { config, manifest, store } = await setup();
      const graph = selectServices(manifest.graph, names);
      const orchestrator = new Orchestrator(graph, deps.createRuntime(store, config), {
        clock: deps.clock,
      });
      orchestrator.subscribe((event) => {
        if (event.type === "state") {
          store.recordOutcome(event.name, event.outcome);
        }
      });

      const controller = new AbortController();
      const detach = deps.handleSignals ? cancelOnSignals(controller) : () => undefined;
      try {
        const result = await orchestrator.up({ signal: controller.signal });
        io.stdout(formatTable(rowsFromResult(result), { color: io.color }));
        io.setExitCode(result.ok ? 0 : 1);
      } finally {
        detach();
        await store.save();
      }
    });

  program
    .command("down")
    .description("stop services, dependents first")
    .action(async () => {
      const { config, manifest, store } = await setup(openGraphOnly);
      const orchestrator = new Orchestrator(manifest.graph, deps.createRuntime(store, config), {
        clock: deps.clock,
      });
      orchestrator.subscribe((event) => {
        if (event.type === "state") {
          store.recordOutcome(event.name, event.outcome);
        }
      });

      try {
        const result = await orchestrator.down();
        io.stdout(formatTable(rowsFromResult(result), { color: io.color }));
        io.setExitCode(result.ok ? 0 : 1);
      } finally {
        await store.save();
      }
    });

  program
    .command("status")
    .description("show the last recorded state of each service")
    .action(async () => {
      const { manifest, store } = await setup(openGraphOnly);
      const rows = rowsFromSnapshot(manifest.graph, store.current(), deps.isAlive);
      io.stdout(formatTable(rows, { color: io.color }));
      io.setExitCode(0);
    });

  program
    .command("config")
    .description("print the resolved manifest")
    .action(async () => {
      const config = resolveConfig(program.opts<GlobalOptions>(), deps.env);
      const manifest = await openManifest(config, deps.env);
      io.stdout(serializeManifest(serviceList(manifest.graph)).trimEnd());
      io.setExitCode(0);
    });

  return program;
};

export const run = async (argv: string[] = process.argv): Promise<void> => {
  await createProgram().parseAsync(argv);
};
