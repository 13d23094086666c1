import chalk from "chalk";
import type { ServiceGraph } from "./graph";
import type { StateSnapshot } from "./state-store";
import type { OrchestrationResult, ServiceState } from "./types";

/** `EXITED`: recorded as ready but its process is gone. */
export type DisplayState = ServiceState | "EXITED";

export interface ReportRow {
  name: string;
  state: DisplayState;
  reason?: string;
  detail?: string;
}

const palette = {
  muted: "#7f8c9a",
  accent: "#6cb6ff",
  success: "#45c97a",
  warn: "#f4b259",
  error: "#ef5b5b",
};

const stateColor = (state: DisplayState): string => {
  switch (state) {
    case "READY":
    case "STOPPED":
      return palette.success;
    case "STARTING":
    case "HEALTH_CHECKING":
    case "STOPPING":
      return palette.accent;
    case "TIMED_OUT":
    case "CANCELLED":
    case "EXITED":
      return palette.warn;
    case "FAILED":
      return palette.error;
    case "PENDING":
    default:
      return palette.muted;
  }
};

const HEADER = ["SERVICE", "STATE", "REASON", "DETAIL"];

export const formatTable = (rows: readonly ReportRow[], options: { color?: boolean } = {}): string => {
  const paint = new chalk.Instance({ level: options.color ? 2 : 0 });
  const cells = rows.map((row) => [row.name, row.state, row.reason ?? "-", row.detail ?? "-"]);
  const widths = HEADER.map((title, column) =>
    Math.max(title.length, ...cells.map((line) => line[column].length)),
  );

  const render = (line: string[], state?: DisplayState) =>
    line
      .map((cell, column) => {
        const padded = column < line.length - 1 ? cell.padEnd(widths[column]) : cell;
        return column === 1 && state ? paint.hex(stateColor(state))(padded) : padded;
      })
      .join("  ")
      .trimEnd();

  return [
    render(HEADER),
    ...rows.map((row, index) => render(cells[index], row.state)),
  ].join("\n");
};

export const rowsFromResult = (result: OrchestrationResult): ReportRow[] =>
  Object.entries(result.services).map(([name, outcome]) => ({
    name,
    state: outcome.state,
    reason: outcome.reason,
    detail: outcome.message,
  }));

/** One row per service in dependency order, from what the state file last recorded. */
export const rowsFromSnapshot = (
  graph: ServiceGraph,
  snapshot: StateSnapshot,
  isAlive: (pid: number) => boolean,
): ReportRow[] =>
  graph.order.map((name) => {
    const record = snapshot.services[name];
    if (!record) {
      return { name, state: "PENDING" };
    }
    const exited = record.state === "READY" && record.pid !== undefined && !isAlive(record.pid);
    return {
      name,
      state: exited ? "EXITED" : record.state,
      reason: record.reason,
      detail: record.pid !== undefined && !exited ? `pid ${record.pid}` : record.message,
    };
  });
