import { describe, it, expect } from "vitest";
import { isDisabledProbe, normalizeCommand, probeCommand } from "../command";
import { parseDuration } from "../duration";
import { ManifestError } from "../errors";

describe("normalizeCommand", () => {
  it("splits on whitespace", () => {
    expect(normalizeCommand("uvicorn main:app --host 0.0.0.0 --port 8000")).toEqual([
      "uvicorn",
      "main:app",
      "--host",
      "0.0.0.0",
      "--port",
      "8000",
    ]);
  });

  it("keeps quoted arguments together", () => {
    expect(normalizeCommand(`echo "hello world" 'single quoted' esc\\ aped ""`)).toEqual([
      "echo",
      "hello world",
      "single quoted",
      "esc aped",
      "",
    ]);
  });

  it("passes argv arrays through", () => {
    expect(normalizeCommand(["mysqladmin", "ping", "-h", "localhost"])).toEqual([
      "mysqladmin",
      "ping",
      "-h",
      "localhost",
    ]);
  });

  it("rejects shell syntax", () => {
    expect(() => normalizeCommand("npm start && tail -f log")).toThrow(
      "command contains shell operator '&'. Use an argv array instead of shell syntax.",
    );
  });

  it("rejects empty commands and unbalanced quotes", () => {
    expect(() => normalizeCommand("   ")).toThrow("command must not be empty");
    expect(() => normalizeCommand([])).toThrow("command array must not be empty");
    expect(() => normalizeCommand(`echo "open`)).toThrow("command has unclosed quotes");
  });
});

describe("probeCommand", () => {
  it("runs CMD tests directly", () => {
    expect(probeCommand(["CMD", "mysqladmin", "ping", "-h", "localhost"])).toEqual([
      "mysqladmin",
      "ping",
      "-h",
      "localhost",
    ]);
  });

  it("runs CMD-SHELL tests and plain strings through the shell", () => {
    expect(probeCommand(["CMD-SHELL", "curl -f http://localhost:8000 || exit 1"])).toEqual([
      "/bin/sh",
      "-c",
      "curl -f http://localhost:8000 || exit 1",
    ]);
    expect(probeCommand("pg_isready")).toEqual(["/bin/sh", "-c", "pg_isready"]);
  });

  it("treats an array without a marker as argv", () => {
    expect(probeCommand(["redis-cli", "ping"])).toEqual(["redis-cli", "ping"]);
  });

  it("recognises the NONE marker", () => {
    expect(isDisabledProbe(["NONE"])).toBe(true);
    expect(isDisabledProbe("NONE")).toBe(false);
    expect(() => probeCommand(["NONE"])).toThrow("healthcheck.test NONE has no command");
  });
});

describe("parseDuration", () => {
  it("reads compose-style durations", () => {
    expect(parseDuration("10s", "interval")).toBe(10_000);
    expect(parseDuration("1m30s", "interval")).toBe(90_000);
    expect(parseDuration("250ms", "interval")).toBe(250);
    expect(parseDuration("1h", "interval")).toBe(3_600_000);
    expect(parseDuration("1.5s", "interval")).toBe(1_500);
  });

  it("takes plain numbers as milliseconds", () => {
    expect(parseDuration(5_000, "timeout")).toBe(5_000);
    expect(parseDuration(0, "timeout")).toBe(0);
  });

  it("rejects anything else", () => {
    expect(() => parseDuration("10", "healthcheck.interval")).toThrow(
      'healthcheck.interval has invalid duration "10"',
    );
    expect(() => parseDuration(-1, "timeout")).toThrow("timeout must be a non-negative duration");
    expect(() => parseDuration(true, "timeout")).toThrow(
      'timeout must be a duration like "10s" or a number of milliseconds',
    );
  });

  it("rejects durations a timer cannot hold", () => {
    expect(parseDuration("596h", "interval")).toBe(2_145_600_000);
    expect(parseDuration(2_147_483_647, "interval")).toBe(2_147_483_647);
    expect(() => parseDuration("600h", "healthcheck.interval")).toThrow(
      new ManifestError("healthcheck.interval must be at most 2147483647ms (about 24 days)"),
    );
    expect(() => parseDuration(2_147_483_648, "start_period")).toThrow(
      "start_period must be at most 2147483647ms (about 24 days)",
    );
  });
});
