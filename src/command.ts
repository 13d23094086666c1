import { ManifestError } from "./errors";
import type { CommandSpec } from "./types";

const SHELL = ["/bin/sh", "-c"];

const splitArgs = (input: string): string[] => {
  const args: string[] = [];
  let current = "";
  let pending = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < input.length; i += 1) {
    const ch = input.charAt(i);
    if (ch === "\\" && quote !== "'" && i + 1 < input.length) {
      current += input.charAt(i + 1);
      pending = true;
      i += 1;
      continue;
    }
    if (quote !== null) {
      if (ch === quote) {
        quote = null;
      } else {
        current += ch;
      }
      continue;
    }
    if (ch === "'" || ch === '"') {
      quote = ch;
      pending = true;
      continue;
    }
    if (/\s/.test(ch)) {
      if (pending) {
        args.push(current);
        current = "";
        pending = false;
      }
      continue;
    }
    current += ch;
    pending = true;
  }

  if (quote !== null) {
    throw new ManifestError("command has unclosed quotes");
  }
  if (pending) {
    args.push(current);
  }
  return args;
};

const shellOperators = ["|", "&", ";", ">", "<", "`", "$"];

/**
 * Turns a command into argv. Strings are split on whitespace honouring quotes
 * and backslash escapes; shell syntax is rejected, use an array or a
 * `CMD-SHELL` health test instead.
 */
export const normalizeCommand = (command: CommandSpec): string[] => {
  if (Array.isArray(command)) {
    if (command.length === 0 || command[0] === "") {
      throw new ManifestError("command array must not be empty");
    }
    return [...command];
  }

  const raw = command.trim();
  if (raw.length === 0) {
    throw new ManifestError("command must not be empty");
  }

  const operator = shellOperators.find((op) => raw.includes(op));
  if (operator !== undefined) {
    throw new ManifestError(
      `command contains shell operator '${operator}'. Use an argv array instead of shell syntax.`,
    );
  }
  return splitArgs(raw);
};

/** True when a health test is the compose `["NONE"]` marker. */
export const isDisabledProbe = (test: CommandSpec): boolean =>
  Array.isArray(test) && test.length === 1 && test[0] === "NONE";

/**
 * Resolves a health test to argv the way compose reads `healthcheck.test`:
 * a plain string runs through the shell, `["CMD", ...]` runs directly and
 * `["CMD-SHELL", script]` runs the script through the shell.
 */
export const probeCommand = (test: CommandSpec): string[] => {
  if (typeof test === "string") {
    if (test.trim().length === 0) {
      throw new ManifestError("healthcheck.test must not be empty");
    }
    return [...SHELL, test];
  }

  const [head, ...rest] = test;
  if (head === "CMD") {
    return normalizeCommand(rest);
  }
  if (head === "CMD-SHELL") {
    if (rest.length === 0) {
      throw new ManifestError("healthcheck.test CMD-SHELL needs a script");
    }
    return [...SHELL, rest.join(" ")];
  }
  if (head === "NONE") {
    throw new ManifestError("healthcheck.test NONE has no command");
  }
  return normalizeCommand(test);
};
