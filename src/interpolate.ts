import { GraphError, ManifestError } from "./errors";

export type MissingEnvPolicy = "error" | "empty";

export interface InterpolateOptions {
  lookup: (name: string) => string | undefined;
  /** Called for `$VAR` / `${VAR}` with no value; returns the replacement or throws. */
  onMissing: (name: string) => string;
}

const NAME = /^[A-Za-z_][A-Za-z0-9_]*/;
const BRACED = /^([A-Za-z_][A-Za-z0-9_]*)(?:(:-|-|:\?|\?)([\s\S]*))?$/;

const expandBraced = (expression: string, options: InterpolateOptions): string => {
  const match = BRACED.exec(expression);
  if (!match) {
    throw new ManifestError(`invalid variable reference "\${${expression}}"`);
  }
  const [, name, operator, operand = ""] = match;
  const value = options.lookup(name);

  switch (operator) {
    case ":-":
      return value === undefined || value === "" ? interpolate(operand, options) : value;
    case "-":
      return value === undefined ? interpolate(operand, options) : value;
    case ":?":
    case "?":
      if (value === undefined || (operator === ":?" && value === "")) {
        const detail = operand.length > 0 ? operand : "is not set";
        throw new GraphError("MissingEnv", `required variable ${name} ${detail}`);
      }
      return value;
    default:
      return value ?? options.onMissing(name);
  }
};

/** Index of the `}` closing a reference whose body starts at `from`, or -1. */
const matchingBrace = (template: string, from: number): number => {
  let depth = 1;
  for (let i = from; i < template.length; i += 1) {
    const ch = template.charAt(i);
    if (ch === "$" && template.charAt(i + 1) === "$") {
      i += 1;
    } else if (ch === "$" && template.charAt(i + 1) === "{") {
      depth += 1;
      i += 1;
    } else if (ch === "}") {
      depth -= 1;
      if (depth === 0) return i;
    }
  }
  return -1;
};

/**
 * Expands compose-style references: `$VAR`, `${VAR}`, `${VAR:-default}`,
 * `${VAR-default}`, `${VAR:?message}`, `${VAR?message}` and `$$` for a
 * literal dollar sign.
 */
export const interpolate = (template: string, options: InterpolateOptions): string => {
  let output = "";
  let i = 0;

  while (i < template.length) {
    const ch = template.charAt(i);
    if (ch !== "$") {
      output += ch;
      i += 1;
      continue;
    }

    const next = template.charAt(i + 1);
    if (next === "$") {
      output += "$";
      i += 2;
      continue;
    }

    if (next === "{") {
      const close = matchingBrace(template, i + 2);
      if (close === -1) {
        throw new ManifestError(`unterminated variable reference in "${template}"`);
      }
      output += expandBraced(template.slice(i + 2, close), options);
      i = close + 1;
      continue;
    }

    const name = NAME.exec(template.slice(i + 1));
    if (name) {
      output += options.lookup(name[0]) ?? options.onMissing(name[0]);
      i += 1 + name[0].length;
      continue;
    }

    output += "$";
    i += 1;
  }

  return output;
};

/** Inverse of `$$`: makes a resolved value survive another interpolation pass. */
export const escapeInterpolation = (value: string): string => value.replaceAll("$", "$$$$");

export const parseMissingEnvPolicy = (value: string | undefined): MissingEnvPolicy => {
  if (value === undefined || value === "" || value === "error") return "error";
  if (value === "empty") return "empty";
  throw new ManifestError(`missing-env policy must be one of error | empty, got "${value}"`);
};
