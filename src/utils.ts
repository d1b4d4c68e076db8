import { access, constants } from "node:fs/promises";

/**
 * Check if a file or directory exists
 *
 * @param path The path to check
 */
export async function exists(path: string) {
  try {
    await access(path, constants.F_OK);
  } catch {
    return false;
  }

  return true;
}

/**
 * Find the first path in the list that exists, checking them in order
 */
export async function findFirstExistingFile(paths: readonly string[]) {
  for (const path of paths) {
    if (await exists(path)) {
      return path;
    }
  }

  return undefined;
}

/**
 * Sleep for the specified number of milliseconds
 */
export async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

type Operator = ":-" | "-" | ":+" | "+" | ":?" | "?";

const variablePattern =
  /\$\$|\$(?:([a-zA-Z_][a-zA-Z0-9_]*)|\{([a-zA-Z_][a-zA-Z0-9_]*)(?:(:?[-+?])([^{}]*))?\})/g;

/**
 * Interpolate a string with variables, following Compose's rules
 *
 * Supports `$VAR` and `${VAR}`, the default (`:-`, `-`), alternative (`:+`,
 * `+`) and required (`:?`, `?`) operators, where the colon variants also
 * treat an empty value as unset. `$$` is an escaped literal dollar sign.
 *
 * @param str The string to interpolate
 * @param variables Variables to substitute
 * @throws {Error} if a required variable is missing
 */
export function interpolateString(
  str: string,
  variables: ReadonlyMap<string, string>,
): string {
  return str.replace(
    variablePattern,
    (match, bare?: string, braced?: string, operator?: string, arg = "") => {
      if (match === "$$") {
        return "$";
      }

      const key = bare ?? braced ?? "";
      const value = variables.get(key);

      if (!isOperator(operator)) {
        return value ?? "";
      }

      const unset = operator.startsWith(":") ? !value : value === undefined;

      if (operator === ":-" || operator === "-") {
        return unset ? arg : (value ?? "");
      }

      if (operator === ":+" || operator === "+") {
        return unset ? "" : arg;
      }

      if (unset) {
        throw new Error(
          `Failed to resolve variable ${key}: ${arg || "required but not set"}`,
        );
      }

      return value ?? "";
    },
  );
}

function isOperator(value: string | undefined): value is Operator {
  return (
    value === ":-" ||
    value === "-" ||
    value === ":+" ||
    value === "+" ||
    value === ":?" ||
    value === "?"
  );
}
