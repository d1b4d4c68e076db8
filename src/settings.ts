import { cwd } from "node:process";
import * as core from "@actions/core";
import { type DeployMode, deployModes } from "./plan.js";

/**
 * Deployment settings
 */
export interface Settings {
  mode: DeployMode;
  appService?: string;
  sidecarService?: string;
  omitSidecar: boolean;
  hooksModule?: string;
  hooksSoftFail?: boolean;
  composeFiles: string[];
  envFile: string;
  runtimeEnvFile: string;
  variables: Map<string, string>;
  image?: string;
  cpu?: number;
  memory?: number;
  sidecarImage?: string;
  dryRun: boolean;
  repoRoot: string;
}

export function defineSettings<T extends Settings>(settings: T) {
  return settings;
}

/**
 * Parse settings from GitHub Actions inputs
 */
export function parseSettings(env: NodeJS.ProcessEnv) {
  core.debug("Parsing settings from inputs");

  return defineSettings({
    mode: inferMode(core.getInput("deploy-mode")),
    appService: optional(core.getInput("app-service")),
    sidecarService: optional(core.getInput("sidecar-service")),
    omitSidecar: getOptionalBoolean("omit-sidecar") ?? false,
    hooksModule: optional(core.getInput("hooks-module")),
    hooksSoftFail: getOptionalBoolean("hooks-soft-fail"),
    composeFiles: inferComposeFiles(core.getInput("compose-file"), env),
    envFile: core.getInput("env-file") || ".env.deploy",
    runtimeEnvFile: core.getInput("runtime-env-file") || ".env",
    variables: parseVariableInput(core.getInput("variables")),
    image: optional(core.getInput("image")),
    cpu: getOptionalNumber("cpu"),
    memory: getOptionalNumber("memory"),
    sidecarImage: optional(core.getInput("sidecar-image")),
    dryRun: getOptionalBoolean("dry-run") ?? false,
    repoRoot: env.GITHUB_WORKSPACE || cwd(),
  });
}

function inferMode(mode: string): DeployMode {
  const value = mode.trim() || "app+sidecar";

  if (!isDeployMode(value)) {
    throw new Error(
      `Invalid deploy mode "${value}": Expected one of ` +
        deployModes.map((mode) => `"${mode}"`).join(", "),
    );
  }

  return value;
}

function isDeployMode(value: string): value is DeployMode {
  return deployModes.some((mode) => mode === value);
}

function inferComposeFiles(files: string | undefined, env: NodeJS.ProcessEnv) {
  const composeFiles = files || env.COMPOSE_FILE;

  // Newlines separate files unless a custom separator is set
  const hasCustomSeparator = env.COMPOSE_PATH_SEPARATOR !== undefined;
  const hasNewlines = composeFiles?.includes("\n") ?? false;
  const separator =
    hasNewlines && !hasCustomSeparator
      ? "\n"
      : env.COMPOSE_PATH_SEPARATOR || ":";

  return (composeFiles?.split(separator) ?? [])
    .map((file) => file.trim())
    .filter(Boolean);
}

function optional(value: string) {
  return value.trim() || undefined;
}

function getOptionalBoolean(name: string) {
  if (!core.getInput(name)) {
    return undefined;
  }

  return core.getBooleanInput(name);
}

function getOptionalNumber(name: string) {
  const raw = core.getInput(name).trim();

  if (!raw) {
    return undefined;
  }

  const value = Number(raw);

  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid input "${name}": Expected a positive number, got "${raw}"`);
  }

  return value;
}

/**
 * Parse explicit variable overrides
 *
 * Accepts a JSON object, or `KEY=VALUE` lines with `KEY<<DELIMITER` heredoc
 * blocks for multi-line values.
 */
function parseVariableInput(input: string): Map<string, string> {
  const variables = new Map<string, string>();
  const trimmedInput = input.trim();

  if (!trimmedInput) {
    return variables;
  }

  if (isJsonLike(trimmedInput)) {
    const parsed = parseJsonObject(trimmedInput);

    if (parsed) {
      for (const [key, value] of parsed) {
        if (value !== null && value !== undefined) {
          variables.set(key, String(value));
        }
      }

      return variables;
    }
  }

  const lines = input.split("\n");
  let i = 0;

  while (i < lines.length) {
    const line = lines[i].trim();

    if (!line || line.startsWith("#")) {
      i++;
      continue;
    }

    const heredocMatch = line.match(
      /^([A-Za-z_][A-Za-z0-9_]*)<<([A-Za-z0-9_]+)$/,
    );

    if (heredocMatch) {
      const [, key, delimiter] = heredocMatch;
      const contentLines: string[] = [];

      i++;

      while (i < lines.length && lines[i] !== delimiter) {
        contentLines.push(lines[i]);
        i++;
      }

      variables.set(key, contentLines.join("\n"));

      // Skip the delimiter line
      i++;
    } else {
      const [key, ...parts] = line.split("=").map((part) => part.trim());
      variables.set(key, parts.join("="));
      i++;
    }
  }

  return variables;
}

function parseJsonObject(input: string) {
  let parsed: unknown;

  try {
    parsed = JSON.parse(input);
  } catch {
    return undefined;
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return undefined;
  }

  const entries: Array<[string, unknown]> = Object.entries(parsed);

  return entries;
}

function isJsonLike(input: string): boolean {
  if (!input.startsWith("{") || !input.endsWith("}")) {
    return false;
  }

  // KEY=VALUE lines wrapped in braces are not JSON
  return !(input.includes("=") && !input.includes(":"));
}
