import * as core from "@actions/core";
import dotenv from "dotenv";
import { readFile } from "node:fs/promises";
import { SchemaViolation } from "./errors.js";
import {
  filterSchemaByTargets,
  type Schema,
  type Sensitivity,
  type StorageTarget,
  storageTargets,
} from "./schema.js";
import { exists } from "./utils.js";

/**
 * Where a resolved value came from, in descending order of precedence
 */
export const precedence = [
  "override",
  "process",
  "deploy-file",
  "runtime-file",
  "default",
] as const;

export type Source = (typeof precedence)[number];

type KeyValues = Readonly<Record<string, string | undefined>>;

/**
 * Raw environment sources to merge
 *
 * The process environment is allowed to carry arbitrary unrelated variables,
 * so only keys declared in the schema are taken from it. Every other source
 * must stick to its declared keys.
 */
export interface EnvSources {
  overrides?: KeyValues;
  processEnv?: KeyValues;
  deployFile?: KeyValues;
  runtimeFile?: KeyValues;
}

export interface ResolvedEnv {
  readonly values: ReadonlyMap<string, string>;
  readonly provenance: ReadonlyMap<string, Source>;
}

export interface ResolveOptions {
  /**
   * Storage targets being resolved. Mandatory keys stored only elsewhere are
   * not demanded.
   */
  targets?: Iterable<StorageTarget>;

  /**
   * Human-readable name of what is being validated, used in error reports
   */
  context?: string;
}

/**
 * Resolve the environment against a schema
 *
 * Merges all sources by precedence (explicit override, process environment,
 * deploy-time file, runtime file, schema default) and validates the result.
 * All missing mandatory keys, undeclared keys and cross-field problems are
 * reported together.
 *
 * @throws {SchemaViolation}
 */
export function resolve(
  schema: Schema,
  sources: EnvSources,
  { targets = storageTargets, context = "environment" }: ResolveOptions = {},
): ResolvedEnv {
  const unknown = new Set([
    ...undeclaredKeys(sources.runtimeFile, (key) =>
      schema.runtime.some(({ name }) => name === key),
    ),
    ...undeclaredKeys(sources.deployFile, (key) =>
      schema.deploy.some(({ name }) => name === key),
    ),
    ...undeclaredKeys(sources.overrides, (key) => schema.has(key)),
  ]);

  const layers: Array<[Source, KeyValues | undefined]> = [
    ["override", sources.overrides],
    ["process", sources.processEnv],
    ["deploy-file", sources.deployFile],
    ["runtime-file", sources.runtimeFile],
  ];
  const values = new Map<string, string>();
  const provenance = new Map<string, Source>();

  for (const spec of schema.keys) {
    for (const [source, layer] of layers) {
      const value = layer?.[spec.name];

      if (isPresent(value)) {
        values.set(spec.name, value);
        provenance.set(spec.name, source);
        break;
      }
    }

    if (!values.has(spec.name) && spec.default !== undefined) {
      values.set(spec.name, spec.default);
      provenance.set(spec.name, "default");
    }
  }

  const missing = filterSchemaByTargets(schema.keys, targets)
    .filter((spec) => spec.mandatory && !values.has(spec.name))
    .map(({ name }) => name)
    .sort();
  const problems = schema.rules.flatMap((rule) => rule(values));

  if (unknown.size > 0 || missing.length > 0 || problems.length > 0) {
    throw new SchemaViolation({
      context,
      missing,
      unknown: [...unknown].sort(),
      problems,
    });
  }

  return { values, provenance };
}

/**
 * Look up whether a key holds a plain variable or a secret
 *
 * @throws {SchemaViolation} if the key is not declared
 */
export function classify(schema: Schema, key: string): Sensitivity {
  const spec = schema.get(key);

  if (!spec) {
    throw new SchemaViolation({
      context: `classification of "${key}"`,
      unknown: [key],
    });
  }

  return spec.sensitivity;
}

/**
 * Look up a single key across raw sources, by precedence
 *
 * Values are neither validated nor defaulted. This serves settings that are
 * needed before the environment can be resolved, such as the hook unit.
 */
export function lookupSource(sources: EnvSources, name: string) {
  return [
    sources.overrides,
    sources.processEnv,
    sources.deployFile,
    sources.runtimeFile,
  ]
    .map((layer) => layer?.[name])
    .find(isPresent);
}

/**
 * Parse the contents of a dotenv file
 *
 * Keys with empty values are kept, so undeclared keys are still detected even
 * if they carry no value.
 */
export function parseEnvFile(content: string) {
  const values: Record<string, string> = {};

  for (const [key, value] of Object.entries(dotenv.parse(content))) {
    const name = key.trim();

    if (name) {
      values[name] = value.trim();
    }
  }

  return values;
}

/**
 * Read and parse a dotenv file, if it exists
 */
export async function readEnvFile(path: string) {
  if (!(await exists(path))) {
    core.debug(`Environment file "${path}" does not exist`);

    return undefined;
  }

  return parseEnvFile(await readFile(path, "utf8"));
}

function isPresent(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== "";
}

function undeclaredKeys(
  layer: KeyValues | undefined,
  isDeclared: (key: string) => boolean,
) {
  return Object.keys(layer ?? {}).filter((key) => !isDeclared(key));
}
