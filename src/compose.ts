import * as core from "@actions/core";
import { load } from "js-yaml";
import { readFile } from "node:fs/promises";
import { isAbsolute, join } from "node:path";
import { z } from "zod";
import { ManifestInvalid, RoleAmbiguity, RoleMissing } from "./errors.js";
import { exists, findFirstExistingFile, interpolateString } from "./utils.js";

export const roleLabel = "x-deploy-role";

export const serviceRoles = [
  "app",
  "sidecar",
  "secondary",
  "unassigned",
] as const;

export type ServiceRole = (typeof serviceRoles)[number];

export const defaultVariants = [
  "compose.production.yaml",
  "compose.production.yml",
  "compose.prod.yaml",
  "compose.prod.yml",
  "compose.yaml",
  "compose.yml",
  "docker-compose.production.yaml",
  "docker-compose.production.yml",
  "docker-compose.prod.yaml",
  "docker-compose.prod.yml",
  "docker-compose.yaml",
  "docker-compose.yml",
  join(".docker", "compose.yaml"),
  join(".docker", "compose.yml"),
  join("docker", "compose.yaml"),
  join("docker", "compose.yml"),
] as const;

// region Manifest Schema
const scalar = z.union([z.string(), z.number()]);

const portSchema = z.union([
  scalar,
  z
    .object({
      target: scalar,
      published: scalar.optional(),
      host_ip: z.string().optional(),
      protocol: z.string().optional(),
    })
    .passthrough(),
]);

const volumeSchema = z.union([
  z.string(),
  z
    .object({
      type: z.string().optional(),
      source: z.string().optional(),
      target: z.string(),
      read_only: z.boolean().optional(),
    })
    .passthrough(),
]);

const serviceSchema = z
  .object({
    image: z.string().optional(),
    build: z
      .union([
        z.string(),
        z.object({ context: z.string().optional() }).passthrough(),
      ])
      .optional(),
    command: z.union([z.string(), z.array(scalar), z.null()]).optional(),
    ports: z.array(portSchema).optional(),
    volumes: z.array(volumeSchema).optional(),
    environment: z
      .union([
        z.record(z.union([scalar, z.boolean(), z.null()])),
        z.array(z.string()),
      ])
      .optional(),
    deploy: z
      .object({
        resources: z
          .object({
            limits: z
              .object({ cpus: scalar.optional(), memory: scalar.optional() })
              .passthrough()
              .optional(),
          })
          .passthrough()
          .optional(),
      })
      .passthrough()
      .optional(),
    [roleLabel]: z.string().optional(),
  })
  .passthrough();

const manifestSchema = z
  .object({
    name: z.string().optional(),
    services: z.record(serviceSchema.nullable()),
  })
  .passthrough();

/**
 * Compose manifest, as far as the deployment needs to understand it
 */
export type ComposeManifest = z.infer<typeof manifestSchema>;
export type ComposeService = z.infer<typeof serviceSchema>;
// endregion

export type VolumeKind = "durable" | "host" | "ephemeral";

export interface VolumeMount {
  kind: VolumeKind;
  source?: string;
  target: string;
  readOnly: boolean;
}

export interface ResourceLimits {
  cpu?: number;
  memoryGb?: number;
}

/**
 * A manifest service, resolved to its role and normalized
 */
export interface ServiceDefinition {
  name: string;
  role: ServiceRole;
  image?: string;
  build?: string;
  ports: number[];
  command: string[];
  volumes: VolumeMount[];
  environment: Record<string, string>;
  resources: ResourceLimits;
}

export interface RoleMap {
  app: ServiceDefinition;
  sidecar?: ServiceDefinition;
  secondary: ServiceDefinition[];
  unassigned: ServiceDefinition[];
}

/**
 * Caller-supplied service names per role; these win over manifest tags
 */
export interface RoleOverrides {
  app?: string;
  sidecar?: string;
  secondary?: string[];
}

/**
 * Resolves the Compose File paths
 *
 * Explicitly configured files must all exist; a single missing file aborts
 * the deployment instead of silently falling back to another manifest. If no
 * files are configured, the conventional locations are checked in order.
 */
export async function resolveComposeFiles(
  composeFiles: readonly string[] | undefined,
  repoRoot: string,
): Promise<readonly [string, ...string[]]> {
  const absolute = (path: string) =>
    isAbsolute(path) ? path : join(repoRoot, path);

  if (composeFiles && composeFiles.length > 0) {
    const [first, ...rest] = composeFiles.map(absolute);
    const found = await Promise.all([first, ...rest].map((path) => exists(path)));
    const missing = [first, ...rest].filter((_, index) => !found[index]);

    if (missing.length > 0) {
      throw new ManifestInvalid(
        `One or more Compose Files specified in the configuration are ` +
          `missing or not readable: ${missing.join(", ")}`,
      );
    }

    return [first, ...rest];
  }

  const foundFile = await findFirstExistingFile(defaultVariants.map(absolute));

  if (!foundFile) {
    throw new ManifestInvalid("Could not find suitable Compose File");
  }

  core.info(`Found Compose File at "${foundFile}"`);

  return [foundFile];
}

/**
 * Parse and validate a Compose document
 *
 * @throws {ManifestInvalid}
 */
export function parseManifest(content: string, filename?: string) {
  let document: unknown;

  try {
    document = load(content, { filename });
  } catch (cause) {
    const message = cause instanceof Error ? cause.message : String(cause);

    throw new ManifestInvalid(`Failed to parse Compose File: ${message}`, {
      cause,
    });
  }

  return validateManifest(document, filename ?? "manifest");
}

/**
 * Read one or more Compose Files and merge them into a single manifest
 *
 * Later files override earlier ones per service, key by key.
 */
export async function loadManifest(composeFiles: readonly string[]) {
  const manifests = await Promise.all(
    composeFiles.map(async (path) =>
      parseManifest(await readFile(path, "utf8"), path),
    ),
  );

  return mergeManifests(manifests);
}

export function mergeManifests(manifests: readonly ComposeManifest[]) {
  const services: Record<string, ComposeService> = {};

  for (const manifest of manifests) {
    for (const [name, service] of Object.entries(manifest.services)) {
      services[name] = { ...services[name], ...service };
    }
  }

  return validateManifest(
    Object.assign({}, ...manifests, { services }),
    "merged manifest",
  );
}

/**
 * Interpolate variables in the manifest's values
 *
 * Keys are left untouched, as Compose does.
 */
export function interpolateManifest(
  manifest: ComposeManifest,
  variables: ReadonlyMap<string, string>,
) {
  let interpolated: unknown;

  try {
    interpolated = JSON.parse(
      JSON.stringify(manifest, (_, value: unknown) =>
        typeof value === "string" ? interpolateString(value, variables) : value,
      ),
    );
  } catch (cause) {
    const message = cause instanceof Error ? cause.message : String(cause);

    throw new ManifestInvalid(`Failed to interpolate Compose File: ${message}`, {
      cause,
    });
  }

  return validateManifest(interpolated, "interpolated manifest");
}

/**
 * Resolve each manifest service to its role
 *
 * @throws {RoleAmbiguity} if more than one service claims an exclusive role
 * @throws {RoleMissing} if no service claims the app role
 */
export function interpret(
  manifest: ComposeManifest,
  overrides: RoleOverrides = {},
): RoleMap {
  const names = Object.keys(manifest.services);

  for (const [role, name] of [
    ["app", overrides.app],
    ["sidecar", overrides.sidecar],
    ...(overrides.secondary ?? []).map((name) => ["secondary", name] as const),
  ] as const) {
    if (name !== undefined && !names.includes(name)) {
      throw new RoleMissing(
        role,
        `Service "${name}" named for the "${role}" role does not exist in ` +
          `the manifest`,
      );
    }
  }

  if (overrides.app !== undefined && overrides.app === overrides.sidecar) {
    throw new RoleAmbiguity(
      "sidecar",
      [overrides.app],
      `Service "${overrides.app}" cannot be named for both the "app" and ` +
        `"sidecar" roles`,
    );
  }

  const services = names.map((name) =>
    defineService(
      name,
      manifest.services[name] ?? {},
      resolveRole(name, manifest.services[name] ?? {}, overrides),
    ),
  );
  const byRole = (role: ServiceRole) =>
    services.filter((service) => service.role === role);
  const [app, ...otherApps] = byRole("app");
  const [sidecar, ...otherSidecars] = byRole("sidecar");

  if (otherApps.length > 0) {
    throw new RoleAmbiguity(
      "app",
      byRole("app").map(({ name }) => name),
    );
  }

  if (otherSidecars.length > 0) {
    throw new RoleAmbiguity(
      "sidecar",
      byRole("sidecar").map(({ name }) => name),
    );
  }

  if (!app) {
    throw new RoleMissing("app");
  }

  return {
    app,
    ...(sidecar ? { sidecar } : {}),
    secondary: byRole("secondary"),
    unassigned: byRole("unassigned"),
  };
}

function resolveRole(
  name: string,
  service: ComposeService,
  overrides: RoleOverrides,
): ServiceRole {
  if (name === overrides.app) {
    return "app";
  }

  if (name === overrides.sidecar) {
    return "sidecar";
  }

  if (overrides.secondary?.includes(name)) {
    return "secondary";
  }

  const declared = service[roleLabel]?.trim().toLowerCase();

  if (declared === undefined || declared === "") {
    return "unassigned";
  }

  if (!isServiceRole(declared)) {
    core.warning(
      `Service "${name}" declares unknown role "${declared}"; treating it ` +
        `as unassigned`,
    );

    return "unassigned";
  }

  // An explicit override for an exclusive role replaces the manifest's claim.
  if (
    (declared === "app" && overrides.app !== undefined) ||
    (declared === "sidecar" && overrides.sidecar !== undefined)
  ) {
    core.debug(
      `Ignoring "${declared}" role of service "${name}" in favor of the ` +
        `explicitly named service`,
    );

    return "unassigned";
  }

  return declared;
}

function defineService(
  name: string,
  service: ComposeService,
  role: ServiceRole,
): ServiceDefinition {
  const build =
    typeof service.build === "string" ? service.build : service.build?.context;

  return {
    name,
    role,
    ...(service.image ? { image: service.image } : {}),
    ...(build !== undefined ? { build } : {}),
    ports: extractPorts(name, service.ports ?? []),
    command: normalizeCommand(service.command),
    volumes: (service.volumes ?? []).map(parseVolume),
    environment: extractEnvironment(service.environment),
    resources: extractResources(name, service),
  };
}

// region Extraction
const loopbackAddresses = new Set(["127.0.0.1", "localhost", "::1"]);

/**
 * Extract the container ports intended for external exposure
 *
 * Takes the container side of every mapping, expands ranges and skips ports
 * bound to the loopback interface only.
 */
export function extractPorts(
  service: string,
  ports: readonly z.infer<typeof portSchema>[],
) {
  const exposed = new Set<number>();

  for (const entry of ports) {
    let hostIp: string | undefined;
    let container: string;

    if (typeof entry === "number") {
      container = String(entry);
    } else if (typeof entry === "string") {
      const [mapping] = entry.split("/");
      const parts = mapping.split(":");

      container = parts[parts.length - 1];
      hostIp = parts.length > 2 ? parts.slice(0, -2).join(":") : undefined;
    } else {
      container = String(entry.target);
      hostIp = entry.host_ip;
    }

    if (hostIp && loopbackAddresses.has(hostIp.replace(/^\[|\]$/g, ""))) {
      continue;
    }

    for (const port of expandPortRange(service, container)) {
      exposed.add(port);
    }
  }

  return [...exposed].sort((a, b) => a - b);
}

function expandPortRange(service: string, range: string) {
  const [start, end = start] = range.trim().split("-").map(Number);

  if (!isValidPort(start) || !isValidPort(end) || end < start) {
    throw new ManifestInvalid(
      `Service "${service}" declares an invalid port: "${range}"`,
    );
  }

  return Array.from({ length: end - start + 1 }, (_, index) => start + index);
}

function isValidPort(port: number) {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

const shellSyntax = /[$`|&;<>(){}*?~"'\\\n]/;

/**
 * Normalize a service command into an executable argument list
 *
 * A command list is kept verbatim. A plain command string is split on
 * whitespace; one using shell syntax (expansion, pipes, redirects, quoting)
 * is handed to a login shell instead, so it keeps its meaning.
 */
export function normalizeCommand(
  command: string | ReadonlyArray<string | number> | null | undefined,
): string[] {
  if (command === null || command === undefined) {
    return [];
  }

  if (typeof command !== "string") {
    return command.map(String);
  }

  const text = command.trim();

  if (!text) {
    return [];
  }

  return shellSyntax.test(text) ? ["sh", "-lc", text] : text.split(/\s+/);
}

/**
 * Classify a volume mount
 *
 * Named volumes can be carried over to durable storage; bind mounts refer to
 * the host the manifest was written for, and anonymous or tmpfs volumes have
 * no identity to persist.
 */
export function parseVolume(
  volume: z.infer<typeof volumeSchema>,
): VolumeMount {
  if (typeof volume !== "string") {
    const readOnly = volume.read_only ?? false;

    if (volume.type === "bind" || volume.type === "npipe") {
      return { kind: "host", source: volume.source, target: volume.target, readOnly };
    }

    if (volume.type === "tmpfs" || !volume.source) {
      return { kind: "ephemeral", target: volume.target, readOnly };
    }

    return {
      kind: isHostPath(volume.source) ? "host" : "durable",
      source: volume.source,
      target: volume.target,
      readOnly,
    };
  }

  const [source, target, mode = ""] = volume.split(":");

  if (target === undefined) {
    return { kind: "ephemeral", target: source, readOnly: false };
  }

  return {
    kind: isHostPath(source) ? "host" : "durable",
    source,
    target,
    readOnly: mode.split(",").includes("ro"),
  };
}

function isHostPath(source: string) {
  return /^[./~]/.test(source) || /^[a-zA-Z]:[\\/]/.test(source);
}

export function extractEnvironment(
  environment: ComposeService["environment"],
): Record<string, string> {
  if (!environment) {
    return {};
  }

  if (Array.isArray(environment)) {
    return Object.fromEntries(
      environment
        .filter((entry) => entry.includes("="))
        .map((entry) => {
          const [key, ...value] = entry.split("=");

          return [key.trim(), value.join("=")];
        }),
    );
  }

  return Object.fromEntries(
    Object.entries(environment)
      .filter(([, value]) => value !== null)
      .map(([key, value]) => [key, String(value)]),
  );
}

function extractResources(
  name: string,
  service: ComposeService,
): ResourceLimits {
  const limits = service.deploy?.resources?.limits;
  const cpu = limits?.cpus !== undefined ? Number(limits.cpus) : undefined;
  const memoryGb =
    limits?.memory !== undefined ? parseMemory(name, limits.memory) : undefined;

  if (cpu !== undefined && !(cpu > 0)) {
    throw new ManifestInvalid(
      `Service "${name}" declares an invalid CPU limit: "${limits?.cpus}"`,
    );
  }

  return {
    ...(cpu !== undefined ? { cpu } : {}),
    ...(memoryGb !== undefined ? { memoryGb } : {}),
  };
}

const memoryUnits: Record<string, number> = {
  "": 1,
  b: 1,
  k: 1024,
  m: 1024 ** 2,
  g: 1024 ** 3,
  t: 1024 ** 4,
};

/**
 * Convert a Compose memory value (bytes, or a string like "512m") to GB
 */
export function parseMemory(service: string, value: string | number) {
  const match = String(value)
    .trim()
    .match(/^(\d+(?:\.\d+)?)\s*([bkmgt]?)(?:i?b)?$/i);

  if (!match) {
    throw new ManifestInvalid(
      `Service "${service}" declares an invalid memory limit: "${value}"`,
    );
  }

  const [, amount, unit] = match;

  return (Number(amount) * memoryUnits[unit.toLowerCase()]) / 1024 ** 3;
}
// endregion

function validateManifest(document: unknown, source: string) {
  const result = manifestSchema.safeParse(document);

  if (!result.success) {
    const issues = result.error.issues
      .map(({ path, message }) => `${path.join(".") || "(root)"}: ${message}`)
      .join("; ");

    throw new ManifestInvalid(`Invalid Compose File ${source}: ${issues}`);
  }

  if (Object.keys(result.data.services).length === 0) {
    throw new ManifestInvalid(
      `Invalid Compose File ${source}: Missing services section`,
    );
  }

  return result.data;
}

function isServiceRole(value: string): value is ServiceRole {
  return serviceRoles.some((role) => role === value);
}
