/**
 * Locations a configuration key may be stored in
 */
export const storageTargets = [
  "runtime-file",
  "deploy-file",
  "ci-variable",
  "ci-secret",
  "vault-secret",
] as const;

export type StorageTarget = (typeof storageTargets)[number];

export type Sensitivity = "var" | "secret";

export type SchemaPartition = "runtime" | "deploy";

/**
 * Specification of a single configuration key
 */
export interface EnvKeySpec {
  readonly name: string;
  readonly sensitivity: Sensitivity;
  readonly mandatory: boolean;
  readonly default?: string;
  readonly targets: ReadonlySet<StorageTarget>;
}

/**
 * Validation that cannot be expressed by mandatory/default alone. Returns the
 * list of problems found in the merged values.
 */
export type CrossFieldRule = (values: ReadonlyMap<string, string>) => string[];

/**
 * Define a key specification, enforcing its invariants
 */
export function defineKeySpec({
  name,
  sensitivity = "var",
  mandatory = false,
  default: defaultValue,
  targets,
}: {
  name: string;
  sensitivity?: Sensitivity;
  mandatory?: boolean;
  default?: string;
  targets: StorageTarget[];
}): EnvKeySpec {
  if (!name.trim()) {
    throw new Error("Key specification must have a name");
  }

  if (mandatory && defaultValue !== undefined) {
    throw new Error(`Mandatory key "${name}" must not declare a default`);
  }

  if (targets.length === 0) {
    throw new Error(`Key "${name}" must declare at least one storage target`);
  }

  return Object.freeze({
    name,
    sensitivity,
    mandatory,
    ...(defaultValue !== undefined ? { default: defaultValue } : {}),
    targets: new Set(targets),
  });
}

/**
 * Ordered, immutable set of key specifications
 *
 * Keys are partitioned into the runtime schema (what the running containers
 * read) and the deploy-time schema (what the deployment itself consumes).
 */
export class Schema {
  readonly runtime: readonly EnvKeySpec[];
  readonly deploy: readonly EnvKeySpec[];
  readonly rules: readonly CrossFieldRule[];
  readonly #index: ReadonlyMap<string, EnvKeySpec>;

  constructor({
    runtime,
    deploy,
    rules = [],
  }: {
    runtime: EnvKeySpec[];
    deploy: EnvKeySpec[];
    rules?: CrossFieldRule[];
  }) {
    const index = new Map<string, EnvKeySpec>();

    for (const spec of [...runtime, ...deploy]) {
      if (index.has(spec.name)) {
        throw new Error(`Duplicate key "${spec.name}" in schema`);
      }

      index.set(spec.name, spec);
    }

    this.runtime = Object.freeze([...runtime]);
    this.deploy = Object.freeze([...deploy]);
    this.rules = Object.freeze([...rules]);
    this.#index = index;
    Object.freeze(this);
  }

  /**
   * All keys, runtime partition first
   */
  get keys(): readonly EnvKeySpec[] {
    return [...this.runtime, ...this.deploy];
  }

  get(name: string) {
    return this.#index.get(name);
  }

  has(name: string) {
    return this.#index.has(name);
  }

  partition(name: SchemaPartition) {
    return name === "runtime" ? this.runtime : this.deploy;
  }
}

/**
 * Keep only the specifications stored in at least one of the given targets
 */
export function filterSchemaByTargets(
  specs: readonly EnvKeySpec[],
  targets: Iterable<StorageTarget>,
) {
  const include = new Set(targets);

  return specs.filter((spec) =>
    [...spec.targets].some((target) => include.has(target)),
  );
}

export function truthy(value: string | undefined) {
  return ["1", "true", "yes", "y", "on"].includes(
    (value ?? "").trim().toLowerCase(),
  );
}

// region Default Schema
const runtimeFile: StorageTarget[] = ["runtime-file", "ci-secret"];
const deployVariable: StorageTarget[] = ["deploy-file", "ci-variable"];
const deploySecret: StorageTarget[] = ["deploy-file", "ci-secret"];

export const registryRule: CrossFieldRule = (values) => {
  if (!truthy(values.get("REGISTRY_PRIVATE"))) {
    return [];
  }

  return ["REGISTRY_USERNAME", "REGISTRY_PASSWORD"]
    .filter((key) => !values.get(key))
    .map((key) => `${key} is required when REGISTRY_PRIVATE=true`);
};

/**
 * Schema used by the action unless a caller provides its own
 */
export const defaultSchema = new Schema({
  runtime: [
    defineKeySpec({
      name: "BASIC_AUTH_USER",
      default: "admin",
      targets: ["runtime-file", "ci-variable"],
    }),
    defineKeySpec({
      name: "BASIC_AUTH_HASH",
      sensitivity: "secret",
      mandatory: true,
      targets: runtimeFile,
    }),
    defineKeySpec({
      name: "APP_SECRET",
      sensitivity: "secret",
      targets: ["runtime-file"],
    }),
  ],
  deploy: [
    defineKeySpec({ name: "AZURE_CLIENT_ID", targets: deployVariable }),
    defineKeySpec({ name: "AZURE_TENANT_ID", targets: deployVariable }),
    defineKeySpec({ name: "AZURE_SUBSCRIPTION_ID", targets: deployVariable }),
    defineKeySpec({
      name: "AZURE_RESOURCE_GROUP",
      default: "compose-deployment-rg",
      targets: deployVariable,
    }),
    defineKeySpec({
      name: "AZURE_LOCATION",
      default: "westeurope",
      targets: deployVariable,
    }),
    defineKeySpec({
      name: "AZURE_CONTAINER_NAME",
      default: "compose-deployment",
      targets: deployVariable,
    }),
    defineKeySpec({ name: "AZURE_DNS_LABEL", targets: deployVariable }),
    defineKeySpec({ name: "AZURE_STORAGE_ACCOUNT", targets: deployVariable }),
    defineKeySpec({
      name: "AZURE_STORAGE_KEY",
      sensitivity: "secret",
      targets: ["ci-secret", "vault-secret"],
    }),
    defineKeySpec({
      name: "PUBLIC_DOMAIN",
      mandatory: true,
      targets: deployVariable,
    }),
    defineKeySpec({
      name: "ACME_EMAIL",
      mandatory: true,
      targets: deployVariable,
    }),
    defineKeySpec({ name: "CONTAINER_IMAGE", targets: deployVariable }),
    defineKeySpec({
      name: "SIDECAR_IMAGE",
      default: "caddy:2-alpine",
      targets: deployVariable,
    }),
    defineKeySpec({
      name: "REGISTRY_SERVER",
      default: "ghcr.io",
      targets: deployVariable,
    }),
    defineKeySpec({
      name: "REGISTRY_PRIVATE",
      default: "false",
      targets: deployVariable,
    }),
    defineKeySpec({ name: "REGISTRY_USERNAME", targets: deployVariable }),
    defineKeySpec({
      name: "REGISTRY_PASSWORD",
      sensitivity: "secret",
      targets: deploySecret,
    }),
    defineKeySpec({
      name: "DEFAULT_CPU_CORES",
      default: "1.0",
      targets: deployVariable,
    }),
    defineKeySpec({
      name: "DEFAULT_MEMORY_GB",
      default: "2.0",
      targets: deployVariable,
    }),
    defineKeySpec({
      name: "SIDECAR_CPU_CORES",
      default: "0.5",
      targets: deployVariable,
    }),
    defineKeySpec({
      name: "SIDECAR_MEMORY_GB",
      default: "0.5",
      targets: deployVariable,
    }),
    defineKeySpec({ name: "APP_PORT", default: "8080", targets: deployVariable }),
    defineKeySpec({
      name: "UNIT_PUBLIC_PORT_LIMIT",
      default: "5",
      targets: deployVariable,
    }),
    defineKeySpec({ name: "DEPLOY_HOOKS_MODULE", targets: deployVariable }),
    defineKeySpec({ name: "DEPLOY_HOOKS_SOFT_FAIL", targets: deployVariable }),
    // CI materializes the runtime file from this secret; never read locally.
    defineKeySpec({
      name: "RUNTIME_ENV_DOTENV",
      sensitivity: "secret",
      targets: ["ci-secret"],
    }),
  ],
  rules: [registryRule],
});
// endregion
