import type {
  RoleMap,
  ServiceDefinition,
  ServiceRole,
} from "./compose.js";
import type { DeployContext } from "./context.js";
import { PlanIncomplete } from "./errors.js";
import { defaultSchema, type Schema, truthy } from "./schema.js";

export const deployModes = ["app-only", "app+sidecar", "full"] as const;

export type DeployMode = (typeof deployModes)[number];

const modeRequirements: Record<
  DeployMode,
  { sidecar: boolean; secondary: boolean }
> = {
  "app-only": { sidecar: false, secondary: false },
  "app+sidecar": { sidecar: true, secondary: false },
  full: { sidecar: true, secondary: true },
};

export type DeployedRole = Exclude<ServiceRole, "unassigned">;

export interface ServiceOverride {
  image?: string;
  cpu?: number;
  memoryGb?: number;
  ports?: number[];
}

/**
 * Values that win over both the manifest and the environment
 */
export interface PlanOverrides {
  app?: ServiceOverride;
  sidecar?: ServiceOverride;
  secondary?: Record<string, ServiceOverride>;

  /**
   * Deploy without a sidecar even if the mode asks for one
   */
  omitSidecar?: boolean;
}

export interface EnvironmentVariable {
  name: string;
  value: string;
  secure: boolean;
}

/**
 * A named volume that must survive container restarts
 */
export interface VolumeIntent {
  name: string;
  mountPath: string;
  readOnly: boolean;
}

export interface ServiceDescriptor {
  serviceName: string;
  role: DeployedRole;
  image: string;
  ports: number[];
  command: string[];
  resources: { cpu: number; memoryGb: number };
  volumes: VolumeIntent[];
  environment: EnvironmentVariable[];
}

/**
 * One independently applied deployment target, e.g. a container group
 */
export interface DeploymentUnit {
  name: string;
  dnsLabel: string;
  suffix: string;
  services: string[];
}

export interface RegistryCredentials {
  server: string;
  username: string;
  password: string;
}

export interface StorageAccount {
  accountName: string;
  accountKey: string;
}

/**
 * Canonical, platform-agnostic description of what should be deployed
 *
 * Owned by the lifecycle engine for the duration of a run; hooks receive it
 * by reference and may modify it in place.
 */
export interface DeployPlan {
  mode: DeployMode;
  baseName: string;
  dnsLabel: string;
  location: string;
  resourceGroup: string;
  portBudget: number;
  services: {
    app: ServiceDescriptor;
    sidecar?: ServiceDescriptor;
    secondary: ServiceDescriptor[];
  };
  units: DeploymentUnit[];
  registry?: RegistryCredentials;
  storage?: StorageAccount;

  /**
   * Free-form data for hooks; carried through the run untouched
   */
  extensions: Record<string, unknown>;
}

interface ServiceDefaults {
  image?: string;
  cpu: number;
  memoryGb: number;
  ports: number[];
}

/**
 * Build the deployment plan for a mode
 *
 * Image, CPU, memory and ports are each resolved independently, with
 * overrides taking precedence over the manifest, and the manifest over the
 * environment's defaults.
 *
 * @throws {PlanIncomplete}
 */
export function build(
  context: DeployContext,
  roleMap: RoleMap,
  mode: DeployMode,
  overrides: PlanOverrides = {},
  schema: Schema = defaultSchema,
): DeployPlan {
  const { env, logger } = context;
  const requirements = modeRequirements[mode];
  const sidecarCpu = readNumber(context, "SIDECAR_CPU_CORES") ?? 0.5;
  const sidecarMemory = readNumber(context, "SIDECAR_MEMORY_GB") ?? 0.5;
  const appPort = readNumber(context, "APP_PORT");

  const describe = (
    service: ServiceDefinition,
    role: DeployedRole,
    override: ServiceOverride | undefined,
    defaults: ServiceDefaults,
  ) => describeService(service, role, override, defaults, schema);

  const app = describe(roleMap.app, "app", overrides.app, {
    image: env.get("CONTAINER_IMAGE"),
    cpu: readNumber(context, "DEFAULT_CPU_CORES") ?? 1,
    memoryGb: readNumber(context, "DEFAULT_MEMORY_GB") ?? 2,
    ports: appPort !== undefined ? [appPort] : [],
  });

  let sidecar: ServiceDescriptor | undefined;

  if (requirements.sidecar) {
    if (roleMap.sidecar) {
      sidecar = describe(roleMap.sidecar, "sidecar", overrides.sidecar, {
        image: env.get("SIDECAR_IMAGE"),
        cpu: sidecarCpu,
        memoryGb: sidecarMemory,
        ports: [80, 443],
      });
    } else if (overrides.omitSidecar) {
      logger.info(`Deploying in "${mode}" mode without a sidecar, as requested`);
    } else {
      throw new PlanIncomplete(
        `Deploy mode "${mode}" requires a sidecar service, but none was ` +
          `found. Tag a service with "x-deploy-role: sidecar", name one ` +
          `explicitly, or omit the sidecar on purpose.`,
        "sidecar",
      );
    }
  }

  const secondary = requirements.secondary
    ? roleMap.secondary.map((service) =>
        describe(service, "secondary", overrides.secondary?.[service.name], {
          cpu: sidecarCpu,
          memoryGb: sidecarMemory,
          ports: [],
        }),
      )
    : [];

  for (const service of [
    ...roleMap.unassigned,
    ...(requirements.secondary ? [] : roleMap.secondary),
    ...(requirements.sidecar || !roleMap.sidecar ? [] : [roleMap.sidecar]),
  ]) {
    logger.debug(
      `Service "${service.name}" (${service.role}) is not part of the ` +
        `"${mode}" deployment`,
    );
  }

  const baseName = sanitizeName(
    env.get("AZURE_CONTAINER_NAME") || "compose-deployment",
  );
  const dnsLabel = sanitizeName(env.get("AZURE_DNS_LABEL") || baseName);
  const location = env.get("AZURE_LOCATION") || "westeurope";

  if (sidecar) {
    sidecar.environment = withSidecarEnvironment(
      sidecar.environment,
      context,
      fqdn(dnsLabel, location),
      schema,
    );
  }

  const portBudget = readNumber(context, "UNIT_PUBLIC_PORT_LIMIT") ?? 5;
  const services = { app, ...(sidecar ? { sidecar } : {}), secondary };
  const registry = resolveRegistry(context);
  const storage = resolveStorage(context);

  return {
    mode,
    baseName,
    dnsLabel,
    location,
    resourceGroup: env.get("AZURE_RESOURCE_GROUP") || "",
    portBudget,
    services,
    units: splitUnits(services, portBudget, baseName, dnsLabel),
    ...(registry ? { registry } : {}),
    ...(storage ? { storage } : {}),
    extensions: {},
  };
}

/**
 * Distribute services across deployment units within the public port budget
 *
 * Everything goes into one unit if it fits. Otherwise, the app and sidecar
 * share the first unit, secondaries join it while the budget allows, and
 * each remaining secondary gets a unit of its own, in manifest order.
 *
 * @throws {PlanIncomplete} if a unit cannot fit within the budget at all
 */
export function splitUnits(
  services: DeployPlan["services"],
  budget: number,
  baseName: string,
  dnsLabel: string,
): DeploymentUnit[] {
  const primary = [services.app, ...(services.sidecar ? [services.sidecar] : [])];
  const primaryPorts = publicPorts(primary);

  if (primaryPorts.size > budget) {
    throw new PlanIncomplete(
      `The ${primary.map(({ serviceName }) => `"${serviceName}"`).join(" and ")} ` +
        `service(s) expose ${primaryPorts.size} public ports, which exceeds ` +
        `the budget of ${budget} per deployment unit`,
      "app",
    );
  }

  const first = {
    name: baseName,
    dnsLabel,
    suffix: "",
    services: primary.map(({ serviceName }) => serviceName),
  };
  const units: DeploymentUnit[] = [first];

  for (const service of services.secondary) {
    if (publicPorts([...primary, service]).size <= budget) {
      primary.push(service);
      first.services.push(service.serviceName);
      continue;
    }

    if (new Set(service.ports).size > budget) {
      throw new PlanIncomplete(
        `Service "${service.serviceName}" exposes ${service.ports.length} ` +
          `public ports, which exceeds the budget of ${budget} per ` +
          `deployment unit`,
        "secondary",
      );
    }

    const suffix = sanitizeName(service.serviceName);

    units.push({
      name: sanitizeName(`${baseName}-${suffix}`),
      dnsLabel: sanitizeName(`${dnsLabel}-${suffix}`),
      suffix,
      services: [service.serviceName],
    });
  }

  return units;
}

/**
 * Public host name Azure assigns to a container group's DNS label
 */
export function fqdn(dnsLabel: string, location: string) {
  return `${dnsLabel}.${location}.azurecontainer.io`;
}

export function publicPorts(services: readonly ServiceDescriptor[]) {
  return new Set(services.flatMap(({ ports }) => ports));
}

/**
 * Look up the descriptors of a unit's services, in plan order
 */
export function unitServices(plan: DeployPlan, unit: DeploymentUnit) {
  const all = [
    plan.services.app,
    ...(plan.services.sidecar ? [plan.services.sidecar] : []),
    ...plan.services.secondary,
  ];

  return all.filter(({ serviceName }) => unit.services.includes(serviceName));
}

/**
 * Reduce a name to lowercase letters, digits and single hyphens
 */
export function sanitizeName(name: string) {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9-]+/g, "-")
    .replace(/-{2,}/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 63)
    .replace(/-+$/, "");
}

function describeService(
  service: ServiceDefinition,
  role: DeployedRole,
  override: ServiceOverride | undefined,
  defaults: ServiceDefaults,
  schema: Schema,
): ServiceDescriptor {
  const image = override?.image || service.image || defaults.image;

  if (!image) {
    throw new PlanIncomplete(
      `No image could be determined for service "${service.name}" ` +
        `(${role}). Set an image in the manifest or provide one explicitly.`,
      role,
    );
  }

  return {
    serviceName: service.name,
    role,
    image,
    ports:
      override?.ports ??
      (service.ports.length > 0 ? service.ports : defaults.ports),
    command: service.command,
    resources: {
      cpu: override?.cpu ?? service.resources.cpu ?? defaults.cpu,
      memoryGb:
        override?.memoryGb ?? service.resources.memoryGb ?? defaults.memoryGb,
    },
    volumes: service.volumes
      .filter((volume) => volume.kind === "durable")
      .map(({ source, target, readOnly }) => ({
        name: sanitizeName(source ?? target),
        mountPath: target,
        readOnly,
      })),
    environment: Object.entries(service.environment).map(([name, value]) => ({
      name,
      value,
      secure: schema.get(name)?.sensitivity === "secret",
    })),
  };
}

/**
 * Keys the TLS sidecar is configured through
 */
const sidecarKeys = [
  "PUBLIC_DOMAIN",
  "ACME_EMAIL",
  "BASIC_AUTH_USER",
  "BASIC_AUTH_HASH",
] as const;

/**
 * Add the sidecar's domain and authentication settings to its environment
 *
 * Variables the manifest already sets for the sidecar are kept.
 */
function withSidecarEnvironment(
  environment: EnvironmentVariable[],
  { env }: DeployContext,
  fallbackDomain: string,
  schema: Schema,
): EnvironmentVariable[] {
  const declared = new Set(environment.map(({ name }) => name));
  const entries: [string, string | undefined][] = [
    ...sidecarKeys.map((key): [string, string | undefined] => [key, env.get(key)]),
    ["FALLBACK_DOMAIN", fallbackDomain],
  ];
  const added: EnvironmentVariable[] = [];

  for (const [name, value] of entries) {
    if (declared.has(name) || value === undefined || value === "") {
      continue;
    }

    added.push({
      name,
      value,
      secure: schema.get(name)?.sensitivity === "secret",
    });
  }

  return [...environment, ...added];
}

function readNumber({ env }: DeployContext, key: string) {
  const value = env.get(key);

  if (value === undefined || value.trim() === "") {
    return undefined;
  }

  const number = Number(value);

  if (!Number.isFinite(number) || number <= 0) {
    throw new PlanIncomplete(`${key} must be a positive number, got "${value}"`);
  }

  return number;
}

function resolveRegistry({ env }: DeployContext) {
  if (!truthy(env.get("REGISTRY_PRIVATE"))) {
    return undefined;
  }

  const server = env.get("REGISTRY_SERVER") || "ghcr.io";
  const username = env.get("REGISTRY_USERNAME");
  const password = env.get("REGISTRY_PASSWORD");

  if (!username || !password) {
    throw new PlanIncomplete(
      "REGISTRY_PRIVATE=true but the registry credentials are incomplete. " +
        "Set REGISTRY_USERNAME and REGISTRY_PASSWORD.",
    );
  }

  return { server, username, password };
}

function resolveStorage({ env }: DeployContext) {
  const accountName = env.get("AZURE_STORAGE_ACCOUNT");
  const accountKey = env.get("AZURE_STORAGE_KEY");

  return accountName && accountKey ? { accountName, accountKey } : undefined;
}
