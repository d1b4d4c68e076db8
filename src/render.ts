import { dump, load } from "js-yaml";
import {
  type DeployPlan,
  type DeploymentUnit,
  publicPorts,
  sanitizeName,
  type ServiceDescriptor,
  unitServices,
} from "./plan.js";

export const aciApiVersion = "2023-05-01";

/**
 * Target-specific deployment descriptor for a single unit
 */
export interface RenderedArtifact {
  unit: string;
  name: string;
  dnsLabel: string;
  text: string;
}

/**
 * Render a plan into one ACI container group descriptor per deployment unit
 *
 * Output is ordered like the plan's units, which puts the app and sidecar
 * unit first. Rendering the same plan always yields identical text.
 */
export function render(plan: DeployPlan): RenderedArtifact[] {
  return plan.units.map((unit) => renderUnit(plan, unit));
}

export function renderUnit(
  plan: DeployPlan,
  unit: DeploymentUnit,
): RenderedArtifact {
  const services = unitServices(plan, unit);
  const ports = [...publicPorts(services)].sort((a, b) => a - b);
  const volumes = renderVolumes(plan, services);
  const document = {
    apiVersion: aciApiVersion,
    location: plan.location,
    name: unit.name,
    type: "Microsoft.ContainerInstance/containerGroups",
    properties: {
      ...(plan.registry
        ? {
            imageRegistryCredentials: [
              {
                server: plan.registry.server,
                username: plan.registry.username,
                password: plan.registry.password,
              },
            ],
          }
        : {}),
      containers: services.map(renderContainer),
      osType: "Linux",
      restartPolicy: "Always",
      ...(ports.length > 0
        ? {
            ipAddress: {
              type: "Public",
              dnsNameLabel: unit.dnsLabel,
              ports: ports.map((port) => ({ port, protocol: "TCP" })),
            },
          }
        : {}),
      ...(volumes.length > 0 ? { volumes } : {}),
    },
  };

  return {
    unit: unit.suffix || "primary",
    name: unit.name,
    dnsLabel: unit.dnsLabel,
    text: dump(document, { lineWidth: -1, noRefs: true }),
  };
}

const sensitiveFields = new Set(["secureValue", "password", "storageAccountKey"]);

/**
 * Replace secret values in an artifact, for storage outside the deployment
 */
export function redactArtifact(text: string) {
  return dump(redact(load(text)), { lineWidth: -1, noRefs: true });
}

/**
 * Round memory up to the 0.1 GB steps ACI accepts
 */
export function normalizeMemory(memoryGb: number) {
  if (!(memoryGb > 0)) {
    throw new RangeError(`Memory must be greater than zero, got ${memoryGb}`);
  }

  // toFixed drops float noise such as 0.30000000000000004
  return Math.ceil(Number((memoryGb * 10).toFixed(6))) / 10;
}

function renderContainer(service: ServiceDescriptor) {
  return {
    name: sanitizeName(service.serviceName),
    properties: {
      image: service.image,
      ...(service.ports.length > 0
        ? {
            ports: service.ports.map((port) => ({ port, protocol: "TCP" })),
          }
        : {}),
      resources: {
        requests: {
          cpu: service.resources.cpu,
          memoryInGB: normalizeMemory(service.resources.memoryGb),
        },
      },
      ...(service.environment.length > 0
        ? {
            environmentVariables: service.environment.map(
              ({ name, value, secure }) =>
                secure ? { name, secureValue: value } : { name, value },
            ),
          }
        : {}),
      ...(service.command.length > 0 ? { command: service.command } : {}),
      ...(service.volumes.length > 0
        ? {
            volumeMounts: service.volumes.map(
              ({ name, mountPath, readOnly }) =>
                readOnly ? { name, mountPath, readOnly } : { name, mountPath },
            ),
          }
        : {}),
    },
  };
}

function renderVolumes(plan: DeployPlan, services: ServiceDescriptor[]) {
  const names = [
    ...new Set(services.flatMap(({ volumes }) => volumes.map(({ name }) => name))),
  ];

  return names.map((name) =>
    plan.storage
      ? {
          name,
          azureFile: {
            shareName: name,
            storageAccountName: plan.storage.accountName,
            storageAccountKey: plan.storage.accountKey,
          },
        }
      : { name, emptyDir: {} },
  );
}

function redact(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redact);
  }

  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, field]) => [
        key,
        sensitiveFields.has(key) ? "***" : redact(field),
      ]),
    );
  }

  return value;
}
