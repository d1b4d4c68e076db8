import type { ExtensionPoint } from "./hooks.js";
import type { ServiceRole } from "./compose.js";

/**
 * Lifecycle stage an error was raised in
 *
 * Stages are named after the state the engine was transitioning into, so a
 * failure while resolving the environment carries `env-resolved`.
 */
export type Stage =
  | "start"
  | "env-resolved"
  | "plan-built"
  | "plan-finalized"
  | "artifact-rendered"
  | "applied"
  | "done";

/**
 * Base class of every failure the deployment core reports
 */
export class DeploymentError extends Error {
  stage: Stage | undefined;

  constructor(message: string, options?: ErrorOptions & { stage?: Stage }) {
    super(message, options);
    this.name = new.target.name;
    this.stage = options?.stage;
  }

  /**
   * Full message, prefixed with the failing stage once it is known
   */
  describe() {
    return this.stage ? `[${this.stage}] ${this.message}` : this.message;
  }
}

/**
 * Environment sources do not satisfy the schema
 *
 * Collects all missing and undeclared keys in a single report rather than
 * failing on the first one.
 */
export class SchemaViolation extends DeploymentError {
  readonly context: string;
  readonly missing: readonly string[];
  readonly unknown: readonly string[];
  readonly problems: readonly string[];

  constructor({
    context,
    missing = [],
    unknown = [],
    problems = [],
  }: {
    context: string;
    missing?: string[];
    unknown?: string[];
    problems?: string[];
  }) {
    const lines = [
      missing.length > 0
        ? `Missing mandatory key(s): ${missing.join(", ")}`
        : undefined,
      unknown.length > 0
        ? `Unknown key(s): ${unknown.join(", ")}`
        : undefined,
      ...problems,
    ].filter((line): line is string => line !== undefined);

    super(`Environment validation failed for ${context}: ${lines.join("; ")}`);
    this.context = context;
    this.missing = missing;
    this.unknown = unknown;
    this.problems = problems;
  }
}

export class ManifestInvalid extends DeploymentError {}

export class RoleAmbiguity extends DeploymentError {
  readonly role: ServiceRole;
  readonly services: readonly string[];

  constructor(role: ServiceRole, services: string[], detail?: string) {
    super(
      detail ??
        `More than one service claims the "${role}" role: ` +
          services.map((name) => `"${name}"`).join(", "),
    );
    this.role = role;
    this.services = services;
  }
}

export class RoleMissing extends DeploymentError {
  readonly role: ServiceRole;

  constructor(role: ServiceRole, detail?: string) {
    super(
      detail ??
        `No service claims the "${role}" role. Tag a service with ` +
          `"x-deploy-role: ${role}" or name one explicitly.`,
    );
    this.role = role;
  }
}

export class PlanIncomplete extends DeploymentError {
  readonly role: ServiceRole | undefined;

  constructor(message: string, role?: ServiceRole) {
    super(message);
    this.role = role;
  }
}

export class HookLoadError extends DeploymentError {
  readonly reference: string;

  constructor(reference: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);

    super(`Failed to load hooks from "${reference}": ${message}`, { cause });
    this.reference = reference;
  }
}

export class HookExecutionError extends DeploymentError {
  readonly extensionPoint: ExtensionPoint;

  constructor(extensionPoint: ExtensionPoint, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);

    super(`Hook "${extensionPoint}" failed: ${message}`, { cause });
    this.extensionPoint = extensionPoint;
  }
}

export class ApplyFailure extends DeploymentError {
  readonly unit: string;

  constructor(unit: string, cause?: unknown) {
    const reason =
      cause === undefined
        ? "the apply command reported failure"
        : cause instanceof Error
          ? cause.message
          : String(cause);

    super(`Failed to apply deployment unit "${unit}": ${reason}`, { cause });
    this.unit = unit;
  }
}

/**
 * Wraps any other error raised while a lifecycle transition was running
 */
export class StageFailure extends DeploymentError {
  constructor(stage: Stage, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);

    super(message, { cause, stage });
  }
}
