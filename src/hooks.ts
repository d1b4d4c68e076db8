import * as core from "@actions/core";
import { isAbsolute, join } from "node:path";
import { pathToFileURL } from "node:url";
import type { ApplyOutcome } from "./azure.js";
import type { DeployContext, Logger } from "./context.js";
import { HookExecutionError, HookLoadError } from "./errors.js";
import { importModule } from "./modules.js";
import type { DeployPlan } from "./plan.js";
import { truthy } from "./schema.js";
import { exists } from "./utils.js";

export const extensionPoints = [
  "pre_validate_env",
  "post_validate_env",
  "build_deploy_plan",
  "pre_render_yaml",
  "post_render_yaml",
  "pre_az_apply",
  "post_deploy",
  "on_error",
] as const;

export type ExtensionPoint = (typeof extensionPoints)[number];

/**
 * Arguments passed to each extension point
 */
export interface HookArguments {
  pre_validate_env: [context: DeployContext];
  post_validate_env: [context: DeployContext];
  build_deploy_plan: [context: DeployContext, plan: DeployPlan];
  pre_render_yaml: [context: DeployContext, plan: DeployPlan];
  post_render_yaml: [context: DeployContext, plan: DeployPlan, text: string];
  pre_az_apply: [context: DeployContext, plan: DeployPlan, location: string];
  post_deploy: [
    context: DeployContext,
    plan: DeployPlan,
    outcomes: ApplyOutcome[],
  ];
  on_error: [context: DeployContext, error: unknown];
}

/**
 * Shape of a hook unit as authored by a project
 *
 * Every extension point is optional. `post_render_yaml` may return the
 * replacement artifact text; all other return values are ignored.
 */
export type HookDefinition = {
  [P in ExtensionPoint]?: (...args: HookArguments[P]) => unknown;
};

type HookFunction = (...args: readonly unknown[]) => unknown;

/**
 * Loaded hook unit, with one slot per extension point
 *
 * A slot is either the callable or `null` if the unit does not implement it.
 */
export type Hooks = Readonly<Record<ExtensionPoint, HookFunction | null>>;

export type HookOutcome =
  | { status: "skipped" }
  | { status: "completed"; value: unknown }
  | { status: "failed"; error: HookExecutionError };

export const noopHooks: Hooks = createHooks(() => null);

/**
 * Conventional location of the hook unit, relative to the repository root
 */
export const defaultHooksPath = join(".deploy", "hooks.mjs");

/**
 * Type helper for authoring hook units
 */
export function defineHooks(hooks: HookDefinition) {
  return hooks;
}

/**
 * Anything hook settings can be read from, such as the environment view or
 * the layered configuration sources
 */
export interface SettingLookup {
  get(name: string): string | undefined;
}

/**
 * Determine which hook unit to load
 *
 * An explicit reference takes precedence over `DEPLOY_HOOKS_MODULE`. If
 * neither is set, the default location is used.
 */
export function resolveHooksReference(
  explicit: string | undefined,
  settings: SettingLookup,
) {
  return (
    explicit?.trim() || settings.get("DEPLOY_HOOKS_MODULE")?.trim() || undefined
  );
}

/**
 * Determine whether hook failures are downgraded to warnings
 *
 * An explicit setting takes precedence over `DEPLOY_HOOKS_SOFT_FAIL`; hook
 * failures are fatal by default.
 */
export function resolveSoftFail(
  explicit: boolean | undefined,
  settings: SettingLookup,
) {
  return explicit ?? truthy(settings.get("DEPLOY_HOOKS_SOFT_FAIL"));
}

/**
 * Load the hook unit
 *
 * If a reference is given, it must load. Otherwise, the default location is
 * tried: a missing file yields no-op hooks, but a file that exists and fails
 * to load is an error just the same.
 *
 * @throws {HookLoadError}
 */
export async function loadHooks(
  reference: string | undefined,
  { repoRoot, logger = core }: { repoRoot: string; logger?: Logger },
): Promise<Hooks> {
  if (!reference) {
    const path = join(repoRoot, defaultHooksPath);

    if (!(await exists(path))) {
      logger.debug(`No hooks module found at "${path}"`);

      return noopHooks;
    }

    return importHooks(path, pathToFileURL(path).href, logger);
  }

  if (!isFilePath(reference)) {
    return importHooks(reference, reference, logger);
  }

  const path = isAbsolute(reference) ? reference : join(repoRoot, reference);

  if (!(await exists(path))) {
    throw new HookLoadError(reference, new Error(`File "${path}" not found`));
  }

  return importHooks(reference, pathToFileURL(path).href, logger);
}

/**
 * Adapt a hook unit's exports into uniform slots
 *
 * Accepts a `getHooks` factory or a default-exported factory (either may be
 * async), a default-exported hooks object, or standalone functions named
 * after the extension points, in that order of preference.
 *
 * @throws {HookLoadError} if the exports cannot be adapted
 */
export async function adaptModule(
  exports: unknown,
  reference: string,
): Promise<Hooks> {
  if (typeof exports !== "object" || exports === null) {
    throw new HookLoadError(
      reference,
      new TypeError("Module did not produce any exports"),
    );
  }

  const candidates: unknown[] = [
    Reflect.get(exports, "getHooks"),
    Reflect.get(exports, "default"),
  ];
  const factory = candidates.find(isHookFunction);

  if (factory) {
    let hooks: unknown;

    try {
      hooks = await factory();
    } catch (cause) {
      throw new HookLoadError(reference, cause);
    }

    return adaptHooks(hooks, reference);
  }

  const fallback: unknown = Reflect.get(exports, "default");

  return adaptHooks(
    typeof fallback === "object" && fallback !== null ? fallback : exports,
    reference,
  );
}

/**
 * Adapt a hooks object into uniform slots
 *
 * Methods are bound to their object, so class-based hooks keep their state.
 *
 * @throws {HookLoadError} if an extension point holds something other than a
 *                         function
 */
export function adaptHooks(value: unknown, reference = "hooks"): Hooks {
  if (typeof value !== "object" || value === null) {
    throw new HookLoadError(
      reference,
      new TypeError(`Expected a hooks object, got ${describeType(value)}`),
    );
  }

  return createHooks((point) => {
    const slot: unknown = Reflect.get(value, point);

    if (slot === undefined || slot === null) {
      return null;
    }

    if (!isHookFunction(slot)) {
      throw new HookLoadError(
        reference,
        new TypeError(
          `Extension point "${point}" must be a function, got ` +
            describeType(slot),
        ),
      );
    }

    return slot.bind(value);
  });
}

/**
 * Dispatches extension point calls to a loaded hook unit
 */
export class HookRunner {
  readonly #hooks: Hooks;
  readonly #softFail: boolean;
  readonly #logger: Logger;

  constructor(
    hooks: Hooks = noopHooks,
    { softFail = false, logger = core }: { softFail?: boolean; logger?: Logger } = {},
  ) {
    this.#hooks = hooks;
    this.#softFail = softFail;
    this.#logger = logger;
  }

  get softFail() {
    return this.#softFail;
  }

  /**
   * Check whether the hook unit implements an extension point
   */
  implements(point: ExtensionPoint) {
    return this.#hooks[point] !== null;
  }

  /**
   * Invoke an extension point, if implemented
   *
   * In soft-fail mode, a failing hook is reported as a warning and a failed
   * outcome; the caller is responsible for restoring the prior state.
   *
   * @throws {HookExecutionError} if the hook fails and soft-fail is off
   */
  async call<P extends Exclude<ExtensionPoint, "on_error">>(
    point: P,
    ...args: HookArguments[P]
  ): Promise<HookOutcome> {
    const hook = this.#hooks[point];

    if (!hook) {
      return { status: "skipped" };
    }

    this.#logger.debug(`Calling hook "${point}"`);

    try {
      return { status: "completed", value: await hook(...args) };
    } catch (cause) {
      const error = new HookExecutionError(point, cause);

      if (!this.#softFail) {
        throw error;
      }

      this.#logger.warning(
        `${error.message}. Soft-fail is enabled, continuing with the state ` +
          "from before the hook was called.",
      );

      return { status: "failed", error };
    }
  }

  /**
   * Notify the `on_error` extension point of a failure
   *
   * Never throws: a failure of the observer itself is logged, so the
   * original error is the one reported.
   */
  async observe(context: DeployContext, error: unknown) {
    const hook = this.#hooks.on_error;

    if (!hook) {
      return;
    }

    try {
      await hook(context, error);
    } catch (cause) {
      const message = cause instanceof Error ? cause.message : String(cause);
      this.#logger.error(`Hook "on_error" failed: ${message}`);
    }
  }
}

async function importHooks(
  reference: string,
  specifier: string,
  logger: Logger,
) {
  let exports: unknown;

  try {
    exports = await importModule(specifier);
  } catch (cause) {
    throw new HookLoadError(reference, cause);
  }

  const hooks = await adaptModule(exports, reference);
  const implemented = extensionPoints.filter((point) => hooks[point] !== null);

  logger.info(
    `Loaded hooks from "${reference}" ` +
      `(${implemented.length > 0 ? implemented.join(", ") : "no extension points"})`,
  );

  return hooks;
}

function createHooks(slot: (point: ExtensionPoint) => HookFunction | null) {
  return Object.freeze({
    pre_validate_env: slot("pre_validate_env"),
    post_validate_env: slot("post_validate_env"),
    build_deploy_plan: slot("build_deploy_plan"),
    pre_render_yaml: slot("pre_render_yaml"),
    post_render_yaml: slot("post_render_yaml"),
    pre_az_apply: slot("pre_az_apply"),
    post_deploy: slot("post_deploy"),
    on_error: slot("on_error"),
  });
}

function isHookFunction(value: unknown): value is HookFunction {
  return typeof value === "function";
}

function isFilePath(reference: string) {
  return (
    !reference.startsWith("@") &&
    (/\.[cm]?js$/.test(reference) ||
      /[\\/]/.test(reference) ||
      reference.startsWith("."))
  );
}

function describeType(value: unknown) {
  return value === null ? "null" : Array.isArray(value) ? "array" : typeof value;
}
