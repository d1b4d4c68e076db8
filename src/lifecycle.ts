import type { ApplyOutcome, Applier, ArtifactStore } from "./azure.js";
import {
  type ComposeManifest,
  interpolateManifest,
  interpret,
  type RoleOverrides,
} from "./compose.js";
import { type EnvSources, resolve } from "./config.js";
import type { DeployContext } from "./context.js";
import {
  ApplyFailure,
  DeploymentError,
  type Stage,
  StageFailure,
} from "./errors.js";
import type { HookArguments, HookRunner } from "./hooks.js";
import {
  build,
  type DeployMode,
  type DeployPlan,
  type PlanOverrides,
} from "./plan.js";
import { type RenderedArtifact, render } from "./render.js";
import { defaultSchema, type Schema } from "./schema.js";

export type LifecycleState = Stage | "error";

export interface LifecycleOptions {
  mode: DeployMode;
  schema?: Schema;

  /**
   * Environment sources besides the process environment, read once the
   * `pre_validate_env` hook has run
   */
  sources: (context: DeployContext) => Promise<EnvSources> | EnvSources;

  /**
   * Manifest to deploy, read once the environment has been resolved
   */
  manifest: (context: DeployContext) => Promise<ComposeManifest>;

  roles?: RoleOverrides;
  overrides?: PlanOverrides;
  applier: Applier;
  store: ArtifactStore;

  /**
   * Render and store artifacts, but do not apply them
   */
  dryRun?: boolean;

  /**
   * Called with every resolved secret value, e.g. to mask it in logs
   */
  mask?: (secret: string) => void;
}

export interface LifecycleResult {
  plan: DeployPlan;
  artifacts: RenderedArtifact[];
  outcomes: ApplyOutcome[];
}

type PlanHook = "build_deploy_plan" | "pre_render_yaml" | "pre_az_apply" | "post_deploy";
type EnvironmentHook = "pre_validate_env" | "post_validate_env";

/**
 * Drives a single deployment run through its fixed sequence of states
 *
 * Every transition is a hook boundary. If anything fails, the `on_error`
 * hook observes the failure before it is rethrown, tagged with the stage the
 * engine was transitioning into.
 */
export class LifecycleEngine {
  readonly #context: DeployContext;
  readonly #hooks: HookRunner;
  readonly #options: LifecycleOptions;
  readonly #history: LifecycleState[] = ["start"];

  constructor(
    context: DeployContext,
    hooks: HookRunner,
    options: LifecycleOptions,
  ) {
    this.#context = context;
    this.#hooks = hooks;
    this.#options = options;
  }

  get state(): LifecycleState {
    return this.#history[this.#history.length - 1] ?? "start";
  }

  /**
   * All states the engine has passed through, in order
   */
  get history(): readonly LifecycleState[] {
    return this.#history;
  }

  async run(): Promise<LifecycleResult> {
    if (this.state !== "start") {
      throw new Error(`Lifecycle has already run (state: ${this.state})`);
    }

    const { store } = this.#options;
    let stage: Stage = "env-resolved";

    try {
      await this.#resolveEnvironment();
      this.#advance(stage);

      stage = "plan-built";
      let plan = await this.#buildPlan();
      this.#advance(stage);

      stage = "plan-finalized";
      plan = await this.#callPlanHook(plan, "pre_render_yaml", [
        this.#context,
        plan,
      ]);
      this.#advance(stage);

      stage = "artifact-rendered";
      const artifacts = await this.#render(plan);
      this.#advance(stage);

      stage = "applied";
      const { plan: appliedPlan, outcomes } = await this.#apply(plan, artifacts);
      plan = appliedPlan;
      this.#advance(stage);

      stage = "done";
      plan = await this.#callPlanHook(plan, "post_deploy", [
        this.#context,
        plan,
        outcomes,
      ]);
      this.#advance(stage);

      return { plan, artifacts, outcomes };
    } catch (cause) {
      const error = tagError(cause, stage);

      this.#history.push("error");
      this.#context.logger.error(error.describe());
      await this.#hooks.observe(this.#context, error);

      throw error;
    } finally {
      await store.cleanup();
    }
  }

  async #resolveEnvironment() {
    const context = this.#context;
    const { schema = defaultSchema } = this.#options;

    await this.#callEnvironmentHook("pre_validate_env");

    const sources = await this.#options.sources(context);
    const resolved = resolve(
      schema,
      { ...sources, processEnv: context.env.toRecord() },
      { context: "deployment environment" },
    );

    context.resolved = resolved;
    context.env.assign(resolved.values);

    for (const [key, value] of resolved.values) {
      if (schema.get(key)?.sensitivity === "secret") {
        this.#options.mask?.(value);
      }
    }

    context.logger.info(`Resolved ${resolved.values.size} configuration key(s)`);

    await this.#callEnvironmentHook("post_validate_env");
  }

  async #buildPlan() {
    const context = this.#context;
    const { mode, roles, overrides, schema = defaultSchema } = this.#options;
    const manifest = interpolateManifest(
      await this.#options.manifest(context),
      context.env.toMap(),
    );
    const roleMap = interpret(manifest, roles);
    const plan = build(context, roleMap, mode, overrides, schema);

    context.logger.info(
      `Planned ${plan.units.length} deployment unit(s) in "${mode}" mode: ` +
        plan.units.map(({ name }) => name).join(", "),
    );

    return this.#callPlanHook(plan, "build_deploy_plan", [context, plan]);
  }

  async #render(plan: DeployPlan) {
    const artifacts: RenderedArtifact[] = [];

    for (const artifact of render(plan)) {
      const outcome = await this.#hooks.call(
        "post_render_yaml",
        this.#context,
        plan,
        artifact.text,
      );

      if (outcome.status !== "completed" || outcome.value === undefined) {
        artifacts.push(artifact);
      } else if (typeof outcome.value === "string") {
        artifacts.push({ ...artifact, text: outcome.value });
      } else {
        this.#context.logger.warning(
          `Hook "post_render_yaml" returned ${typeof outcome.value} instead ` +
            `of text; keeping the rendered artifact for "${artifact.name}"`,
        );
        artifacts.push(artifact);
      }
    }

    return artifacts;
  }

  async #apply(plan: DeployPlan, artifacts: RenderedArtifact[]) {
    const { applier, store, dryRun = false } = this.#options;
    const outcomes: ApplyOutcome[] = [];

    for (const artifact of artifacts) {
      const location = await store.write(artifact);

      plan = await this.#callPlanHook(plan, "pre_az_apply", [
        this.#context,
        plan,
        location,
      ]);

      if (dryRun) {
        this.#context.logger.info(
          `Dry run: Not applying "${artifact.name}" (written to ${location})`,
        );
        continue;
      }

      const outcome = await applier.apply(artifact, location, {
        resourceGroup: plan.resourceGroup,
        location: plan.location,
      });

      if (!outcome.success) {
        throw new ApplyFailure(artifact.name, failureReason(outcome.result));
      }

      outcomes.push(outcome);
    }

    return { plan, outcomes };
  }

  /**
   * Call a hook that may mutate the plan
   *
   * If the hook fails in soft-fail mode, the plan as it was before the call
   * is returned instead.
   */
  async #callPlanHook<P extends PlanHook>(
    plan: DeployPlan,
    point: P,
    args: HookArguments[P],
  ) {
    if (!this.#hooks.implements(point)) {
      return plan;
    }

    const snapshot = this.#hooks.softFail ? snapshotPlan(plan) : plan;
    const outcome = await this.#hooks.call(point, ...args);

    return outcome.status === "failed" ? snapshot : plan;
  }

  /**
   * Call a hook that may mutate the environment
   *
   * If the hook fails in soft-fail mode, the environment is restored to its
   * state before the call.
   */
  async #callEnvironmentHook(point: EnvironmentHook) {
    if (!this.#hooks.implements(point)) {
      return;
    }

    const snapshot = this.#context.env.snapshot();
    const outcome = await this.#hooks.call(point, this.#context);

    if (outcome.status === "failed") {
      this.#context.env.restore(snapshot);
    }
  }

  #advance(state: Stage) {
    this.#context.logger.debug(`Lifecycle: ${this.state} -> ${state}`);
    this.#history.push(state);
  }
}

/**
 * Copy a plan so a failed hook's changes can be discarded
 *
 * Hooks may keep arbitrary values in `extensions`, which cannot all be
 * cloned; that bag is copied one level deep only.
 */
function snapshotPlan({ extensions, ...plan }: DeployPlan): DeployPlan {
  return { ...structuredClone(plan), extensions: { ...extensions } };
}

/**
 * Extract a usable failure reason from an applier's result
 */
function failureReason(result: unknown) {
  if (result instanceof Error) {
    return result;
  }

  if (typeof result === "string" && result.trim() !== "") {
    return result.trim();
  }

  return undefined;
}

/**
 * Attach the failing stage to an error, wrapping foreign errors
 */
function tagError(cause: unknown, stage: Stage): DeploymentError {
  if (cause instanceof DeploymentError) {
    cause.stage ??= stage;

    return cause;
  }

  return new StageFailure(stage, cause);
}
