import { env as processEnv } from "node:process";
import { isAbsolute, join } from "node:path";
import * as core from "@actions/core";
import {
  type Applier,
  type ArtifactStore,
  AzureCliApplier,
  FileArtifactStore,
} from "./azure.js";
import { loadManifest, resolveComposeFiles } from "./compose.js";
import { type EnvSources, lookupSource, readEnvFile } from "./config.js";
import { createContext, type Logger } from "./context.js";
import { DeploymentError, StageFailure } from "./errors.js";
import {
  HookRunner,
  loadHooks,
  resolveHooksReference,
  resolveSoftFail,
} from "./hooks.js";
import {
  LifecycleEngine,
  type LifecycleResult,
  type LifecycleState,
} from "./lifecycle.js";
import type { PlanOverrides } from "./plan.js";
import type { Settings } from "./settings.js";

export interface DeployOptions {
  env?: NodeJS.ProcessEnv;
  applier?: Applier;
  store?: ArtifactStore;
  logger?: Logger;
}

export interface DeploymentReport extends LifecycleResult {
  state: LifecycleState;
}

/**
 * Main deployment function
 */
export async function deploy(
  settings: Readonly<Settings>,
  {
    env = processEnv,
    applier = new AzureCliApplier(),
    store = new FileArtifactStore(),
    logger = core,
  }: DeployOptions = {},
): Promise<DeploymentReport> {
  const { repoRoot } = settings;
  const context = createContext({ env, args: settings, repoRoot, logger });
  const absolute = (path: string) =>
    isAbsolute(path) ? path : join(repoRoot, path);

  let sources: EnvSources;
  let runner: HookRunner;

  // Hook settings may live in any configuration layer, so the sources are
  // read before the hook unit is loaded.
  try {
    sources = {
      overrides: Object.fromEntries(settings.variables),
      deployFile: await readEnvFile(absolute(settings.envFile)),
      runtimeFile: await readEnvFile(absolute(settings.runtimeEnvFile)),
    };

    const layered = { ...sources, processEnv: context.env.toRecord() };
    const layers = { get: (name: string) => lookupSource(layered, name) };
    const hooks = await loadHooks(
      resolveHooksReference(settings.hooksModule, layers),
      { repoRoot, logger },
    );
    runner = new HookRunner(hooks, {
      softFail: resolveSoftFail(settings.hooksSoftFail, layers),
      logger,
    });
  } catch (error) {
    if (error instanceof DeploymentError) {
      error.stage ??= "start";

      throw error;
    }

    throw new StageFailure("start", error);
  }

  const engine = new LifecycleEngine(context, runner, {
    mode: settings.mode,
    sources: () => sources,
    manifest: async () =>
      loadManifest(await resolveComposeFiles(settings.composeFiles, repoRoot)),
    roles: {
      app: settings.appService,
      sidecar: settings.sidecarService,
    },
    overrides: planOverrides(settings),
    applier,
    store,
    dryRun: settings.dryRun,
    mask: (secret) => core.setSecret(secret),
  });

  const result = await engine.run();

  return { ...result, state: engine.state };
}

function planOverrides(settings: Readonly<Settings>): PlanOverrides {
  return {
    app: {
      image: settings.image,
      cpu: settings.cpu,
      memoryGb: settings.memory,
    },
    sidecar: { image: settings.sidecarImage },
    omitSidecar: settings.omitSidecar,
  };
}
