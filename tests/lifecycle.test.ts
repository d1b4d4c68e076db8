import * as core from "@actions/core";
import { load } from "js-yaml";
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { ApplyOutcome } from "../src/azure.js";
import { parseManifest } from "../src/compose.js";
import { createContext, EnvironmentView } from "../src/context.js";
import {
  ApplyFailure,
  HookExecutionError,
  SchemaViolation,
  StageFailure,
} from "../src/errors.js";
import {
  adaptHooks,
  defineHooks,
  type HookDefinition,
  HookRunner,
} from "../src/hooks.js";
import { LifecycleEngine, type LifecycleOptions } from "../src/lifecycle.js";
import type { DeployMode } from "../src/plan.js";
import type { RenderedArtifact } from "../src/render.js";
import { defineSettings } from "../src/settings.js";

vi.mock("@actions/core");

const deployFile = {
  PUBLIC_DOMAIN: "shop.example.com",
  ACME_EMAIL: "ops@example.com",
  AZURE_CONTAINER_NAME: "shop",
  AZURE_RESOURCE_GROUP: "shop-rg",
};

const runtimeFile = {
  BASIC_AUTH_HASH: "test-hash",
  APP_SECRET: "test-secret",
};

const webAndProxy = {
  web: {
    image: "web:1",
    "x-deploy-role": "app",
    command: "serve --port 8080",
    ports: ["8080:8080"],
  },
  proxy: {
    image: "caddy:2-alpine",
    "x-deploy-role": "sidecar",
    ports: ["80:80", "443:443"],
  },
};

const withMetrics = {
  ...webAndProxy,
  metrics: {
    image: "metrics:1",
    "x-deploy-role": "secondary",
    ports: ["9100-9102:9100-9102"],
  },
};

function setup({
  hooks = {},
  softFail = false,
  deploy = deployFile,
  services = webAndProxy,
  mode = "app+sidecar",
  dryRun = false,
  outcome = (artifact: RenderedArtifact): ApplyOutcome => ({
    unit: artifact.unit,
    name: artifact.name,
    success: true,
    result: { provisioningState: "Succeeded" },
  }),
}: {
  hooks?: HookDefinition;
  softFail?: boolean;
  deploy?: Record<string, string>;
  services?: Record<string, unknown>;
  mode?: DeployMode;
  dryRun?: boolean;
  outcome?: (artifact: RenderedArtifact) => ApplyOutcome;
} = {}) {
  const context = createContext({
    env: new EnvironmentView([["PATH", "/usr/bin"]]),
    args: defineSettings({
      mode,
      omitSidecar: false,
      composeFiles: [],
      envFile: ".env.deploy",
      runtimeEnvFile: ".env",
      variables: new Map(),
      dryRun,
      repoRoot: "/repo",
    }),
    repoRoot: "/repo",
  });
  const manifest = vi.fn(async () =>
    parseManifest(JSON.stringify({ services })),
  );
  const applier = {
    apply: vi.fn(async (artifact: RenderedArtifact) => outcome(artifact)),
  };
  const store = {
    write: vi.fn(async (artifact: RenderedArtifact) => `/tmp/${artifact.name}.aci.yaml`),
    cleanup: vi.fn(async () => undefined),
  };
  const mask = vi.fn();
  const options: LifecycleOptions = {
    mode,
    sources: () => ({ deployFile: deploy, runtimeFile }),
    manifest,
    applier,
    store,
    dryRun,
    mask,
  };
  const engine = new LifecycleEngine(
    context,
    new HookRunner(adaptHooks(hooks), { softFail }),
    options,
  );

  return { context, engine, manifest, applier, store, mask };
}

function containers(artifact: RenderedArtifact | undefined) {
  const document = load(artifact?.text ?? "");

  if (
    typeof document !== "object" ||
    document === null ||
    !("properties" in document)
  ) {
    throw new Error("Artifact is not a container group");
  }

  return document.properties;
}

describe("Lifecycle", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  describe("Deployment Run", () => {
    it("should deploy an app with its sidecar in a single unit", async () => {
      const postDeploy = vi.fn();
      const { context, engine, applier, store, mask } = setup({
        hooks: { post_deploy: postDeploy },
      });

      const result = await engine.run();

      expect(result.artifacts).toHaveLength(1);
      expect(containers(result.artifacts[0])).toMatchObject({
        containers: [
          {
            name: "web",
            properties: { command: ["serve", "--port", "8080"] },
          },
          { name: "proxy" },
        ],
      });
      expect(applier.apply).toHaveBeenCalledTimes(1);
      expect(applier.apply).toHaveBeenCalledWith(
        result.artifacts[0],
        "/tmp/shop.aci.yaml",
        { resourceGroup: "shop-rg", location: "westeurope" },
      );
      expect(postDeploy).toHaveBeenCalledTimes(1);
      expect(postDeploy).toHaveBeenCalledWith(context, result.plan, [
        {
          unit: "primary",
          name: "shop",
          success: true,
          result: { provisioningState: "Succeeded" },
        },
      ]);
      expect(engine.history).toEqual([
        "start",
        "env-resolved",
        "plan-built",
        "plan-finalized",
        "artifact-rendered",
        "applied",
        "done",
      ]);
      expect(engine.state).toBe("done");
      expect(store.cleanup).toHaveBeenCalledTimes(1);
      expect(mask.mock.calls).toEqual([["test-hash"], ["test-secret"]]);
      expect(core.info).toHaveBeenCalledWith("Resolved 17 configuration key(s)");
      expect(core.info).toHaveBeenCalledWith(
        'Planned 1 deployment unit(s) in "app+sidecar" mode: shop',
      );
    });

    it("should abort before reading the manifest if a mandatory key is missing", async () => {
      const onError = vi.fn();
      const { engine, manifest, applier, store } = setup({
        hooks: { on_error: onError },
        deploy: { PUBLIC_DOMAIN: "shop.example.com" },
      });

      const error = await engine.run().catch((error: unknown) => error);

      expect(error).toBeInstanceOf(SchemaViolation);
      expect(error).toHaveProperty("stage", "env-resolved");
      expect(error).toHaveProperty("missing", ["ACME_EMAIL"]);
      expect(manifest).not.toHaveBeenCalled();
      expect(applier.apply).not.toHaveBeenCalled();
      expect(engine.history).toEqual(["start", "error"]);
      expect(onError).toHaveBeenCalledWith(expect.anything(), error);
      expect(store.cleanup).toHaveBeenCalledTimes(1);
      expect(core.error).toHaveBeenCalledWith(
        "[env-resolved] Environment validation failed for deployment " +
          "environment: Missing mandatory key(s): ACME_EMAIL",
      );
    });

    it("should apply units in order and stop at the first failure", async () => {
      const postDeploy = vi.fn();
      const { engine, applier } = setup({
        mode: "full",
        services: withMetrics,
        hooks: { post_deploy: postDeploy },
        outcome: (artifact) => ({
          unit: artifact.unit,
          name: artifact.name,
          success: false,
          result: "Quota exceeded",
        }),
      });

      const error = await engine.run().catch((error: unknown) => error);

      expect(error).toBeInstanceOf(ApplyFailure);
      expect(error).toHaveProperty(
        "message",
        'Failed to apply deployment unit "shop": Quota exceeded',
      );
      expect(error).toHaveProperty("stage", "applied");
      expect(applier.apply).toHaveBeenCalledTimes(1);
      expect(postDeploy).not.toHaveBeenCalled();
      expect(engine.history.slice(-2)).toEqual(["artifact-rendered", "error"]);
    });

    it("should report a generic failure if the applier gives no reason", async () => {
      const { engine } = setup({
        outcome: (artifact) => ({
          unit: artifact.unit,
          name: artifact.name,
          success: false,
          result: { provisioningState: "Failed" },
        }),
      });

      await expect(engine.run()).rejects.toThrow(
        'Failed to apply deployment unit "shop": the apply command reported ' +
          "failure",
      );
    });

    it("should apply every unit of a split plan", async () => {
      const { engine, applier } = setup({ mode: "full", services: withMetrics });

      const result = await engine.run();

      expect(result.artifacts.map(({ name }) => name)).toEqual([
        "shop",
        "shop-metrics",
      ]);
      expect(applier.apply.mock.calls.map(([{ name }]) => name)).toEqual([
        "shop",
        "shop-metrics",
      ]);
      expect(result.outcomes).toHaveLength(2);
    });

    it("should render and store, but not apply, in a dry run", async () => {
      const { engine, applier, store } = setup({ dryRun: true });

      const result = await engine.run();

      expect(result.outcomes).toEqual([]);
      expect(store.write).toHaveBeenCalledTimes(1);
      expect(applier.apply).not.toHaveBeenCalled();
      expect(engine.state).toBe("done");
      expect(core.info).toHaveBeenCalledWith(
        'Dry run: Not applying "shop" (written to /tmp/shop.aci.yaml)',
      );
    });

    it("should wrap unexpected errors with the failing stage", async () => {
      const { engine, manifest } = setup();
      manifest.mockRejectedValue(new Error("Disk unavailable"));

      const error = await engine.run().catch((error: unknown) => error);

      expect(error).toBeInstanceOf(StageFailure);
      expect(error).toHaveProperty("stage", "plan-built");
      expect(error).toHaveProperty("message", "Disk unavailable");
    });

    it("should only run once", async () => {
      const { engine } = setup();

      await engine.run();

      await expect(engine.run()).rejects.toThrow(
        "Lifecycle has already run (state: done)",
      );
    });
  });

  describe("Hooks", () => {
    it("should share environment changes with later stages", async () => {
      const { engine, context } = setup({
        deploy: { PUBLIC_DOMAIN: "shop.example.com" },
        hooks: defineHooks({
          pre_validate_env: ({ env }) => {
            env.set("ACME_EMAIL", "hooks@example.com");
          },
        }),
      });

      await engine.run();

      expect(context.resolved?.values.get("ACME_EMAIL")).toBe(
        "hooks@example.com",
      );
      expect(context.resolved?.provenance.get("ACME_EMAIL")).toBe("process");
    });

    it("should let hooks mutate the plan in place", async () => {
      const { engine } = setup({
        hooks: defineHooks({
          build_deploy_plan: (_context, plan) => {
            plan.services.app.image = "web:2";
          },
          pre_render_yaml: (_context, plan) => {
            plan.extensions.reviewed = true;
          },
        }),
      });

      const result = await engine.run();

      expect(result.plan.services.app.image).toBe("web:2");
      expect(result.plan.extensions).toEqual({ reviewed: true });
      expect(containers(result.artifacts[0])).toMatchObject({
        containers: [{ properties: { image: "web:2" } }, { name: "proxy" }],
      });
    });

    it("should abort if a plan hook fails", async () => {
      const onError = vi.fn();
      const { engine, applier } = setup({
        hooks: defineHooks({
          build_deploy_plan: () => {
            throw new Error("Image not allowed");
          },
          on_error: onError,
        }),
      });

      const error = await engine.run().catch((error: unknown) => error);

      expect(error).toBeInstanceOf(HookExecutionError);
      expect(error).toHaveProperty("stage", "plan-built");
      expect(error).toHaveProperty(
        "message",
        'Hook "build_deploy_plan" failed: Image not allowed',
      );
      expect(onError).toHaveBeenCalledWith(expect.anything(), error);
      expect(applier.apply).not.toHaveBeenCalled();
    });

    it("should continue with the previous plan in soft-fail mode", async () => {
      const { engine, applier } = setup({
        softFail: true,
        hooks: defineHooks({
          build_deploy_plan: (_context, plan) => {
            plan.services.app.image = "web:tampered";
            throw new Error("Image not allowed");
          },
        }),
      });

      const result = await engine.run();

      expect(result.plan.services.app.image).toBe("web:1");
      expect(containers(result.artifacts[0])).toMatchObject({
        containers: [{ properties: { image: "web:1" } }, { name: "proxy" }],
      });
      expect(applier.apply).toHaveBeenCalledTimes(1);
      expect(core.warning).toHaveBeenCalledWith(
        'Hook "build_deploy_plan" failed: Image not allowed. Soft-fail is ' +
          "enabled, continuing with the state from before the hook was called.",
      );
    });

    it("should keep values that cannot be cloned in soft-fail mode", async () => {
      const notify = () => "sent";
      const { engine } = setup({
        softFail: true,
        hooks: defineHooks({
          build_deploy_plan: (_context, plan) => {
            plan.extensions.notify = notify;
          },
          pre_render_yaml: () => undefined,
        }),
      });

      const result = await engine.run();

      expect(engine.state).toBe("done");
      expect(result.plan.extensions.notify).toBe(notify);
    });

    it("should discard extensions added by a failed hook in soft-fail mode", async () => {
      const { engine } = setup({
        softFail: true,
        hooks: defineHooks({
          build_deploy_plan: (_context, plan) => {
            plan.extensions.ticket = "OPS-1";
          },
          pre_render_yaml: (_context, plan) => {
            plan.extensions.approved = true;
            throw new Error("Approval service unreachable");
          },
        }),
      });

      const result = await engine.run();

      expect(result.plan.extensions).toEqual({ ticket: "OPS-1" });
    });

    it("should restore the environment after a failed hook in soft-fail mode", async () => {
      const { engine, context } = setup({
        softFail: true,
        hooks: defineHooks({
          pre_validate_env: ({ env }) => {
            env.set("AZURE_LOCATION", "northeurope");
            throw new Error("Vault unreachable");
          },
        }),
      });

      const result = await engine.run();

      expect(result.plan.location).toBe("westeurope");
      expect(context.env.get("AZURE_LOCATION")).toBe("westeurope");
    });

    it("should replace artifact text returned by post_render_yaml", async () => {
      const { engine } = setup({
        hooks: defineHooks({
          post_render_yaml: (_context, _plan, text) => `# reviewed\n${text}`,
        }),
      });

      const result = await engine.run();

      expect(result.artifacts[0]?.text.split("\n")[0]).toBe("# reviewed");
    });

    it("should ignore non-text values returned by post_render_yaml", async () => {
      const { engine } = setup({
        hooks: defineHooks({ post_render_yaml: () => 42 }),
      });

      const result = await engine.run();

      expect(result.artifacts[0]?.text.startsWith("apiVersion:")).toBe(true);
      expect(core.warning).toHaveBeenCalledWith(
        'Hook "post_render_yaml" returned number instead of text; keeping ' +
          'the rendered artifact for "shop"',
      );
    });

    it("should pass the artifact location to pre_az_apply", async () => {
      const preApply = vi.fn();
      const { engine, context } = setup({ hooks: { pre_az_apply: preApply } });

      const result = await engine.run();

      expect(preApply).toHaveBeenCalledWith(
        context,
        result.plan,
        "/tmp/shop.aci.yaml",
      );
    });

    it("should report the original error if on_error fails", async () => {
      const { engine } = setup({
        deploy: {},
        hooks: defineHooks({
          on_error: () => {
            throw new Error("Webhook unreachable");
          },
        }),
      });

      await expect(engine.run()).rejects.toThrow(SchemaViolation);
      expect(core.error).toHaveBeenCalledWith(
        'Hook "on_error" failed: Webhook unreachable',
      );
    });
  });
});
