import { cwd } from "node:process";
import * as core from "@actions/core";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { parseSettings } from "../src/settings.js";

vi.mock("@actions/core", { spy: true });

function withInputs(inputs: Record<string, string>) {
  vi.spyOn(core, "getInput").mockImplementation((name) => inputs[name] ?? "");
  vi.spyOn(core, "getBooleanInput").mockImplementation(
    (name) => inputs[name] === "true",
  );
}

const env = { GITHUB_WORKSPACE: "/repo" };

describe("settings", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it("should parse settings with default values", () => {
    withInputs({});

    const settings = parseSettings(env);

    expect(settings).toEqual({
      mode: "app+sidecar",
      appService: undefined,
      sidecarService: undefined,
      omitSidecar: false,
      hooksModule: undefined,
      hooksSoftFail: undefined,
      composeFiles: [],
      envFile: ".env.deploy",
      runtimeEnvFile: ".env",
      variables: new Map(),
      image: undefined,
      cpu: undefined,
      memory: undefined,
      sidecarImage: undefined,
      dryRun: false,
      repoRoot: "/repo",
    });
  });

  it("should parse settings with provided inputs", () => {
    withInputs({
      "deploy-mode": "full",
      "app-service": "web",
      "sidecar-service": "proxy",
      "omit-sidecar": "false",
      "hooks-module": "./ci/hooks.mjs",
      "hooks-soft-fail": "true",
      "compose-file": "compose.yaml:compose.prod.yaml",
      "env-file": "deploy/.env.prod",
      "runtime-env-file": "deploy/.env.runtime",
      variables: "APP_PORT=3000",
      image: "ghcr.io/example/web:1.4.0",
      cpu: "1.5",
      memory: "3",
      "sidecar-image": "caddy:2",
      "dry-run": "true",
    });

    const settings = parseSettings(env);

    expect(settings).toEqual({
      mode: "full",
      appService: "web",
      sidecarService: "proxy",
      omitSidecar: false,
      hooksModule: "./ci/hooks.mjs",
      hooksSoftFail: true,
      composeFiles: ["compose.yaml", "compose.prod.yaml"],
      envFile: "deploy/.env.prod",
      runtimeEnvFile: "deploy/.env.runtime",
      variables: new Map([["APP_PORT", "3000"]]),
      image: "ghcr.io/example/web:1.4.0",
      cpu: 1.5,
      memory: 3,
      sidecarImage: "caddy:2",
      dryRun: true,
      repoRoot: "/repo",
    });
  });

  it("should fall back to the working directory as repository root", () => {
    withInputs({});

    expect(parseSettings({}).repoRoot).toBe(cwd());
  });

  it("should reject unknown deploy modes", () => {
    withInputs({ "deploy-mode": "everything" });

    expect(() => parseSettings(env)).toThrow(
      'Invalid deploy mode "everything": Expected one of "app-only", ' +
        '"app+sidecar", "full"',
    );
  });

  it("should reject non-positive sizing inputs", () => {
    withInputs({ cpu: "0" });

    expect(() => parseSettings(env)).toThrow(
      'Invalid input "cpu": Expected a positive number, got "0"',
    );
  });

  it("should distinguish an unset soft-fail input from false", () => {
    withInputs({ "hooks-soft-fail": "false" });

    expect(parseSettings(env).hooksSoftFail).toBe(false);
  });

  describe("Compose Files", () => {
    it("should retrieve compose files from COMPOSE_FILE environment variable", () => {
      withInputs({});

      const settings = parseSettings({
        ...env,
        COMPOSE_FILE: "file1.yml,file2.yml",
        COMPOSE_PATH_SEPARATOR: ",",
      });

      expect(settings.composeFiles).toEqual(["file1.yml", "file2.yml"]);
    });

    it("should prefer the input over COMPOSE_FILE", () => {
      withInputs({ "compose-file": "compose.yaml" });

      const settings = parseSettings({ ...env, COMPOSE_FILE: "other.yaml" });

      expect(settings.composeFiles).toEqual(["compose.yaml"]);
    });

    it("should split on newlines unless a separator is set", () => {
      withInputs({ "compose-file": "compose.yaml\n compose.ci.yaml \n" });

      expect(parseSettings(env).composeFiles).toEqual([
        "compose.yaml",
        "compose.ci.yaml",
      ]);
    });
  });

  describe("Variable Overrides", () => {
    it("should parse a JSON object", () => {
      withInputs({
        variables: '{"APP_PORT": 3000, "AZURE_LOCATION": "northeurope", "X": null}',
      });

      expect(parseSettings(env).variables).toEqual(
        new Map([
          ["APP_PORT", "3000"],
          ["AZURE_LOCATION", "northeurope"],
        ]),
      );
    });

    it("should parse KEY=VALUE lines and skip comments", () => {
      withInputs({
        variables: "# sizing\nDEFAULT_CPU_CORES = 2\n\nPUBLIC_DOMAIN=a=b",
      });

      expect(parseSettings(env).variables).toEqual(
        new Map([
          ["DEFAULT_CPU_CORES", "2"],
          ["PUBLIC_DOMAIN", "a=b"],
        ]),
      );
    });

    it("should parse multi-line variables with HEREDOC syntax", () => {
      withInputs({
        variables: "BASIC_AUTH_HASH<<EOF\nfoo\nbar\nEOF\nAPP_PORT=8080",
      });

      const settings = parseSettings(env);

      expect(settings.variables.get("BASIC_AUTH_HASH")).toBe("foo\nbar");
      expect(settings.variables.get("APP_PORT")).toBe("8080");
    });

    it("should only end a HEREDOC at the exact delimiter", () => {
      withInputs({ variables: "TEST_VAR<<EOF\nline1\n  EOF  \nline2\nEOF" });

      expect(parseSettings(env).variables.get("TEST_VAR")).toBe(
        "line1\n  EOF  \nline2",
      );
    });

    it("should include the remaining content in an unclosed HEREDOC", () => {
      withInputs({ variables: "INCOMPLETE<<EOF\nsome content\nREGULAR=value" });

      const settings = parseSettings(env);

      expect(settings.variables.get("INCOMPLETE")).toBe(
        "some content\nREGULAR=value",
      );
      expect(settings.variables.has("REGULAR")).toBe(false);
    });
  });
});
