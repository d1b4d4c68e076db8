import { afterEach, describe, expect, it, vi } from "vitest";

describe("Test Reporters", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it("should annotate results when running on GitHub Actions", async () => {
    vi.stubEnv("GITHUB_ACTIONS", "true");

    const { default: config } = await import("../vitest.config.js");

    expect(config.test?.reporters).toEqual(["verbose", "github-actions"]);
  });

  it("should use the default reporter elsewhere", async () => {
    vi.stubEnv("GITHUB_ACTIONS", "");

    const { default: config } = await import("../vitest.config.js");

    expect(config.test?.reporters).toEqual(["default"]);
  });
});
