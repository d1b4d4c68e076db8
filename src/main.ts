import { randomUUID } from "node:crypto";
import { unlink, writeFile } from "node:fs/promises";
import { env } from "node:process";
import { DefaultArtifactClient } from "@actions/artifact";
import * as core from "@actions/core";
import { type DeploymentReport, deploy } from "./deployment.js";
import { DeploymentError } from "./errors.js";
import { fqdn } from "./plan.js";
import { type RenderedArtifact, redactArtifact } from "./render.js";
import { parseSettings } from "./settings.js";

export async function run() {
  let report: DeploymentReport | undefined;

  try {
    const settings = parseSettings(env);
    report = await deploy(settings);

    const { plan } = report;

    core.setOutput("units", plan.units.map(({ name }) => name));
    core.setOutput(
      "fqdns",
      plan.units.map(({ dnsLabel }) => fqdn(dnsLabel, plan.location)),
    );
    core.setOutput("artifacts", report.artifacts.map(({ name }) => name));
    core.setOutput("state", report.state);
    core.setOutput("status", "success");
  } catch (error) {
    if (error instanceof DeploymentError) {
      core.setFailed(error.describe());
    } else if (error instanceof Error) {
      core.setFailed(error);
    } else {
      core.setFailed(`An unknown error occurred: ${String(error)}`);
    }

    core.setOutput("state", "error");
    core.setOutput("status", "failure");
  }

  if (!report || report.artifacts.length === 0) {
    return;
  }

  try {
    await storeArtifacts(report.artifacts);
  } catch (cause) {
    const message = cause instanceof Error ? cause.message : String(cause);
    core.warning(
      new Error(`Failed to store deployment artifacts: ${message}`, {
        cause,
      }),
    );
  }
}

/**
 * Upload the applied descriptors, with secret values redacted
 */
async function storeArtifacts(artifacts: readonly RenderedArtifact[]) {
  const artifactClient = new DefaultArtifactClient();
  const paths = artifacts.map(
    ({ name }) => `./${name}.aci.generated.${randomUUID()}.yaml`,
  );

  try {
    await Promise.all(
      artifacts.map((artifact, index) =>
        writeFile(paths[index], redactArtifact(artifact.text)),
      ),
    );
  } catch (cause) {
    const message = cause instanceof Error ? cause.message : String(cause);
    throw new Error(`Failed to write artifacts to file: ${message}`, {
      cause,
    });
  }

  try {
    await artifactClient.uploadArtifact("aci-artifacts", paths, ".", {
      retentionDays: 30,
    });
  } catch (cause) {
    const message = cause instanceof Error ? cause.message : String(cause);
    throw new Error(`Failed to upload artifacts: ${message}`, { cause });
  } finally {
    await Promise.allSettled(paths.map((path) => unlink(path)));
  }
}
