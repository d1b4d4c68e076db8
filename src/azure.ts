import * as core from "@actions/core";
import { exec } from "@actions/exec";
import { randomUUID } from "node:crypto";
import { unlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Logger } from "./context.js";
import { ApplyFailure } from "./errors.js";
import type { RenderedArtifact } from "./render.js";
import { sleep } from "./utils.js";

/**
 * Identifies where an artifact is applied
 */
export interface ApplyTarget {
  resourceGroup: string;
  location: string;
}

export interface ApplyOutcome {
  unit: string;
  name: string;
  success: boolean;

  /**
   * Whatever the applier reported, passed through to `post_deploy`
   */
  result: unknown;
}

/**
 * Applies rendered artifacts to the target platform
 */
export interface Applier {
  apply(
    artifact: RenderedArtifact,
    location: string,
    target: ApplyTarget,
  ): Promise<ApplyOutcome>;
}

/**
 * Persists rendered artifacts for the duration of a run
 */
export interface ArtifactStore {
  /**
   * Store an artifact and return its location
   */
  write(artifact: RenderedArtifact): Promise<string>;

  /**
   * Remove everything written so far
   */
  cleanup(): Promise<void>;
}

/**
 * Writes artifacts as YAML files into a directory
 */
export class FileArtifactStore implements ArtifactStore {
  readonly #directory: string;
  readonly #paths: string[] = [];

  constructor(directory: string = tmpdir()) {
    this.#directory = directory;
  }

  get paths(): readonly string[] {
    return this.#paths;
  }

  async write(artifact: RenderedArtifact) {
    const path = join(
      this.#directory,
      `${artifact.name}.${randomUUID()}.aci.yaml`,
    );

    try {
      await writeFile(path, artifact.text, "utf8");
    } catch (cause) {
      const message = cause instanceof Error ? cause.message : String(cause);
      throw new Error(`Failed to write artifact to "${path}": ${message}`, {
        cause,
      });
    }

    this.#paths.push(path);

    return path;
  }

  async cleanup() {
    const paths = this.#paths.splice(0);
    const results = await Promise.allSettled(paths.map((path) => unlink(path)));

    results.forEach((result, index) => {
      if (result.status === "rejected") {
        const reason = result.reason instanceof Error
          ? result.reason.message
          : String(result.reason);
        core.warning(`Failed to remove artifact "${paths[index]}": ${reason}`);
      }
    });
  }
}

/**
 * Failed Azure CLI invocation, carrying the command's error output
 */
export class AzureCommandError extends Error {
  readonly stderr: string;

  constructor(message: string, stderr: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AzureCommandError";
    this.stderr = stderr;
  }
}

export interface RetryPolicy {
  attempts: number;
  baseDelay: number;
  maxDelay: number;
}

export const defaultRetryPolicy: Readonly<RetryPolicy> = {
  attempts: 5,
  baseDelay: 10_000,
  maxDelay: 60_000,
};

/**
 * Applies container group descriptors with `az container create`
 *
 * Registry conflicts reported by ACI are usually transient, so those are
 * retried with exponential backoff. Any other failure is final.
 */
export class AzureCliApplier implements Applier {
  readonly #retry: RetryPolicy;
  readonly #logger: Logger;

  constructor({
    retry = defaultRetryPolicy,
    logger = core,
  }: { retry?: Partial<RetryPolicy>; logger?: Logger } = {}) {
    this.#retry = { ...defaultRetryPolicy, ...retry };
    this.#logger = logger;
  }

  async apply(
    artifact: RenderedArtifact,
    location: string,
    { resourceGroup }: ApplyTarget,
  ): Promise<ApplyOutcome> {
    const { attempts, baseDelay, maxDelay } = this.#retry;

    for (let attempt = 1; ; attempt++) {
      try {
        const output = await executeAzureCommand(
          [
            "container",
            "create",
            "--resource-group",
            resourceGroup,
            "--file",
            location,
          ],
          this.#logger,
        );

        this.#logger.info(`Applied deployment unit "${artifact.name}"`);

        return {
          unit: artifact.unit,
          name: artifact.name,
          success: true,
          result: parseOutput(output),
        };
      } catch (cause) {
        if (!isTransient(cause) || attempt >= attempts) {
          throw new ApplyFailure(artifact.name, cause);
        }

        const delay = Math.min(maxDelay, baseDelay * 2 ** (attempt - 1));

        this.#logger.warning(
          `Registry conflict while applying "${artifact.name}" (attempt ` +
            `${attempt}/${attempts}). Retrying in ${Math.round(delay / 1000)}s...`,
        );

        await sleep(delay);
      }
    }
  }
}

/**
 * Check whether an Azure CLI failure is worth retrying
 */
export function isTransient(error: unknown) {
  if (!(error instanceof AzureCommandError)) {
    return false;
  }

  return /RegistryErrorResponse|Conflict/.test(error.stderr);
}

/**
 * Execute an Azure CLI command
 *
 * Captures stdout and returns it as a string. On failure, the captured
 * stderr is attached to the thrown error.
 */
export async function executeAzureCommand(
  args: [string, ...string[]],
  logger: Logger = core,
) {
  let output = "";
  let errorOutput = "";

  logger.startGroup(`az ${args.join(" ")}`);

  try {
    await exec("az", [...args, "--output", "json"], {
      silent: true,
      listeners: {
        stdout: (data) => (output += data.toString()),
        stderr: (data) => (errorOutput += data.toString()),
      },
    });
  } catch (cause) {
    const message = cause instanceof Error ? cause.message : String(cause);
    logger.error(`Command failed: ${message}`);
    logger.error(errorOutput);

    throw new AzureCommandError(
      `Failed to execute Azure CLI command: ${message}`,
      errorOutput,
      { cause },
    );
  } finally {
    logger.endGroup();
  }

  return output;
}

function parseOutput(output: string): unknown {
  try {
    return JSON.parse(output);
  } catch {
    return output.trim();
  }
}
