import * as core from "@actions/core";
import type { ResolvedEnv } from "./config.js";
import type { Settings } from "./settings.js";

/**
 * Logging surface the deployment writes to
 *
 * Matches the `@actions/core` logging functions, so the Actions runtime can
 * be used directly; tests and other hosts can pass their own sink.
 */
export type Logger = Pick<
  typeof core,
  "debug" | "info" | "notice" | "warning" | "error" | "startGroup" | "endGroup"
>;

/**
 * The single mutable environment of a deployment run
 *
 * Hooks and lifecycle stages share one instance; every change is visible to
 * all later stages of the same run.
 */
export class EnvironmentView {
  readonly #values: Map<string, string>;

  constructor(initial: Iterable<[string, string]> = []) {
    this.#values = new Map(initial);
  }

  /**
   * Create a view from a process environment, dropping unset variables
   */
  static fromProcessEnv(env: NodeJS.ProcessEnv) {
    return new EnvironmentView(
      Object.entries(env).filter(
        (entry): entry is [string, string] => entry[1] !== undefined,
      ),
    );
  }

  get(key: string) {
    return this.#values.get(key);
  }

  has(key: string) {
    return this.#values.has(key);
  }

  set(key: string, value: string) {
    this.#values.set(key, value);

    return this;
  }

  delete(key: string) {
    return this.#values.delete(key);
  }

  /**
   * Overlay several values at once
   */
  assign(values: Iterable<[string, string]>) {
    for (const [key, value] of values) {
      this.#values.set(key, value);
    }

    return this;
  }

  entries() {
    return this.#values.entries();
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.#values);
  }

  toMap(): ReadonlyMap<string, string> {
    return new Map(this.#values);
  }

  /**
   * Capture the current state, to be restored with {@link restore}
   */
  snapshot(): ReadonlyMap<string, string> {
    return this.toMap();
  }

  restore(snapshot: ReadonlyMap<string, string>) {
    this.#values.clear();
    this.assign(snapshot);
  }
}

/**
 * State shared by reference across the whole lifecycle run
 */
export interface DeployContext {
  readonly env: EnvironmentView;
  readonly args: Readonly<Settings>;
  readonly repoRoot: string;
  readonly logger: Logger;
  resolved?: ResolvedEnv;
}

export function createContext({
  env,
  args,
  repoRoot,
  logger = core,
}: {
  env: EnvironmentView | NodeJS.ProcessEnv;
  args: Readonly<Settings>;
  repoRoot: string;
  logger?: Logger;
}): DeployContext {
  return {
    env:
      env instanceof EnvironmentView
        ? env
        : EnvironmentView.fromProcessEnv(env),
    args,
    repoRoot,
    logger,
  };
}
