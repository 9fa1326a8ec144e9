import type { RunConfig } from '../config.js';
import { containerName } from '../config.js';
import type { ComposeRuntime, ContainerRuntime } from '../docker/runtime.js';
import { execChecked } from '../docker/runtime.js';
import { ReadinessTimeoutError } from '../errors.js';

export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export interface WaitOptions {
  /** Absolute time (per `now`) after which waiting gives up. */
  deadline: number;
  intervalMs: number;
  service: string;
  sleep?: Sleep;
  now?: Clock;
}

/**
 * Poll until probe reports ready. Each attempt sleeps first, then checks the
 * deadline, then probes.
 * @returns Number of probes it took
 */
export async function waitForReady(
  probe: () => Promise<boolean>,
  options: WaitOptions,
): Promise<number> {
  const wait = options.sleep ?? sleep;
  const now = options.now ?? Date.now;
  const startedAt = now();
  let polls = 0;

  for (;;) {
    await wait(options.intervalMs);

    // Check timeout
    if (now() > options.deadline) {
      throw new ReadinessTimeoutError(options.service, now() - startedAt);
    }

    polls++;
    if (await probe()) {
      return polls;
    }
  }
}

/**
 * A log read that fails counts as not ready; only the deadline ends the wait.
 */
export function logMarkerProbe(
  compose: ComposeRuntime,
  service: string,
  marker: string,
): () => Promise<boolean> {
  return async () => {
    try {
      return (await compose.logs(service)).includes(marker);
    } catch (error) {
      console.warn(
        `  ! Could not read ${service} logs: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      return false;
    }
  };
}

export async function runSmokeQuery(
  containers: ContainerRuntime,
  config: RunConfig,
): Promise<string> {
  const result = await execChecked(
    containers,
    containerName(config.projectName, config.services.compute),
    ['psql', ...config.psqlArgs, '-c', config.smokeQuery],
  );
  return result.stdout;
}
