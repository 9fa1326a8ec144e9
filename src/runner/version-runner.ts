import type { RunConfig } from '../config.js';
import { needsWorkaround, testVersionFor } from '../config.js';
import type {
  ComposeRuntime,
  ContainerRuntime,
  OutputHandler,
} from '../docker/runtime.js';
import { SuiteFailureError } from '../errors.js';
import type { RunReport, VersionResult } from '../types.js';
import { cleanup } from './cleanup.js';
import { runExtensionTests } from './extension-tests.js';
import type { Clock, Sleep } from './readiness.js';
import { logMarkerProbe, runSmokeQuery, waitForReady } from './readiness.js';
import { applyVersionWorkaround } from './workaround.js';

export interface VersionRunnerOptions {
  config: RunConfig;
  compose: ComposeRuntime;
  containers: ContainerRuntime;
  onOutput?: OutputHandler;
  sleep?: Sleep;
  now?: Clock;
}

/**
 * Run the build, start, test cycle for every configured version in order,
 * stopping at the first version that fails. Containers of a failing version
 * are left running; the next run's cleanup removes them.
 */
export async function runVersions(
  options: VersionRunnerOptions,
): Promise<RunReport> {
  const now = options.now ?? Date.now;
  const startTime = now();
  const { versions } = options.config;
  const results: VersionResult[] = [];

  for (let i = 0; i < versions.length; i++) {
    const version = versions[i];
    const testVersion = testVersionFor(version);

    console.log(
      `\n[${i + 1}/${versions.length}] Postgres v${version} (extension tests v${testVersion})`,
    );

    const versionStart = now();

    try {
      const readyAfterPolls = await runSingleVersion(options, version);
      const durationMs = now() - versionStart;

      results.push({
        version,
        testVersion,
        status: 'success',
        readyAfterPolls,
        durationMs,
      });
      console.log(`  ✓ PASSED (${durationMs}ms)`);
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);

      results.push({
        version,
        testVersion,
        status: 'failure',
        error: errorMessage,
        failedSuites:
          error instanceof SuiteFailureError ? error.suites : undefined,
        durationMs: now() - versionStart,
      });
      console.log(`  ✗ FAILED: ${errorMessage}`);
      break;
    }
  }

  // Calculate summary
  const passed = results.filter((r) => r.status === 'success').length;
  const failed = results.filter((r) => r.status === 'failure').length;

  return {
    totalVersions: versions.length,
    passed,
    failed,
    results,
    durationMs: now() - startTime,
  };
}

async function runSingleVersion(
  options: VersionRunnerOptions,
  version: number,
): Promise<number> {
  const { config, compose, containers } = options;

  console.log('  Clean up containers if exists');
  await cleanup(compose, containers);

  // Build and start the compute and test containers
  await compose.up(
    {
      PG_VERSION: String(version),
      PG_TEST_VERSION: String(testVersionFor(version)),
    },
    options.onOutput,
  );

  console.log(
    `  Wait until the compute is ready. Timeout after ${config.readiness.timeoutMs / 1000}s.`,
  );
  const now = options.now ?? Date.now;
  const readyAfterPolls = await waitForReady(
    logMarkerProbe(compose, config.services.readiness, config.readiness.marker),
    {
      deadline: now() + config.readiness.timeoutMs,
      intervalMs: config.readiness.intervalMs,
      service: config.services.readiness,
      sleep: options.sleep,
      now,
    },
  );

  console.log('  OK. The compute is ready to connect.');
  console.log('  Execute simple queries.');
  await runSmokeQuery(containers, config);

  // Extension tests only exist for newer versions
  if (needsWorkaround(version)) {
    await applyVersionWorkaround(containers, config);
    console.log('  Running extension tests');
    await runExtensionTests(containers, config, options.onOutput);
  }

  return readyAfterPolls;
}
