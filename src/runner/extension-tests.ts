import * as fs from 'fs';
import * as path from 'path';
import type { RunConfig } from '../config.js';
import { containerName } from '../config.js';
import type { ContainerRuntime, OutputHandler } from '../docker/runtime.js';
import { SuiteFailureError } from '../errors.js';
import type { CopyResult } from '../types.js';
import { isSafeSuiteName, parseFailedSuites } from '../utils/failed-suites.js';

export const DIAGNOSTIC_FILES = ['regression.diffs', 'regression.out'];

// Order in which collected diagnostics are printed.
const PRINT_ORDER = ['regression.out', 'regression.diffs'];

export interface SuiteArtifacts {
  suite: string;
  dir: string;
  copies: CopyResult[];
}

async function tryCopy(
  containers: ContainerRuntime,
  container: string,
  source: string,
  hostDir: string,
): Promise<CopyResult> {
  const destination = path.join(hostDir, path.posix.basename(source));
  try {
    await containers.copyFromContainer(container, source, hostDir);
    return { source, destination, ok: true };
  } catch (error) {
    return {
      source,
      destination,
      ok: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Copy regression.diffs and regression.out of each failed suite into a local
 * directory named after the suite. Copy failures are reported, not thrown.
 */
export async function collectFailureArtifacts(
  containers: ContainerRuntime,
  config: RunConfig,
  suites: string[],
): Promise<SuiteArtifacts[]> {
  const tests = containerName(config.projectName, config.services.tests);
  const collected: SuiteArtifacts[] = [];

  for (const suite of suites) {
    if (!isSafeSuiteName(suite)) {
      console.warn(
        `  ! Skipping artifacts for unexpected suite name: ${suite}`,
      );
      continue;
    }

    // Create local directory named after the suite
    const dir = path.join(config.workDir, suite);
    fs.mkdirSync(dir, { recursive: true });

    const copies: CopyResult[] = [];
    for (const file of DIAGNOSTIC_FILES) {
      const source = path.posix.join(config.extSrcDir, suite, file);
      const copy = await tryCopy(containers, tests, source, dir);
      if (!copy.ok) {
        console.warn(`  ! Could not copy ${source}: ${copy.error}`);
      }
      copies.push(copy);
    }

    collected.push({ suite, dir, copies });
  }

  return collected;
}

export function printArtifacts(artifacts: SuiteArtifacts[]): void {
  for (const { suite, dir } of artifacts) {
    for (const file of PRINT_ORDER) {
      const filePath = path.join(dir, file);
      if (!fs.existsSync(filePath)) continue;
      console.log(`\n----- ${suite}/${file} -----`);
      console.log(fs.readFileSync(filePath, 'utf-8'));
    }
  }
}

/**
 * Run the extension regression harness in the test container. Output is
 * passed to onOutput and written to config.outputFile as it arrives.
 * @throws SuiteFailureError when the harness exits non-zero, after the
 *   diagnostics of every reported suite have been collected and printed
 */
export async function runExtensionTests(
  containers: ContainerRuntime,
  config: RunConfig,
  onOutput?: OutputHandler,
): Promise<void> {
  const tests = containerName(config.projectName, config.services.tests);

  // Start with an empty capture file
  fs.writeFileSync(config.outputFile, '');

  const result = await containers.exec(tests, [config.testScript], {
    env: { SKIP: config.skippedSuites.join(',') },
    onOutput: (chunk) => {
      fs.appendFileSync(config.outputFile, chunk.data);
      onOutput?.(chunk);
    },
  });

  if (result.exitCode === 0) {
    return;
  }

  // The harness lists failed suites on its last stdout line
  const suites = parseFailedSuites(result.stdout);
  const artifacts = await collectFailureArtifacts(containers, config, suites);
  printArtifacts(artifacts);

  throw new SuiteFailureError(suites);
}
