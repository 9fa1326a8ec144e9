import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { RunConfig } from '../config.js';
import { containerName } from '../config.js';
import type { ContainerRuntime } from '../docker/runtime.js';
import { execChecked } from '../docker/runtime.js';

/**
 * Prepare the compute node for the extension tests of newer versions.
 *
 * The empty override config silences a log line that pg_hint_plan's expected
 * output does not contain. Its directory only exists once the compute has
 * started, so this must run after the readiness wait.
 *
 * pg_hint_plan's fixtures live in the test container; the runtime cannot
 * copy between containers, so they go through a local staging directory.
 */
export async function applyVersionWorkaround(
  containers: ContainerRuntime,
  config: RunConfig,
): Promise<void> {
  const compute = containerName(config.projectName, config.services.compute);
  const tests = containerName(config.projectName, config.services.tests);

  console.log('  Adding dummy config');
  await execChecked(containers, compute, ['touch', config.overrideConfigPath]);

  const suiteDir = path.posix.join(config.extSrcDir, config.hintPlanSuite);
  const stagingDir = fs.mkdtempSync(
    path.join(os.tmpdir(), 'pgext-compose-test-'),
  );

  try {
    console.log(`  Copying ${suiteDir}/data to the compute`);
    await containers.copyFromContainer(
      tests,
      path.posix.join(suiteDir, 'data'),
      stagingDir,
    );
    await containers.copyToContainer(
      compute,
      path.join(stagingDir, 'data'),
      `${suiteDir}/`,
    );
  } finally {
    fs.rmSync(stagingDir, { recursive: true, force: true });
  }
}
