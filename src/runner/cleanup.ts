import type { ComposeRuntime, ContainerRuntime } from '../docker/runtime.js';

/**
 * Stop and remove everything under the test profile. Safe to run against an
 * environment that is already down.
 */
export async function cleanup(
  compose: ComposeRuntime,
  containers: ContainerRuntime,
): Promise<void> {
  console.log('  Show container information');
  const running = await containers.listContainers();
  if (running.length === 0) {
    console.log('    (no running containers)');
  }
  for (const container of running) {
    console.log(`    ${container.name}  ${container.image}  ${container.state}`);
  }

  console.log('  Stop containers...');
  await compose.down();
}
