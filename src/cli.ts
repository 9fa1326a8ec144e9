import { Command, Option } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import type { CliOptions, RunConfig } from './config.js';
import { needsWorkaround, resolveConfig, testVersionFor } from './config.js';
import { ComposeCli } from './docker/compose.js';
import { ContainerManager } from './docker/container.js';
import type { ComposeRuntime, ContainerRuntime } from './docker/runtime.js';
import { runVersions } from './runner/version-runner.js';
import type { Clock, Sleep } from './runner/readiness.js';
import type { RunReport, StreamChunk } from './types.js';

export const VERSION = '1.0.0';

export interface Runtime {
  compose: ComposeRuntime;
  containers: ContainerRuntime;
}

export interface ProgramDeps {
  createRuntime?: (config: RunConfig) => Runtime;
  exit?: (code: number) => void;
  sleep?: Sleep;
  now?: Clock;
}

interface ProgramOptions extends CliOptions {
  output?: string;
  dryRun?: boolean;
}

function createDockerRuntime(config: RunConfig): Runtime {
  return {
    compose: new ComposeCli({
      composeFile: config.composeFile,
      projectName: config.projectName,
      profile: config.profile,
      cwd: config.workDir,
    }),
    containers: new ContainerManager(),
  };
}

function printChunk(chunk: StreamChunk): void {
  if (chunk.type === 'stderr') {
    process.stderr.write(`\x1b[31m${chunk.data}\x1b[0m`);
  } else {
    process.stdout.write(chunk.data);
  }
}

function writeReport(outputFile: string, report: RunReport): void {
  const outputPath = path.resolve(outputFile);
  fs.writeFileSync(outputPath, JSON.stringify(report, null, 2));
  console.log(`\nReport written to: ${outputPath}`);
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const createRuntime = deps.createRuntime ?? createDockerRuntime;
  const exit = deps.exit ?? ((code: number) => process.exit(code));

  const program = new Command();

  program
    .name('pgext-compose-test')
    .description(
      'Build the compute images for each Postgres version, start them with docker compose and run the extension regression tests',
    )
    .version(VERSION)
    .addOption(
      new Option(
        '--versions <list>',
        'Postgres major versions to test (e.g. "14 15 16 17")',
      ).env('TEST_VERSION_ONLY'),
    )
    .option(
      '--dir <path>',
      'Directory holding the compose file; artifacts are written here',
    )
    .addOption(
      new Option('--compose-file <file>', 'Compose file').env('COMPOSE_FILE'),
    )
    .addOption(
      new Option('--project <name>', 'Compose project name').env(
        'COMPOSE_PROJECT_NAME',
      ),
    )
    .addOption(
      new Option(
        '--skip <list>',
        'Extension suites excluded from the regression run',
      ).env('SKIP_SUITES'),
    )
    .option('--timeout <seconds>', 'Readiness timeout in seconds')
    .option('--interval <seconds>', 'Readiness poll interval in seconds')
    .option('-o, --output <file>', 'Output JSON report to file')
    .option('--dry-run', 'Print the versions that would be tested')
    .action(async (options: ProgramOptions) => {
      try {
        const config = resolveConfig(options);

        console.log(`\npgext-compose-test v${VERSION}`);
        console.log(`==================`);
        console.log(`Compose file: ${config.composeFile}`);
        console.log(`Versions:     ${config.versions.join(' ')}`);

        if (options.dryRun) {
          console.log('\n[DRY RUN] Would test the following versions:');
          config.versions.forEach((version, i) => {
            const steps = needsWorkaround(version)
              ? 'smoke query, extension tests'
              : 'smoke query';
            console.log(
              `  ${i + 1}. v${version} (PG_TEST_VERSION=${testVersionFor(version)}): ${steps}`,
            );
          });
          exit(0);
          return;
        }

        const { compose, containers } = createRuntime(config);

        const report = await runVersions({
          config,
          compose,
          containers,
          onOutput: printChunk,
          sleep: deps.sleep,
          now: deps.now,
        });

        console.log('\n================');
        console.log('Summary');
        console.log('================');
        console.log(`Total:  ${report.totalVersions}`);
        console.log(`Passed: ${report.passed}`);
        console.log(`Failed: ${report.failed}`);
        console.log(`Time:   ${report.durationMs}ms`);

        if (options.output) {
          writeReport(options.output, report);
        }

        exit(report.failed > 0 ? 1 : 0);
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        exit(1);
      }
    });

  return program;
}
