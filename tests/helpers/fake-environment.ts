import * as fs from 'fs';
import * as path from 'path';
import type {
  ComposeRuntime,
  ContainerRuntime,
  ExecOptions,
} from '../../src/docker/runtime.js';
import type { CommandResult, ContainerInfo } from '../../src/types.js';

export interface HarnessOutcome {
  exitCode: number;
  output: string;
  /** Written after all of output. */
  stderr?: string;
}

/** Contents of a container path: a file body, or a directory of file bodies. */
export type FakeEntry = string | Record<string, string>;

export interface CopiedIn {
  container: string;
  containerDir: string;
  name: string;
  files: string[];
}

/**
 * In-process stand-in for the compose project: records every call in order
 * and answers log reads, execs and copies from canned data.
 */
export class FakeEnvironment {
  events: string[] = [];
  copiedIn: CopiedIn[] = [];
  execEnv: Record<string, string>[] = [];
  running: ContainerInfo[] = [];

  /** Log read on which the readiness marker first appears; null for never. */
  readyOnLogRead: number | null = 2;
  harness: (version: number) => HarnessOutcome = () => ({
    exitCode: 0,
    output: 'All tests passed\n',
  });
  files = new Map<string, FakeEntry>();
  failingExec: string | null = null;
  /** Log reads (1-based) that fail as if compose logs exited non-zero. */
  failingLogReads = new Set<number>();

  private currentVersion = 0;
  private logReads = 0;

  compose: ComposeRuntime = {
    up: async (env) => {
      this.events.push(`up ${env.PG_VERSION} ${env.PG_TEST_VERSION}`);
      this.currentVersion = Number(env.PG_VERSION);
      this.logReads = 0;
    },
    down: async () => {
      this.events.push('down');
    },
    logs: async (service) => {
      this.events.push(`logs ${service}`);
      this.logReads++;
      if (this.failingLogReads.has(this.logReads)) {
        throw new Error(`docker compose logs ${service} exited with code 1`);
      }
      const ready =
        this.readyOnLogRead !== null && this.logReads >= this.readyOnLogRead;
      return ready
        ? `${service}-1  | LOG:  database system is ready\n${service}-1  | accepting connections\n`
        : `${service}-1  | waiting for compute\n`;
    },
  };

  containers: ContainerRuntime = {
    exec: async (
      containerName: string,
      command: string[],
      options: ExecOptions = {},
    ): Promise<CommandResult> => {
      const line = `exec ${containerName} ${command.join(' ')}`;
      this.events.push(line);
      this.execEnv.push(options.env ?? {});

      if (this.failingExec !== null && line.includes(this.failingExec)) {
        return { exitCode: 2, stdout: '', stderr: 'command failed\n' };
      }

      if (command[0] === '/run-tests.sh') {
        const outcome = this.harness(this.currentVersion);
        options.onOutput?.({ type: 'stdout', data: outcome.output });
        if (outcome.stderr) {
          options.onOutput?.({ type: 'stderr', data: outcome.stderr });
        }
        return {
          exitCode: outcome.exitCode,
          stdout: outcome.output,
          stderr: outcome.stderr ?? '',
        };
      }

      return { exitCode: 0, stdout: '', stderr: '' };
    },

    copyFromContainer: async (containerName, containerPath, hostDir) => {
      this.events.push(`cp-from ${containerName}:${containerPath}`);
      const entry = this.files.get(`${containerName}:${containerPath}`);
      if (entry === undefined) {
        throw new Error(
          `Could not find the file ${containerPath} in container ${containerName}`,
        );
      }

      const target = path.join(hostDir, path.posix.basename(containerPath));
      if (typeof entry === 'string') {
        fs.writeFileSync(target, entry);
        return;
      }
      fs.mkdirSync(target, { recursive: true });
      for (const [name, body] of Object.entries(entry)) {
        fs.writeFileSync(path.join(target, name), body);
      }
    },

    copyToContainer: async (containerName, hostPath, containerDir) => {
      this.events.push(`cp-to ${containerName}:${containerDir}`);
      this.copiedIn.push({
        container: containerName,
        containerDir,
        name: path.basename(hostPath),
        files: fs.readdirSync(hostPath).sort(),
      });
    },

    listContainers: async () => this.running,
  };
}

export function fakeClock(): {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
} {
  let clock = 0;
  return {
    now: () => clock,
    sleep: async (ms: number) => {
      clock += ms;
    },
  };
}
