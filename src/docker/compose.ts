import { spawn } from 'child_process';
import type { CommandResult } from '../types.js';
import { CommandError } from '../errors.js';
import type { ComposeRuntime, OutputHandler } from './runtime.js';

export interface ComposeOptions {
  composeFile: string;
  projectName: string;
  profile: string;
  cwd: string;
  dockerPath?: string;
}

export function composeArgs(
  options: ComposeOptions,
  args: string[],
): string[] {
  return [
    'compose',
    '--profile',
    options.profile,
    '-f',
    options.composeFile,
    '-p',
    options.projectName,
    ...args,
  ];
}

export class ComposeCli implements ComposeRuntime {
  constructor(private options: ComposeOptions) {}

  async up(
    env: Record<string, string>,
    onOutput?: OutputHandler,
  ): Promise<void> {
    await this.runChecked(['up', '--build', '-d'], env, onOutput);
  }

  async down(): Promise<void> {
    await this.runChecked(['down']);
  }

  async logs(service: string): Promise<string> {
    const result = await this.runChecked(['logs', service]);
    return result.stdout + result.stderr;
  }

  private async runChecked(
    args: string[],
    env: Record<string, string> = {},
    onOutput?: OutputHandler,
  ): Promise<CommandResult> {
    const command = [
      this.options.dockerPath ?? 'docker',
      ...composeArgs(this.options, args),
    ];
    const result = await this.run(command, env, onOutput);
    if (result.exitCode !== 0) {
      throw new CommandError(
        command,
        result.exitCode,
        result.stdout + result.stderr,
      );
    }
    return result;
  }

  private run(
    command: string[],
    env: Record<string, string>,
    onOutput?: OutputHandler,
  ): Promise<CommandResult> {
    const [file, ...args] = command;

    return new Promise((resolve, reject) => {
      const child = spawn(file, args, {
        cwd: this.options.cwd,
        env: { ...process.env, ...env },
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';

      child.stdout.on('data', (chunk: Buffer) => {
        const data = chunk.toString();
        stdout += data;
        onOutput?.({ type: 'stdout', data });
      });

      child.stderr.on('data', (chunk: Buffer) => {
        const data = chunk.toString();
        stderr += data;
        onOutput?.({ type: 'stderr', data });
      });

      child.on('error', reject);
      child.on('close', (code, signal) => {
        resolve({
          exitCode: code ?? (signal ? 128 : 1),
          stdout,
          stderr,
        });
      });
    });
  }
}
