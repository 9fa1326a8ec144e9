import { CommandError } from '../errors.js';
import type {
  CommandResult,
  ContainerInfo,
  StreamChunk,
} from '../types.js';

export type OutputHandler = (chunk: StreamChunk) => void;

export interface ExecOptions {
  env?: Record<string, string>;
  onOutput?: OutputHandler;
}

/**
 * Operations on individual running containers, addressed by name.
 */
export interface ContainerRuntime {
  exec(
    containerName: string,
    command: string[],
    options?: ExecOptions,
  ): Promise<CommandResult>;
  /** Like `docker cp <container>:<path> <hostDir>`: the source lands inside hostDir. */
  copyFromContainer(
    containerName: string,
    containerPath: string,
    hostDir: string,
  ): Promise<void>;
  /** Like `docker cp <hostPath> <container>:<containerDir>/`. */
  copyToContainer(
    containerName: string,
    hostPath: string,
    containerDir: string,
  ): Promise<void>;
  listContainers(): Promise<ContainerInfo[]>;
}

/**
 * Lifecycle of the whole compose project under one profile.
 */
export interface ComposeRuntime {
  up(env: Record<string, string>, onOutput?: OutputHandler): Promise<void>;
  down(): Promise<void>;
  logs(service: string): Promise<string>;
}

/**
 * Run a command in a container and fail on a non-zero exit code.
 */
export async function execChecked(
  runtime: ContainerRuntime,
  containerName: string,
  command: string[],
  options?: ExecOptions,
): Promise<CommandResult> {
  const result = await runtime.exec(containerName, command, options);
  if (result.exitCode !== 0) {
    throw new CommandError(
      ['docker', 'exec', containerName, ...command],
      result.exitCode,
      result.stdout + result.stderr,
    );
  }
  return result;
}
