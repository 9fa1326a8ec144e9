import Docker from 'dockerode';
import { PassThrough } from 'stream';
import * as fs from 'fs';
import type { CommandResult, ContainerInfo } from '../types.js';
import type { ContainerRuntime, ExecOptions } from './runtime.js';
import { extractArchive, packPath } from './archive.js';

function toEnvArray(env?: Record<string, string>): string[] | undefined {
  if (!env) return undefined;
  const envArray = Object.entries(env).map(
    ([key, value]) => `${key}=${value}`,
  );
  return envArray.length > 0 ? envArray : undefined;
}

export class ContainerManager implements ContainerRuntime {
  private docker: Docker;

  constructor(socketPath: string = '/var/run/docker.sock') {
    this.docker = new Docker({ socketPath });
  }

  async exec(
    containerName: string,
    command: string[],
    options: ExecOptions = {},
  ): Promise<CommandResult> {
    const container = this.docker.getContainer(containerName);

    // Create exec instance with both output streams attached
    const exec = await container.exec({
      Cmd: command,
      Env: toEnvArray(options.env),
      AttachStdout: true,
      AttachStderr: true,
      Tty: false,
    });

    const stream = await exec.start({ hijack: true, stdin: false });

    // Collect output
    let stdout = '';
    let stderr = '';

    const stdoutStream = new PassThrough();
    const stderrStream = new PassThrough();

    stdoutStream.on('data', (chunk: Buffer) => {
      const data = chunk.toString();
      stdout += data;
      options.onOutput?.({ type: 'stdout', data });
    });

    stderrStream.on('data', (chunk: Buffer) => {
      const data = chunk.toString();
      stderr += data;
      options.onOutput?.({ type: 'stderr', data });
    });

    // Demux the stream
    this.docker.modem.demuxStream(stream, stdoutStream, stderrStream);

    // Wait for the command to finish
    await new Promise<void>((resolve, reject) => {
      stream.on('end', () => resolve());
      stream.on('close', () => resolve());
      stream.on('error', reject);
    });

    // Exit code is only available from inspect once the stream has ended
    const info = await exec.inspect();

    return {
      exitCode: info.ExitCode ?? 1,
      stdout,
      stderr,
    };
  }

  async copyFromContainer(
    containerName: string,
    containerPath: string,
    hostDir: string,
  ): Promise<void> {
    const container = this.docker.getContainer(containerName);
    // Docker returns the path as a tar archive rooted at its basename
    const archive = await container.getArchive({ path: containerPath });
    fs.mkdirSync(hostDir, { recursive: true });
    await extractArchive(archive, hostDir);
  }

  async copyToContainer(
    containerName: string,
    hostPath: string,
    containerDir: string,
  ): Promise<void> {
    const container = this.docker.getContainer(containerName);
    await container.putArchive(packPath(hostPath), { path: containerDir });
  }

  async listContainers(): Promise<ContainerInfo[]> {
    const containers = await this.docker.listContainers();
    return containers.map((c) => ({
      name: (c.Names[0] ?? c.Id).replace(/^\//, ''),
      image: c.Image,
      state: c.State,
    }));
  }
}
