export type VersionStatus = 'success' | 'failure';

export interface StreamChunk {
  type: 'stdout' | 'stderr';
  data: string;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CopyResult {
  source: string;
  destination: string;
  ok: boolean;
  error?: string;
}

export interface VersionResult {
  version: number;
  testVersion: number;
  status: VersionStatus;
  readyAfterPolls?: number;
  failedSuites?: string[];
  error?: string;
  durationMs: number;
}

export interface RunReport {
  totalVersions: number;
  passed: number;
  failed: number;
  results: VersionResult[];
  durationMs: number;
}

export interface ContainerInfo {
  name: string;
  image: string;
  state: string;
}
