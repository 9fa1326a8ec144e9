import * as path from 'path';

export const DEFAULT_VERSIONS = [14, 15, 16, 17];

// Versions below this run the extension tests built for this version.
export const MIN_TEST_VERSION = 16;

export const DEFAULT_SKIPPED_SUITES = [
  'timescaledb-src',
  'rdkit-src',
  'postgis-src',
  'pgx_ulid-src',
  'pgtap-src',
  'pg_tiktoken-src',
  'pg_jsonschema-src',
  'pg_graphql-src',
  'kq_imcx-src',
  'wal2json_2_5-src',
];

export interface ServiceNames {
  compute: string;
  tests: string;
  readiness: string;
}

export interface RunConfig {
  versions: number[];
  workDir: string;
  composeFile: string;
  projectName: string;
  profile: string;
  services: ServiceNames;
  skippedSuites: string[];
  readiness: {
    marker: string;
    timeoutMs: number;
    intervalMs: number;
  };
  psqlArgs: string[];
  smokeQuery: string;
  testScript: string;
  extSrcDir: string;
  overrideConfigPath: string;
  hintPlanSuite: string;
  outputFile: string;
}

export interface CliOptions {
  versions?: string;
  dir?: string;
  composeFile?: string;
  project?: string;
  skip?: string;
  timeout?: string;
  interval?: string;
}

/**
 * Parse a whitespace or comma separated version list such as "v14 15,16".
 */
export function parseVersions(input: string | undefined): number[] {
  if (input === undefined || input.trim() === '') {
    return [...DEFAULT_VERSIONS];
  }

  return input
    .split(/[\s,]+/)
    .filter(Boolean)
    .map((token) => {
      const stripped = token.replace(/^v/, '');
      if (!/^\d+$/.test(stripped)) {
        throw new Error(`Invalid version: "${token}"`);
      }
      return Number(stripped);
    });
}

export function parseList(
  input: string | undefined,
  fallback: string[],
): string[] {
  if (input === undefined) {
    return [...fallback];
  }
  return input.split(/[\s,]+/).filter(Boolean);
}

function parseSeconds(
  input: string | undefined,
  fallback: number,
  name: string,
): number {
  if (input === undefined) {
    return fallback * 1000;
  }
  const value = Number(input);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid ${name}: "${input}"`);
  }
  return value * 1000;
}

export function testVersionFor(version: number): number {
  return Math.max(version, MIN_TEST_VERSION);
}

export function needsWorkaround(version: number): boolean {
  return version >= MIN_TEST_VERSION;
}

export function containerName(projectName: string, service: string): string {
  return `${projectName}-${service}-1`;
}

export function resolveConfig(options: CliOptions = {}): RunConfig {
  const workDir = path.resolve(options.dir ?? process.cwd());

  return {
    versions: parseVersions(options.versions),
    workDir,
    composeFile: path.resolve(
      workDir,
      options.composeFile ?? 'docker-compose.yml',
    ),
    projectName: options.project ?? 'docker-compose',
    profile: 'test-extensions',
    services: {
      compute: 'compute',
      tests: 'neon-test-extensions',
      readiness: 'compute_is_ready',
    },
    skippedSuites: parseList(options.skip, DEFAULT_SKIPPED_SUITES),
    readiness: {
      marker: 'accepting connections',
      timeoutMs: parseSeconds(options.timeout, 60, 'timeout'),
      intervalMs: parseSeconds(options.interval, 3, 'interval'),
    },
    psqlArgs: [
      '-h',
      'localhost',
      '-U',
      'cloud_admin',
      '-p',
      '55433',
      '-d',
      'postgres',
    ],
    smokeQuery: 'SELECT 1',
    testScript: '/run-tests.sh',
    extSrcDir: '/ext-src',
    overrideConfigPath:
      '/var/db/postgres/compute/compute_ctl_temp_override.conf',
    hintPlanSuite: 'pg_hint_plan-src',
    outputFile: path.join(workDir, 'testout.txt'),
  };
}
