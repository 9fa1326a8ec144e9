export class ReadinessTimeoutError extends Error {
  constructor(
    readonly service: string,
    readonly elapsedMs: number,
  ) {
    super(
      `timeout before the compute is ready (${service} after ${elapsedMs / 1000}s)`,
    );
    this.name = 'ReadinessTimeoutError';
  }
}

export class CommandError extends Error {
  constructor(
    readonly command: string[],
    readonly exitCode: number,
    readonly output: string = '',
  ) {
    super(`Command failed with exit code ${exitCode}: ${command.join(' ')}`);
    this.name = 'CommandError';
  }
}

export class SuiteFailureError extends Error {
  constructor(readonly suites: string[]) {
    super(
      suites.length > 0
        ? `Extension tests failed: ${suites.join(', ')}`
        : 'Extension tests failed',
    );
    this.name = 'SuiteFailureError';
  }
}
