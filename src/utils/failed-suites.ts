const SUITE_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * The regression harness reports failed suites as a space separated list on
 * the last line of its output.
 */
export function parseFailedSuites(output: string): string[] {
  const lines = output.split('\n').map((line) => line.trim());
  const lastLine = lines.filter(Boolean).pop() ?? '';
  return lastLine.split(/\s+/).filter(Boolean);
}

// Suite names become local directory names.
export function isSafeSuiteName(name: string): boolean {
  return SUITE_NAME.test(name) && name !== '..';
}
