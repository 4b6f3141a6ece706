/**
 * Error types raised by the connector and its host pieces
 */

/**
 * Invalid connector configuration. `issues` holds one line per rejected field.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Transport-level HTTP failure (DNS, TLS, timeout, reset)
 */
export class HttpError extends Error {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    super(`HTTP GET failed: ${describeError(cause)}`, { cause });
    this.name = 'HttpError';
    this.url = url;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
