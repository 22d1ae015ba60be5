/**
 * @file packages/cli/src/domain/errors/app-error.ts
 * @description Error types surfaced to the command line.
 */

/**
 * Base error carrying the process exit code it maps to.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1,
    public readonly isOperational: boolean = true,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid user input or configuration. Reported together with usage help.
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 1);
  }
}

/**
 * Enumeration found no sensors under the requested scope.
 */
export class SensorNotFoundError extends AppError {
  constructor(public readonly scope: string) {
    super(`No sensors found under ${scope}`, 1);
  }
}

/**
 * The bus failed to answer a call.
 */
export class TransportError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 1, true, { cause });
  }
}

/**
 * Message of any thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
