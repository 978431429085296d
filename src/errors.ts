/**
 * Error classes for the outer layers (config, manifests, state file)
 *
 * The reconciliation core reports through diagnostics and never throws;
 * these are raised by the surrounding tooling and turned into exit code 1
 * by the CLI.
 */

/**
 * Base error class with a machine-readable code and an optional hint
 */
export class FmcSyncError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly suggestion?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FmcSyncError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

/**
 * Connection settings are missing or invalid
 */
export class ConfigurationError extends FmcSyncError {
  constructor(message: string, suggestion?: string) {
    super(message, 'INVALID_CONFIGURATION', suggestion);
    this.name = 'ConfigurationError';
  }
}

/**
 * One or more manifests could not be loaded. Lists every problem found.
 */
export class ManifestError extends FmcSyncError {
  constructor(
    public readonly issues: readonly string[],
    options?: { cause?: unknown }
  ) {
    super(
      issues.length === 1
        ? `Invalid manifest: ${issues[0]}`
        : `Invalid manifests (${issues.length} problems):\n${issues.map((i) => `  - ${i}`).join('\n')}`,
      'INVALID_MANIFEST',
      'Fix the listed problems and run the command again',
      options
    );
    this.name = 'ManifestError';
  }
}

export type StateFileErrorCode = 'STATE_FILE_CORRUPT' | 'STATE_FILE_UNREADABLE' | 'STATE_FILE_UNWRITABLE';

/**
 * The state file could not be read, parsed or written
 */
export class StateFileError extends FmcSyncError {
  constructor(
    public readonly path: string,
    message: string,
    code: StateFileErrorCode,
    options?: { cause?: unknown }
  ) {
    super(
      `${path}: ${message}`,
      code,
      code === 'STATE_FILE_CORRUPT'
        ? 'Restore the state file from version control or remove the broken entry'
        : undefined,
      options
    );
    this.name = 'StateFileError';
  }
}

/**
 * Render any thrown value for the terminal
 */
export function describeError(err: unknown): string {
  if (err instanceof FmcSyncError) {
    return err.toUserMessage();
  }
  if (err instanceof Error) {
    return `Error: ${err.message}`;
  }
  return `Error: ${String(err)}`;
}
