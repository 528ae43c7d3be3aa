/**
 * The audit fails as a whole only for these two reasons. Everything else that goes
 * wrong while checking is reported as a failing rule outcome.
 */

/** Unsupported format, unknown level, unusable rule file, unknown sheet */
export class AuditConfigurationError extends Error {
  readonly code = 'CONFIGURATION_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'AuditConfigurationError';
  }
}

/** The input file cannot be read or decoded */
export class AuditResourceError extends Error {
  readonly code = 'RESOURCE_ERROR';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'AuditResourceError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
