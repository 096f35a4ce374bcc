/**
 * Application error taxonomy
 *
 * Every error the HTTP layer knows how to render carries a stable code and
 * an HTTP status. Anything else is reported as INTERNAL_ERROR.
 */
export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly status: number;

  constructor(message: string, readonly details?: unknown) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Missing or invalid setting. Raised at startup only.
 */
export class ConfigurationError extends AppError {
  readonly code = 'CONFIGURATION_ERROR' as const;
  readonly status = 500;

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
}

/**
 * Malformed request payload
 */
export class ValidationError extends AppError {
  readonly code = 'VALIDATION_ERROR' as const;
  readonly status = 400;
}

export type UpstreamService = 'embedding' | 'search' | 'completion' | 'store';

/**
 * A managed service call failed (network, auth, quota or an unexpected body)
 */
export class UpstreamServiceError extends AppError {
  readonly code = 'UPSTREAM_ERROR' as const;
  readonly status = 502;

  constructor(
    readonly service: UpstreamService,
    message: string,
    readonly upstreamStatus?: number,
    options?: { cause?: unknown }
  ) {
    super(`${service}: ${message}`);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}
