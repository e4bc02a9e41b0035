import {
  SeedsError,
  ensureSeedsError,
  type ErrorKind,
  type ErrorSeverity,
} from '../errors.js';
import { componentLogger } from '../logger.js';

export interface ErrorContext extends Record<string, unknown> {
  stage?: string;
  url?: string;
  host?: string;
  attempt?: number;
}

export interface ErrorHandlingOptions {
  defaultKind?: ErrorKind;
  defaultSeverity?: ErrorSeverity;
  throwOnFatal?: boolean;
}

/**
 * Records an error on the logger of the stage it came from. Recoverable errors
 * (a host that failed to probe, a rejected import record) are also echoed to the
 * console so they show up without `--log-level`. Fatal errors are left for the
 * caller to print, and are rethrown unless `throwOnFatal` is false.
 */
export function reportSeedsError(
  error: unknown,
  context: ErrorContext = {},
  options: ErrorHandlingOptions = {},
): SeedsError {
  const seedsError = ensureSeedsError(error, {
    kind: options.defaultKind ?? 'internal',
    severity: options.defaultSeverity,
    details: context,
  });
  const details: Record<string, unknown> = { ...seedsError.details, ...context };
  const logger = componentLogger(context.stage ?? seedsError.kind);
  const fields = { kind: seedsError.kind, severity: seedsError.severity, ...details };

  if (seedsError.severity === 'recoverable') {
    logger.warn(fields, seedsError.message);
    console.warn(describeSeedsError(seedsError, details));
    return seedsError;
  }

  logger.error({ ...fields, err: seedsError.cause ?? seedsError }, seedsError.message);
  if (options.throwOnFatal ?? true) {
    throw seedsError;
  }
  return seedsError;
}

/** `[probe/recoverable] message (host="a.gov" stage="precheck")`, keys sorted. */
export function describeSeedsError(error: SeedsError, details: Record<string, unknown> = {}): string {
  const entries = Object.entries(details)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`);

  const line = `[${error.kind}/${error.severity}] ${error.message}`;
  return entries.length > 0 ? `${line} (${entries.join(' ')})` : line;
}
