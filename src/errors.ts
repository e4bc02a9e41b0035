export type ErrorKind =
  | 'hostname'
  | 'config'
  | 'catalog'
  | 'probe'
  | 'import'
  | 'output'
  | 'internal';

export type ErrorSeverity = 'recoverable' | 'fatal';

export interface SeedsErrorProps {
  message: string;
  kind: ErrorKind;
  severity?: ErrorSeverity;
  details?: Record<string, unknown>;
  cause?: unknown;
}

const ERROR_NAMES: Partial<Record<ErrorKind, string>> = {
  hostname: 'InvalidHostnameError',
  config: 'InvalidConfigurationError',
};

export class SeedsError extends Error {
  readonly kind: ErrorKind;
  readonly severity: ErrorSeverity;
  readonly details?: Record<string, unknown>;

  constructor({ message, kind, severity = 'recoverable', details, cause }: SeedsErrorProps) {
    super(message, cause ? { cause } : undefined);
    this.name = ERROR_NAMES[kind] ?? `${capitalize(kind)}Error`;
    this.kind = kind;
    this.severity = severity;
    this.details = details;
  }
}

export function isSeedsError(value: unknown): value is SeedsError {
  return value instanceof SeedsError;
}

export function ensureSeedsError(
  error: unknown,
  fallback: Partial<SeedsErrorProps> & Pick<SeedsErrorProps, 'kind'> = { kind: 'internal' },
): SeedsError {
  if (isSeedsError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new SeedsError({
    message,
    kind: fallback.kind,
    severity: fallback.severity ?? 'fatal',
    details: fallback.details,
    cause: error instanceof Error ? error : undefined,
  });
}

/** A URL without a usable host cannot be grouped, so the whole run stops. */
export function createInvalidHostnameError(
  url: string,
  options: { cause?: unknown } = {},
): SeedsError {
  return new SeedsError({
    message: `No hostname: "${url}"`,
    kind: 'hostname',
    severity: 'fatal',
    details: { url },
    cause: options.cause,
  });
}

export function createConfigurationError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): SeedsError {
  return new SeedsError({
    message,
    kind: 'config',
    severity: 'fatal',
    details,
    cause: options.cause,
  });
}

export function createCatalogError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): SeedsError {
  return new SeedsError({
    message,
    kind: 'catalog',
    severity: 'fatal',
    details,
    cause: options.cause,
  });
}

export function createProbeError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): SeedsError {
  return new SeedsError({
    message,
    kind: 'probe',
    severity: 'recoverable',
    details,
    cause: options.cause,
  });
}

export function createImportError(
  message: string,
  details: Record<string, unknown> = {},
  options: { severity?: ErrorSeverity; cause?: unknown } = {},
): SeedsError {
  return new SeedsError({
    message,
    kind: 'import',
    severity: options.severity ?? 'recoverable',
    details,
    cause: options.cause,
  });
}

export function createOutputError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): SeedsError {
  return new SeedsError({
    message,
    kind: 'output',
    severity: 'fatal',
    details,
    cause: options.cause,
  });
}

export function createInternalError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown; severity?: ErrorSeverity } = {},
): SeedsError {
  return new SeedsError({
    message,
    kind: 'internal',
    severity: options.severity ?? 'fatal',
    details,
    cause: options.cause,
  });
}

function capitalize(value: string): string {
  if (!value) {
    return value;
  }
  return value.charAt(0).toUpperCase() + value.slice(1);
}
