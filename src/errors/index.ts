/**
 * Provisioning Error Taxonomy
 *
 * Every failure the pipeline can report is a ProvisionError subclass carrying
 * a `kind`, so the executor and CLI can record and display the failure class
 * without inspecting messages.
 *
 * This module has no internal dependencies and may be imported from anywhere.
 *
 * @module errors
 */

/**
 * Failure classes recorded in build records and manifests.
 *
 * - resolution: base image, OS package or dependency cannot be resolved
 * - transient: network or download failure (never retried at this layer)
 * - io: disk or permission failure while layering files
 * - manifest: dependency manifest missing or malformed
 * - recipe: recipe file missing or invalid
 * - config: invalid environment configuration or catalog
 * - internal: anything that is not a ProvisionError
 */
export const ERROR_KINDS = [
  'resolution',
  'transient',
  'io',
  'manifest',
  'recipe',
  'config',
  'internal',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

/**
 * Base class for all provisioning errors.
 */
export class ProvisionError extends Error {
  readonly kind: ErrorKind;

  constructor(message: string, kind: ErrorKind = 'internal', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProvisionError';
    this.kind = kind;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * A named base image, OS package or dependency could not be located, or no
 * version satisfies the collected constraints.
 */
export class ResolutionError extends ProvisionError {
  /** The package or image identifier that failed to resolve */
  readonly subject: string;

  constructor(subject: string, message: string) {
    super(message, 'resolution');
    this.name = 'ResolutionError';
    this.subject = subject;
  }
}

/** Network or download failure. Retrying belongs to whatever wraps the build. */
export class TransientInfrastructureError extends ProvisionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'transient', options);
    this.name = 'TransientInfrastructureError';
  }
}

/** Disk-full, permission-denied or missing-path failures while layering. */
export class LayerIOError extends ProvisionError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, 'io', options);
    this.name = 'LayerIOError';
    this.path = path;
  }
}

/** The dependency manifest is missing or cannot be parsed. */
export class ManifestError extends ProvisionError {
  readonly manifestPath: string;
  /** 1-based line number of the offending line, when known */
  readonly line?: number;

  constructor(manifestPath: string, message: string, line?: number) {
    super(line !== undefined ? `${manifestPath}:${line}: ${message}` : message, 'manifest');
    this.name = 'ManifestError';
    this.manifestPath = manifestPath;
    this.line = line;
  }
}

/** The recipe file is missing or fails schema validation. */
export class RecipeError extends ProvisionError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message, 'recipe');
    this.name = 'RecipeError';
    this.issues = issues;
  }
}

/** Invalid environment configuration or package catalog. */
export class ConfigError extends ProvisionError {
  constructor(message: string) {
    super(message, 'config');
    this.name = 'ConfigError';
  }
}

/**
 * Classify any thrown value into an ErrorKind.
 */
export function errorKindOf(error: unknown): ErrorKind {
  return error instanceof ProvisionError ? error.kind : 'internal';
}

/**
 * Extract a printable message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalise a caught value to an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Map a Node.js filesystem error to a LayerIOError, passing ProvisionErrors
 * through untouched.
 */
export function wrapIOError(error: unknown, path: string): ProvisionError {
  if (error instanceof ProvisionError) {
    return error;
  }
  const code = (error as NodeJS.ErrnoException | undefined)?.code;
  switch (code) {
    case 'ENOENT':
      return new LayerIOError(path, `No such file or directory: ${path}`, { cause: error });
    case 'EACCES':
    case 'EPERM':
      return new LayerIOError(path, `Permission denied: ${path}`, { cause: error });
    case 'ENOSPC':
      return new LayerIOError(path, `No space left on device while writing ${path}`, { cause: error });
    default:
      return new LayerIOError(path, `I/O error at ${path}: ${errorMessage(error)}`, { cause: error });
  }
}
