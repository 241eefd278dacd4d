export type ScriptlinkErrorCode =
  | 'LINKING_FAILED'
  | 'ENGINE_INVOCATION'
  | 'INCOMPATIBLE_RETURN'
  | 'INVALID_ARGUMENT'
  | 'CLEANUP_FAILED';

export class ScriptlinkError extends Error {
  override name = 'ScriptlinkError';
  readonly code: ScriptlinkErrorCode;

  constructor(code: ScriptlinkErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
  }
}

/** A declared contract could not be linked to a remote function. Raised only by link(). */
export class LinkingError extends ScriptlinkError {
  override name = 'LinkingError';

  constructor(message: string, options?: { cause?: unknown }) {
    super('LINKING_FAILED', message, options);
  }
}

/**
 * The remote engine failed to evaluate a statement or call a function.
 *
 * Engines raise this; the binding layer only lets it through.
 */
export class EngineInvocationError extends ScriptlinkError {
  override name = 'EngineInvocationError';

  constructor(message: string, options?: { cause?: unknown }) {
    super('ENGINE_INVOCATION', message, options);
  }
}

export class IncompatibleReturnError extends ScriptlinkError {
  override name = 'IncompatibleReturnError';

  constructor(message: string) {
    super('INCOMPATIBLE_RETURN', message);
  }
}

export class ArgumentError extends ScriptlinkError {
  override name = 'ArgumentError';

  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}

/** Clearing generated variables or restoring the working directory failed. */
export class CleanupError extends ScriptlinkError {
  override name = 'CleanupError';

  constructor(message: string, options?: { cause?: unknown }) {
    super('CLEANUP_FAILED', message, options);
  }
}

export type ErrorClass = abstract new (...args: never[]) => Error;

/** Formats `key: value` context lines under a headline, skipping empty values. */
export function detailMessage(
  headline: string,
  details: Record<string, string | number | null | undefined>,
): string {
  const lines = [headline];
  for (const [k, v] of Object.entries(details)) {
    if (v == null || v === '') continue;
    lines.push(`${k}: ${v}`);
  }
  return lines.join('\n');
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
