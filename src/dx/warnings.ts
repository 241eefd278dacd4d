import { traceWarn } from './trace.js';

export type ScriptlinkWarningCode = 'CLEANUP_FAILED' | 'CONFIG_IGNORED';

export type ScriptlinkWarning = {
  code: ScriptlinkWarningCode;
  message: string;
  hint?: string;
};

/**
 * Emit a non-fatal warning.
 *
 * Printed whether or not debug logging is on: a warning stands for an error
 * that was not thrown. Must never throw.
 */
export function warn(w: ScriptlinkWarning) {
  const hint = w.hint ? ` Hint: ${w.hint}` : '';
  try {
    // eslint-disable-next-line no-console
    console.warn('[scriptlink]', `warning(${w.code}): ${w.message}${hint}`);
    traceWarn('warning', { code: w.code, message: w.message });
  } catch {
    // A broken console must not turn a warning into an error.
  }
}
