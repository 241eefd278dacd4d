let forced = false;

/**
 * Debug output is on when `SCRIPTLINK_DEBUG=1`, when `debug: true` is set in
 * scriptlink.config.js, or after `setDebugEnabled(true)`.
 */
export function isDebugEnabled(): boolean {
  return forced || process.env.SCRIPTLINK_DEBUG === '1';
}

export function setDebugEnabled(v: boolean) {
  forced = v;
}

function emit(args: unknown[]) {
  // eslint-disable-next-line no-console
  if (isDebugEnabled()) console.log('[scriptlink]', ...args);
}

/** Per-call detail: descriptors, generated names, session queue. */
export function logDebug(...args: unknown[]) {
  emit(args);
}

/** One line per link or extraction. */
export function logInfo(...args: unknown[]) {
  emit(args);
}
