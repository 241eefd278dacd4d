import { performance } from 'node:perf_hooks';

import type { BindingDescriptor } from '../contract/descriptor.js';
import { describeTag } from '../types/typeTags.js';

export type TraceLevel = 'error' | 'warn' | 'info' | 'debug';

/** One line of `SCRIPTLINK_TRACE` output, as printed after the `[scriptlink:trace]` tag. */
export type TraceEvent = {
  /** Milliseconds since process start */
  t: number;
  pid: number;
  level: TraceLevel;
  event: string;
  data?: Record<string, unknown>;
};

const LEVELS: readonly TraceLevel[] = ['error', 'warn', 'info', 'debug'];

function isTraceLevel(v: string): v is TraceLevel {
  return LEVELS.some((level) => level === v);
}

/** The most verbose level printed, or null while tracing is off. */
function traceThreshold(): TraceLevel | null {
  if (!['1', 'true', 'yes'].includes(process.env.SCRIPTLINK_TRACE ?? '')) return null;
  const requested = (process.env.SCRIPTLINK_TRACE_LEVEL ?? '').toLowerCase();
  return isTraceLevel(requested) ? requested : 'info';
}

export function isTraceEnabled(): boolean {
  return traceThreshold() !== null;
}

export function shouldTrace(level: TraceLevel): boolean {
  const threshold = traceThreshold();
  return threshold !== null && LEVELS.indexOf(level) <= LEVELS.indexOf(threshold);
}

// Descriptors and results may carry bigint values.
function encodeEvent(e: TraceEvent): string {
  return JSON.stringify(e, (_k, v: unknown) => (typeof v === 'bigint' ? `${v}n` : v));
}

export function trace(level: TraceLevel, event: string, data?: Record<string, unknown>) {
  if (!shouldTrace(level)) return;

  const e: TraceEvent = { t: Math.round(performance.now() * 1000) / 1000, pid: process.pid, level, event };
  if (data !== undefined) e.data = data;
  // eslint-disable-next-line no-console
  console.log('[scriptlink:trace]', encodeEvent(e));
}

export const traceError = (event: string, data?: Record<string, unknown>) => trace('error', event, data);
export const traceWarn = (event: string, data?: Record<string, unknown>) => trace('warn', event, data);
export const traceInfo = (event: string, data?: Record<string, unknown>) => trace('info', event, data);
export const traceDebug = (event: string, data?: Record<string, unknown>) => trace('debug', event, data);

/** `[out1, out2] = name(double, RemoteVariable)` */
export function formatDescriptorSignature(d: BindingDescriptor): string {
  const params = d.parameterTypes.map(describeTag).join(', ');
  const call = `${d.name}(${params})`;
  if (d.nargout === 0) return call;
  const outs = d.returnTypes.map(describeTag).join(', ');
  return `[${outs}] = ${call}`;
}
