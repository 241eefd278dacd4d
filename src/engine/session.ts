import type { EngineCallable, RemoteEngine } from './engineTypes.js';
import { logDebug } from '../dx/logger.js';
import { traceDebug } from '../dx/trace.js';

export class SessionClosedError extends Error {
  override name = 'SessionClosedError';
}

/**
 * Runs engine work one callable at a time, in submission order.
 *
 * The engine has a single execution context and a shared namespace, so a
 * whole invocation (name allocation, the call, cleanup) must not interleave
 * with another one.
 */
export class EngineSession {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;
  private seq = 0;
  private closed = false;

  constructor(readonly engine: RemoteEngine) {}

  get pending(): number {
    return this.queued;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  invokeAndWait<T>(callable: EngineCallable<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new SessionClosedError('Engine session is closed'));
    }

    this.queued++;
    const id = ++this.seq;
    traceDebug('session.enqueue', { id, pending: this.queued });

    const run = this.tail.then(() => callable(this.engine));
    // Keep the queue moving whatever this callable does; the caller sees
    // the rejection through `run`.
    this.tail = run.then(
      () => this.settle(id),
      () => this.settle(id),
    );
    return run;
  }

  /** Refuses new work and resolves once everything already queued has run. */
  async close(): Promise<void> {
    this.closed = true;
    await this.tail;
    logDebug('session closed');
  }

  private settle(id: number) {
    this.queued--;
    traceDebug('session.settle', { id, pending: this.queued });
  }
}

const sessions = new WeakMap<RemoteEngine, EngineSession>();

/**
 * The one open session for an engine.
 *
 * Every table linked against the same raw engine shares its queue, so their
 * generated variables never collide. A closed session is replaced.
 */
export function toSession(target: EngineSession | RemoteEngine): EngineSession {
  if (target instanceof EngineSession) {
    const current = sessions.get(target.engine);
    if (!target.isClosed && (!current || current.isClosed)) sessions.set(target.engine, target);
    return target;
  }

  const existing = sessions.get(target);
  if (existing && !existing.isClosed) return existing;

  const session = new EngineSession(target);
  sessions.set(target, session);
  return session;
}
