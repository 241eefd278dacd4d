import { describe, it, expect } from 'vitest';

import { ScriptedEngine } from './scriptedEngine.js';
import { EngineSession, SessionClosedError, toSession } from './session.js';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('EngineSession', () => {
  it('runs callables one at a time in submission order', async () => {
    const session = new EngineSession(new ScriptedEngine());
    const events: string[] = [];
    const gate = deferred();

    const first = session.invokeAndWait(async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = session.invokeAndWait(async () => {
      events.push('second');
      return 2;
    });

    expect(session.pending).toBe(2);
    await Promise.resolve();
    gate.resolve();

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(session.pending).toBe(0);
  });

  it('keeps going after a callable rejects', async () => {
    const session = new EngineSession(new ScriptedEngine());
    const failed = session.invokeAndWait(async () => {
      throw new Error('engine gone');
    });
    const next = session.invokeAndWait(async () => 'ok');

    await expect(failed).rejects.toThrow('engine gone');
    await expect(next).resolves.toBe('ok');
  });

  it('hands every callable the wrapped engine', async () => {
    const engine = new ScriptedEngine();
    const session = new EngineSession(engine);
    await session.invokeAndWait((e) => e.setVariable('x', 1));
    expect(await engine.getVariable('x')).toBe(1);
  });

  it('refuses work after close and waits for queued work', async () => {
    const session = new EngineSession(new ScriptedEngine());
    let ran = false;
    const queued = session.invokeAndWait(async () => {
      ran = true;
    });
    await session.close();

    expect(ran).toBe(true);
    await queued;
    expect(session.isClosed).toBe(true);
    await expect(session.invokeAndWait(async () => 1)).rejects.toBeInstanceOf(SessionClosedError);
  });

  it('reuses an existing session', () => {
    const session = new EngineSession(new ScriptedEngine());
    expect(toSession(session)).toBe(session);
    expect(toSession(new ScriptedEngine())).toBeInstanceOf(EngineSession);
  });

  it('keeps one session per raw engine', () => {
    const engine = new ScriptedEngine();
    const first = toSession(engine);
    expect(toSession(engine)).toBe(first);
    expect(toSession(new ScriptedEngine())).not.toBe(first);
  });

  it('shares an explicit session with later raw-engine links', () => {
    const engine = new ScriptedEngine();
    const session = toSession(new EngineSession(engine));
    expect(toSession(engine)).toBe(session);
  });

  it('replaces a closed session', async () => {
    const engine = new ScriptedEngine();
    const first = toSession(engine);
    await first.close();

    const next = toSession(engine);
    expect(next).not.toBe(first);
    expect(next.isClosed).toBe(false);
  });
});
