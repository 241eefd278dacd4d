import type { RemoteEngine } from '../engine/engineTypes.js';
import { EngineInvocationError } from '../errors.js';
import { traceDebug } from '../dx/trace.js';

/**
 * Changes the engine's working directory to `directory` when it is not
 * already there.
 *
 * Returns the directory to restore afterwards, or null when nothing changed.
 */
export async function enterDirectory(
  engine: RemoteEngine,
  directory: string | null,
): Promise<string | null> {
  if (directory === null) return null;

  const [initial] = await engine.callByNameReturning('pwd', 1, []);
  if (typeof initial !== 'string') {
    throw new EngineInvocationError(`pwd returned ${typeof initial}, expected a directory`);
  }
  if (initial === directory) return null;

  await engine.callByName('cd', [directory]);
  traceDebug('invoke.cd', { from: initial, to: directory });
  return initial;
}

export async function restoreDirectory(engine: RemoteEngine, initial: string | null): Promise<void> {
  if (initial === null) return;
  await engine.callByName('cd', [initial]);
  traceDebug('invoke.cd.restore', { to: initial });
}
