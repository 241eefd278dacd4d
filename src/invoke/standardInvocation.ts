import type { RemoteEngine } from '../engine/engineTypes.js';
import type { Invocation } from './invocationTypes.js';
import { withCleanup } from './cleanup.js';
import { enterDirectory, restoreDirectory } from './workingDirectory.js';

/**
 * Calls the function by name with the arguments passed natively.
 *
 * Used when neither an argument nor a return value is bridged.
 */
export async function invokeStandard(engine: RemoteEngine, invocation: Invocation): Promise<unknown[]> {
  const { descriptor: d, args } = invocation;
  const initialDir = await enterDirectory(engine, d.containingDirectory);

  return withCleanup(
    async () => {
      if (d.nargout === 0) {
        await engine.callByName(d.name, args);
        return [];
      }
      return engine.callByNameReturning(d.name, d.nargout, args);
    },
    [{ label: 'restore the working directory', run: () => restoreDirectory(engine, initialDir) }],
  );
}
