import type { RemoteEngine } from '../engine/engineTypes.js';
import type { Invocation, NamingOptions } from './invocationTypes.js';
import { brandGetter, isSerializedSetter } from '../bridged/bridgedTypes.js';
import { IncompatibleReturnError } from '../errors.js';
import { logDebug } from '../dx/logger.js';
import { describeTag } from '../types/typeTags.js';
import { withCleanup } from './cleanup.js';
import { generateNames } from './nameGeneration.js';
import { enterDirectory, restoreDirectory } from './workingDirectory.js';

/** `[r0, r1] = f(a0, a1);`, or `f(a0, a1);` without return names. */
export function buildCallStatement(
  functionName: string,
  argumentNames: readonly string[],
  returnNames: readonly string[],
): string {
  const call = `${functionName}(${argumentNames.join(', ')});`;
  if (returnNames.length === 0) return call;
  return `[${returnNames.join(', ')}] = ${call}`;
}

export function buildClearStatement(names: readonly string[]): string {
  return `clear ${names.join(' ')}`;
}

/**
 * Calls the function through generated variables in the engine namespace.
 *
 * Arguments that are serialized setters write themselves into their
 * variable; bridged return values are read back through their type's
 * getter, which is returned still serialized. Generated variables are
 * cleared and the working directory restored on every exit path.
 */
export async function invokeCustom(
  engine: RemoteEngine,
  invocation: Invocation,
  naming: NamingOptions,
): Promise<unknown[]> {
  const { descriptor: d, args } = invocation;
  const initialDir = await enterDirectory(engine, d.containingDirectory);

  let argumentNames: string[] = [];
  let returnNames: string[] = [];

  return withCleanup(
    async () => {
      if (args.length > 0 || d.nargout > 0) {
        const bound = await engine.listBoundNames();
        argumentNames = generateNames(bound, naming.argumentPrefix, args.length);
        returnNames = generateNames(
          new Set([...bound, ...argumentNames]),
          naming.returnPrefix,
          d.nargout,
        );
      }

      for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const name = argumentNames[i];
        if (isSerializedSetter(arg)) {
          await arg.setIn(engine, name);
        } else {
          await engine.setVariable(name, arg);
        }
      }

      const statement = buildCallStatement(d.name, argumentNames, returnNames);
      logDebug('custom invocation', statement);
      await engine.evaluate(statement);

      const results: unknown[] = [];
      for (let i = 0; i < d.nargout; i++) {
        const tag = d.returnTypes[i];
        const name = returnNames[i];
        if (tag.kind === 'bridged') {
          const create = tag.type.createGetter;
          if (!create) {
            throw new IncompatibleReturnError(`${describeTag(tag)} cannot be read back from the engine`);
          }
          const getter = brandGetter(create());
          await getter.getIn(engine, name);
          results.push(getter);
        } else {
          results.push(await engine.getVariable(name));
        }
      }
      return results;
    },
    [
      {
        label: 'clear generated variables',
        run: async () => {
          const created = [...argumentNames, ...returnNames];
          if (created.length > 0) await engine.evaluate(buildClearStatement(created));
        },
      },
      { label: 'restore the working directory', run: () => restoreDirectory(engine, initialDir) },
    ],
  );
}
