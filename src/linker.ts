import type { ContractTable, FunctionContract } from './contract/contractTypes.js';
import type { BindingDescriptor } from './contract/descriptor.js';
import type { RemoteEngine } from './engine/engineTypes.js';
import { resolveContracts, type ResolveOptions } from './contract/resolveDescriptor.js';
import { BridgedValue, brandSetter, isSerializedGetter } from './bridged/bridgedTypes.js';
import { isValidVariableName } from './bridged/RemoteVariable.js';
import { convertReturn } from './coerce/convertReturn.js';
import type { ReturnTuple } from './coerce/returnTuple.js';
import { EngineSession, toSession } from './engine/session.js';
import { ArgumentError, LinkingError, detailMessage, errorMessage } from './errors.js';
import { invokeCustom } from './invoke/customInvocation.js';
import { DEFAULT_NAMING, type NamingOptions } from './invoke/invocationTypes.js';
import { invokeStandard } from './invoke/standardInvocation.js';
import { loadOptionalConfig } from './dx/config.js';
import { logDebug, logInfo } from './dx/logger.js';
import { formatDescriptorSignature, traceDebug, traceError, traceInfo } from './dx/trace.js';
import {
  describeTag,
  describeValue,
  isAssignable,
  type PrimitiveTag,
  type TupleTag,
  type TypeTag,
  type ValueOf,
  type VoidTag,
} from './types/typeTags.js';

export type LinkOptions = ResolveOptions &
  Partial<NamingOptions> & {
    /** Where `scriptlink.config.js` is looked up. Default: the current working directory. */
    projectRoot?: string;
  };

/** Primitive parameters need a value; every other parameter also takes null. */
type ParamValues<P extends readonly TypeTag[]> = {
  -readonly [I in keyof P]: P[I] extends PrimitiveTag ? ValueOf<P[I]> : ValueOf<P[I]> | null;
};

type TupleValueList<R extends readonly TypeTag[]> = { -readonly [I in keyof R]: ValueOf<R[I]> | null };

type TupleValues<R> = R extends readonly TypeTag[] ? TupleValueList<R> : unknown[];

export type ResultOf<C extends FunctionContract> = C['returns'] extends VoidTag
  ? void
  : C['returns'] extends TupleTag
    ? ReturnTuple<TupleValues<C['returnTypes']>>
    : ValueOf<C['returns']>;

export type LinkedFunction<C extends FunctionContract> = (
  ...args: ParamValues<C['parameters']>
) => Promise<ResultOf<C>>;

export type LinkedFunctions<T extends ContractTable> = {
  readonly [K in keyof T]: LinkedFunction<T[K]>;
} & {
  /** Calls a declared function by key, without static argument types. */
  invoke(key: Extract<keyof T, string>, ...args: unknown[]): Promise<unknown>;
  readonly descriptors: ReadonlyMap<string, BindingDescriptor>;
};

const RESERVED_KEYS: ReadonlySet<string> = new Set(['invoke', 'descriptors', 'then']);

function checkArguments(d: BindingDescriptor, args: readonly unknown[]) {
  if (args.length !== d.parameterTypes.length) {
    throw new ArgumentError(
      detailMessage(`${d.key} takes ${d.parameterTypes.length} argument(s) but was called with ${args.length}`, {
        signature: formatDescriptorSignature(d),
      }),
    );
  }

  d.parameterTypes.forEach((tag, i) => {
    const arg = args[i];
    if (arg == null) {
      if (tag.kind === 'primitive') {
        throw new ArgumentError(`${d.key} argument ${i} is a ${tag.name} and cannot be ${describeValue(arg)}`);
      }
      return;
    }
    if (!isAssignable(arg, tag)) {
      throw new ArgumentError(
        detailMessage(`${d.key} argument ${i} does not match its declared type`, {
          'declared type': describeTag(tag),
          'given type': describeValue(arg),
        }),
      );
    }
  });
}

/** Bridged arguments cross as their branded setter; everything else as is. */
function toEngineArgument(arg: unknown): unknown {
  return arg instanceof BridgedValue ? brandSetter(arg.serializedSetter()) : arg;
}

async function runInvocation(
  session: EngineSession,
  d: BindingDescriptor,
  args: readonly unknown[],
  naming: NamingOptions,
): Promise<unknown[]> {
  if (!d.usesBridgedTypes) {
    return session.invokeAndWait((engine) => invokeStandard(engine, { descriptor: d, args }));
  }

  const prepared = args.map(toEngineArgument);
  const results = await session.invokeAndWait((engine) =>
    invokeCustom(engine, { descriptor: d, args: prepared }, naming),
  );
  // Getters hold client-side intermediates only; deserializing needs no engine.
  return results.map((r) => (isSerializedGetter(r) ? r.deserialize() : r));
}

/**
 * The dispatcher behind every linked function.
 *
 * Engine errors and cleanup errors propagate unchanged.
 */
async function dispatch(
  session: EngineSession,
  d: BindingDescriptor,
  args: readonly unknown[],
  naming: NamingOptions,
): Promise<unknown> {
  checkArguments(d, args);

  const signature = formatDescriptorSignature(d);
  traceDebug('call.begin', { key: d.key, signature, argc: args.length, bridged: d.usesBridgedTypes });
  logDebug('call', d.key, signature);

  try {
    const raw = await runInvocation(session, d, args, naming);
    const value = convertReturn(raw, d.returnTypes, d.resultShape);
    traceDebug('call.done', { key: d.key, results: raw.length });
    return d.nargout === 0 ? undefined : value;
  } catch (err) {
    traceError('call.error', { key: d.key, signature, error: errorMessage(err) });
    throw err;
  }
}

function checkNaming(naming: NamingOptions) {
  for (const [option, prefix] of Object.entries(naming)) {
    if (!isValidVariableName(prefix)) {
      throw new LinkingError(`${option} is not a valid variable name prefix: ${prefix}`);
    }
  }
  if (naming.argumentPrefix === naming.returnPrefix) {
    throw new LinkingError(
      `argumentPrefix and returnPrefix must differ (both are ${naming.argumentPrefix})`,
    );
  }
}

/**
 * Validates and resolves a contract table, then returns one async function
 * per contract.
 *
 * Nothing is returned unless every contract links. Options given here win
 * over `scriptlink.config.js`.
 *
 * Example:
 *   const fns = await link(defineContracts({
 *     add: { name: 'plus', nargout: 1, returns: t.double,
 *            parameters: [t.double, t.double], throws: [EngineInvocationError] },
 *   }), engine);
 *   await fns.add(1, 2); // 3
 */
export async function link<const T extends ContractTable>(
  table: T,
  target: EngineSession | RemoteEngine,
  options: LinkOptions = {},
): Promise<LinkedFunctions<T>> {
  const config = (await loadOptionalConfig(options.projectRoot)) ?? {};

  const naming: NamingOptions = {
    argumentPrefix: options.argumentPrefix ?? config.argumentPrefix ?? DEFAULT_NAMING.argumentPrefix,
    returnPrefix: options.returnPrefix ?? config.returnPrefix ?? DEFAULT_NAMING.returnPrefix,
  };
  checkNaming(naming);

  for (const key of Object.keys(table)) {
    if (RESERVED_KEYS.has(key)) {
      throw new LinkingError(`${key} is a reserved name and cannot be used as a function key`);
    }
  }

  const descriptors = resolveContracts(table, {
    origin: options.origin,
    scriptExtension: options.scriptExtension ?? config.scriptExtension,
    tempDir: options.tempDir ?? config.tempDir,
  });

  const session = toSession(target);

  const call = (key: string, args: readonly unknown[]): Promise<unknown> => {
    const d = descriptors.get(key);
    if (!d) {
      return Promise.reject(new ArgumentError(`No linked function named ${key}`));
    }
    return dispatch(session, d, args, naming);
  };

  const facade: Record<string, unknown> = {
    invoke: (key: string, ...args: unknown[]) => call(key, args),
    descriptors,
  };
  for (const key of descriptors.keys()) {
    facade[key] = (...args: unknown[]) => call(key, args);
  }
  Object.freeze(facade);

  traceInfo('link.done', { functions: [...descriptors.keys()], ...naming });
  logInfo(`linked ${descriptors.size} function(s)`);

  // Per-key signatures are computed from T; the object carries exactly
  // T's keys.
  return facade as LinkedFunctions<T>;
}
