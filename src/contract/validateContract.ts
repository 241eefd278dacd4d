import type { FunctionContract } from './contractTypes.js';
import { EngineInvocationError, LinkingError, detailMessage } from '../errors.js';
import { isValidVariableName } from '../bridged/RemoteVariable.js';
import {
  componentTag,
  describeTag,
  isArrayShape,
  isUntypedArray,
  isValueTag,
  type TypeTag,
} from '../types/typeTags.js';

/** A tag a value can be read back into. */
function isReturnable(tag: TypeTag): boolean {
  if (!isValueTag(tag)) return false;
  if (tag.kind === 'bridged') return tag.type.createGetter !== undefined;
  return true;
}

export function checkLocation(key: string, c: FunctionContract) {
  const given = [c.name, c.absolutePath, c.relativePath].filter(
    (v) => v !== undefined && v !== '',
  ).length;
  if (given !== 1) {
    throw new LinkingError(
      `${key} must specify either a function name, an absolute path, or a relative path. ` +
        `It must specify exactly one.`,
    );
  }
  if (c.name && !isValidVariableName(c.name)) {
    throw new LinkingError(`${key} specifies an invalid function name: ${c.name}`);
  }
}

export function checkReturn(key: string, c: FunctionContract) {
  const { nargout, returns } = c;

  if (!Number.isInteger(nargout) || nargout < 0) {
    throw new LinkingError(
      `${key} specifies a nargout of ${nargout}. nargout must be an integer, 0 or greater.`,
    );
  }

  if (returns.kind === 'bridged' && !returns.type.createGetter) {
    throw new LinkingError(`${key} cannot have a return type of ${describeTag(returns)}`);
  }

  if (returns.kind === 'void' && nargout !== 0) {
    throw new LinkingError(`${key} has a void return type but has a non-zero nargout value: ${nargout}`);
  }

  if (returns.kind !== 'void' && nargout === 0) {
    throw new LinkingError(
      `${key} has a non-void return type but does not specify the number of return arguments or specified 0.`,
    );
  }

  const annotated = c.returnTypes ?? [];

  if (annotated.length !== 0) {
    if (!(returns.kind === 'tuple' || isUntypedArray(returns))) {
      throw new LinkingError(
        `${key} has annotated return types but provides an incompatible return type. ` +
          `The return type must either be t.list or a tuple.`,
      );
    }

    if (annotated.length !== nargout) {
      throw new LinkingError(
        detailMessage(
          `${key} has a differing amount of return arguments specified by nargout and the number of annotated return types.`,
          { nargout, 'number of annotated return types': annotated.length },
        ),
      );
    }

    for (const tag of annotated) {
      if (tag.kind === 'primitive') {
        throw new LinkingError(
          `${key} has annotated a primitive return type (${tag.name}). Primitive types are not supported`,
        );
      }
      if (!isReturnable(tag)) {
        throw new LinkingError(`${key} has annotated a return type that cannot be returned: ${describeTag(tag)}`);
      }
    }
  }

  if (returns.kind === 'tuple') {
    const arity = returns.arity;
    if (!Number.isInteger(arity) || arity < 2) {
      throw new LinkingError(`${key} has a tuple return type with an arity of ${arity}; tuples hold 2 or more values`);
    }

    if (annotated.length !== arity) {
      throw new LinkingError(
        `${key} has a return type for ${arity} return arguments, but has ${annotated.length} return types annotated`,
      );
    }

    if (arity !== nargout) {
      throw new LinkingError(
        `${key} has a return type for ${arity} return arguments, but specifies an nargout of ${nargout}`,
      );
    }
  } else if (nargout > 1 && !isArrayShape(returns)) {
    throw new LinkingError(`${key} must have a return type of an array or a tuple`);
  }
}

export function checkFailureMode(key: string, c: FunctionContract) {
  if (!c.throws.includes(EngineInvocationError)) {
    throw new LinkingError(`${key} must declare that it throws ${EngineInvocationError.name}`);
  }
}

export function checkParameters(key: string, c: FunctionContract) {
  c.parameters.forEach((tag, i) => {
    if (!isValueTag(tag)) {
      throw new LinkingError(`${key} declares parameter ${i} as ${describeTag(tag)}, which is not a value type`);
    }
  });
}

/**
 * Per-position return types. Only valid after checkReturn().
 *
 * - nargout 0 or 1: the declared result itself
 * - no annotated types: the array's component type, nargout times
 * - otherwise: the annotated types
 */
export function resolveReturnTypes(key: string, c: FunctionContract): TypeTag[] {
  const annotated = c.returnTypes ?? [];

  if (c.nargout === 0 || c.nargout === 1) return [c.returns];

  if (annotated.length === 0) {
    const component = componentTag(c.returns);
    if (!component || !isReturnable(component)) {
      throw new LinkingError(`${key} has an array return type whose elements cannot be returned: ${describeTag(c.returns)}`);
    }
    return Array.from({ length: c.nargout }, () => component);
  }

  return [...annotated];
}

/** Runs every contract rule; throws the first LinkingError found. */
export function validateContract(key: string, c: FunctionContract) {
  checkLocation(key, c);
  checkReturn(key, c);
  checkFailureMode(key, c);
  checkParameters(key, c);
}
