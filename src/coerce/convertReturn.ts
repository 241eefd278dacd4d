import { IncompatibleReturnError, detailMessage } from '../errors.js';
import {
  TYPED_ARRAYS,
  describeTag,
  describeValue,
  isAssignable,
  primitiveInfo,
  type AnyTypedArray,
  type PrimitiveTag,
  type TypeTag,
} from '../types/typeTags.js';
import { ReturnTuple } from './returnTuple.js';

function incompatible(required: string, returned: unknown): IncompatibleReturnError {
  return new IncompatibleReturnError(
    detailMessage('Required return type is incompatible with the type actually returned', {
      'Required type': required,
      'Returned type': describeValue(returned),
    }),
  );
}

function convertPrimitive(value: unknown, tag: PrimitiveTag): unknown {
  const info = primitiveInfo(tag.name);

  if (info.isScalar(value)) return value;

  if (info.isArrayForm(value)) {
    if (value.length !== 1) {
      throw new IncompatibleReturnError(
        `Array of ${tag.name} does not have exactly 1 value (it has ${value.length})`,
      );
    }
    return value[0];
  }

  throw incompatible(tag.name, value);
}

/**
 * Checks one returned value against its declared type.
 *
 * null passes through. Primitive types also take a one-element array of
 * that primitive and unwrap it; nothing is ever widened.
 */
export function convertToType(value: unknown, tag: TypeTag): unknown {
  if (value == null) return null;
  if (tag.kind === 'primitive') return convertPrimitive(value, tag);
  if (!isAssignable(value, tag)) throw incompatible(describeTag(tag), value);
  return value;
}

function setTypedElement(container: AnyTypedArray, index: number, value: unknown) {
  if (container instanceof BigInt64Array || container instanceof BigUint64Array) {
    if (typeof value !== 'bigint') throw incompatible(container.constructor.name, value);
    container[index] = value;
    return;
  }
  if (typeof value !== 'number') throw incompatible(container.constructor.name, value);
  container[index] = value;
}

/**
 * Shapes the raw result vector of a call into what the caller declared.
 *
 * - no values: the empty vector itself
 * - one value: that value, converted, not wrapped
 * - several: an array of the declared kind (or a ReturnTuple), converted
 *   position by position
 */
export function convertReturn(
  result: readonly unknown[],
  returnTypes: readonly TypeTag[],
  shape: TypeTag,
): unknown {
  if (result.length === 0) return result;

  if (result.length === 1) return convertToType(result[0], returnTypes[0]);

  if (result.length !== returnTypes.length) {
    throw new IncompatibleReturnError(
      `Engine returned ${result.length} values but ${returnTypes.length} were declared`,
    );
  }

  if (shape.kind === 'typedArray') {
    const container = new TYPED_ARRAYS[shape.name](result.length);
    result.forEach((v, i) => {
      if (v != null) setTypedElement(container, i, convertToType(v, returnTypes[i]));
    });
    return container;
  }

  const values = result.map((v, i) => (v == null ? null : convertToType(v, returnTypes[i])));

  if (shape.kind === 'tuple') return new ReturnTuple(values);
  return values;
}
