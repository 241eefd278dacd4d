import type { BridgedType, BridgedValue } from '../bridged/bridgedTypes.js';
import type { ReturnTuple } from '../coerce/returnTuple.js';
import { RemoteVariable, RemoteVariableType } from '../bridged/RemoteVariable.js';

export type PrimitiveName =
  | 'double'
  | 'single'
  | 'int8'
  | 'int16'
  | 'int32'
  | 'uint8'
  | 'uint16'
  | 'uint32'
  | 'int64'
  | 'uint64'
  | 'logical';

export type TypedArrayName =
  | 'Float64Array'
  | 'Float32Array'
  | 'Int8Array'
  | 'Int16Array'
  | 'Int32Array'
  | 'Uint8Array'
  | 'Uint16Array'
  | 'Uint32Array'
  | 'BigInt64Array'
  | 'BigUint64Array';

export type AnyTypedArray =
  | Float64Array
  | Float32Array
  | Int8Array
  | Int16Array
  | Int32Array
  | Uint8Array
  | Uint16Array
  | Uint32Array
  | BigInt64Array
  | BigUint64Array;

type TypedArrayByName = {
  Float64Array: Float64Array;
  Float32Array: Float32Array;
  Int8Array: Int8Array;
  Int16Array: Int16Array;
  Int32Array: Int32Array;
  Uint8Array: Uint8Array;
  Uint16Array: Uint16Array;
  Uint32Array: Uint32Array;
  BigInt64Array: BigInt64Array;
  BigUint64Array: BigUint64Array;
};

export type TypedArrayCtor = {
  new (length: number): AnyTypedArray;
  readonly name: string;
};

export const TYPED_ARRAYS: Readonly<Record<TypedArrayName, TypedArrayCtor>> = {
  Float64Array,
  Float32Array,
  Int8Array,
  Int16Array,
  Int32Array,
  Uint8Array,
  Uint16Array,
  Uint32Array,
  BigInt64Array,
  BigUint64Array,
};

export type VoidTag = { readonly kind: 'void' };
export type AnyTag = { readonly kind: 'any' };
export type StringTag = { readonly kind: 'string' };
export type NumberTag = { readonly kind: 'number' };
export type BooleanTag = { readonly kind: 'boolean' };
export type BigintTag = { readonly kind: 'bigint' };
export type PrimitiveTag<N extends PrimitiveName = PrimitiveName> = {
  readonly kind: 'primitive';
  readonly name: N;
};
export type TypedArrayTag<N extends TypedArrayName = TypedArrayName> = {
  readonly kind: 'typedArray';
  readonly name: N;
};
export interface ArrayTag<E extends TypeTag = TypeTag> { readonly kind: 'array'; readonly of: E }
export type InstanceTag<T = unknown> = {
  readonly kind: 'instance';
  readonly ctor: abstract new (...args: never[]) => T;
};
export type BridgedTag<T extends BridgedValue = BridgedValue> = {
  readonly kind: 'bridged';
  readonly type: BridgedType<T>;
};
export type TupleTag<N extends number = number> = { readonly kind: 'tuple'; readonly arity: N };

/**
 * A declared parameter or return type.
 *
 * This is the closed set of shapes a contract can name; values coming back
 * from the engine are checked against it at run time.
 */
export type TypeTag =
  | VoidTag
  | AnyTag
  | StringTag
  | NumberTag
  | BooleanTag
  | BigintTag
  | PrimitiveTag
  | TypedArrayTag
  | ArrayTag
  | InstanceTag
  | BridgedTag
  | TupleTag;

/** Client-side value type described by a tag. */
export type ValueOf<T extends TypeTag> = T extends VoidTag
  ? void
  : T extends StringTag
    ? string
    : T extends NumberTag
      ? number
      : T extends BooleanTag
        ? boolean
        : T extends BigintTag
          ? bigint
          : T extends PrimitiveTag<infer N>
            ? N extends 'int64' | 'uint64'
              ? bigint
              : N extends 'logical'
                ? boolean
                : number
            : T extends TypedArrayTag<infer N>
              ? TypedArrayByName[N]
              : T extends ArrayTag<infer E>
                ? Array<ValueOf<E> | null>
                : T extends InstanceTag<infer I>
                  ? I
                  : T extends BridgedTag<infer B>
                    ? B
                    : T extends TupleTag
                      ? ReturnTuple
                      : unknown;

function primitive<N extends PrimitiveName>(name: N): PrimitiveTag<N> {
  return { kind: 'primitive', name };
}

const voidTag: VoidTag = { kind: 'void' };
const anyTag: AnyTag = { kind: 'any' };
const stringTag: StringTag = { kind: 'string' };
const numberTag: NumberTag = { kind: 'number' };
const booleanTag: BooleanTag = { kind: 'boolean' };
const bigintTag: BigintTag = { kind: 'bigint' };
const listTag: ArrayTag<AnyTag> = { kind: 'array', of: anyTag };
const remoteVariableTag: BridgedTag<RemoteVariable> = { kind: 'bridged', type: RemoteVariableType };

export const t = {
  void: voidTag,
  any: anyTag,
  string: stringTag,
  number: numberTag,
  boolean: booleanTag,
  bigint: bigintTag,
  /** Untyped array result, the only array shape that may carry explicit return types. */
  list: listTag,

  double: primitive('double'),
  single: primitive('single'),
  int8: primitive('int8'),
  int16: primitive('int16'),
  int32: primitive('int32'),
  uint8: primitive('uint8'),
  uint16: primitive('uint16'),
  uint32: primitive('uint32'),
  int64: primitive('int64'),
  uint64: primitive('uint64'),
  logical: primitive('logical'),

  /** Named remote reference. Valid as a parameter, never as a return. */
  remoteVariable: remoteVariableTag,

  typedArray<N extends TypedArrayName>(name: N): TypedArrayTag<N> {
    return { kind: 'typedArray', name };
  },
  arrayOf<E extends TypeTag>(of: E): ArrayTag<E> {
    return { kind: 'array', of };
  },
  instanceOf<T>(ctor: abstract new (...args: never[]) => T): InstanceTag<T> {
    return { kind: 'instance', ctor };
  },
  bridged<T extends BridgedValue>(type: BridgedType<T>): BridgedTag<T> {
    return { kind: 'bridged', type };
  },
  tuple<N extends number>(arity: N): TupleTag<N> {
    return { kind: 'tuple', arity };
  },
};

type PrimitiveInfo = {
  isScalar(v: unknown): boolean;
  isArrayForm(v: unknown): v is ArrayLike<unknown>;
};

function intRange(min: number, max: number) {
  return (v: unknown) => typeof v === 'number' && Number.isInteger(v) && v >= min && v <= max;
}

function bigRange(min: bigint, max: bigint) {
  return (v: unknown) => typeof v === 'bigint' && v >= min && v <= max;
}

function typedForm(name: TypedArrayName) {
  const ctor = TYPED_ARRAYS[name];
  return (v: unknown): v is ArrayLike<unknown> => v instanceof ctor;
}

const PRIMITIVES: Readonly<Record<PrimitiveName, PrimitiveInfo>> = {
  double: { isScalar: (v) => typeof v === 'number', isArrayForm: typedForm('Float64Array') },
  single: {
    isScalar: (v) => typeof v === 'number' && (Number.isNaN(v) || Math.fround(v) === v),
    isArrayForm: typedForm('Float32Array'),
  },
  int8: { isScalar: intRange(-128, 127), isArrayForm: typedForm('Int8Array') },
  int16: { isScalar: intRange(-32768, 32767), isArrayForm: typedForm('Int16Array') },
  int32: { isScalar: intRange(-2147483648, 2147483647), isArrayForm: typedForm('Int32Array') },
  uint8: { isScalar: intRange(0, 255), isArrayForm: typedForm('Uint8Array') },
  uint16: { isScalar: intRange(0, 65535), isArrayForm: typedForm('Uint16Array') },
  uint32: { isScalar: intRange(0, 4294967295), isArrayForm: typedForm('Uint32Array') },
  int64: { isScalar: bigRange(-(2n ** 63n), 2n ** 63n - 1n), isArrayForm: typedForm('BigInt64Array') },
  uint64: { isScalar: bigRange(0n, 2n ** 64n - 1n), isArrayForm: typedForm('BigUint64Array') },
  logical: {
    isScalar: (v) => typeof v === 'boolean',
    // logical arrays cross as plain boolean[]
    isArrayForm: (v): v is ArrayLike<unknown> => Array.isArray(v) && v.every((e) => typeof e === 'boolean'),
  },
};

export function primitiveInfo(name: PrimitiveName): PrimitiveInfo {
  return PRIMITIVES[name];
}

const COMPONENT_OF_TYPED: Readonly<Record<TypedArrayName, PrimitiveName>> = {
  Float64Array: 'double',
  Float32Array: 'single',
  Int8Array: 'int8',
  Int16Array: 'int16',
  Int32Array: 'int32',
  Uint8Array: 'uint8',
  Uint16Array: 'uint16',
  Uint32Array: 'uint32',
  BigInt64Array: 'int64',
  BigUint64Array: 'uint64',
};

export function isBridgedTag(tag: TypeTag): tag is BridgedTag {
  return tag.kind === 'bridged';
}

/** Whether a tag names a value, as opposed to a result-only shape. */
export function isValueTag(tag: TypeTag): boolean {
  return tag.kind !== 'void' && tag.kind !== 'tuple';
}

export function isArrayShape(tag: TypeTag): tag is ArrayTag | TypedArrayTag {
  return tag.kind === 'array' || tag.kind === 'typedArray';
}

export function isUntypedArray(tag: TypeTag): boolean {
  return tag.kind === 'array' && tag.of.kind === 'any';
}

/** Element tag of an array-like result shape. */
export function componentTag(shape: TypeTag): TypeTag | null {
  if (shape.kind === 'array') return shape.of;
  if (shape.kind === 'typedArray') return primitive(COMPONENT_OF_TYPED[shape.name]);
  return null;
}

export function describeTag(tag: TypeTag): string {
  switch (tag.kind) {
    case 'void':
    case 'any':
    case 'string':
    case 'number':
    case 'boolean':
    case 'bigint':
      return tag.kind;
    case 'primitive':
    case 'typedArray':
      return tag.name;
    case 'array': {
      const inner = describeTag(tag.of);
      return /[^\w]/.test(inner) ? `(${inner})[]` : `${inner}[]`;
    }
    case 'instance':
      return tag.ctor.name || '<anonymous class>';
    case 'bridged':
      return tag.type.typeName;
    case 'tuple':
      return `tuple<${tag.arity}>`;
  }
}

/** Runtime type name of a value, for error messages. */
export function describeValue(v: unknown): string {
  if (v === null) return 'null';
  if (v === undefined) return 'undefined';
  if (Array.isArray(v)) return 'Array';
  if (typeof v === 'object') {
    const proto: unknown = Object.getPrototypeOf(v);
    if (proto === null) return 'Object';
    return v.constructor?.name || 'Object';
  }
  return typeof v;
}

/**
 * Whether `value` may stand where `tag` is declared.
 *
 * Primitive tags only take their scalar form here; the one-element array
 * form is a return-coercion concern.
 */
export function isAssignable(value: unknown, tag: TypeTag): boolean {
  if (value == null) return false;
  switch (tag.kind) {
    case 'void':
    case 'tuple':
      return false;
    case 'any':
      return true;
    case 'string':
    case 'number':
    case 'boolean':
    case 'bigint':
      return typeof value === tag.kind;
    case 'primitive':
      return PRIMITIVES[tag.name].isScalar(value);
    case 'typedArray':
      return value instanceof TYPED_ARRAYS[tag.name];
    case 'array':
      return Array.isArray(value) && value.every((e) => e == null || isAssignable(e, tag.of));
    case 'instance':
      return value instanceof tag.ctor;
    case 'bridged':
      return tag.type.isInstance(value);
  }
}
