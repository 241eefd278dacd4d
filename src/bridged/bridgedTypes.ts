import type { RemoteEngine } from '../engine/engineTypes.js';

/** Writes a value into a named variable of the remote namespace. */
export interface SerializedSetter {
  setIn(engine: RemoteEngine, variableName: string): Promise<void>;
}

/**
 * Reads a named remote variable into a client-side intermediate, then turns
 * that intermediate into the bridged value once the engine work is over.
 */
export interface SerializedGetter<T> {
  getIn(engine: RemoteEngine, variableName: string): Promise<void>;
  deserialize(): T;
}

// Setters and getters handed out by the dispatcher; anything else in an
// argument or result vector is a plain value.
const setters = new WeakSet<object>();
const getters = new WeakSet<object>();

/**
 * A value that crosses into the engine through its own setter instead of
 * native value passing.
 */
export abstract class BridgedValue {
  abstract serializedSetter(): SerializedSetter;
}

export interface BridgedType<T extends BridgedValue = BridgedValue> {
  readonly typeName: string;
  isInstance(v: unknown): v is T;
  /** Absent for types that can only be passed, never returned. */
  readonly createGetter?: () => SerializedGetter<T>;
}

/**
 * Builds a bridged type from its class.
 *
 * Example:
 *   const PointType = defineBridgedType(Point, () => new PointGetter());
 */
export function defineBridgedType<T extends BridgedValue>(
  ctor: abstract new (...args: never[]) => T,
  createGetter?: () => SerializedGetter<T>,
): BridgedType<T> {
  const type: BridgedType<T> = {
    typeName: ctor.name,
    isInstance: (v: unknown): v is T => v instanceof ctor,
    ...(createGetter ? { createGetter } : {}),
  };
  return Object.freeze(type);
}

/** Marks a setter so it can be told apart from a plain argument value. */
export function brandSetter(setter: SerializedSetter): SerializedSetter {
  setters.add(setter);
  return setter;
}

export function brandGetter<T>(getter: SerializedGetter<T>): SerializedGetter<T> {
  getters.add(getter);
  return getter;
}

export function isSerializedSetter(v: unknown): v is SerializedSetter {
  return typeof v === 'object' && v !== null && setters.has(v);
}

export function isSerializedGetter(v: unknown): v is SerializedGetter<unknown> {
  return typeof v === 'object' && v !== null && getters.has(v);
}
