import type { RemoteEngine } from '../engine/engineTypes.js';
import { BridgedValue, defineBridgedType, type SerializedSetter } from './bridgedTypes.js';

const IDENTIFIER = /^[A-Za-z][A-Za-z0-9_]*$/;

export function isValidVariableName(name: string): boolean {
  return IDENTIFIER.test(name);
}

/**
 * A variable that already exists in the remote namespace, passed by name.
 *
 * Passing one as an argument copies nothing across the wire: the argument
 * variable is assigned from the existing one inside the engine.
 */
export class RemoteVariable extends BridgedValue {
  readonly name: string;

  constructor(name: string) {
    super();
    if (!isValidVariableName(name)) {
      throw new TypeError(`Invalid remote variable name: ${name}`);
    }
    this.name = name;
  }

  serializedSetter(): SerializedSetter {
    return new RemoteVariableSetter(this.name);
  }

  toString(): string {
    return this.name;
  }
}

class RemoteVariableSetter implements SerializedSetter {
  constructor(private readonly source: string) {}

  async setIn(engine: RemoteEngine, variableName: string): Promise<void> {
    await engine.evaluate(`${variableName} = ${this.source};`);
  }
}

/** No getter: a remote variable can never be a declared return type. */
export const RemoteVariableType = defineBridgedType(RemoteVariable);
