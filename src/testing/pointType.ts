import type { RemoteEngine } from '../engine/engineTypes.js';
import {
  BridgedValue,
  defineBridgedType,
  type SerializedGetter,
  type SerializedSetter,
} from '../bridged/bridgedTypes.js';

/** Bridged value used by tests: crosses as a two-element Float64Array. */
export class Point extends BridgedValue {
  constructor(
    readonly x: number,
    readonly y: number,
  ) {
    super();
  }

  serializedSetter(): SerializedSetter {
    const { x, y } = this;
    return {
      async setIn(engine: RemoteEngine, variableName: string) {
        await engine.setVariable(variableName, Float64Array.of(x, y));
      },
    };
  }
}

export class PointGetter implements SerializedGetter<Point> {
  private raw: unknown;

  async getIn(engine: RemoteEngine, variableName: string): Promise<void> {
    this.raw = await engine.getVariable(variableName);
  }

  deserialize(): Point {
    if (!(this.raw instanceof Float64Array) || this.raw.length !== 2) {
      throw new TypeError('expected a Float64Array of length 2');
    }
    return new Point(this.raw[0], this.raw[1]);
  }
}

export const PointType = defineBridgedType(Point, () => new PointGetter());
