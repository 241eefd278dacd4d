import { describe, it, expect } from 'vitest';

import { createDescriptor } from '../contract/descriptor.js';
import { ScriptedEngine } from '../engine/scriptedEngine.js';
import { EngineInvocationError } from '../errors.js';
import { t, type TypeTag } from '../types/typeTags.js';
import { invokeStandard } from './standardInvocation.js';

function descriptor(name: string, nargout: number, containingDirectory: string | null, params: TypeTag[]) {
  return createDescriptor({
    key: name,
    name,
    containingDirectory,
    nargout,
    returnTypes: nargout === 0 ? [t.void] : Array.from({ length: nargout }, () => t.double),
    parameterTypes: params,
    resultShape: nargout === 0 ? t.void : nargout === 1 ? t.double : t.typedArray('Float64Array'),
  });
}

describe('invokeStandard', () => {
  it('calls by name on the search path without touching the directory', async () => {
    const engine = new ScriptedEngine({ cwd: '/home' }).define('plus', (a) => [Number(a[0]) + Number(a[1])]);
    const result = await invokeStandard(engine, {
      descriptor: descriptor('plus', 1, null, [t.double, t.double]),
      args: [1, 2],
    });

    expect(result).toEqual([3]);
    expect(engine.calls).toEqual([{ name: 'plus', args: [1, 2], nargout: 1 }]);
  });

  it('switches into the containing directory and back', async () => {
    const engine = new ScriptedEngine({ cwd: '/home' }).define('local', () => [7, 8], {
      directory: '/scripts',
    });
    const result = await invokeStandard(engine, {
      descriptor: descriptor('local', 2, '/scripts', []),
      args: [],
    });

    expect(result).toEqual([7, 8]);
    expect(engine.calls.map((c) => c.name)).toEqual(['pwd', 'cd', 'local', 'cd']);
    expect(engine.calls[3].args).toEqual(['/home']);
    expect(engine.workingDirectory).toBe('/home');
  });

  it('does not cd when already in the containing directory', async () => {
    const engine = new ScriptedEngine({ cwd: '/scripts' }).define('local', () => [1], {
      directory: '/scripts',
    });
    await invokeStandard(engine, { descriptor: descriptor('local', 1, '/scripts', []), args: [] });
    expect(engine.calls.map((c) => c.name)).toEqual(['pwd', 'local']);
  });

  it('restores the directory when the call fails', async () => {
    const engine = new ScriptedEngine({ cwd: '/home' }).define(
      'broken',
      () => {
        throw new Error('division by zero');
      },
      { directory: '/scripts' },
    );

    const err = await invokeStandard(engine, {
      descriptor: descriptor('broken', 1, '/scripts', []),
      args: [],
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(EngineInvocationError);
    expect(err).toHaveProperty('message', 'Error in broken: division by zero');
    expect(engine.workingDirectory).toBe('/home');
  });

  it('returns the empty vector for nargout 0', async () => {
    let called = 0;
    const engine = new ScriptedEngine().define('tick', () => {
      called++;
      return [];
    });
    const result = await invokeStandard(engine, { descriptor: descriptor('tick', 0, null, []), args: [] });

    expect(result).toEqual([]);
    expect(called).toBe(1);
    expect(engine.calls).toEqual([{ name: 'tick', args: [], nargout: 0 }]);
  });
});
