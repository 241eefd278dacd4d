import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { EngineInvocationError, IncompatibleReturnError, LinkingError } from '../errors.js';
import { PointType } from '../testing/pointType.js';
import { t } from '../types/typeTags.js';
import { parseManifest, parseTypeName, readManifest } from './manifest.js';

describe('parseTypeName', () => {
  it('parses simple, primitive and typed-array names', () => {
    expect(parseTypeName('string')).toBe(t.string);
    expect(parseTypeName('list')).toBe(t.list);
    expect(parseTypeName('int16')).toBe(t.int16);
    expect(parseTypeName('Float32Array')).toEqual(t.typedArray('Float32Array'));
    expect(parseTypeName('RemoteVariable')).toBe(t.remoteVariable);
  });

  it('parses arrays and tuples', () => {
    expect(parseTypeName('string[]')).toEqual(t.arrayOf(t.string));
    expect(parseTypeName('(double[])[]')).toEqual(t.arrayOf(t.arrayOf(t.double)));
    expect(parseTypeName('tuple<3>')).toEqual(t.tuple(3));
  });

  it('parses bridged types it was given', () => {
    const bridged = new Map([[PointType.typeName, PointType]]);
    expect(parseTypeName('Point', bridged)).toEqual(t.bridged(PointType));
    expect(() => parseTypeName('Point')).toThrow(new LinkingError('Unknown type name: Point'));
  });
});

describe('parseManifest', () => {
  it('builds contracts with defaults for throws and parameters', () => {
    const { table, origin } = parseManifest(
      {
        functions: {
          area: { name: 'area', nargout: 1, returns: 'double', parameters: ['double', 'double'] },
          reset: { relativePath: 'reset.m', nargout: 0 },
          info: {
            name: 'info',
            nargout: 2,
            returns: 'tuple<2>',
            returnTypes: ['string', 'number'],
            throws: ['EngineInvocationError', 'IncompatibleReturnError'],
          },
        },
      },
      '/project',
    );

    expect(origin).toEqual({ kind: 'directory', directory: '/project' });
    expect(table.area).toEqual({
      name: 'area',
      nargout: 1,
      returns: t.double,
      parameters: [t.double, t.double],
      throws: [EngineInvocationError],
    });
    expect(table.reset).toEqual({
      relativePath: 'reset.m',
      nargout: 0,
      returns: t.void,
      parameters: [],
      throws: [EngineInvocationError],
    });
    expect(table.info.returnTypes).toEqual([t.string, t.number]);
    expect(table.info.throws).toEqual([EngineInvocationError, IncompatibleReturnError]);
  });

  it('uses an archive origin when the manifest names one', () => {
    const { origin } = parseManifest({ archive: 'bundle.zip', base: 'scripts', functions: {} }, '/project');
    expect(origin).toEqual({ kind: 'archive', archive: '/project/bundle.zip', base: 'scripts' });
  });

  it('names the function in type errors', () => {
    expect(() => parseManifest({ functions: { f: { name: 'f', nargout: 1, returns: 'float' } } }, '/p')).toThrow(
      'f: Unknown type name: float',
    );
    expect(() => parseManifest({ functions: { f: { name: 'f', nargout: '1' } } }, '/p')).toThrow(
      'f: nargout must be a number',
    );
    expect(() =>
      parseManifest({ functions: { f: { name: 'f', nargout: 0, throws: ['Oops'] } } }, '/p'),
    ).toThrow('f: unknown error class: Oops');
  });

  it('rejects a manifest without functions', () => {
    expect(() => parseManifest([], '/p')).toThrow('Manifest must be an object with a "functions" object');
  });
});

describe('readManifest', () => {
  it('resolves relative scripts against the manifest directory', () => {
    const dir = mkdtempSync(join(tmpdir(), 'scriptlink-manifest-'));
    const file = join(dir, 'scriptlink.json');
    writeFileSync(file, JSON.stringify({ functions: { area: { name: 'area', nargout: 1, returns: 'double' } } }));

    const { table, origin } = readManifest(file);
    expect(origin).toEqual({ kind: 'directory', directory: dir });
    expect(Object.keys(table)).toEqual(['area']);
  });

  it('reports unreadable and malformed files as linking errors', () => {
    const dir = mkdtempSync(join(tmpdir(), 'scriptlink-manifest-'));
    expect(() => readManifest(join(dir, 'missing.json'))).toThrow(LinkingError);

    const file = join(dir, 'broken.json');
    writeFileSync(file, '{ "functions": ');
    const err = (() => {
      try {
        readManifest(file);
      } catch (e) {
        return e;
      }
    })();
    expect(err).toBeInstanceOf(LinkingError);
    expect(err).toHaveProperty('message', expect.stringMatching(/^Manifest is not valid JSON\npath: /));
  });
});
