import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

import {
  archiveOrigin,
  directoryOrigin,
  type ContractOrigin,
  type ContractTable,
  type FunctionContract,
} from './contractTypes.js';
import type { BridgedType } from '../bridged/bridgedTypes.js';
import {
  ArgumentError,
  CleanupError,
  EngineInvocationError,
  IncompatibleReturnError,
  LinkingError,
  detailMessage,
  errorMessage,
  type ErrorClass,
} from '../errors.js';
import { t, TYPED_ARRAYS, type PrimitiveName, type TypeTag, type TypedArrayName } from '../types/typeTags.js';

export type ManifestOptions = {
  /** Bridged types the manifest may name, by type name. */
  bridgedTypes?: readonly BridgedType[];
};

export type Manifest = {
  table: ContractTable;
  origin: ContractOrigin;
};

const SIMPLE_TAGS: Readonly<Record<string, TypeTag>> = {
  void: t.void,
  any: t.any,
  string: t.string,
  number: t.number,
  boolean: t.boolean,
  bigint: t.bigint,
  list: t.list,
  RemoteVariable: t.remoteVariable,
};

const PRIMITIVE_TAGS: Readonly<Record<PrimitiveName, TypeTag>> = {
  double: t.double,
  single: t.single,
  int8: t.int8,
  int16: t.int16,
  int32: t.int32,
  uint8: t.uint8,
  uint16: t.uint16,
  uint32: t.uint32,
  int64: t.int64,
  uint64: t.uint64,
  logical: t.logical,
};

const ERROR_CLASSES: Readonly<Record<string, ErrorClass>> = {
  EngineInvocationError,
  IncompatibleReturnError,
  ArgumentError,
  CleanupError,
  LinkingError,
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isPrimitiveName(name: string): name is PrimitiveName {
  return Object.hasOwn(PRIMITIVE_TAGS, name);
}

function isTypedArrayName(name: string): name is TypedArrayName {
  return Object.hasOwn(TYPED_ARRAYS, name);
}

/**
 * Parses a manifest type name: `double`, `Float64Array`, `string[]`,
 * `(double[])[]`, `tuple<2>`, `RemoteVariable`, a bridged type name.
 */
export function parseTypeName(name: string, bridged: ReadonlyMap<string, BridgedType> = new Map()): TypeTag {
  const trimmed = name.trim();

  if (Object.hasOwn(SIMPLE_TAGS, trimmed)) return SIMPLE_TAGS[trimmed];
  if (isPrimitiveName(trimmed)) return PRIMITIVE_TAGS[trimmed];
  if (isTypedArrayName(trimmed)) return t.typedArray(trimmed);

  const tuple = /^tuple<(\d+)>$/.exec(trimmed);
  if (tuple) return t.tuple(Number(tuple[1]));

  if (trimmed.endsWith('[]')) {
    let inner = trimmed.slice(0, -2).trim();
    if (inner.startsWith('(') && inner.endsWith(')')) inner = inner.slice(1, -1);
    return t.arrayOf(parseTypeName(inner, bridged));
  }

  const type = bridged.get(trimmed);
  if (type) return t.bridged(type);

  throw new LinkingError(`Unknown type name: ${name}`);
}

function stringField(key: string, raw: Record<string, unknown>, field: string): string | undefined {
  const v = raw[field];
  if (v === undefined) return undefined;
  if (typeof v !== 'string') {
    throw new LinkingError(`${key}: ${field} must be a string`);
  }
  return v;
}

function stringList(key: string, raw: Record<string, unknown>, field: string): string[] | undefined {
  const v = raw[field];
  if (v === undefined) return undefined;
  if (!Array.isArray(v) || !v.every((e): e is string => typeof e === 'string')) {
    throw new LinkingError(`${key}: ${field} must be a list of strings`);
  }
  return v;
}

function parseContract(
  key: string,
  raw: unknown,
  bridged: ReadonlyMap<string, BridgedType>,
): FunctionContract {
  if (!isRecord(raw)) throw new LinkingError(`${key}: contract must be an object`);

  const { nargout } = raw;
  if (typeof nargout !== 'number') throw new LinkingError(`${key}: nargout must be a number`);

  const parseTag = (n: string) => {
    try {
      return parseTypeName(n, bridged);
    } catch (err) {
      throw new LinkingError(`${key}: ${errorMessage(err)}`, { cause: err });
    }
  };

  const returns = parseTag(stringField(key, raw, 'returns') ?? 'void');
  const returnTypes = stringList(key, raw, 'returnTypes')?.map(parseTag);
  const parameters = (stringList(key, raw, 'parameters') ?? []).map(parseTag);
  const throws = (stringList(key, raw, 'throws') ?? ['EngineInvocationError']).map((n) => {
    if (!Object.hasOwn(ERROR_CLASSES, n)) throw new LinkingError(`${key}: unknown error class: ${n}`);
    return ERROR_CLASSES[n];
  });

  const name = stringField(key, raw, 'name');
  const absolutePath = stringField(key, raw, 'absolutePath');
  const relativePath = stringField(key, raw, 'relativePath');

  return {
    ...(name !== undefined ? { name } : {}),
    ...(absolutePath !== undefined ? { absolutePath } : {}),
    ...(relativePath !== undefined ? { relativePath } : {}),
    nargout,
    returns,
    ...(returnTypes ? { returnTypes } : {}),
    parameters,
    throws,
  };
}

/** Builds a contract table from already-parsed manifest JSON. */
export function parseManifest(
  json: unknown,
  manifestDir: string,
  opts: ManifestOptions = {},
): Manifest {
  if (!isRecord(json) || !isRecord(json.functions)) {
    throw new LinkingError('Manifest must be an object with a "functions" object');
  }

  const bridged = new Map((opts.bridgedTypes ?? []).map((b) => [b.typeName, b] as const));

  const table: Record<string, FunctionContract> = {};
  for (const [key, raw] of Object.entries(json.functions)) {
    table[key] = parseContract(key, raw, bridged);
  }

  let origin = directoryOrigin(manifestDir);
  if (json.archive !== undefined) {
    if (typeof json.archive !== 'string') throw new LinkingError('Manifest "archive" must be a string');
    const base = json.base;
    if (base !== undefined && typeof base !== 'string') {
      throw new LinkingError('Manifest "base" must be a string');
    }
    origin = archiveOrigin(resolve(manifestDir, json.archive), base);
  }

  return { table, origin };
}

/**
 * Reads a `scriptlink.json` manifest.
 *
 * Relative script paths resolve against the manifest's directory, or inside
 * the archive the manifest names.
 */
export function readManifest(path: string, opts: ManifestOptions = {}): Manifest {
  const file = resolve(path);

  let text: string;
  try {
    text = readFileSync(file, 'utf8');
  } catch (err) {
    throw new LinkingError(detailMessage('Unable to read manifest', { path: file }), { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new LinkingError(
      detailMessage('Manifest is not valid JSON', { path: file, reason: errorMessage(err) }),
      { cause: err },
    );
  }

  return parseManifest(json, dirname(file), opts);
}
