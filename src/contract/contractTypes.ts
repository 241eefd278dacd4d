import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

import { LinkingError, type ErrorClass } from '../errors.js';
import type { TypeTag } from '../types/typeTags.js';

/**
 * One declared remote call.
 *
 * Exactly one of `name`, `absolutePath` and `relativePath` locates the
 * function. A bare name is looked up on the engine's search path; a path
 * names a script file whose directory becomes the working directory for the
 * duration of each call.
 */
export type FunctionContract = {
  readonly name?: string;
  readonly absolutePath?: string;
  /** Relative to the table's origin (a directory or a zip archive). */
  readonly relativePath?: string;
  /** Number of values the remote function returns. */
  readonly nargout: number;
  /** Declared result shape. */
  readonly returns: TypeTag;
  /** Per-position return types; only with `t.list` or a tuple result. */
  readonly returnTypes?: readonly TypeTag[];
  readonly parameters: readonly TypeTag[];
  /** Failure modes the caller accepts. Must include `EngineInvocationError`. */
  readonly throws: readonly ErrorClass[];
};

export type ContractTable = { readonly [key: string]: FunctionContract };

/** Where relative script paths of a contract table resolve. */
export type ContractOrigin =
  | { readonly kind: 'directory'; readonly directory: string }
  | { readonly kind: 'archive'; readonly archive: string; readonly base?: string };

export function directoryOrigin(directory: string): ContractOrigin {
  return { kind: 'directory', directory };
}

/** The directory of a module, from its `import.meta.url`. */
export function moduleOrigin(importMetaUrl: string): ContractOrigin {
  return directoryOrigin(dirname(fileURLToPath(importMetaUrl)));
}

/** Scripts packaged inside a zip archive, optionally below `base`. */
export function archiveOrigin(archive: string, base?: string): ContractOrigin {
  return base === undefined ? { kind: 'archive', archive } : { kind: 'archive', archive, base };
}

/** Identity helper that keeps the literal tag types of a table for `link()`. */
export function defineContracts<const T extends ContractTable>(table: T): T {
  return table;
}

/** `m` and `.m` both mean `.m`. */
export function normalizeScriptExtension(extension: string): string {
  const dotted = extension.startsWith('.') ? extension : `.${extension}`;
  if (dotted === '.') {
    throw new LinkingError(`Script extension must name a file extension, got ${JSON.stringify(extension)}`);
  }
  return dotted;
}
