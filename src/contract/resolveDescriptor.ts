import { existsSync, realpathSync, statSync } from 'node:fs';
import { basename, dirname, isAbsolute, resolve } from 'node:path';

import {
  normalizeScriptExtension,
  type ContractOrigin,
  type ContractTable,
  type FunctionContract,
} from './contractTypes.js';
import { createDescriptor, type BindingDescriptor } from './descriptor.js';
import { archiveEntryPath, extractScript, removeExtracted } from './extractScript.js';
import { resolveReturnTypes, validateContract } from './validateContract.js';
import { LinkingError, detailMessage } from '../errors.js';
import { traceDebug } from '../dx/trace.js';

export const DEFAULT_SCRIPT_EXTENSION = '.m';

export type ResolveOptions = {
  /** Where relative paths resolve. Default: the current working directory. */
  origin?: ContractOrigin;
  /** Script file extension, with or without its dot. Default `.m`. */
  scriptExtension?: string;
  /** Parent directory for scripts extracted from archives. */
  tempDir?: string;
};

type Location = { name: string; containingDirectory: string | null };

/** Validates that `file` is an existing regular script file and splits it into name + directory. */
function locateFile(key: string, path: string, file: string, extension: string): Location {
  if (!existsSync(file)) {
    throw new LinkingError(
      detailMessage('Specified script does not exist', { function: key, path, 'resolved as': file }),
    );
  }

  let canonical: string;
  try {
    canonical = realpathSync(file);
  } catch (err) {
    throw new LinkingError(
      detailMessage('Unable to resolve canonical path of specified function', {
        function: key,
        path,
        'non-canonical path': file,
      }),
      { cause: err },
    );
  }

  if (!statSync(canonical).isFile()) {
    throw new LinkingError(
      detailMessage('Specified script is not a file', { function: key, path, 'resolved as': canonical }),
    );
  }
  if (!canonical.endsWith(extension)) {
    throw new LinkingError(
      detailMessage(`Specified script does not end in ${extension}`, {
        function: key,
        path,
        'resolved as': canonical,
      }),
    );
  }

  return {
    name: basename(canonical, extension),
    containingDirectory: dirname(canonical),
  };
}

function locate(
  key: string,
  c: FunctionContract,
  opts: Required<Pick<ResolveOptions, 'origin' | 'scriptExtension'>> & ResolveOptions,
  extractedDirs: string[],
): Location {
  if (c.name) return { name: c.name, containingDirectory: null };

  const extension = opts.scriptExtension;

  if (c.absolutePath) {
    if (!isAbsolute(c.absolutePath)) {
      throw new LinkingError(
        detailMessage('Specified absolute path is not absolute', { function: key, path: c.absolutePath }),
      );
    }
    return locateFile(key, c.absolutePath, resolve(c.absolutePath), extension);
  }

  const relativePath = c.relativePath ?? '';
  const origin = opts.origin;

  if (origin.kind === 'archive') {
    const entry = archiveEntryPath(relativePath, origin.base);
    const script = extractScript(key, origin.archive, entry, {
      extension,
      tempDir: opts.tempDir,
    });
    extractedDirs.push(script.directory);
    return locateFile(key, relativePath, script.file, extension);
  }

  return locateFile(key, relativePath, resolve(origin.directory, relativePath), extension);
}

export function resolveDescriptor(
  key: string,
  c: FunctionContract,
  opts: ResolveOptions = {},
  extractedDirs: string[] = [],
): BindingDescriptor {
  validateContract(key, c);

  const { name, containingDirectory } = locate(
    key,
    c,
    {
      ...opts,
      origin: opts.origin ?? { kind: 'directory', directory: process.cwd() },
      scriptExtension: normalizeScriptExtension(opts.scriptExtension ?? DEFAULT_SCRIPT_EXTENSION),
    },
    extractedDirs,
  );

  return createDescriptor({
    key,
    name,
    containingDirectory,
    nargout: c.nargout,
    returnTypes: resolveReturnTypes(key, c),
    parameterTypes: c.parameters,
    resultShape: c.returns,
  });
}

/**
 * Validates and resolves every contract of a table.
 *
 * All or nothing: the first invalid contract aborts the whole table, and
 * scripts already extracted for it are removed again.
 */
export function resolveContracts(
  table: ContractTable,
  opts: ResolveOptions = {},
): ReadonlyMap<string, BindingDescriptor> {
  const descriptors = new Map<string, BindingDescriptor>();
  const extractedDirs: string[] = [];

  try {
    for (const [key, contract] of Object.entries(table)) {
      const d = resolveDescriptor(key, contract, opts, extractedDirs);
      descriptors.set(key, d);
      traceDebug('link.resolved', {
        key,
        name: d.name,
        containingDirectory: d.containingDirectory,
        nargout: d.nargout,
        usesBridgedTypes: d.usesBridgedTypes,
      });
    }
  } catch (err) {
    removeExtracted(extractedDirs);
    throw err;
  }

  return descriptors;
}
