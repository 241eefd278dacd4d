import AdmZip from 'adm-zip';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, posix } from 'node:path';

import { normalizeScriptExtension } from './contractTypes.js';
import { LinkingError, detailMessage } from '../errors.js';
import { logDebug } from '../dx/logger.js';
import { warn } from '../dx/warnings.js';

export type ExtractedScript = {
  /** Extracted file on disk */
  file: string;
  /** Private directory holding only that file */
  directory: string;
  functionName: string;
};

const extracted = new Set<string>();
let exitHookInstalled = false;

function installExitHook() {
  if (exitHookInstalled) return;
  exitHookInstalled = true;
  process.once('exit', () => {
    cleanupExtractedScripts();
  });
}

/** Normalised archive entry path: forward slashes, no leading `./` or `/`. */
export function archiveEntryPath(relativePath: string, base?: string): string {
  const joined = posix.join(base ?? '', relativePath.replace(/\\/g, '/'));
  return posix.normalize(joined).replace(/^(\.\/)+/, '').replace(/^\/+/, '');
}

/**
 * Copies a script out of a zip archive into a fresh private temp directory.
 *
 * Every failure is a LinkingError: a script that cannot be extracted can
 * never be called.
 */
export function extractScript(
  key: string,
  archive: string,
  entryPath: string,
  opts: { extension: string; tempDir?: string },
): ExtractedScript {
  const context = { function: key, path: entryPath, 'archive location': archive };
  const extension = normalizeScriptExtension(opts.extension);

  let zip: AdmZip;
  try {
    zip = new AdmZip(archive);
  } catch (err) {
    throw new LinkingError(detailMessage('Unable to open archive', context), { cause: err });
  }

  const entry = zip.getEntry(entryPath);
  if (!entry || entry.isDirectory) {
    throw new LinkingError(detailMessage('Unable to find script inside of archive', context));
  }

  if (!entry.entryName.endsWith(extension)) {
    throw new LinkingError(detailMessage(`Specified script does not end in ${extension}`, context));
  }

  const functionName = posix.basename(entry.entryName, extension);

  let directory: string | undefined;
  try {
    directory = mkdtempSync(join(opts.tempDir ?? tmpdir(), 'scriptlink-'));
    extracted.add(directory);
    installExitHook();

    const file = join(directory, functionName + extension);
    writeFileSync(file, entry.getData(), { flag: 'wx' });
    logDebug('extracted script', { key, entry: entryPath, file });
    return { file, directory, functionName };
  } catch (err) {
    if (directory) removeExtracted([directory]);
    throw new LinkingError(
      detailMessage('Unable to extract script from archive', {
        ...context,
        'generated path': directory,
      }),
      { cause: err },
    );
  }
}

/** Removes the given extraction directories now. Never throws. */
export function removeExtracted(directories: Iterable<string>) {
  for (const dir of directories) {
    try {
      rmSync(dir, { recursive: true, force: true });
    } catch (err) {
      warn({
        code: 'CLEANUP_FAILED',
        message: `could not remove extracted script directory ${dir}: ${String(err)}`,
      });
    }
    extracted.delete(dir);
  }
}

/** Removes every script extracted by this process. Runs at process exit. */
export function cleanupExtractedScripts() {
  removeExtracted([...extracted]);
}

export function extractedDirectories(): readonly string[] {
  return [...extracted];
}
