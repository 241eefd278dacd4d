import type { BridgedType } from './bridged/bridgedTypes.js';
import type { BindingDescriptor } from './contract/descriptor.js';
import { readManifest } from './contract/manifest.js';
import { removeExtracted } from './contract/extractScript.js';
import { resolveDescriptor, type ResolveOptions } from './contract/resolveDescriptor.js';
import { errorMessage } from './errors.js';
import { formatDescriptorSignature } from './dx/trace.js';

export type CheckResult =
  | { key: string; ok: true; descriptor: BindingDescriptor }
  | { key: string; ok: false; error: string };

/**
 * Runs link-time validation and resolution for every function of a
 * manifest, without an engine.
 *
 * Unlike `link()`, each function is checked on its own so that one report
 * lists every problem. Scripts extracted along the way are removed again.
 */
export function checkManifest(
  manifestPath: string,
  opts: Omit<ResolveOptions, 'origin'> & { bridgedTypes?: readonly BridgedType[] } = {},
): CheckResult[] {
  const { table, origin } = readManifest(manifestPath, { bridgedTypes: opts.bridgedTypes });

  const extracted: string[] = [];
  try {
    return Object.entries(table).map(([key, contract]): CheckResult => {
      try {
        const descriptor = resolveDescriptor(
          key,
          contract,
          { origin, scriptExtension: opts.scriptExtension, tempDir: opts.tempDir },
          extracted,
        );
        return { key, ok: true, descriptor };
      } catch (err) {
        return { key, ok: false, error: errorMessage(err) };
      }
    });
  } finally {
    removeExtracted(extracted);
  }
}

function fmtOk(msg: string) {
  return `✓ ${msg}`;
}

function fmtFail(msg: string) {
  return `✗ ${msg}`;
}

export function formatCheckResults(results: readonly CheckResult[]): string {
  if (!results.length) return 'No functions declared';

  const width = Math.max(...results.map((r) => r.key.length));
  return results
    .map((r) => {
      const key = r.key.padEnd(width);
      if (!r.ok) {
        const [first, ...rest] = r.error.split('\n');
        return [fmtFail(`${key}  ${first}`), ...rest.map((l) => `    ${l}`)].join('\n');
      }
      const where = r.descriptor.containingDirectory ?? '(search path)';
      return fmtOk(`${key}  ${formatDescriptorSignature(r.descriptor)}  ${where}`);
    })
    .join('\n');
}

export function checkResultsToJson(results: readonly CheckResult[]) {
  return results.map((r) =>
    r.ok
      ? {
          key: r.key,
          ok: true,
          name: r.descriptor.name,
          containingDirectory: r.descriptor.containingDirectory,
          nargout: r.descriptor.nargout,
          signature: formatDescriptorSignature(r.descriptor),
        }
      : { key: r.key, ok: false, error: r.error },
  );
}

/** What `scriptlink check --json` prints. */
export function formatCheckResultsJson(results: readonly CheckResult[]): string {
  return JSON.stringify(checkResultsToJson(results), null, 2);
}
