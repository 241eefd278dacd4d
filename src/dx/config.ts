import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { normalizeScriptExtension } from '../contract/contractTypes.js';
import { logDebug, setDebugEnabled } from './logger.js';
import { warn } from './warnings.js';

export type ScriptlinkRuntimeConfig = {
  /** Enable debug logs without env var */
  debug?: boolean;
  /** Extension of script files named by path (default `.m`) */
  scriptExtension?: string;
  /** Prefix of generated argument variables (default `args_`) */
  argumentPrefix?: string;
  /** Prefix of generated return variables (default `return_`) */
  returnPrefix?: string;
  /** Parent directory for scripts extracted from archives (default: OS temp dir) */
  tempDir?: string;
};

const KNOWN_KEYS: ReadonlySet<string> = new Set([
  'debug',
  'scriptExtension',
  'argumentPrefix',
  'returnPrefix',
  'tempDir',
]);

let cached:
  | { loaded: true; config: ScriptlinkRuntimeConfig | null }
  | { loaded: false } = { loaded: false };

function configPath(projectRoot: string) {
  return join(projectRoot, 'scriptlink.config.js');
}

function pickString(raw: Record<string, unknown>, key: string): string | undefined {
  const v = raw[key];
  if (v === undefined) return undefined;
  if (typeof v !== 'string' || v.length === 0) {
    warn({ code: 'CONFIG_IGNORED', message: `${key} must be a non-empty string` });
    return undefined;
  }
  return v;
}

export function normalizeConfig(raw: unknown): ScriptlinkRuntimeConfig {
  if (typeof raw !== 'object' || raw === null) return {};
  const record: Record<string, unknown> = { ...raw };

  for (const key of Object.keys(record)) {
    if (!KNOWN_KEYS.has(key)) {
      warn({ code: 'CONFIG_IGNORED', message: `unknown config key: ${key}` });
    }
  }

  const cfg: ScriptlinkRuntimeConfig = {};
  if (typeof record.debug === 'boolean') cfg.debug = record.debug;
  const ext = pickString(record, 'scriptExtension');
  if (ext === '.') warn({ code: 'CONFIG_IGNORED', message: 'scriptExtension must name a file extension' });
  else if (ext) cfg.scriptExtension = normalizeScriptExtension(ext);
  const argumentPrefix = pickString(record, 'argumentPrefix');
  if (argumentPrefix) cfg.argumentPrefix = argumentPrefix;
  const returnPrefix = pickString(record, 'returnPrefix');
  if (returnPrefix) cfg.returnPrefix = returnPrefix;
  const tempDir = pickString(record, 'tempDir');
  if (tempDir) cfg.tempDir = tempDir;
  return cfg;
}

/**
 * Loads optional `scriptlink.config.js` from the project root.
 *
 * - Optional: if missing, returns null
 * - Cached: reads at most once per process
 */
export async function loadOptionalConfig(
  projectRoot: string = process.cwd(),
): Promise<ScriptlinkRuntimeConfig | null> {
  if (cached.loaded) return cached.config;

  const p = configPath(projectRoot);
  if (!existsSync(p)) {
    cached = { loaded: true, config: null };
    return null;
  }

  // Dynamic import so there is zero cost when config isn't present.
  const url = pathToFileURL(resolve(p)).href;
  const mod: unknown = await import(url);
  const exported =
    typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : mod;
  const cfg = normalizeConfig(exported);
  if (cfg.debug) setDebugEnabled(true);
  cached = { loaded: true, config: cfg };
  logDebug('loaded config', { path: p });
  return cached.config;
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cached = { loaded: false };
}
