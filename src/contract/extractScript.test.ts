import { describe, it, expect } from 'vitest';
import AdmZip from 'adm-zip';
import { existsSync, mkdtempSync, readFileSync, readdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';

import { EngineInvocationError, LinkingError } from '../errors.js';
import { t } from '../types/typeTags.js';
import { archiveOrigin } from './contractTypes.js';
import {
  archiveEntryPath,
  cleanupExtractedScripts,
  extractScript,
  extractedDirectories,
} from './extractScript.js';
import { resolveContracts } from './resolveDescriptor.js';

const AREA_SOURCE = 'function a = area(w, h)\n  a = w * h;\nend\n';

function buildArchive() {
  const dir = mkdtempSync(join(tmpdir(), 'scriptlink-zip-'));
  const zip = new AdmZip();
  zip.addFile('scripts/area.m', Buffer.from(AREA_SOURCE, 'utf8'));
  zip.addFile('scripts/readme.txt', Buffer.from('docs\n', 'utf8'));
  const archive = join(dir, 'bundle.zip');
  zip.writeZip(archive);
  const tempDir = mkdtempSync(join(tmpdir(), 'scriptlink-extract-'));
  return { archive, tempDir };
}

function messageOf(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof LinkingError) return err.message;
    throw err;
  }
  throw new Error('no LinkingError thrown');
}

describe('archiveEntryPath', () => {
  it('joins the base and normalises separators', () => {
    expect(archiveEntryPath('./area.m', 'scripts')).toBe('scripts/area.m');
    expect(archiveEntryPath('sub\\area.m')).toBe('sub/area.m');
    expect(archiveEntryPath('/area.m')).toBe('area.m');
  });
});

describe('extractScript', () => {
  it('copies the entry into a private temp directory', () => {
    const { archive, tempDir } = buildArchive();
    const script = extractScript('area', archive, 'scripts/area.m', { extension: '.m', tempDir });

    expect(script.functionName).toBe('area');
    expect(basename(script.file)).toBe('area.m');
    expect(basename(script.directory).startsWith('scriptlink-')).toBe(true);
    expect(readdirSync(tempDir)).toEqual([basename(script.directory)]);
    expect(readFileSync(script.file, 'utf8')).toBe(AREA_SOURCE);
    expect(extractedDirectories()).toContain(script.directory);

    cleanupExtractedScripts();
    expect(existsSync(script.directory)).toBe(false);
    expect(extractedDirectories()).not.toContain(script.directory);
  });

  it('accepts an extension without its dot', () => {
    const { archive, tempDir } = buildArchive();
    const script = extractScript('area', archive, 'scripts/area.m', { extension: 'm', tempDir });

    expect(script.functionName).toBe('area');
    expect(basename(script.file)).toBe('area.m');
    cleanupExtractedScripts();
  });

  it('fails for a missing entry', () => {
    const { archive, tempDir } = buildArchive();
    expect(messageOf(() => extractScript('f', archive, 'scripts/gone.m', { extension: '.m', tempDir }))).toBe(
      `Unable to find script inside of archive\nfunction: f\npath: scripts/gone.m\narchive location: ${archive}`,
    );
  });

  it('fails for an entry with the wrong extension', () => {
    const { archive, tempDir } = buildArchive();
    const message = messageOf(() => extractScript('f', archive, 'scripts/readme.txt', { extension: '.m', tempDir }));
    expect(message.split('\n')[0]).toBe('Specified script does not end in .m');
    expect(readdirSync(tempDir)).toEqual([]);
  });

  it('fails for an archive that cannot be opened', () => {
    const { tempDir } = buildArchive();
    const missing = join(tempDir, 'nothing.zip');
    expect(messageOf(() => extractScript('f', missing, 'area.m', { extension: '.m', tempDir })).split('\n')[0]).toBe(
      'Unable to open archive',
    );
  });
});

describe('linking against an archive', () => {
  it('resolves scripts below the archive base', () => {
    const { archive, tempDir } = buildArchive();
    const descriptors = resolveContracts(
      {
        area: {
          relativePath: 'area.m',
          nargout: 1,
          returns: t.double,
          parameters: [t.double, t.double],
          throws: [EngineInvocationError],
        },
      },
      { origin: archiveOrigin(archive, 'scripts'), tempDir },
    );

    const d = descriptors.get('area');
    expect(d?.name).toBe('area');
    expect(basename(d?.containingDirectory ?? '').startsWith('scriptlink-')).toBe(true);
    cleanupExtractedScripts();
  });

  it('removes extracted scripts again when the table fails to link', () => {
    const { archive, tempDir } = buildArchive();
    expect(() =>
      resolveContracts(
        {
          area: {
            relativePath: 'area.m',
            nargout: 1,
            returns: t.double,
            parameters: [],
            throws: [EngineInvocationError],
          },
          broken: { name: 'broken', nargout: 1, returns: t.void, parameters: [], throws: [EngineInvocationError] },
        },
        { origin: archiveOrigin(archive, 'scripts'), tempDir },
      ),
    ).toThrow(LinkingError);
    expect(readdirSync(tempDir)).toEqual([]);
  });
});
