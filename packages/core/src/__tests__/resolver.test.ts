import { describe, it, expect } from 'vitest';
import { VersionFolderResolver, ResolveVersionFolders } from '../scripts/resolver';
import { AmbiguousVersionError, MalformedVersionError, ScriptReadError } from '../core/errors';
import { MemoryFileSystem } from './memory-file-system';
import type { MemoryTree } from './memory-file-system';

const ROOT = '/migrations';

// ─── Test Helpers ────────────────────────────────────────────────────

function makeResolver(tree: MemoryTree): { resolver: VersionFolderResolver; fs: MemoryFileSystem } {
  const fs = new MemoryFileSystem(ROOT, tree);
  return { resolver: new VersionFolderResolver(fs), fs };
}

function names(scripts: { Name: string }[]): string[] {
  return scripts.map((s) => s.Name);
}

// ─── Without Target Version ──────────────────────────────────────────

describe('VersionFolderResolver — no target version', () => {
  it('loads scripts from every folder', async () => {
    const { resolver } = makeResolver({
      '1.0': { 'script1.sql': 'CREATE TABLE A (ID INT);' },
      '2.0': { 'script1.sql': 'CREATE TABLE B (ID INT);' },
    });

    const scripts = await resolver.Resolve({ RootPath: ROOT });

    expect(scripts).toEqual([
      { Name: '1.0/script1.sql', Contents: 'CREATE TABLE A (ID INT);' },
      { Name: '2.0/script1.sql', Contents: 'CREATE TABLE B (ID INT);' },
    ]);
  });

  it('does not parse folder names', async () => {
    const { resolver } = makeResolver({
      drafts: { 'wip.sql': 'SELECT 1' },
      '1.0': { 'a.sql': 'SELECT 2' },
      '01.0': { 'b.sql': 'SELECT 3' },
    });

    const scripts = await resolver.Resolve({ RootPath: ROOT });

    expect(names(scripts)).toEqual(['drafts/wip.sql', '1.0/a.sql', '01.0/b.sql']);
  });

  it('treats an empty target version as no target version', async () => {
    const { resolver } = makeResolver({
      'not-a-version': { 'a.sql': 'SELECT 1' },
    });

    const scripts = await resolver.Resolve({ RootPath: ROOT, TargetVersion: '' });

    expect(names(scripts)).toEqual(['not-a-version/a.sql']);
  });

  it('keeps folder then file enumeration order', async () => {
    const { resolver } = makeResolver({
      '2.0': { 'b.sql': '', 'a.sql': '' },
      '1.0': { 'z.sql': '' },
    });

    const scripts = await resolver.Resolve({ RootPath: ROOT });

    expect(names(scripts)).toEqual(['2.0/b.sql', '2.0/a.sql', '1.0/z.sql']);
  });

  it('only picks up .sql files', async () => {
    const { resolver } = makeResolver({
      '1.0': { 'a.sql': 'SELECT 1', 'README.md': '# notes', 'b.sql.bak': 'SELECT 2' },
    });

    const scripts = await resolver.Resolve({ RootPath: ROOT });

    expect(names(scripts)).toEqual(['1.0/a.sql']);
  });

  it('applies the filter to folder/file names but not to folder names', async () => {
    const { resolver } = makeResolver({
      '1.0': { 'a.sql': '', 'b.sql': '' },
      '2.0': { 'a.sql': '' },
    });

    const scripts = await resolver.Resolve({
      RootPath: ROOT,
      // '1.0' and '2.0' themselves would fail this predicate
      Filter: (name) => name.endsWith('/a.sql'),
    });

    expect(names(scripts)).toEqual(['1.0/a.sql', '2.0/a.sql']);
  });

  it('returns an empty list for a root without folders', async () => {
    const { resolver } = makeResolver({});

    expect(await resolver.Resolve({ RootPath: ROOT })).toEqual([]);
  });
});

// ─── With Target Version ─────────────────────────────────────────────

describe('VersionFolderResolver — target version', () => {
  it('excludes folders above the target version', async () => {
    const { resolver, fs } = makeResolver({
      '1.0': { 'a.sql': 'SELECT 1' },
      '1.5': { 'b.sql': 'SELECT 2' },
      '3.0': { 'c.sql': 'SELECT 3' },
    });

    const scripts = await resolver.Resolve({ RootPath: ROOT, TargetVersion: '2.0' });

    expect(names(scripts)).toEqual(['1.0/a.sql', '1.5/b.sql']);
    expect(fs.Reads).toEqual(['/migrations/1.0/a.sql', '/migrations/1.5/b.sql']);
  });

  it('includes a folder equal to the target version', async () => {
    const { resolver } = makeResolver({
      '2.0': { 'a.sql': '' },
      '2.0.0.1': { 'b.sql': '' },
    });

    const scripts = await resolver.Resolve({ RootPath: ROOT, TargetVersion: '2' });

    expect(names(scripts)).toEqual(['2.0/a.sql']);
  });

  it('compares versions numerically', async () => {
    const { resolver } = makeResolver({
      '1.9': { 'a.sql': '' },
      '1.10': { 'b.sql': '' },
    });

    const scripts = await resolver.Resolve({ RootPath: ROOT, TargetVersion: '1.9' });

    expect(names(scripts)).toEqual(['1.9/a.sql']);
  });

  it('accepts descriptive folder names with a version prefix', async () => {
    const { resolver } = makeResolver({
      '1.0 initial schema': { 'a.sql': '' },
      '1_1-hotfix': { 'b.sql': '' },
    });

    const scripts = await resolver.Resolve({ RootPath: ROOT, TargetVersion: '1.1' });

    expect(names(scripts)).toEqual(['1.0 initial schema/a.sql', '1_1-hotfix/b.sql']);
  });

  it('fails when two accepted folders parse to the same version', async () => {
    const { resolver } = makeResolver({
      '1.0': { 'a.sql': '' },
      '01.0': { 'b.sql': '' },
    });

    const error = await resolver.Resolve({ RootPath: ROOT, TargetVersion: '2.0' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AmbiguousVersionError);
    expect(error).toMatchObject({
      Code: 'AMBIGUOUS_VERSION',
      Version: '1.0.0.0',
      FolderName: '01.0',
      ConflictingFolderName: '1.0',
    });
  });

  it('ignores duplicate versions above the target', async () => {
    const { resolver } = makeResolver({
      '1.0': { 'a.sql': '' },
      '3.0': { 'b.sql': '' },
      '03.0': { 'c.sql': '' },
    });

    const scripts = await resolver.Resolve({ RootPath: ROOT, TargetVersion: '2.0' });

    expect(names(scripts)).toEqual(['1.0/a.sql']);
  });

  it('fails on a folder name that is not a version', async () => {
    const { resolver } = makeResolver({
      '1.0': { 'a.sql': '' },
      drafts: { 'b.sql': '' },
    });

    await expect(resolver.Resolve({ RootPath: ROOT, TargetVersion: '2.0' })).rejects.toThrow(
      "Error parsing version from string 'drafts'."
    );
  });

  it('lets the filter exclude folders that are not versions', async () => {
    const { resolver } = makeResolver({
      '1.0': { 'a.sql': '' },
      drafts: { 'b.sql': '' },
      '01.0': { 'c.sql': '' },
    });

    const scripts = await resolver.Resolve({
      RootPath: ROOT,
      TargetVersion: '2.0',
      Filter: (name) => !name.startsWith('drafts') && !name.startsWith('01.0'),
    });

    expect(names(scripts)).toEqual(['1.0/a.sql']);
  });

  it('applies the filter to folder/file names too', async () => {
    const { resolver } = makeResolver({
      '1.0': { 'keep.sql': '', 'skip.sql': '' },
    });

    const scripts = await resolver.Resolve({
      RootPath: ROOT,
      TargetVersion: '2.0',
      Filter: (name) => !name.endsWith('skip.sql'),
    });

    expect(names(scripts)).toEqual(['1.0/keep.sql']);
  });

  it('returns an empty list when the filter leaves no folders', async () => {
    const { resolver } = makeResolver({
      drafts: { 'a.sql': '' },
    });

    const scripts = await resolver.Resolve({
      RootPath: ROOT,
      TargetVersion: '2.0',
      Filter: (name) => name !== 'drafts',
    });

    expect(scripts).toEqual([]);
  });

  it('does not parse the target version when there are no folders', async () => {
    const { resolver } = makeResolver({});

    await expect(resolver.Resolve({ RootPath: ROOT, TargetVersion: 'latest' })).resolves.toEqual([]);
  });

  it('fails on a malformed target version', async () => {
    const { resolver } = makeResolver({
      '1.0': { 'a.sql': '' },
    });

    await expect(resolver.Resolve({ RootPath: ROOT, TargetVersion: 'latest' })).rejects.toBeInstanceOf(
      MalformedVersionError
    );
  });
});

// ─── Loading ─────────────────────────────────────────────────────────

describe('VersionFolderResolver — loading scripts', () => {
  it('keeps same-named files in different folders distinct', async () => {
    const { resolver } = makeResolver({
      '1.0': { 'script1.sql': 'v1' },
      '1.1': { 'script1.sql': 'v1.1' },
    });

    const scripts = await resolver.Resolve({ RootPath: ROOT, TargetVersion: '1.1' });

    expect(scripts).toEqual([
      { Name: '1.0/script1.sql', Contents: 'v1' },
      { Name: '1.1/script1.sql', Contents: 'v1.1' },
    ]);
  });

  it('decodes with the configured encoding', async () => {
    const { resolver } = makeResolver({
      '1.0': { 'latin.sql': Buffer.from([0x63, 0x61, 0x66, 0xe9]) },
    });

    const scripts = await resolver.Resolve({ RootPath: ROOT, Encoding: 'latin1' });

    expect(scripts[0].Contents).toBe('café');
  });

  it('aborts the whole resolution when one file cannot be read', async () => {
    const { resolver, fs } = makeResolver({
      '1.0': { 'a.sql': 'SELECT 1' },
      '2.0': { 'b.sql': new Error('EACCES: permission denied'), 'c.sql': 'SELECT 3' },
    });

    const error = await resolver.Resolve({ RootPath: ROOT }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ScriptReadError);
    expect(error).toMatchObject({
      Code: 'SCRIPT_READ_FAILED',
      Path: '/migrations/2.0/b.sql',
      message: 'Cannot read script "/migrations/2.0/b.sql": EACCES: permission denied',
    });
    // c.sql is never reached
    expect(fs.Reads).toEqual(['/migrations/1.0/a.sql', '/migrations/2.0/b.sql']);
  });

  it('preserves the underlying error as the cause', async () => {
    const failure = new Error('EIO: i/o error');
    const { resolver } = makeResolver({
      '1.0': { 'a.sql': failure },
    });

    const error = await resolver.Resolve({ RootPath: ROOT, TargetVersion: '1.0' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ScriptReadError);
    expect(error instanceof ScriptReadError && error.cause).toBe(failure);
  });

  it('wraps a failure to list the root folder', async () => {
    const fs = new MemoryFileSystem('/elsewhere', {});

    await expect(ResolveVersionFolders({ RootPath: ROOT }, fs)).rejects.toThrow(
      'Cannot list version folders in "/migrations"'
    );
  });
});

// ─── Callbacks ───────────────────────────────────────────────────────

describe('VersionFolderResolver — progress callbacks', () => {
  it('reports accepted and skipped folders', async () => {
    const { resolver } = makeResolver({
      '1.0': { 'a.sql': '' },
      '3.0': { 'b.sql': '' },
    });
    const accepted: string[] = [];
    const skipped: string[] = [];
    const loaded: string[] = [];

    await resolver
      .OnProgress({
        OnFolderAccepted: (folder, version) => accepted.push(`${folder}=${version?.toString()}`),
        OnFolderSkipped: (folder, version) => skipped.push(`${folder}=${version.toString()}`),
        OnScriptLoaded: (script) => loaded.push(script.Name),
      })
      .Resolve({ RootPath: ROOT, TargetVersion: '2.0' });

    expect(accepted).toEqual(['1.0=1.0.0.0']);
    expect(skipped).toEqual(['3.0=3.0.0.0']);
    expect(loaded).toEqual(['1.0/a.sql']);
  });

  it('logs the resolution mode', async () => {
    const { resolver } = makeResolver({
      '1.0': { 'a.sql': '' },
    });
    const messages: string[] = [];

    await resolver.OnProgress({ OnLog: (m) => messages.push(m) }).Resolve({ RootPath: ROOT });

    expect(messages).toEqual(['Resolving 1 folder(s) in /migrations (no target version)']);
  });
});
