import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { ModuleError } from '../errors.js';
import { buildRegistry } from '../modules/registry.js';
import { FsModule } from '../modules/fs/index.js';
import type { ExecutionContext } from '../types/modules.js';
import { session } from './helpers.js';

let root: string;
let fs: FsModule;
const ctx = (): ExecutionContext => ({ signal: new AbortController().signal, session, facts: {} });

async function failure(p: Promise<unknown>): Promise<unknown> {
  return p.then(() => { throw new Error('expected a failure'); }, (err: unknown) => err);
}

beforeEach(async () => {
  root = await mkdtemp(path.join(tmpdir(), 'fs-module-'));
  await mkdir(path.join(root, 'src'));
  await mkdir(path.join(root, 'node_modules', 'pkg'), { recursive: true });
  await writeFile(path.join(root, 'src', 'a.ts'), 'const x = 1;\n  // TODO: tidy\n');
  await writeFile(path.join(root, 'src', 'b.ts'), 'export {};\n');
  await writeFile(path.join(root, 'notes.txt'), 'hello');
  await writeFile(path.join(root, 'node_modules', 'pkg', 'index.js'), '// TODO: not ours\n');
  fs = new FsModule({ root });
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe('fs module', () => {
  it('registers cleanly', () => {
    expect(buildRegistry([fs]).isDestructive('fs', 'delete_file')).toBe(true);
  });

  it('lists a directory, marking subdirectories', async () => {
    const out = await fs.execute('list_dir', {}, ctx());
    expect(out).toEqual({
      summary: '3 entries in .',
      output: { path: '.', entries: ['node_modules/', 'notes.txt', 'src/'] },
      facts: { 'fs.last_path': '.' },
    });
    const src = await fs.execute('list_dir', { path: 'src' }, ctx());
    expect(src.summary).toBe('2 entries in src');
  });

  it('finds a pattern, skipping dependency folders', async () => {
    const out = await fs.execute('find_pattern', { pattern: 'TODO' }, ctx());
    expect(out.summary).toBe("1 match for 'TODO' in .");
    expect(out.output).toEqual({ pattern: 'TODO', matches: ['src/a.ts:2: // TODO: tidy'], truncated: false });
  });

  it('stops collecting matches at the limit', async () => {
    const capped = new FsModule({ root, maxMatches: 1 });
    const out = await capped.execute('find_pattern', { pattern: ';', path: 'src' }, ctx());
    expect(out.output).toEqual({ pattern: ';', matches: ['src/a.ts:1: const x = 1;'], truncated: true });
  });

  it('reads a file', async () => {
    const out = await fs.execute('read_file', { path: 'notes.txt' }, ctx());
    expect(out).toEqual({
      summary: 'read 5 bytes from notes.txt',
      output: { path: 'notes.txt', content: 'hello' },
      facts: { 'fs.last_path': 'notes.txt' },
    });
  });

  it('refuses to read a file over the size limit', async () => {
    const small = new FsModule({ root, maxReadBytes: 2 });
    const err = await failure(small.execute('read_file', { path: 'notes.txt' }, ctx()));
    expect(err).toBeInstanceOf(ModuleError);
    expect(err).toHaveProperty('message', "'notes.txt' is larger than 2 bytes");
  });

  it('writes a file, creating parent directories', async () => {
    const out = await fs.execute('write_file', { path: 'out/new.txt', content: 'hi' }, ctx());
    expect(out.summary).toBe('wrote 2 bytes to out/new.txt');
    expect(await readFile(path.join(root, 'out', 'new.txt'), 'utf8')).toBe('hi');
  });

  it('deletes a file', async () => {
    const out = await fs.execute('delete_file', { path: 'notes.txt' }, ctx());
    expect(out.summary).toBe('deleted notes.txt');
    await expect(stat(path.join(root, 'notes.txt'))).rejects.toHaveProperty('code', 'ENOENT');
  });

  it('refuses to delete directories or the root', async () => {
    expect(await failure(fs.execute('delete_file', { path: 'src' }, ctx()))).toHaveProperty('message', "'src' is not a file");
    expect(await failure(fs.execute('delete_file', { path: '.' }, ctx())))
      .toHaveProperty('message', 'refusing to delete the workspace root');
  });

  it('refuses paths outside the root', async () => {
    const err = await failure(fs.execute('read_file', { path: '../secret' }, ctx()));
    expect(err).toBeInstanceOf(ModuleError);
    expect(err).toHaveProperty('message', "path '../secret' is outside the workspace root");
  });

  it('reads a file whose name starts with two dots', async () => {
    await writeFile(path.join(root, '..notes.txt'), 'hi');
    const out = await fs.execute('read_file', { path: '..notes.txt' }, ctx());
    expect(out.summary).toBe('read 2 bytes from ..notes.txt');
  });

  it('reports missing paths as permanent failures', async () => {
    const err = await failure(fs.execute('read_file', { path: 'nope.txt' }, ctx()));
    expect(err).toHaveProperty('message', "'nope.txt' does not exist");
    expect(err).toHaveProperty('transient', false);
  });

  it('reports a file listed as a directory', async () => {
    const err = await failure(fs.execute('list_dir', { path: 'notes.txt' }, ctx()));
    expect(err).toHaveProperty('message', "'notes.txt' is not a directory");
  });

  it('rejects an unsupported action', async () => {
    const err = await failure(fs.execute('rename', {}, ctx()));
    expect(err).toHaveProperty('message', 'unsupported fs action: rename');
  });
});
