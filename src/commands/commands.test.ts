import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { access, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { cloneCommand } from './clone.js';
import { checkCommand, compareRoundTrip } from './check.js';
import { initCommand } from './init.js';
import { diffCommand } from './diff.js';
import { loadConfig } from '../config/config-loader.js';

const ORG = '# # demo.el --- demo\n\n* Code\n\n#+BEGIN_SRC emacs-lisp\n(provide (quote demo))\n#+END_SRC\n';

describe('commands', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'twinview-test-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await rm(tempDir, { recursive: true });
  });

  it('should write a default config that loads back', async () => {
    await initCommand({ cwd: tempDir });
    const config = await loadConfig(tempDir);
    expect(config.defaults.org).toBe('org-to-el');
    expect(config.configurations).toEqual([]);
  });

  it('should clone by extension', async () => {
    await writeFile(join(tempDir, 'demo.org'), ORG);
    await cloneCommand(['demo.org'], { cwd: tempDir });

    const el = await readFile(join(tempDir, 'demo.el'), 'utf-8');
    expect(el).toBe(';; # # demo.el --- demo\n;; \n;; * Code\n;; \n#+BEGIN_SRC emacs-lisp\n(provide (quote demo))\n#+END_SRC\n');
    expect(process.exitCode).toBeUndefined();
  });

  it('should clone with a named configuration', async () => {
    await writeFile(join(tempDir, 'demo.org'), ORG);
    await cloneCommand(['demo.org'], { cwd: tempDir, config: 'org-to-orgel' });

    const el = await readFile(join(tempDir, 'demo.el'), 'utf-8');
    expect(el).toBe(';;; demo.el --- demo\n;; \n;;; Code:\n;; \n#+BEGIN_SRC emacs-lisp\n(provide (quote demo))\n#+END_SRC\n');
  });

  it('should not write in dry-run mode', async () => {
    await writeFile(join(tempDir, 'demo.org'), ORG);
    await cloneCommand(['demo.org'], { cwd: tempDir, dryRun: true });
    await expect(access(join(tempDir, 'demo.el'))).rejects.toThrow();
  });

  it('should set a failing exit code for an unknown extension', async () => {
    await writeFile(join(tempDir, 'notes.txt'), 'x');
    await cloneCommand(['notes.txt'], { cwd: tempDir });
    expect(process.exitCode).toBe(1);
  });

  it('should warn about an unclosed block when diffing', async () => {
    await writeFile(join(tempDir, 'open.org'), 'intro\n#+BEGIN_SRC emacs-lisp\n(foo)\n');
    await diffCommand('open.org', { cwd: tempDir });
    expect(console.log).toHaveBeenCalledWith(
      expect.stringContaining('open.org: Code region opened on line 2 is never closed; treating the rest as code')
    );
  });

  it('should pass the round-trip check for a well-formed file', async () => {
    await writeFile(join(tempDir, 'demo.org'), ORG);
    await checkCommand(['demo.org'], { cwd: tempDir, config: 'org-to-orgel' });
    expect(process.exitCode).toBeUndefined();
  });

  it('should fail the round-trip check for bare prose in a source file', async () => {
    await writeFile(join(tempDir, 'demo.el'), ';; ok\nbare prose\n');
    await checkCommand(['demo.el'], { cwd: tempDir });
    expect(process.exitCode).toBe(1);
  });
});

describe('compareRoundTrip', () => {
  it('should report the first differing line', () => {
    expect(compareRoundTrip('a\nb\nc', 'a\nx\nc')).toEqual({ ok: false, line: 2, expected: 'b', actual: 'x' });
  });

  it('should accept identical text', () => {
    expect(compareRoundTrip('a\n', 'a\n')).toEqual({ ok: true });
  });

  it('should report a missing line', () => {
    expect(compareRoundTrip('a\nb', 'a')).toEqual({ ok: false, line: 2, expected: 'b', actual: '<end of file>' });
  });
});
