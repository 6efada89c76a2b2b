/**
 * File-backed links
 *
 * Loads a source file and its derived target into buffers, and writes the
 * target back after a clone. All file-system access for the CLI lives here.
 */

import { readFile, writeFile } from 'fs/promises';
import { resolve } from 'path';
import { glob } from 'glob';
import type { InitializerEntry } from '../engine/registry.js';
import { TextBuffer } from './buffer.js';
import { Link } from './link.js';
import { deriveTargetPath } from './paths.js';

export interface FileLinkOptions {
  /** Directory relative paths are resolved against. */
  cwd?: string;
  /** Explicit target path; derived from the source extension otherwise. */
  out?: string;
}

async function readIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissing(error)) return null;
    throw error;
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export interface FileLink {
  link: Link;
  sourcePath: string;
  targetPath: string;
  /** Whether the target file existed before loading. */
  targetExists: boolean;
  cwd: string;
}

export async function openFileLink(
  sourcePath: string,
  entry: InitializerEntry,
  options: FileLinkOptions = {}
): Promise<FileLink> {
  const cwd = options.cwd ?? process.cwd();
  const targetPath = options.out ?? deriveTargetPath(sourcePath, entry.targetExtension);
  const source = await readFile(resolve(cwd, sourcePath), 'utf-8');
  const target = await readIfExists(resolve(cwd, targetPath));

  const config = entry.create(sourcePath, targetPath);
  const link = new Link(
    new TextBuffer(sourcePath, source, sourcePath),
    new TextBuffer(targetPath, target ?? '', targetPath),
    config
  );
  return { link, sourcePath, targetPath, targetExists: target !== null, cwd };
}

export async function saveTarget(fileLink: FileLink): Promise<void> {
  await writeFile(resolve(fileLink.cwd, fileLink.targetPath), fileLink.link.thatBuffer.content);
}

/**
 * Expand glob patterns relative to `cwd`; a pattern matching nothing is kept
 * as a literal path so the caller can report it.
 */
export async function expandPatterns(patterns: string[], cwd: string): Promise<string[]> {
  const files: string[] = [];
  for (const pattern of patterns) {
    const matches = await glob(pattern, { cwd, nodir: true, dot: false });
    if (matches.length === 0) {
      files.push(pattern);
    } else {
      files.push(...matches.sort());
    }
  }
  return [...new Set(files)];
}
