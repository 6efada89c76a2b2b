import { basename, extname, join, dirname } from 'path';

/**
 * Replace the last extension of `sourcePath` with `extension` (with or without the dot).
 */
export function deriveTargetPath(sourcePath: string, extension: string): string {
  const ext = extension.startsWith('.') ? extension : `.${extension}`;
  const current = extname(sourcePath);
  const stem = current ? basename(sourcePath, current) : basename(sourcePath);
  return join(dirname(sourcePath), `${stem}${ext}`);
}

export function extensionOf(path: string): string {
  return extname(path).replace(/^\./, '').toLowerCase();
}
