/**
 * Region Matcher
 *
 * Partitions a line sequence into alternating prose and code regions. The
 * delimiter lines that switch between them form one-line regions of their own,
 * so every line belongs to exactly one region.
 */

import { ConfigurationError, MalformedRegionError } from './errors.js';

export type RegionKind = 'prose' | 'code' | 'delimiter';

export interface Region {
  kind: RegionKind;
  /** First line, inclusive. */
  start: number;
  /** Last line, exclusive. */
  end: number;
}

export interface RegionPartition {
  regions: Region[];
  issues: MalformedRegionError[];
}

export interface RegionPatterns {
  regionStartPattern: string;
  regionEndPattern: string;
  caseSensitive: boolean;
}

export function compilePattern(source: string, caseSensitive: boolean, owner = ''): RegExp {
  try {
    return new RegExp(source, caseSensitive ? '' : 'i');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(owner, 'pattern', `is not a valid regular expression (${reason})`);
  }
}

export function classifyLines(lines: readonly string[], patterns: RegionPatterns): RegionPartition {
  const opens = compilePattern(patterns.regionStartPattern, patterns.caseSensitive);
  const closes = compilePattern(patterns.regionEndPattern, patterns.caseSensitive);

  const regions: Region[] = [];
  let kind: 'prose' | 'code' = 'prose';
  let regionStart = 0;
  let lastOpening = -1;

  const flush = (end: number) => {
    if (end > regionStart) {
      regions.push({ kind, start: regionStart, end });
    }
  };

  for (let i = 0; i < lines.length; i++) {
    const delimiter = kind === 'prose' ? opens : closes;
    if (!delimiter.test(lines[i])) continue;

    flush(i);
    regions.push({ kind: 'delimiter', start: i, end: i + 1 });
    if (kind === 'prose') lastOpening = i;
    kind = kind === 'prose' ? 'code' : 'prose';
    regionStart = i + 1;
  }
  flush(lines.length);

  const issues = kind === 'code' ? [new MalformedRegionError(lastOpening)] : [];
  return { regions, issues };
}

/**
 * Region kind of every line, indexed by line number.
 */
export function lineKinds(partition: RegionPartition, lineCount: number): RegionKind[] {
  const kinds = new Array<RegionKind>(lineCount).fill('prose');
  for (const region of partition.regions) {
    for (let i = region.start; i < region.end; i++) {
      kinds[i] = region.kind;
    }
  }
  return kinds;
}
