/**
 * Block Transform Strategy
 *
 * The two complementary rewrites. Only prose lines change; code and delimiter
 * lines are copied through, and the output always has as many lines as the input.
 */

import { lineKinds, type RegionPartition } from './regions.js';

export type BlockRewrite = (
  lines: readonly string[],
  partition: RegionPartition,
  prefix: string
) => string[];

/**
 * Uncomment-Block: `this` holds bare prose, so the clone comments it.
 * Empty lines are commented as well so that `uncommentProse` restores them.
 */
export const commentProse: BlockRewrite = (lines, partition, prefix) => {
  const kinds = lineKinds(partition, lines.length);
  return lines.map((line, i) => (kinds[i] === 'prose' ? prefix + line : line));
};

/**
 * Comment-Block: `this` holds commented prose, so the clone strips one prefix.
 * Bare prose lines are tolerated and left alone.
 */
export const uncommentProse: BlockRewrite = (lines, partition, prefix) => {
  const kinds = lineKinds(partition, lines.length);
  const bare = prefix.trimEnd();
  return lines.map((line, i) => {
    if (kinds[i] !== 'prose') return line;
    if (line.startsWith(prefix)) return line.slice(prefix.length);
    // commented blank line that lost its trailing space
    if (bare !== prefix && line === bare) return '';
    return line;
  });
};
