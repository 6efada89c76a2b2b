/**
 * Strategy
 *
 * A base block rewrite composed with an optional list of overlay rules.
 * `transform` is a pure function of the configuration and the input text.
 */

import { commentProse, uncommentProse, type BlockRewrite } from './block-transform.js';
import { invert, type Configuration } from './configuration.js';
import { applyLineRules, orgelRules, type LineRule } from './overlay.js';
import { classifyLines, lineKinds, type RegionPartition } from './regions.js';
import { joinLines, splitLines } from './text.js';

export interface TransformResult {
  text: string;
  partition: RegionPartition;
}

export interface Strategy {
  readonly config: Configuration;
  transform(text: string): string;
  /** Like `transform`, but also returns the region partition and its issues. */
  run(text: string): TransformResult;
  invert(): Strategy;
}

function baseRewrite(config: Configuration): BlockRewrite {
  return config.direction === 'uncommented' ? commentProse : uncommentProse;
}

/**
 * Overlay rules split by when they run relative to the base rewrite.
 */
function overlayStages(config: Configuration): { before: LineRule[]; after: LineRule[] } {
  if (!config.overlay) return { before: [], after: [] };
  if (config.direction === 'uncommented') {
    return { before: [], after: orgelRules(config.commentPrefix, config.overlay, 'forward') };
  }
  return { before: orgelRules(config.commentPrefix, config.overlay, 'reverse'), after: [] };
}

export function run(config: Configuration, text: string): TransformResult {
  const { before, after } = overlayStages(config);
  const split = splitLines(text);
  const partition = classifyLines(split.lines, config);
  const kinds = lineKinds(partition, split.lines.length);
  // headings and the summary line only live in prose
  const prose = (i: number) => kinds[i] === 'prose';

  const prepared = applyLineRules(split.lines, before, prose);
  const rewritten = baseRewrite(config)(prepared, partition, config.commentPrefix);
  const lines = applyLineRules(rewritten, after, prose);
  return {
    text: joinLines({ ...split, lines }),
    partition,
  };
}

export function transform(config: Configuration, text: string): string {
  return run(config, text).text;
}

export function createStrategy(config: Configuration): Strategy {
  return {
    config,
    transform: text => transform(config, text),
    run: text => run(config, text),
    invert: () => createStrategy(invert(config)),
  };
}
