/**
 * Line-Rule Overlay
 *
 * Ordered regex substitutions layered over a block strategy. They act on the
 * commented (source-side) text: after the base strategy going doc→source and
 * before it going source→doc.
 */

import { joinLines, splitLines } from './text.js';

export type RuleScope = 'first-line' | 'every-line';

export interface LineRule {
  name: string;
  scope: RuleScope;
  /** Matched against a single line, without its terminator. */
  pattern: RegExp;
  replacement: string;
}

export type OverlayDirection = 'forward' | 'reverse';

export interface OrgelSettings {
  /** Marker that opens the source file's summary line, e.g. `;;; `. */
  summaryMarker: string;
  /** Prefix of a named section comment, e.g. `;;; ` in `;;; Code:`. */
  headingPrefix: string;
}

export const DEFAULT_ORGEL_SETTINGS: OrgelSettings = {
  summaryMarker: ';;; ',
  headingPrefix: ';;; ',
};

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Apply `rules` in order to each line. `eligible` limits which lines a rule
 * may touch; a rule with no match leaves the lines as they are.
 */
export function applyLineRules(
  lines: readonly string[],
  rules: readonly LineRule[],
  eligible: (index: number) => boolean = () => true
): string[] {
  return rules.reduce<string[]>(
    (current, rule) =>
      current.map((line, i) => {
        if (rule.scope === 'first-line' && i > 0) return line;
        return eligible(i) ? line.replace(rule.pattern, rule.replacement) : line;
      }),
    [...lines]
  );
}

export function applyRules(text: string, rules: readonly LineRule[]): string {
  const split = splitLines(text);
  return joinLines({ ...split, lines: applyLineRules(split.lines, rules) });
}

/**
 * Summary-line and single-word header rules for the "orgel" form.
 *
 * Forward turns `;; # # text` on the first line into `;;; text` and
 * `;; * Word` into `;;; Word:`; reverse undoes both.
 */
export function orgelRules(
  prefix: string,
  settings: OrgelSettings,
  direction: OverlayDirection
): LineRule[] {
  const comment = escapeRegExp(prefix);
  const summary = escapeRegExp(settings.summaryMarker);
  const heading = escapeRegExp(settings.headingPrefix);
  const literal = (text: string) => text.replace(/\$/g, '$$$$');

  if (direction === 'forward') {
    return [
      {
        name: 'summary-line',
        scope: 'first-line',
        pattern: new RegExp(`^${comment}# # `),
        replacement: literal(settings.summaryMarker),
      },
      {
        name: 'header',
        scope: 'every-line',
        pattern: new RegExp(`^${comment}\\* (\\w+)$`),
        replacement: `${literal(settings.headingPrefix)}$1:`,
      },
    ];
  }

  return [
    {
      name: 'summary-line',
      scope: 'first-line',
      pattern: new RegExp(`^${summary}`),
      replacement: `${literal(prefix)}# # `,
    },
    {
      name: 'header',
      scope: 'every-line',
      pattern: new RegExp(`^${heading}(\\w+):$`),
      replacement: `${literal(prefix)}* $1`,
    },
  ];
}
