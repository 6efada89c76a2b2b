/**
 * Configuration
 *
 * The parameterized descriptor of one direction of a link between two
 * buffers. Configurations are frozen values; nothing in the engine holds
 * a "current" configuration.
 */

import { ConfigurationError } from './errors.js';
import { compilePattern } from './regions.js';
import { DEFAULT_ORGEL_SETTINGS, type OrgelSettings } from './overlay.js';

/**
 * `uncommented`: `this` is the documentation form with bare prose.
 * `commented`: `this` is the source form with commented prose.
 */
export type Direction = 'uncommented' | 'commented';

export interface OrgelOverlay extends OrgelSettings {
  kind: 'orgel';
}

export type Overlay = OrgelOverlay;

export interface Configuration {
  readonly name: string;
  /** Identifier of the buffer read from. */
  readonly thisId: string;
  /** Identifier of the buffer written to; supplied by the caller, never derived. */
  readonly thatId: string;
  readonly commentPrefix: string;
  readonly regionStartPattern: string;
  readonly regionEndPattern: string;
  readonly caseSensitive: boolean;
  readonly direction: Direction;
  readonly overlay: Overlay | null;
}

export interface ConfigurationInit {
  name: string;
  thisId: string;
  thatId: string;
  commentPrefix: string;
  regionStartPattern: string;
  regionEndPattern: string;
  caseSensitive?: boolean;
  direction: Direction;
  overlay?: Partial<OrgelSettings> & { kind: 'orgel' } | null;
}

const DIRECTIONS: readonly Direction[] = ['uncommented', 'commented'];

export function makeConfiguration(init: ConfigurationInit): Configuration {
  const name = init.name;
  const fail = (field: string, reason: string): never => {
    throw new ConfigurationError(name, field, reason);
  };

  if (!name || name.trim().length === 0) fail('name', 'is required');
  if (!init.thisId) fail('thisId', 'is required');
  if (!init.thatId) fail('thatId', 'is required');
  if (init.thisId === init.thatId) fail('thatId', `must differ from thisId ("${init.thisId}")`);
  if (!init.commentPrefix) fail('commentPrefix', 'is required');
  if (!init.regionStartPattern) fail('regionStartPattern', 'is required');
  if (!init.regionEndPattern) fail('regionEndPattern', 'is required');
  if (!DIRECTIONS.includes(init.direction)) {
    fail('direction', `must be one of ${DIRECTIONS.join(', ')} (got "${String(init.direction)}")`);
  }

  const caseSensitive = init.caseSensitive ?? false;
  compilePattern(init.regionStartPattern, caseSensitive, name);
  compilePattern(init.regionEndPattern, caseSensitive, name);

  let overlay: Overlay | null = null;
  if (init.overlay) {
    if (init.overlay.kind !== 'orgel') {
      fail('overlay', `has unknown kind "${String(init.overlay.kind)}"`);
    }
    overlay = Object.freeze({
      kind: 'orgel',
      summaryMarker: init.overlay.summaryMarker ?? DEFAULT_ORGEL_SETTINGS.summaryMarker,
      headingPrefix: init.overlay.headingPrefix ?? DEFAULT_ORGEL_SETTINGS.headingPrefix,
    });
    if (!overlay.summaryMarker) fail('overlay.summaryMarker', 'must not be empty');
    if (!overlay.headingPrefix) fail('overlay.headingPrefix', 'must not be empty');
  }

  return Object.freeze({
    name,
    thisId: init.thisId,
    thatId: init.thatId,
    commentPrefix: init.commentPrefix,
    regionStartPattern: init.regionStartPattern,
    regionEndPattern: init.regionEndPattern,
    caseSensitive,
    direction: init.direction,
    overlay,
  });
}

/**
 * Name of the configuration running the other way: `org-to-el` becomes
 * `el-to-org`; other names gain or lose an `-inverse` suffix.
 */
export function invertName(name: string): string {
  const parts = name.split('-to-');
  if (parts.length === 2 && parts[0] && parts[1]) {
    return `${parts[1]}-to-${parts[0]}`;
  }
  return name.endsWith('-inverse') ? name.slice(0, -'-inverse'.length) : `${name}-inverse`;
}

/**
 * The structurally opposite configuration: buffer roles swapped, direction
 * flipped, everything else kept.
 */
export function invert(config: Configuration): Configuration {
  return makeConfiguration({
    ...config,
    name: invertName(config.name),
    thisId: config.thatId,
    thatId: config.thisId,
    direction: config.direction === 'uncommented' ? 'commented' : 'uncommented',
  });
}
