/**
 * Config Loader
 *
 * Reads .twinview/config.yaml and merges user-defined links into the
 * built-in registry.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import yaml from 'js-yaml';
import { ConfigurationError } from '../engine/errors.js';
import { invertName, type Direction } from '../engine/configuration.js';
import { defineInitializer, listInitializers, type InitializerEntry } from '../engine/registry.js';
import { extensionOf } from '../sync/paths.js';

export interface UserConfiguration {
  name: string;
  description?: string;
  sourceExtension: string;
  targetExtension: string;
  commentPrefix: string;
  regionStartPattern: string;
  regionEndPattern: string;
  caseSensitive?: boolean;
  direction: Direction;
  overlay?: { kind: 'orgel'; summaryMarker?: string; headingPrefix?: string } | null;
}

export interface TwinviewConfig {
  version: string;
  /** Default configuration name per source extension. */
  defaults: Record<string, string>;
  configurations: UserConfiguration[];
}

export const DEFAULT_CONFIG: TwinviewConfig = {
  version: '1.0',
  defaults: {
    org: 'org-to-el',
    el: 'el-to-org',
    clj: 'clojure-to-org',
  },
  configurations: [],
};

export function configPath(cwd: string): string {
  return join(cwd, '.twinview', 'config.yaml');
}

export async function loadConfig(cwd: string): Promise<TwinviewConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath(cwd), 'utf-8');
  } catch {
    return { ...DEFAULT_CONFIG, defaults: { ...DEFAULT_CONFIG.defaults } };
  }
  return parseConfig(raw);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseConfig(raw: string): TwinviewConfig {
  const doc: unknown = yaml.load(raw);
  if (doc === undefined || doc === null) {
    return { ...DEFAULT_CONFIG, defaults: { ...DEFAULT_CONFIG.defaults } };
  }
  if (!isRecord(doc)) {
    throw new ConfigurationError('config.yaml', 'document', 'must be a mapping');
  }

  const defaults = { ...DEFAULT_CONFIG.defaults };
  if (doc.defaults !== undefined) {
    if (!isRecord(doc.defaults)) {
      throw new ConfigurationError('config.yaml', 'defaults', 'must map extensions to configuration names');
    }
    for (const [ext, name] of Object.entries(doc.defaults)) {
      if (typeof name !== 'string') {
        throw new ConfigurationError('config.yaml', `defaults.${ext}`, 'must be a configuration name');
      }
      defaults[ext.replace(/^\./, '').toLowerCase()] = name;
    }
  }

  const entries: unknown = doc.configurations ?? [];
  if (!Array.isArray(entries)) {
    throw new ConfigurationError('config.yaml', 'configurations', 'must be a list');
  }

  return {
    version: typeof doc.version === 'string' ? doc.version : String(doc.version ?? DEFAULT_CONFIG.version),
    defaults,
    configurations: entries.map((entry: unknown, i) => toUserConfiguration(entry, i)),
  };
}

function toUserConfiguration(entry: unknown, index: number): UserConfiguration {
  const owner = isRecord(entry) && typeof entry.name === 'string' ? entry.name : `configurations[${index}]`;
  if (!isRecord(entry)) {
    throw new ConfigurationError(owner, 'entry', 'must be a mapping');
  }

  const text = (field: string): string => {
    const value = entry[field];
    if (typeof value !== 'string' || value.length === 0) {
      throw new ConfigurationError(owner, field, 'must be a non-empty string');
    }
    return value;
  };

  const direction = text('direction');
  if (direction !== 'uncommented' && direction !== 'commented') {
    throw new ConfigurationError(owner, 'direction', `must be "uncommented" or "commented" (got "${direction}")`);
  }

  let overlay: UserConfiguration['overlay'] = null;
  if (entry.overlay !== undefined && entry.overlay !== null) {
    const o = entry.overlay;
    if (!isRecord(o) || o.kind !== 'orgel') {
      throw new ConfigurationError(owner, 'overlay', 'must be { kind: orgel }');
    }
    overlay = {
      kind: 'orgel',
      summaryMarker: typeof o.summaryMarker === 'string' ? o.summaryMarker : undefined,
      headingPrefix: typeof o.headingPrefix === 'string' ? o.headingPrefix : undefined,
    };
  }

  return {
    name: text('name'),
    description: typeof entry.description === 'string' ? entry.description : undefined,
    sourceExtension: text('sourceExtension').replace(/^\./, ''),
    targetExtension: text('targetExtension').replace(/^\./, ''),
    commentPrefix: text('commentPrefix'),
    regionStartPattern: text('regionStartPattern'),
    regionEndPattern: text('regionEndPattern'),
    caseSensitive: entry.caseSensitive === true,
    direction,
    overlay,
  };
}

/**
 * Every named configuration available: built-ins, then user entries and
 * their inverses. User entries replace built-ins of the same name.
 */
export function buildCatalog(config: TwinviewConfig): InitializerEntry[] {
  const catalog = new Map<string, InitializerEntry>();
  for (const builtIn of listInitializers()) {
    catalog.set(builtIn.name, builtIn);
  }

  for (const user of config.configurations) {
    const template = {
      commentPrefix: user.commentPrefix,
      regionStartPattern: user.regionStartPattern,
      regionEndPattern: user.regionEndPattern,
      caseSensitive: user.caseSensitive,
      overlay: user.overlay,
    };
    catalog.set(user.name, defineInitializer(
      user.name,
      user.description ?? `${user.sourceExtension} to ${user.targetExtension}`,
      user.sourceExtension,
      user.targetExtension,
      { ...template, direction: user.direction }
    ));

    const inverseName = invertName(user.name);
    if (!config.configurations.some(c => c.name === inverseName)) {
      catalog.set(inverseName, defineInitializer(
        inverseName,
        `${user.targetExtension} to ${user.sourceExtension}`,
        user.targetExtension,
        user.sourceExtension,
        { ...template, direction: user.direction === 'uncommented' ? 'commented' : 'uncommented' }
      ));
    }
  }

  return [...catalog.values()];
}

/**
 * Pick a configuration by explicit name, or by the file's extension.
 */
export function resolveInitializer(
  catalog: readonly InitializerEntry[],
  config: TwinviewConfig,
  file: string,
  name?: string
): InitializerEntry {
  const wanted = name ?? config.defaults[extensionOf(file)];
  if (!wanted) {
    throw new ConfigurationError(file, 'extension', 'has no default configuration; pass --config');
  }
  const found = catalog.find(e => e.name === wanted);
  if (!found) {
    throw new ConfigurationError(wanted, 'name', 'is not a known configuration (see `twinview list`)');
  }
  return found;
}
