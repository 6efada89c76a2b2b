/**
 * Link
 *
 * Pairs two buffers under one configuration. `clone` regenerates `that`
 * from `this`; `reverse` gives the link for edits made on the other side.
 */

import { invert, type Configuration } from '../engine/configuration.js';
import { ConfigurationError, TransformError, type MalformedRegionError } from '../engine/errors.js';
import { createStrategy, type Strategy, type TransformResult } from '../engine/strategy.js';
import type { TextBuffer } from './buffer.js';

export interface CloneReport {
  configuration: string;
  changed: boolean;
  lines: number;
  issues: MalformedRegionError[];
}

export class Link {
  readonly strategy: Strategy;

  constructor(
    readonly thisBuffer: TextBuffer,
    readonly thatBuffer: TextBuffer,
    config: Configuration
  ) {
    if (config.thisId !== thisBuffer.name) {
      throw new ConfigurationError(config.name, 'thisId', `is "${config.thisId}" but the buffer is "${thisBuffer.name}"`);
    }
    if (config.thatId !== thatBuffer.name) {
      throw new ConfigurationError(config.name, 'thatId', `is "${config.thatId}" but the buffer is "${thatBuffer.name}"`);
    }
    this.strategy = createStrategy(config);
  }

  get config(): Configuration {
    return this.strategy.config;
  }

  /**
   * Regenerate `that` from `this`. On failure `that` keeps its old content.
   */
  clone(): CloneReport {
    let result: TransformResult;
    try {
      result = this.strategy.run(this.thisBuffer.content);
    } catch (error) {
      throw new TransformError(this.config.name, this.thisBuffer.name, error);
    }

    const changed = this.thatBuffer.replaceContent(result.text);
    return {
      configuration: this.config.name,
      changed,
      lines: this.thatBuffer.lines().length,
      issues: result.partition.issues,
    };
  }

  reverse(): Link {
    return new Link(this.thatBuffer, this.thisBuffer, invert(this.config));
  }
}
