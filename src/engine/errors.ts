/**
 * Engine Errors
 *
 * Only ConfigurationError and TransformError are thrown. MalformedRegionError
 * is collected by the region matcher and handed back with the partition.
 */

export class TwinviewError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends TwinviewError {
  readonly configuration: string;
  readonly field: string;

  constructor(configuration: string, field: string, reason: string) {
    super(`Configuration "${configuration || '<unnamed>'}": ${field} ${reason}`);
    this.configuration = configuration;
    this.field = field;
  }
}

export class MalformedRegionError extends TwinviewError {
  /** Zero-based index of the opening delimiter that was never closed. */
  readonly line: number;

  constructor(line: number) {
    super(`Code region opened on line ${line + 1} is never closed; treating the rest as code`);
    this.line = line;
  }
}

export class TransformError extends TwinviewError {
  readonly configuration: string;
  readonly buffer: string;

  constructor(configuration: string, buffer: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Transform "${configuration}" failed for buffer "${buffer}": ${reason}`);
    this.configuration = configuration;
    this.buffer = buffer;
    this.cause = cause;
  }
}
