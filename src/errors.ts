/**
 * Error types raised by the parser, the filters and the option loader.
 * Everything user-facing extends GcodeError so the CLI can report it
 * without a stack trace.
 */

export class GcodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A numeric word could not be parsed. The parser records it and treats
 * the word as absent, so this is collected rather than thrown.
 */
export class MalformedInputError extends GcodeError {
  constructor(
    readonly lineNumber: number,
    readonly word: string,
    readonly raw: string,
  ) {
    super(`line ${lineNumber}: cannot parse "${word}" in "${raw}"`);
  }
}

export class InsufficientHeightError extends GcodeError {
  constructor(
    message: string,
    readonly zmin?: number,
    readonly zmax?: number,
  ) {
    super(message);
  }
}

export class ConfigError extends GcodeError {}
