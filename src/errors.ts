export type VerbumpErrorKind = 'config' | 'change-set' | 'version-read' | 'version-verify';

export class VerbumpError extends Error {
  readonly kind: VerbumpErrorKind;

  constructor(kind: VerbumpErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class ConfigError extends VerbumpError {
  constructor(message: string) {
    super('config', message);
  }
}

/** Raised in strict mode when git could not report the changes. */
export class ChangeSetError extends VerbumpError {
  constructor(message: string) {
    super('change-set', message);
  }
}

/** The build file has no usable version line. Raised before anything is written. */
export class VersionReadError extends VerbumpError {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super('version-read', message);
    this.filePath = filePath;
  }
}

/**
 * The build file was rewritten but reading it back gave a different version.
 * The file is left as written.
 */
export class VersionVerifyError extends VerbumpError {
  readonly filePath: string;
  readonly expected: string;
  readonly actual: string | undefined;

  constructor(filePath: string, expected: string, actual: string | undefined) {
    super('version-verify', `Failed to update version in ${filePath}: expected ${expected}, found ${actual ?? 'no version'}`);
    this.filePath = filePath;
    this.expected = expected;
    this.actual = actual;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
