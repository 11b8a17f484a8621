import { readFile, writeFile } from 'node:fs/promises';
import { formatSemVer, parseSemVer, type SemVer } from '../model/version.js';
import { VersionReadError, VersionVerifyError } from '../errors.js';

export interface VersionLine {
  /** Zero-based index into the file's lines. */
  index: number;
  version: SemVer;
  indent: string;
  quote: '\'' | '"';
  /** Whatever follows the closing quote, carriage return included. */
  rest: string;
}

// `rest` takes everything after the closing quote, a trailing \r included
const VERSION_LINE = /^(\s*)version\s+(['"])(\d+\.\d+\.\d+)\2([^\n]*)$/;

/**
 * Locate the build file's version declaration: the first line whose trimmed
 * form starts with `version `. Returns undefined when there is no such line or
 * it does not hold a quoted X.Y.Z.
 */
export function findVersionLine(content: string): VersionLine | undefined {
  const lines = content.split('\n');
  const index = lines.findIndex(line => line.trimStart().startsWith('version '));
  if (index === -1) return undefined;

  const match = VERSION_LINE.exec(lines[index]);
  if (!match) return undefined;

  const [, indent, quote, text, rest] = match;
  const version = parseSemVer(text);
  if (!version || (quote !== '\'' && quote !== '"')) return undefined;

  return { index, version, indent, quote, rest };
}

/** Rewrite the version line with single quotes; every other line is kept byte for byte. */
export function replaceVersion(content: string, next: SemVer): string | undefined {
  const found = findVersionLine(content);
  if (!found) return undefined;

  const lines = content.split('\n');
  lines[found.index] = `${found.indent}version '${formatSemVer(next)}'${found.rest}`;
  return lines.join('\n');
}

export async function readBuildVersion(filePath: string): Promise<SemVer> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch {
    throw new VersionReadError(filePath, `Could not read ${filePath}`);
  }

  const found = findVersionLine(content);
  if (!found) {
    throw new VersionReadError(filePath, `Could not get current version from ${filePath}`);
  }
  return found.version;
}

/**
 * Write `next` into the build file, then read it back. A mismatch leaves the
 * file as written and throws VersionVerifyError.
 */
export async function writeBuildVersion(filePath: string, next: SemVer): Promise<void> {
  const content = await readFile(filePath, 'utf-8');
  const updated = replaceVersion(content, next);
  if (updated === undefined) {
    throw new VersionReadError(filePath, `Could not get current version from ${filePath}`);
  }

  await writeFile(filePath, updated, 'utf-8');

  const expected = formatSemVer(next);
  const reread = findVersionLine(await readFile(filePath, 'utf-8'));
  const actual = reread ? formatSemVer(reread.version) : undefined;
  if (actual !== expected) {
    throw new VersionVerifyError(filePath, expected, actual);
  }
}
