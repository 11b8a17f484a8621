import { writeFile } from 'node:fs/promises';
import type { VersionBump } from '../model/version.js';

export interface VersionInfoRecord {
  versionType: VersionBump;
  oldVersion: string;
  newVersion: string;
  /** Always true once a record exists; a run with no changes writes none. */
  changesDetected: true;
  /** Pull-request runs expect no commit yet; pushes expect one to follow. */
  prDetected: boolean;
}

export function formatVersionInfo(record: VersionInfoRecord): string {
  const entries: [string, string][] = [
    ['VERSION_TYPE', record.versionType],
    ['OLD_VERSION', record.oldVersion],
    ['NEW_VERSION', record.newVersion],
    ['CHANGES_DETECTED', String(record.changesDetected)],
    ['PR_DETECTED', String(record.prDetected)],
  ];
  return entries.map(([key, value]) => `${key}=${value}\n`).join('');
}

export async function writeVersionInfo(filePath: string, record: VersionInfoRecord): Promise<void> {
  await writeFile(filePath, formatVersionInfo(record), 'utf-8');
}

/** Read KEY=value lines back; blank lines and lines without `=` are skipped. */
export function parseVersionInfo(text: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const line of text.split(/\r?\n/)) {
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    values[line.slice(0, eq).trim()] = line.slice(eq + 1).trim();
  }
  return values;
}
