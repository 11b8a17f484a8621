export type VersionBump = 'MAJOR' | 'MINOR' | 'PATCH';

export interface SemVer {
  major: number;
  minor: number;
  patch: number;
}

const SEMVER_PATTERN = /^(\d+)\.(\d+)\.(\d+)$/;

export function parseSemVer(text: string): SemVer | undefined {
  const match = SEMVER_PATTERN.exec(text.trim());
  if (!match) return undefined;

  const [, major, minor, patch] = match;
  const parsed = {
    major: Number(major),
    minor: Number(minor),
    patch: Number(patch),
  };

  // Components must stay exact under increment
  if (!Object.values(parsed).every(Number.isSafeInteger)) return undefined;
  return parsed;
}

export function formatSemVer(version: SemVer): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

export function bumpSemVer(version: SemVer, bump: VersionBump): SemVer {
  switch (bump) {
    case 'MAJOR':
      return { major: version.major + 1, minor: 0, patch: 0 };
    case 'MINOR':
      return { major: version.major, minor: version.minor + 1, patch: 0 };
    case 'PATCH':
      return { major: version.major, minor: version.minor, patch: version.patch + 1 };
  }
}
