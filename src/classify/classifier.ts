import type { ChangeSet, ClassificationRule } from '../model/change.js';
import type { VersionBump } from '../model/version.js';
import { createDefaultRules, type BumpRule, type RuleTable } from './rules.js';

export interface Classification {
  bump: VersionBump;
  rule: ClassificationRule;
  /** Paths that satisfied the winning rule's file patterns; empty for the fallback. */
  matchedFiles: string[];
}

export function classifyChanges(changeSet: ChangeSet, table: RuleTable = createDefaultRules()): Classification {
  for (const rule of table.rules) {
    const matchedFiles = matchFiles(rule, changeSet.files);
    if (matchedFiles.length === 0) continue;
    if (!hasMarker(rule, changeSet.diff)) continue;

    return { bump: rule.bump, rule: rule.name, matchedFiles };
  }

  return { bump: table.fallback, rule: 'default', matchedFiles: [] };
}

function matchFiles(rule: BumpRule, files: string[]): string[] {
  return files.filter(file => rule.filePatterns.some(pattern => pattern.test(file)));
}

function hasMarker(rule: BumpRule, diff: string): boolean {
  return rule.markers.some(marker => marker.test(diff));
}
