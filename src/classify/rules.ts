import type { ClassificationRule } from '../model/change.js';
import type { VersionBump } from '../model/version.js';

export type MatchingRuleName = Exclude<ClassificationRule, 'default'>;

export interface BumpRule {
  name: MatchingRuleName;
  bump: VersionBump;
  /** Unanchored; a rule needs at least one changed path to match one of these. */
  filePatterns: RegExp[];
  /** Unanchored; searched across the whole patch text. */
  markers: RegExp[];
}

export interface RuleTable {
  /** Evaluated top-down, first match wins. */
  rules: BumpRule[];
  /** Selected when no rule matches. */
  fallback: VersionBump;
}

const SOURCE_FILES = [/\.java/, /\.groovy/];
const CONFIG_FILES = [/\.ya?ml/];
const TEXT_FILES = [/\.md/, /\.txt/];

export const BREAKING_RULE: BumpRule = {
  name: 'breaking',
  bump: 'MAJOR',
  filePatterns: [/build\.gradle/, ...SOURCE_FILES],
  markers: [/breaking change/i, /!:/, /feat!/, /fix!/],
};

export const FEATURE_RULE: BumpRule = {
  name: 'feature',
  bump: 'MINOR',
  filePatterns: [...SOURCE_FILES, ...CONFIG_FILES],
  markers: [/feat:/, /feature:/, /new:/, /add:/],
};

export const MAINTENANCE_RULE: BumpRule = {
  name: 'maintenance',
  bump: 'PATCH',
  filePatterns: [...SOURCE_FILES, ...CONFIG_FILES, ...TEXT_FILES],
  markers: [
    /fix:/,
    /bugfix:/,
    /patch:/,
    /docs:/,
    /style:/,
    /refactor:/,
    /perf:/,
    /test:/,
    /chore:/,
  ],
};

export function createDefaultRules(): RuleTable {
  return {
    rules: [BREAKING_RULE, FEATURE_RULE, MAINTENANCE_RULE],
    fallback: 'PATCH',
  };
}

export interface RuleOverride {
  filePatterns?: string[];
  markers?: string[];
  ignoreCase?: boolean;
}

export type RuleOverrides = Partial<Record<MatchingRuleName, RuleOverride>>;

/**
 * Replace the patterns of individual rules. Rule order and bump kinds are fixed.
 * Throws SyntaxError for an invalid pattern source.
 */
export function applyRuleOverrides(table: RuleTable, overrides: RuleOverrides): RuleTable {
  return {
    fallback: table.fallback,
    rules: table.rules.map(rule => {
      const override = overrides[rule.name];
      if (!override) return rule;

      const markerFlags = override.ignoreCase ? 'i' : '';
      return {
        ...rule,
        filePatterns: override.filePatterns?.map(source => new RegExp(source)) ?? rule.filePatterns,
        markers: override.markers?.map(source => new RegExp(source, markerFlags)) ?? rule.markers,
      };
    }),
  };
}
