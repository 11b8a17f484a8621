// Model types
export type { SemVer, VersionBump } from './model/version.js';
export type { ChangeRange, ChangeSet, ClassificationRule } from './model/change.js';
export { parseSemVer, formatSemVer, bumpSemVer } from './model/version.js';

// Classification
export { classifyChanges } from './classify/classifier.js';
export type { Classification } from './classify/classifier.js';
export { createDefaultRules, applyRuleOverrides, BREAKING_RULE, FEATURE_RULE, MAINTENANCE_RULE } from './classify/rules.js';
export type { BumpRule, RuleTable, RuleOverride, RuleOverrides } from './classify/rules.js';

// Git
export { GitBridge, parseNameOnly } from './git/bridge.js';
export { resolveChangeRange, PUSH_RANGE } from './git/range.js';
export type { ChangeSource } from './git/types.js';

// Files
export { findVersionLine, replaceVersion, readBuildVersion, writeBuildVersion } from './build-file/version-line.js';
export type { VersionLine } from './build-file/version-line.js';
export { formatVersionInfo, writeVersionInfo, parseVersionInfo } from './status/version-info.js';
export type { VersionInfoRecord } from './status/version-info.js';

// Configuration and running
export { configFromEnv, loadConfigFile, resolveConfig, parseEventKind, DEFAULT_BUILD_FILE, DEFAULT_INFO_FILE } from './config.js';
export type { RunConfig, EventKind, EnvConfig, FileConfig, CliOverrides } from './config.js';
export { run, detectChanges } from './runner.js';
export type { RunOutcome } from './runner.js';

// Errors and logging
export { VerbumpError, ConfigError, ChangeSetError, VersionReadError, VersionVerifyError } from './errors.js';
export type { VerbumpErrorKind } from './errors.js';
export { createConsoleLogger, silentLogger } from './utils/log.js';
export type { Logger } from './utils/log.js';
