import type { ChangeRange, ChangeSet } from './model/change.js';
import type { ChangeSource } from './git/types.js';
import type { RunConfig } from './config.js';
import { resolveChangeRange } from './git/range.js';
import { classifyChanges, type Classification } from './classify/classifier.js';
import { bumpSemVer, formatSemVer } from './model/version.js';
import { readBuildVersion, writeBuildVersion } from './build-file/version-line.js';
import { writeVersionInfo, type VersionInfoRecord } from './status/version-info.js';
import { ChangeSetError } from './errors.js';
import { silentLogger, type Logger } from './utils/log.js';
import { displayPath } from './utils/path.js';

export type RunOutcome =
  | { status: 'unchanged'; range: ChangeRange; reason: 'no-files' | 'git-error' }
  | {
      status: 'bumped';
      range: ChangeRange;
      changeSet: ChangeSet;
      classification: Classification;
      record: VersionInfoRecord;
      /** False for dry runs: nothing was written. */
      written: boolean;
    };

const BUMP_LABELS = {
  MAJOR: 'MAJOR changes detected (breaking changes)',
  MINOR: 'MINOR changes detected (new features)',
  PATCH: 'PATCH changes detected (fixes and improvements)',
} as const;

/**
 * Read the changes for the configured range and classify them. Stops short of
 * touching the build file. Returns undefined when there is nothing to version.
 */
export async function detectChanges(
  config: RunConfig,
  source: ChangeSource,
  logger: Logger = silentLogger,
): Promise<{ range: ChangeRange; changeSet: ChangeSet; reason?: 'no-files' | 'git-error' }> {
  const range = resolveChangeRange(config);
  logger.log(config.event === 'pull_request' ? 'Analyzing changes in Pull Request...' : 'Analyzing changes in direct push...');
  logger.info(`Comparing ${range.base}..${range.head}`);

  const changeSet = await source.readChangeSet(range);

  if (changeSet.error) {
    if (config.strict) {
      throw new ChangeSetError(`Could not determine changes between ${range.base} and ${range.head}: ${changeSet.error}`);
    }
    logger.warn(`Could not determine changes (${changeSet.error}); treating as no modified files`);
    return { range, changeSet, reason: 'git-error' };
  }

  if (changeSet.files.length === 0) {
    logger.warn('No modified files found');
    return { range, changeSet, reason: 'no-files' };
  }

  logger.log('Modified files:');
  for (const file of changeSet.files) logger.detail(file);

  return { range, changeSet };
}

export async function run(config: RunConfig, source: ChangeSource, logger: Logger = silentLogger): Promise<RunOutcome> {
  const { range, changeSet, reason } = await detectChanges(config, source, logger);
  if (reason) return { status: 'unchanged', range, reason };

  const classification = classifyChanges(changeSet, config.rules);
  logger.log(
    classification.rule === 'default'
      ? 'Assuming PATCH changes (default)'
      : BUMP_LABELS[classification.bump],
  );

  const buildFile = displayPath(config.buildFile, config.cwd);
  const current = await readBuildVersion(config.buildFile);
  const next = bumpSemVer(current, classification.bump);
  const oldVersion = formatSemVer(current);
  const newVersion = formatSemVer(next);
  logger.log(`Current version: ${oldVersion}`);
  logger.log(`New version calculated: ${newVersion} (${classification.bump})`);

  const record: VersionInfoRecord = {
    versionType: classification.bump,
    oldVersion,
    newVersion,
    changesDetected: true,
    prDetected: config.event === 'pull_request',
  };

  if (config.dryRun) {
    logger.info(`Dry run: ${buildFile} and ${displayPath(config.infoFile, config.cwd)} left untouched`);
    return { status: 'bumped', range, changeSet, classification, record, written: false };
  }

  logger.log(`Updating ${buildFile}...`);
  await writeBuildVersion(config.buildFile, next);
  logger.log(`Version updated successfully: ${oldVersion} → ${newVersion}`);

  await writeVersionInfo(config.infoFile, record);

  logger.log('Change summary:');
  logger.detail(`Version type: ${record.versionType}`);
  logger.detail(`Previous version: ${oldVersion}`);
  logger.detail(`New version: ${newVersion}`);
  logger.detail(`Modified files: ${changeSet.files.length}`);

  if (record.prDetected) {
    logger.log('Pull Request detected - version will be updated on merge');
  } else {
    logger.log('Direct push detected - preparing commit for new version');
  }

  return { status: 'bumped', range, changeSet, classification, record, written: true };
}
