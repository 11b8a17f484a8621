import chalk from 'chalk';
import type { RunOutcome } from '../../runner.js';
import type { Classification } from '../../classify/classifier.js';
import type { ChangeRange } from '../../model/change.js';
import type { VersionBump } from '../../model/version.js';

const BUMP_COLORS: Record<VersionBump, (text: string) => string> = {
  MAJOR: chalk.red,
  MINOR: chalk.yellow,
  PATCH: chalk.green,
};

const WIDTH = 55;

function box(title: string, body: string[]): string {
  const header = `─ ${title} `;
  const lines = [chalk.dim(`┌${header}${'─'.repeat(Math.max(0, WIDTH - header.length))}`)];
  for (const line of body) {
    lines.push(chalk.dim('│  ') + line);
  }
  lines.push(chalk.dim('└' + '─'.repeat(WIDTH)));
  return lines.join('\n');
}

function describeClassification(classification: Classification): string {
  if (classification.rule === 'default') {
    return chalk.dim('no rule matched, default bump');
  }
  const count = classification.matchedFiles.length;
  return chalk.dim(`rule ${classification.rule} · ${count} matching file${count !== 1 ? 's' : ''}`);
}

export function formatClassification(range: ChangeRange, fileCount: number, classification: Classification): string {
  const color = BUMP_COLORS[classification.bump];
  return box(`${range.base}..${range.head}`, [
    `${color(chalk.bold(classification.bump))}  ${describeClassification(classification)}`,
    chalk.dim(`${fileCount} modified file${fileCount !== 1 ? 's' : ''}`),
  ]);
}

export function formatOutcome(outcome: RunOutcome): string {
  if (outcome.status === 'unchanged') {
    return chalk.dim(outcome.reason === 'git-error' ? 'Could not determine changes; nothing to version.' : 'Nothing to version.');
  }

  const { record, classification, range, changeSet } = outcome;
  const color = BUMP_COLORS[record.versionType];
  const body = [
    `${color(chalk.bold(record.versionType))}  ${record.oldVersion} → ${chalk.bold(record.newVersion)}`,
    describeClassification(classification),
    chalk.dim(`${changeSet.files.length} modified file${changeSet.files.length !== 1 ? 's' : ''}`),
  ];
  if (!outcome.written) {
    body.push(chalk.yellow('dry run, nothing written'));
  }
  return box(`${range.base}..${range.head}`, body);
}
