#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { bumpCommand } from '../src/cli/commands/bump.js';
import { classifyCommand } from '../src/cli/commands/classify.js';
import { currentCommand } from '../src/cli/commands/current.js';
import { parseEventKind, type EventKind } from '../src/config.js';

function parseFormat(value: string): 'terminal' | 'json' {
  if (value === 'terminal' || value === 'json') return value;
  throw new InvalidArgumentError('Expected terminal or json.');
}

function parseEvent(value: string): EventKind {
  try {
    return parseEventKind(value);
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
}

interface RangeFlags {
  format: 'terminal' | 'json';
  cwd?: string;
  event?: EventKind;
  base?: string;
  head?: string;
  strict?: boolean;
}

const program = new Command();

program
  .name('verbump')
  .description('Bump a build file version from the changes between two git refs')
  .version('0.1.0');

program
  .command('bump', { isDefault: true })
  .description('Classify changes, rewrite the version line and write the status file')
  .option('-f, --format <format>', 'Output format: terminal or json', parseFormat, 'terminal')
  .option('--cwd <dir>', 'Repository directory')
  .option('--file <path>', 'Build file holding the version line (default build.gradle)')
  .option('--info-file <path>', 'Status file to write (default .version_info)')
  .option('--event <kind>', 'pull_request or push (default from GITHUB_EVENT_NAME)', parseEvent)
  .option('--base <ref>', 'Base ref for pull request runs (default GITHUB_BASE_REF)')
  .option('--head <ref>', 'Head ref for pull request runs (default GITHUB_HEAD_REF)')
  .option('--strict', 'Fail when git cannot report the changes')
  .option('--dry-run', 'Compute the new version without writing files')
  .action(async (opts: RangeFlags & { file?: string; infoFile?: string; dryRun?: boolean }) => {
    await bumpCommand({
      format: opts.format,
      cwd: opts.cwd,
      file: opts.file,
      infoFile: opts.infoFile,
      event: opts.event,
      base: opts.base,
      head: opts.head,
      strict: opts.strict,
      dryRun: opts.dryRun,
    });
  });

program
  .command('classify')
  .description('Show which bump the changes call for, without touching any file')
  .option('-f, --format <format>', 'Output format: terminal or json', parseFormat, 'terminal')
  .option('--cwd <dir>', 'Repository directory')
  .option('--event <kind>', 'pull_request or push (default from GITHUB_EVENT_NAME)', parseEvent)
  .option('--base <ref>', 'Base ref for pull request runs')
  .option('--head <ref>', 'Head ref for pull request runs')
  .option('--strict', 'Fail when git cannot report the changes')
  .action(async (opts: RangeFlags) => {
    await classifyCommand({
      format: opts.format,
      cwd: opts.cwd,
      event: opts.event,
      base: opts.base,
      head: opts.head,
      strict: opts.strict,
    });
  });

program
  .command('current')
  .description('Print the version declared in the build file')
  .option('-f, --format <format>', 'Output format: terminal or json', parseFormat, 'terminal')
  .option('--cwd <dir>', 'Repository directory')
  .option('--file <path>', 'Build file holding the version line (default build.gradle)')
  .action(async (opts: { format: 'terminal' | 'json'; cwd?: string; file?: string }) => {
    await currentCommand({ format: opts.format, cwd: opts.cwd, file: opts.file });
  });

await program.parseAsync();
