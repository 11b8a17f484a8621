import chalk from 'chalk';
import { GitBridge } from '../../git/bridge.js';
import { resolveConfig, type CliOverrides } from '../../config.js';
import { detectChanges } from '../../runner.js';
import { classifyChanges } from '../../classify/classifier.js';
import { formatClassification } from '../formatters/terminal.js';
import { formatClassificationJson } from '../formatters/json.js';
import { exitWithError } from '../errors.js';

export interface ClassifyOptions extends Pick<CliOverrides, 'event' | 'base' | 'head' | 'strict'> {
  cwd?: string;
  format?: 'terminal' | 'json';
}

export async function classifyCommand(opts: ClassifyOptions = {}, env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const cwd = opts.cwd ?? process.cwd();
  const git = new GitBridge(cwd);

  if (!(await git.isRepo())) {
    console.error(chalk.red('Error: Not inside a Git repository.'));
    process.exit(1);
  }

  try {
    const root = await git.getRepoRoot();
    const config = await resolveConfig({ cwd, root, env, overrides: opts });
    const { range, changeSet, reason } = await detectChanges(config, git);

    if (reason) {
      if (opts.format === 'json') {
        console.log(JSON.stringify({ range, bump: null, reason }, null, 2));
      } else if (reason === 'git-error') {
        console.log(chalk.yellow(`Could not determine changes: ${changeSet.error ?? 'unknown git error'}`));
      } else {
        console.log(chalk.dim('No modified files found.'));
      }
      return;
    }

    const classification = classifyChanges(changeSet, config.rules);
    if (opts.format === 'json') {
      console.log(formatClassificationJson(range, changeSet.files, classification));
      return;
    }
    console.log(formatClassification(range, changeSet.files.length, classification));
  } catch (err) {
    exitWithError(err);
  }
}
