import chalk from 'chalk';
import { GitBridge } from '../../git/bridge.js';
import { resolveConfig, type CliOverrides } from '../../config.js';
import { run } from '../../runner.js';
import { createConsoleLogger, silentLogger } from '../../utils/log.js';
import { formatOutcome } from '../formatters/terminal.js';
import { formatOutcomeJson } from '../formatters/json.js';
import { exitWithError } from '../errors.js';

export interface BumpOptions extends CliOverrides {
  cwd?: string;
  format?: 'terminal' | 'json';
}

export async function bumpCommand(opts: BumpOptions = {}, env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const cwd = opts.cwd ?? process.cwd();
  const git = new GitBridge(cwd);

  if (!(await git.isRepo())) {
    console.error(chalk.red('Error: Not inside a Git repository.'));
    process.exit(1);
  }

  const logger = opts.format === 'json' ? silentLogger : createConsoleLogger();

  try {
    const root = await git.getRepoRoot();
    const config = await resolveConfig({ cwd, root, env, overrides: opts });
    const outcome = await run(config, git, logger);

    if (opts.format === 'json') {
      console.log(formatOutcomeJson(outcome));
      return;
    }

    console.log('');
    console.log(formatOutcome(outcome));
    if (outcome.status === 'bumped') {
      console.log('');
      logger.log(chalk.green('Semantic versioning completed!'));
    }
  } catch (err) {
    exitWithError(err);
  }
}
