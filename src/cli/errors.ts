import chalk from 'chalk';
import { describeError } from '../errors.js';

export function exitWithError(err: unknown): never {
  console.error(chalk.red(`Error: ${describeError(err)}`));
  process.exit(1);
}
