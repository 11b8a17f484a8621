import chalk from 'chalk';

export interface Logger {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  /** Unprefixed continuation line, e.g. one changed file. */
  detail(message: string): void;
}

export function createConsoleLogger(): Logger {
  return {
    log: message => console.log(`${chalk.green('[VERSION]')} ${message}`),
    info: message => console.log(`${chalk.blue('[INFO]')} ${message}`),
    warn: message => console.log(`${chalk.yellow('[WARNING]')} ${message}`),
    detail: message => console.log(chalk.dim(`   ${message}`)),
  };
}

export const silentLogger: Logger = {
  log: () => {},
  info: () => {},
  warn: () => {},
  detail: () => {},
};
