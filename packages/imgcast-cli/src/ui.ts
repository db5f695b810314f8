import chalk from 'chalk';
import { ImgcastError, describeError } from '@imgcast/core';

export function success(msg: string): void {
  console.log(chalk.green('  ✓') + ' ' + msg);
}

export function info(msg: string): void {
  console.log(chalk.dim('  ~') + ' ' + msg);
}

export function step(msg: string): void {
  console.log(chalk.cyan('  →') + ' ' + msg);
}

export function warn(msg: string): void {
  console.error(chalk.yellow('  ✗') + ' ' + msg);
}

/** Typed errors print their code and target; anything else just its message. */
export function failure(error: unknown): void {
  if (error instanceof ImgcastError) {
    console.error(chalk.red(`Error [${error.code}]:`), error.message);
    console.error(chalk.dim(`  target: ${error.target}`));
    return;
  }
  console.error(chalk.red('Error:'), describeError(error));
}
