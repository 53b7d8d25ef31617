import chalk from 'chalk';
import type { ProgressReporter } from '@servicescape/core';

export const Logger = {
  fail(message: string): void {
    console.error(chalk.red(`❌ ${message}`));
  },
  warn(message: string): void {
    console.warn(chalk.yellow(`⚠️  ${message}`));
  },
  info(message: string): void {
    console.log(chalk.blue(`ℹ️  ${message}`));
  },
  success(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  },
} as const;

/** Prints pipeline progress to stderr so stdout stays free for scripts. */
export class ConsoleProgress implements ProgressReporter {
  constructor(private readonly verbose = false) {}

  section(title: string): void {
    console.error(chalk.bold(`\n${title}`));
  }
  start(message: string): void {
    if (this.verbose) console.error(chalk.cyan(`🔄 ${message}...`));
  }
  succeed(message: string): void {
    console.error(chalk.green(`✓ ${message}`));
  }
  fail(message: string): void {
    console.error(chalk.red(`❌ ${message}`));
  }
  warn(message: string): void {
    console.error(chalk.yellow(`⚠️  ${message}`));
  }
  info(message: string): void {
    console.error(chalk.blue(`ℹ️  ${message}`));
  }
}
