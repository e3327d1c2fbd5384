import chalk from 'chalk';

export interface LoggerOptions {
  prefix?: string;
  silent?: boolean;
}

export class Logger {
  private readonly prefix: string;
  private readonly silent: boolean;

  constructor(options: LoggerOptions = {}) {
    this.prefix = options.prefix ?? '[gradlefix]';
    this.silent = options.silent ?? false;
  }

  info(message: string): void {
    this.write(chalk.blue('ℹ'), message);
  }

  success(message: string): void {
    this.write(chalk.green('✓'), message);
  }

  warning(message: string): void {
    this.write(chalk.yellow('⚠'), message);
  }

  error(message: string): void {
    this.write(chalk.red('✗'), message);
  }

  step(message: string): void {
    this.write(chalk.cyan('→'), message);
  }

  log(message: string): void {
    if (this.silent) return;
    console.log(message);
  }

  newLine(): void {
    if (this.silent) return;
    console.log();
  }

  private write(symbol: string, message: string): void {
    if (this.silent) return;
    console.log(symbol, chalk.gray(this.prefix), message);
  }
}
