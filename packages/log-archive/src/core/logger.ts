import chalk from 'chalk';

export type LoggerOptions = {
  write?: (line: string) => void;
  color?: boolean;
};

export class Logger {
  private write: (line: string) => void;
  private paint: chalk.Chalk;

  constructor(options: LoggerOptions = {}) {
    this.write = options.write ?? ((line) => console.log(line));
    this.paint = options.color === false ? new chalk.Instance({ level: 0 }) : chalk;
  }

  info(message: string): void {
    this.write(`${this.paint.blue('ℹ')} ${message}`);
  }

  success(message: string): void {
    this.write(`${this.paint.green('✓')} ${message}`);
  }

  warning(message: string): void {
    this.write(`${this.paint.yellow('⚠')} ${message}`);
  }

  error(message: string): void {
    this.write(`${this.paint.red('✗')} ${message}`);
  }

  step(message: string): void {
    this.write(`${this.paint.cyan('→')} ${message}`);
  }

  // one line per action that a real run would perform
  dryRun(message: string): void {
    this.write(`${this.paint.magenta('[dry-run]')} ${message}`);
  }

  log(message: string): void {
    this.write(message);
  }

  newLine(): void {
    this.write('');
  }
}
