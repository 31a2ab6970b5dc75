/**
 * Levelled console logger for the layersmith CLI.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

class Logger {
  private level: LogLevel = 'info';
  private stepCounter = 0;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    console.log(chalk.gray(`[DEBUG] ${message}`));
    if (data) {
      console.log(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    console.warn(chalk.yellow(`[WARN] ${message}`));
    if (data) {
      console.warn(chalk.yellow(JSON.stringify(data, null, 2)));
    }
  }

  /**
   * Numbered pipeline step, e.g. `[3] Building layer`.
   */
  step(message: string): void {
    this.stepCounter += 1;
    if (!this.shouldLog('info')) return;
    console.log(chalk.cyan.bold(`[${this.stepCounter}] ${message}`));
  }

  /**
   * Indented key/value line under the current step.
   */
  detail(key: string, value: string): void {
    if (!this.shouldLog('info')) return;
    console.log(`    ${chalk.dim(`${key}:`)} ${value}`);
  }

  success(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.green(`✓ ${message}`));
  }

  resetSteps(): void {
    this.stepCounter = 0;
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };
