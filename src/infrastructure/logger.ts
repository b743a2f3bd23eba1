import ora, { Ora } from 'ora';
import chalk from 'chalk';

export interface LoggerOptions {
  debug?: boolean;
  prefix?: string;
}

export class Logger {
  spinner: Ora | null = null;
  private readonly isDebugEnabled: boolean;
  private prefix: string;
  /**
   * Creates an instance of Logger.
   * @param options - Configuration options for the logger.
   * @param options.debug - Enable debug logging (default: false).
   * @param options.prefix - Label printed in brackets before every line.
   */
  constructor(options: LoggerOptions = {}) {
    this.isDebugEnabled = options.debug ?? false;
    this.prefix = options.prefix ?? '';
  }

  /**
   * Returns a logger for a sub-component. The label is appended to this logger's prefix
   * and the debug setting is inherited; this logger is left untouched.
   */
  child(prefix: string): Logger {
    return new Logger({
      debug: this.isDebugEnabled,
      prefix: this.prefix ? `${this.prefix} > ${prefix}` : prefix,
    });
  }

  /**
   * Logs an informational message.
   * Stops the spinner temporarily if active.
   * @param messages - The message(s) to log.
   */
  info(...messages: unknown[]): void {
    const formattedMessage = messages.map((msg) => `${this.label()} ${chalk.blue(String(msg))}`).join(' ');

    if (this.spinner?.isSpinning) {
      this.spinner.stopAndPersist({ text: formattedMessage, symbol: 'ℹ️' });
      this.spinner = null;
    } else {
      console.info(formattedMessage);
    }
  }

  /**
   * Prints the command line a stage is about to run.
   */
  snippet(codeString: string): void {
    const lines = codeString.split('\n');
    const maxLength = Math.max(...lines.map((line) => line.length));
    const borderLength = Math.min(maxLength + 2, 20);
    const border = `=${'='.repeat(borderLength)}=`;

    console.log(chalk.cyan(`${border}{${this.prefix}} command${border}`));
    lines.forEach((line) => {
      console.log(chalk.grey(line));
    });
    console.log(chalk.cyan(border));
  }

  /**
   * Logs a warning message.
   * Stops the spinner temporarily if active.
   * @param messages - The warning message(s).
   */
  warn(...messages: unknown[]): void {
    const formattedMessage = messages.map((msg) => `${this.label()} ${chalk.yellow(String(msg))}`).join(' ');

    if (this.spinner?.isSpinning) {
      this.spinner.warn(formattedMessage);
      this.spinner = null;
    } else {
      console.warn(`⚠️ ${formattedMessage}`);
    }
  }

  /**
   * Logs an error message.
   * Fails the spinner if active. Stack traces are printed only with debug enabled.
   * @param messages - The error message(s) or Error object(s).
   */
  error(...messages: unknown[]): void {
    const formattedMessages = messages
      .map((msg) => (msg instanceof Error ? msg.message : String(msg)))
      .map((msg) => `${this.label()} ${chalk.red(msg)}`)
      .join(' ');

    if (this.spinner?.isSpinning) {
      this.spinner.fail(formattedMessages);
      this.spinner = null;
    } else {
      console.error(`✖ ${formattedMessages}`);
    }
    messages.forEach((msg) => {
      if (msg instanceof Error && msg.stack && this.isDebugEnabled) {
        console.error(chalk.red(msg.stack));
      }
    });
  }

  /**
   * Logs a debug message only if debug mode is enabled.
   * @param messages - The debug message(s).
   */
  debug(...messages: unknown[]): void {
    if (!this.isDebugEnabled) {
      return;
    }
    const formattedMessage = messages
      .map((msg) => `${this.label()} ${chalk.grey(`[Debug] ${String(msg)}`)}`)
      .join(' ');

    if (this.spinner?.isSpinning) {
      this.spinner.stop();
      console.debug(formattedMessage);
      this.spinner.start();
    } else {
      console.debug(formattedMessage);
    }
  }

  /**
   * Starts a new spinner.
   * If a spinner is already active, it will be stopped first.
   * @param message - The initial message for the spinner.
   */
  startSpinner(message: string): void {
    if (this.spinner?.isSpinning) {
      this.spinner.stop();
    }
    this.spinner = ora(`${this.label()} ${message}`).start();
  }

  /**
   * Stops the active spinner and removes it from the console.
   * Does nothing if no spinner is active.
   */
  stopSpinner(): void {
    if (this.spinner?.isSpinning) {
      this.spinner.stop();
    }
    this.spinner = null;
  }

  /**
   * Stops the active spinner with a success symbol (✔).
   * Without a running spinner (e.g. no TTY in a cron container) the message goes to the info log.
   * @param message - Final message.
   */
  succeedSpinner(message: string): void {
    if (this.spinner?.isSpinning) {
      this.spinner.succeed(`${this.label()} ${message}`);
    } else {
      console.info(`✔ ${this.label()} ${chalk.blue(message)}`);
    }
    this.spinner = null;
  }

  private label(): string {
    return chalk.green(`[${this.prefix}]`);
  }
}
