import chalk from "chalk";

type LogLevel = "info" | "success" | "warn" | "error" | "debug";

const LOG_PREFIXES: Record<LogLevel, string> = {
  info: chalk.blue("ℹ"),
  success: chalk.green("✓"),
  warn: chalk.yellow("⚠"),
  error: chalk.red("✗"),
  debug: chalk.gray("⋯"),
};

type LogFn = (message: string, ...args: unknown[]) => void;

export type SymbolLogger = Record<"info" | "warn" | "error" | "debug", LogFn>;

class Logger {
  private verbose = false;

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  info(message: string, ...args: unknown[]): void {
    console.log(`${LOG_PREFIXES.info} ${message}`, ...args);
  }

  success(message: string, ...args: unknown[]): void {
    console.log(`${LOG_PREFIXES.success} ${chalk.green(message)}`, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(`${LOG_PREFIXES.warn} ${chalk.yellow(message)}`, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(`${LOG_PREFIXES.error} ${chalk.red(message)}`, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.verbose) {
      console.log(`${LOG_PREFIXES.debug} ${chalk.gray(message)}`, ...args);
    }
  }

  /** Same levels, with every line tagged by the symbol it concerns. */
  symbol(symbol: string): SymbolLogger {
    const tag = chalk.bold(symbol.toUpperCase());
    return {
      info: (message, ...args) => this.info(`${tag} ${message}`, ...args),
      warn: (message, ...args) => this.warn(`${tag} ${message}`, ...args),
      error: (message, ...args) => this.error(`${tag} ${message}`, ...args),
      debug: (message, ...args) => this.debug(`${tag} ${message}`, ...args),
    };
  }

  header(title: string): void {
    console.log();
    console.log(chalk.bold.cyan(title));
    console.log(chalk.gray("─".repeat(60)));
  }
}

export const logger = new Logger();
