import chalk from "chalk";

const originalConsole = {
  log: console.log.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
};

let isVerbose = false;

export function setVerboseMode(verbose: boolean): void {
  isVerbose = verbose;
}

function logWith(method: "log" | "warn" | "error", args: unknown[]): void {
  originalConsole[method](...args);
}

export const logger = {
  debug(...args: unknown[]): void {
    if (!isVerbose) {
      return;
    }
    logWith("log", args);
  },
  info(...args: unknown[]): void {
    logWith("log", args);
  },
  warn(...args: unknown[]): void {
    logWith("warn", args);
  },
  error(...args: unknown[]): void {
    logWith("error", args);
  },
};

export type ScopedLogger = Record<keyof typeof logger, (message: string) => void>;

/**
 * Logger that prefixes every line with `[scope]`, e.g. a worker id
 */
export function scopedLogger(scope: string): ScopedLogger {
  const tag = `[${scope}]`;
  return {
    debug: (message) => logger.debug(chalk.gray(`${tag} ${message}`)),
    info: (message) => logger.info(chalk.gray(tag), message),
    warn: (message) => logger.warn(chalk.yellow(`${tag} ${message}`)),
    error: (message) => logger.error(chalk.red(`${tag} ${message}`)),
  };
}

export function installConsoleBridge(): void {
  console.log = (...args: unknown[]) => logger.info(...args);
  console.warn = (...args: unknown[]) => logger.warn(...args);
  console.error = (...args: unknown[]) => logger.error(...args);
}
