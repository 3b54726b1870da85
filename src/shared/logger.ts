import chalk from "chalk";

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

let verbose = process.env.LECTURECAP_VERBOSE === "1";

/**
 * Enables or disables debug output for every logger.
 */
export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

/**
 * Creates a console logger tagged with a scope.
 * Debug lines only appear in verbose mode. Never pass cookies or credentials.
 */
export function createLogger(scope: string): Logger {
  const tag = chalk.gray(`[${scope}]`);
  return {
    debug: (message) => {
      if (verbose) console.log(`${chalk.magenta("DEBUG")} ${tag} ${chalk.gray(message)}`);
    },
    info: (message) => {
      console.log(message);
    },
    warn: (message) => {
      console.warn(`${chalk.yellow("WARN")} ${tag} ${message}`);
    },
    error: (message) => {
      console.error(`${chalk.red("ERROR")} ${tag} ${message}`);
    },
  };
}

/**
 * Logger that drops everything. Handy for tests and library callers.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
