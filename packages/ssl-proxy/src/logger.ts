import chalk from "chalk";
import type { Logger } from "./types.js";

/** Logger that writes colored lines to the terminal. */
export function createConsoleLogger(): Logger {
  return {
    info: (message) => console.log(message),
    success: (message) => console.log(chalk.green(message)),
    warn: (message) => console.warn(chalk.yellow(message)),
    error: (message) => console.error(chalk.red(message)),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  info: () => {},
  success: () => {},
  warn: () => {},
  error: () => {},
};
