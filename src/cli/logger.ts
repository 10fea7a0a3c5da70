import chalk from "chalk";
import type { ReportLogger } from "../lib/report/types";

export interface CliLogger extends ReportLogger {
  error(message: string): void;
}

export const cliLogger: CliLogger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(chalk.yellow(`Warning: ${message}`)),
  error: (message) => console.error(chalk.red(`Error: ${message}`)),
};
