#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import { configGetCommand, configSetCommand, configShowCommand } from "./commands/config.js";
import { downloadCommand, type DownloadOptions } from "./commands/download.js";
import { historyCommand, type HistoryOptions } from "./commands/history.js";
import { logoutCommand } from "./commands/logout.js";
import { LectureCapError } from "../shared/errors.js";

function printError(error: unknown): void {
  if (error instanceof LectureCapError) {
    console.error(chalk.red(`\n❌ ${error.message}`));
    if (error.details) {
      console.error(chalk.gray(`   ${error.details}`));
    }
    return;
  }

  console.error(chalk.red("\n❌ Command failed"));
  if (error instanceof Error) {
    console.error(chalk.gray(`   ${error.message}`));
  }
}

// Global error handler to ensure clean exit
process.on("unhandledRejection", (reason) => {
  console.error(chalk.red("\n❌ Unhandled error"));
  printError(reason);
  process.exit(1);
});

// Helper to wrap actions and handle errors
function wrapAction<T extends unknown[]>(
  fn: (...args: T) => Promise<void> | void
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      printError(error);
      process.exit(1);
    }
  };
}

const parseCount = (value: string) => parseInt(value, 10);

const program = new Command();

program
  .name("lecturecap")
  .description("Download recorded lectures for offline viewing")
  .version("0.1.0");

// Download command (default)
program
  .command("download [urls...]", { isDefault: true })
  .description("Download lectures from one or more course links")
  .option("-f, --file <file>", "Read course links from a file (one per line)")
  .option("-a, --all", "Download every lecture without asking")
  .option("-s, --select <spec>", 'Lectures to download, e.g. "1 3-5"')
  .option("-d, --destination <dir>", "Output directory")
  .option("-q, --quality <quality>", "Preferred video quality (highest, lowest, 1080p, 720p, ...)")
  .option("-c, --concurrency <n>", "Parallel downloads", parseCount)
  .option("--history", "Skip videos downloaded in earlier runs")
  .option("-p, --print-source [file]", "List video sources instead of downloading")
  .option("--vault <path>", "Saved session file")
  .option("--no-save-session", "Do not offer to save the session")
  .option("--hide-progress-bar", "Print one line per video instead of progress bars")
  .option("-v, --verbose", "Show debug output")
  .action(wrapAction((urls: string[], options: DownloadOptions) => downloadCommand(urls, options)));

// Logout command
program
  .command("logout")
  .description("Remove the saved session")
  .option("--vault <path>", "Saved session file")
  .action(wrapAction(logoutCommand));

// History command
program
  .command("history [courseId]")
  .description("Show downloaded videos (or clear them with --clear)")
  .option("--clear", "Forget downloaded videos")
  .action(
    wrapAction((courseId: string | undefined, options: HistoryOptions) =>
      historyCommand(courseId, options)
    )
  );

// Config commands
const configCmd = program.command("config").description("Manage configuration");

configCmd.command("show").description("Show all configuration values").action(configShowCommand);

configCmd
  .command("get <key>")
  .description("Get a configuration value")
  .action(wrapAction(configGetCommand));

configCmd
  .command("set <key> <value>")
  .description("Set a configuration value")
  .action(wrapAction(configSetCommand));

// Parse and run
await program.parseAsync();
