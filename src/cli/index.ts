#!/usr/bin/env node

/**
 * CLI entry point for the Markdown image localizer
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { localizeCommand } from "./commands/localize";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("md-localize")
  .description(
    "Download remote images referenced by Markdown notes and point the notes at local copies",
  )
  .version("0.1.0");

// Main localization command (default action)
program
  .argument("[root]", "Root directory to scan for Markdown files", ".")
  .option("-c, --config <path>", "Path to custom config file")
  .option(
    "-d, --images-dir <dir>",
    'Directory for images, relative to each document ("." for beside it)',
  )
  .option("-t, --timeout <ms>", "Per-request timeout in milliseconds")
  .option("-r, --retries <count>", "Retries after a failed download")
  .option("--dry-run", "Report what would be localized without fetching or writing")
  .option("--report <path>", "Write a JSON report to this path")
  .option("-v, --verbose", "Verbose output")
  .action(localizeCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
