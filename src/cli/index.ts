#!/usr/bin/env -S npx tsx

/**
 * CLI entry point for pdf-assemble
 * Handles command-line argument parsing and exit codes
 */

import { Command } from "commander";
import { mergeCommand } from "./commands/merge";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("pdf-assemble")
  .description("Merge PDFs, images and text files into a single PDF")
  .version("0.1.0");

// Main merge command (default action)
program
  .argument("<inputs...>", "Input files in the desired page order")
  .requiredOption("-o, --output <path>", "Output PDF file path")
  .option("-f, --force", "Overwrite output if it exists")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(async (inputs: string[], opts: unknown) => {
    process.exitCode = await mergeCommand(inputs, opts);
  });

// Config command - show config location and effective values
program
  .command("config")
  .description("Show the user config location and the configuration in effect")
  .argument("[file]", "Custom config file to layer on top")
  .action(async (file?: string) => {
    await configCommand(file);
  });

await program.parseAsync();
