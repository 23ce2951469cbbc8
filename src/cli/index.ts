#!/usr/bin/env -S node --import tsx

/**
 * CLI entry point for the document normalizer
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("docnorm")
  .description(
    "Normalize extracted documents (IR JSON) into cross-linked MkDocs Markdown",
  )
  .version("0.1.0");

// Main conversion command (default action)
program
  .option("-i, --input <path>", "Input directory containing *.ir.json files")
  .option("-o, --output <path>", "Output directory for Markdown files")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-j, --concurrency <number>", "Number of documents processed in parallel")
  .option("--no-front-matter", "Do not add YAML front matter to pages")
  .option("--mkdocs-nav", "Write an mkdocs.yml nav snippet")
  .option("-v, --verbose", "Verbose output")
  .action(convertCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

program.parse();
