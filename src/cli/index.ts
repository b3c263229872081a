#!/usr/bin/env node

/**
 * CLI entry point for docbatch
 * Handles command-line argument parsing and user interaction
 */

import "dotenv/config";
import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("docbatch")
  .description("Batch-convert a directory of documents to Markdown")
  .version("0.1.0");

// Main conversion command (default action)
program
  .option("-i, --input <path>", "Input directory containing documents")
  .option("-o, --output <path>", "Output directory for converted files")
  .option("-b, --backend <name>", "Conversion backend (docling, marker, llamaparse, html)")
  .option("-f, --format <format>", "Result format (markdown, text, both)")
  .option("-w, --workers <count>", "Maximum concurrent conversions")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--skip-images", "Do not extract figure/page images")
  .option("--metadata", "Write <name>_meta.json next to each result")
  .option("--timeout <ms>", "Per-document time limit in milliseconds")
  .option("-v, --verbose", "Verbose output")
  .action(convertCommand);

// Config command - show config location and effective settings
program
  .command("config")
  .description("Show the configuration file location and effective settings")
  .option("-c, --config <path>", "Path to custom config file")
  .action(configCommand);

await program.parseAsync();
