#!/usr/bin/env node
/**
 * CLI entry point
 */

import { Command } from "commander";
import { initCommand } from "./commands/init.js";
import { keygenCommand, type KeygenOptions } from "./commands/keygen.js";
import { runCommand, type RunOptions } from "./commands/run.js";
import { validateCommand, type ValidateOptions } from "./commands/validate.js";
import { verifyCommand, type VerifyOptions } from "./commands/verify.js";
import { reportError } from "./errors.js";

const program = new Command();

program
  .name("sealbox")
  .description("Run small WebAssembly capsules under hard limits and sign what they did")
  .version("0.1.0");

function limitOptions(command: Command): Command {
  return command
    .option("-c, --config <path>", "Config file path", "sealbox.config.json")
    .option("--max-size <kb>", "Maximum module size in KB")
    .option("--memory <mb>", "Memory limit in MB")
    .option("--timeout <ms>", "Execution time limit in milliseconds")
    .option("--fuel <units>", "Fuel budget")
    .option("--capabilities <list>", "Comma-separated capabilities, e.g. Hash,Json")
    .option("--preset <name>", "Limits preset: default, development or production");
}

function exitWith(pending: Promise<number>): void {
  pending.then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.exitCode = reportError(error);
    }
  );
}

program
  .command("init")
  .description("Create sealbox.config.json")
  .option("--dir <path>", "Project directory", ".")
  .action((options: { dir: string }) => {
    exitWith(initCommand({ dir: options.dir }));
  });

program
  .command("keygen")
  .description("Generate the node's Ed25519 signing keys")
  .option("-c, --config <path>", "Config file path", "sealbox.config.json")
  .option("--keys <dir>", "Key directory (defaults to signing_key_path)")
  .option("--force", "Replace existing keys")
  .action((options: KeygenOptions) => {
    exitWith(keygenCommand(options));
  });

limitOptions(program.command("validate <file>").description("Check a capsule without running it")).action(
  (file: string, options: ValidateOptions) => {
    exitWith(validateCommand(file, options));
  }
);

limitOptions(program.command("run <file>").description("Execute a capsule and sign a receipt"))
  .option("--keys <dir>", "Key directory (defaults to signing_key_path)")
  .option("-i, --input <text>", "Input as UTF-8 text")
  .option("--input-file <path>", "Input read from a file")
  .option("-r, --receipt <path>", "Write the receipt to a file")
  .option("-v, --verbose", "Debug logging")
  .action((file: string, options: RunOptions) => {
    exitWith(runCommand(file, options));
  });

program
  .command("verify <receipt>")
  .description("Verify a receipt's signature, and optionally its commitments and age")
  .option("--public-key <path>", "SPKI PEM key to verify against (defaults to the receipt's node_id)")
  .option("--module <path>", "Capsule the receipt should commit to")
  .option("--input <text>", "Input the receipt should commit to")
  .option("--input-file <path>", "Input file the receipt should commit to")
  .option("--output <text>", "Output the receipt should commit to")
  .option("--output-file <path>", "Output file the receipt should commit to")
  .option("--max-age <seconds>", "Reject receipts older than this")
  .action((receipt: string, options: VerifyOptions) => {
    exitWith(verifyCommand(receipt, options));
  });

program.parse();
