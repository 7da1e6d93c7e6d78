/**
 * Map pipeline errors to exit codes and print them
 */

import kleur from "kleur";
import {
  ConfigError,
  EXIT_CODES,
  ExecutionError,
  ReceiptError,
  SecurityError,
  ValidationError,
} from "@sealbox/shared";

export function exitCodeFor(error: unknown): number {
  if (error instanceof ValidationError) return EXIT_CODES.VALIDATION;
  if (error instanceof SecurityError) return EXIT_CODES.SECURITY;
  if (error instanceof ExecutionError) return EXIT_CODES.EXECUTION;
  if (error instanceof ReceiptError) return EXIT_CODES.RECEIPT;
  if (error instanceof ConfigError) return EXIT_CODES.CONFIG;
  return EXIT_CODES.INTERNAL;
}

export function reportError(error: unknown): number {
  if (error instanceof ExecutionError) {
    console.error(kleur.red(`❌ ${error.label}: ${error.message}`));
    const m = error.metrics;
    console.error(kleur.gray(`   fuel ${m.fuel_used}, memory ${m.memory_mb} MB, ${m.duration_ms} ms, ${m.host_calls} host calls`));
  } else if (
    error instanceof ValidationError ||
    error instanceof SecurityError ||
    error instanceof ReceiptError ||
    error instanceof ConfigError
  ) {
    console.error(kleur.red(`❌ ${error.code}: ${error.message}`));
  } else {
    console.error(kleur.red(`❌ ${error instanceof Error ? error.message : String(error)}`));
  }
  return exitCodeFor(error);
}
