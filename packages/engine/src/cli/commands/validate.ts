/**
 * validate command - static checks on a capsule without running it
 */

import { readFile } from "node:fs/promises";
import kleur from "kleur";
import { EXIT_CODES } from "@sealbox/shared";
import { CapsuleValidator } from "../../capsule/validator.js";
import { limitsFromConfig, loadConfig } from "../../config/load.js";
import { flagOverrides, type LimitFlags } from "./options.js";

export interface ValidateOptions extends LimitFlags {
  config?: string;
}

export async function validateCommand(file: string, options: ValidateOptions = {}): Promise<number> {
  const config = await loadConfig({ path: options.config, flags: flagOverrides(options) });
  const bytes = new Uint8Array(await readFile(file));
  const validator = new CapsuleValidator({ maxModuleSizeKb: config.max_module_size_kb });
  const result = validator.validate(bytes, limitsFromConfig(config));

  console.log(kleur.gray(`   Size:    ${result.sizeKb.toFixed(2)} KB (${result.sizeBytes} bytes)`));
  console.log(kleur.gray(`   Exports: ${result.exports.join(", ") || "(none)"}`));
  console.log(
    kleur.gray(`   Imports: ${result.imports.map((i) => `${i.namespace}::${i.name}`).join(", ") || "(none)"}`)
  );
  for (const warning of result.warnings) console.log(kleur.yellow(`⚠ ${warning}`));

  if (!result.valid) {
    console.log(kleur.red(`❌ ${result.error.code}: ${result.error.message}`));
    return EXIT_CODES.VALIDATION;
  }
  console.log(kleur.green(`✅ ${file} is a valid capsule`));
  return EXIT_CODES.OK;
}
