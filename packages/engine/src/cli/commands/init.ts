/**
 * init command - creates sealbox.config.json
 */

import { access, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import kleur from "kleur";
import { DEFAULT_CONFIG, EXIT_CODES } from "@sealbox/shared";
import { CONFIG_FILE_NAME } from "../../config/load.js";

export async function initCommand(options: { dir?: string } = {}): Promise<number> {
  const configPath = resolve(options.dir ?? process.cwd(), CONFIG_FILE_NAME);

  // Check if config already exists
  const exists = await access(configPath).then(
    () => true,
    () => false
  );
  if (exists) {
    console.log(kleur.yellow(`⚠ ${CONFIG_FILE_NAME} already exists`));
    return EXIT_CODES.OK;
  }

  await writeFile(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2) + "\n", "utf-8");

  console.log(kleur.green(`✅ Created ${CONFIG_FILE_NAME}`));
  console.log("\nNext steps:");
  console.log("  1. Run: sealbox keygen");
  console.log("  2. Run: sealbox run capsule.wasm --input '{}'");
  return EXIT_CODES.OK;
}
