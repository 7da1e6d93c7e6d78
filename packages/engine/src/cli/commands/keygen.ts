/**
 * keygen command - writes the node's Ed25519 signing keys
 */

import { resolve } from "node:path";
import kleur from "kleur";
import { EXIT_CODES } from "@sealbox/shared";
import { loadConfig } from "../../config/load.js";
import { hasSigningKeys, keyPaths, writeSigningKeys } from "../../services/keystore.js";

export interface KeygenOptions {
  config?: string;
  keys?: string;
  force?: boolean;
}

export async function keygenCommand(options: KeygenOptions = {}): Promise<number> {
  const config = await loadConfig({ path: options.config });
  const dir = resolve(options.keys ?? config.signing_key_path ?? ".sealbox/keys/");

  if (!options.force && (await hasSigningKeys(dir))) {
    console.log(kleur.yellow(`⚠ Signing keys already exist in ${dir} (use --force to replace)`));
    return EXIT_CODES.OK;
  }

  console.log(kleur.cyan("🔑 Generating Ed25519 signing keys..."));
  const keys = await writeSigningKeys(dir);
  console.log(kleur.gray(`   Private key: ${keyPaths(dir).privateKeyPath}`));
  console.log(kleur.gray(`   Node id:     ${keys.nodeId}`));
  console.log(kleur.gray(`   Fingerprint: ${keys.fingerprint}`));
  return EXIT_CODES.OK;
}
