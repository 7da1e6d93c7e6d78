/**
 * run command - validate, execute and sign a receipt
 */

import { readFile, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import kleur from "kleur";
import { EXIT_CODES, ExecutionError } from "@sealbox/shared";
import { limitsFromConfig, loadConfig } from "../../config/load.js";
import { createLogger } from "../../logger.js";
import { ensureSigningIdentity } from "../../services/keystore.js";
import { serializeReceipt } from "../../services/receipts.js";
import { CapsuleRuntime } from "../../services/runtime.js";
import { reportError } from "../errors.js";
import { flagOverrides, type LimitFlags } from "./options.js";

export interface RunOptions extends LimitFlags {
  config?: string;
  keys?: string;
  input?: string;
  inputFile?: string;
  receipt?: string;
  verbose?: boolean;
}

async function readInput(options: RunOptions): Promise<Uint8Array> {
  if (options.inputFile !== undefined) return new Uint8Array(await readFile(options.inputFile));
  return new TextEncoder().encode(options.input ?? "");
}

export async function runCommand(file: string, options: RunOptions = {}): Promise<number> {
  const config = await loadConfig({ path: options.config, flags: flagOverrides(options) });
  const { identity, created } = await ensureSigningIdentity(
    resolve(options.keys ?? config.signing_key_path ?? ".sealbox/keys/")
  );
  if (created) console.error(kleur.cyan(`🔑 Generated signing keys for node ${identity.nodeId}`));

  const runtime = new CapsuleRuntime({
    identity,
    maxModuleSizeKb: config.max_module_size_kb,
    limits: limitsFromConfig(config),
    failureReceipts: config.failure_receipts,
    nonceSource: config.nonce_source,
    logger: createLogger({ level: options.verbose ? "debug" : "warn", pretty: Boolean(process.stderr.isTTY) }),
  });

  try {
    const result = await runtime.run({ module: new Uint8Array(await readFile(file)), input: await readInput(options) });
    process.stdout.write(Buffer.from(result.output));
    process.stdout.write("\n");

    const receiptJson = serializeReceipt(result.receipt);
    if (options.receipt !== undefined) {
      await writeFile(options.receipt, receiptJson + "\n", "utf-8");
      console.error(kleur.gray(`   Receipt written to ${options.receipt}`));
    } else {
      console.error(receiptJson);
    }
    const m = result.metrics;
    console.error(
      kleur.green(`✅ fuel ${m.fuel_used}, memory ${m.memory_mb} MB, ${m.duration_ms} ms, ${m.host_calls} host calls`)
    );
    return EXIT_CODES.OK;
  } catch (error) {
    if (error instanceof ExecutionError && error.receipt && options.receipt !== undefined) {
      await writeFile(options.receipt, serializeReceipt(error.receipt) + "\n", "utf-8");
    }
    return reportError(error);
  }
}
