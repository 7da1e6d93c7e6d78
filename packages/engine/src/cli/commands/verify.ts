/**
 * verify command - check a receipt's signature, commitments and age
 */

import { readFile } from "node:fs/promises";
import kleur from "kleur";
import { EXIT_CODES, ValidationError } from "@sealbox/shared";
import { parseReceipt, verifyReceiptDetailed, type DetailedVerificationOptions } from "../../services/receipts.js";
import { reportError } from "../errors.js";

export interface VerifyOptions {
  publicKey?: string;
  module?: string;
  input?: string;
  inputFile?: string;
  output?: string;
  outputFile?: string;
  maxAge?: string;
}

async function bytesOf(text: string | undefined, file: string | undefined): Promise<Uint8Array | undefined> {
  if (file !== undefined) return new Uint8Array(await readFile(file));
  return text === undefined ? undefined : new TextEncoder().encode(text);
}

export async function verifyCommand(receiptFile: string, options: VerifyOptions = {}): Promise<number> {
  try {
    const receipt = parseReceipt(await readFile(receiptFile, "utf-8"));
    const checks: DetailedVerificationOptions = {};
    if (options.publicKey !== undefined) checks.publicKey = await readFile(options.publicKey, "utf-8");
    if (options.maxAge !== undefined) {
      const maxAge = Number(options.maxAge);
      if (!Number.isFinite(maxAge) || maxAge < 0) {
        throw new ValidationError("Malformed", `--max-age must be a non-negative number, got "${options.maxAge}"`);
      }
      checks.maxAgeSeconds = maxAge;
    }

    const input = await bytesOf(options.input, options.inputFile);
    const output = await bytesOf(options.output, options.outputFile);
    if (options.module !== undefined && input !== undefined && output !== undefined) {
      checks.artifacts = { module: new Uint8Array(await readFile(options.module)), input, output };
    }

    const verification = await verifyReceiptDetailed(receipt, checks);
    if (!verification.valid) {
      console.log(kleur.red(`❌ Receipt rejected: ${verification.errors.join(", ")}`));
      return EXIT_CODES.RECEIPT;
    }
    console.log(kleur.green("✅ Receipt verified"));
    console.log(kleur.gray(`   Node:   ${receipt.node_id}`));
    console.log(kleur.gray(`   Capsule: ${receipt.capsule_id}`));
    if (!checks.artifacts) console.log(kleur.gray("   Commitments not checked (pass --module, --input and --output)"));
    return EXIT_CODES.OK;
  } catch (error) {
    return reportError(error);
  }
}
