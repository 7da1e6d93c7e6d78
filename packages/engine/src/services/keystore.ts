/**
 * On-disk signing keys: <dir>/signing.key (PKCS8) and <dir>/signing.pub (SPKI)
 */

import { access, mkdir, readFile, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import {
  generateSigningKeys,
  loadSigningIdentity,
  type ExportedSigningKeys,
  type SigningIdentity,
} from "./crypto.js";

export const PRIVATE_KEY_FILE = "signing.key";
export const PUBLIC_KEY_FILE = "signing.pub";

export function keyPaths(dir: string): { privateKeyPath: string; publicKeyPath: string } {
  return {
    privateKeyPath: resolve(dir, PRIVATE_KEY_FILE),
    publicKeyPath: resolve(dir, PUBLIC_KEY_FILE),
  };
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function hasSigningKeys(dir: string): Promise<boolean> {
  return exists(keyPaths(dir).privateKeyPath);
}

/**
 * Generate and write a fresh key pair, replacing any existing one
 */
export async function writeSigningKeys(dir: string): Promise<ExportedSigningKeys> {
  const { privateKeyPath, publicKeyPath } = keyPaths(dir);
  await mkdir(dir, { recursive: true });
  const keys = await generateSigningKeys();
  await writeFile(privateKeyPath, keys.privateKey, { encoding: "utf-8", mode: 0o600 });
  await writeFile(publicKeyPath, keys.publicKey, "utf-8");
  return keys;
}

export async function readSigningIdentity(dir: string): Promise<SigningIdentity> {
  const { privateKeyPath, publicKeyPath } = keyPaths(dir);
  const [privateKeyPem, publicKeyPem] = await Promise.all([
    readFile(privateKeyPath, "utf-8"),
    readFile(publicKeyPath, "utf-8"),
  ]);
  return loadSigningIdentity(privateKeyPem, publicKeyPem);
}

/**
 * Load the node's identity, generating keys on first use
 */
export async function ensureSigningIdentity(dir: string): Promise<{ identity: SigningIdentity; created: boolean }> {
  if (await hasSigningKeys(dir)) {
    return { identity: await readSigningIdentity(dir), created: false };
  }
  await writeSigningKeys(dir);
  return { identity: await readSigningIdentity(dir), created: true };
}
