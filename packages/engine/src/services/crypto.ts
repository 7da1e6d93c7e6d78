/**
 * Cryptography utilities (Ed25519 node identity, SHA-256 commitments)
 */

import {
  base64url,
  exportJWK,
  exportPKCS8,
  exportSPKI,
  generateKeyPair,
  importJWK,
  importPKCS8,
  importSPKI,
  type KeyLike,
} from "jose";
import { createHash } from "node:crypto";
import { RECEIPT_FORMAT } from "@sealbox/shared";

export interface SigningIdentity {
  privateKey: KeyLike;
  publicKey: KeyLike;
  /** Raw Ed25519 public key, lowercase hex */
  nodeId: string;
}

export interface ExportedSigningKeys {
  publicKey: string;
  privateKey: string;
  nodeId: string;
  fingerprint: string;
}

export function sha256Hex(bytes: Uint8Array | string): string {
  return createHash("sha256").update(bytes).digest("hex");
}

export async function createSigningIdentity(): Promise<SigningIdentity> {
  const { publicKey, privateKey } = await generateKeyPair("EdDSA", {
    crv: "Ed25519",
    extractable: true,
  });
  return { publicKey, privateKey, nodeId: await nodeIdFromPublicKey(publicKey) };
}

export async function generateSigningKeys(): Promise<ExportedSigningKeys> {
  return exportSigningIdentity(await createSigningIdentity());
}

export async function exportSigningIdentity(identity: SigningIdentity): Promise<ExportedSigningKeys> {
  return {
    publicKey: await exportSPKI(identity.publicKey),
    privateKey: await exportPKCS8(identity.privateKey),
    nodeId: identity.nodeId,
    fingerprint: fingerprint(identity.nodeId),
  };
}

/**
 * Load an identity from PKCS8 / SPKI PEM text
 */
export async function loadSigningIdentity(privateKeyPem: string, publicKeyPem: string): Promise<SigningIdentity> {
  const privateKey = await importPKCS8(privateKeyPem, "EdDSA");
  const publicKey = await importSPKI(publicKeyPem, "EdDSA");
  return { privateKey, publicKey, nodeId: await nodeIdFromPublicKey(publicKey) };
}

export async function nodeIdFromPublicKey(publicKey: KeyLike): Promise<string> {
  const jwk = await exportJWK(publicKey);
  if (jwk.kty !== "OKP" || jwk.crv !== "Ed25519" || !jwk.x) {
    throw new Error("Node identity must be an Ed25519 public key");
  }
  return Buffer.from(base64url.decode(jwk.x)).toString("hex");
}

/**
 * Rebuild a verification key from a receipt's `node_id`
 */
export async function publicKeyFromNodeId(nodeId: string): Promise<KeyLike> {
  if (!/^[0-9a-f]+$/.test(nodeId) || nodeId.length !== RECEIPT_FORMAT.PUBLIC_KEY_HEX_LENGTH) {
    throw new Error("node_id must be a 32-byte hex Ed25519 public key");
  }
  const key = await importJWK(
    { kty: "OKP", crv: "Ed25519", x: base64url.encode(Buffer.from(nodeId, "hex")) },
    "EdDSA"
  );
  if (key instanceof Uint8Array) throw new Error("Expected an asymmetric key for node_id");
  return key;
}

export async function loadPublicKey(publicKeyPem: string): Promise<KeyLike> {
  return importSPKI(publicKeyPem, "EdDSA");
}

/**
 * Short display fingerprint: first 16 hex chars of SHA-256 of the raw public key
 */
export function fingerprint(nodeId: string): string {
  return sha256Hex(Buffer.from(nodeId, "hex")).slice(0, 16);
}
