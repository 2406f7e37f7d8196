import crypto from "crypto";

// DER header of an Ed25519 SubjectPublicKeyInfo; the raw 32-byte key follows it.
const ED25519_SPKI_PREFIX = Buffer.from("302a300506032b6570032100", "hex");

export function ed25519PublicKeyFromHex(hex: string): crypto.KeyObject {
  const raw = Buffer.from(hex, "hex");
  if (raw.length !== 32) {
    throw new Error("Ed25519 public key must be 32 bytes");
  }
  return crypto.createPublicKey({
    key: Buffer.concat([ED25519_SPKI_PREFIX, raw]),
    format: "der",
    type: "spki",
  });
}

/**
 * Checks the platform signature over `timestamp + body`. Malformed
 * signatures count as invalid.
 */
export function verifyInteractionSignature(args: {
  publicKey: crypto.KeyObject;
  signature: string;
  timestamp: string;
  body: Buffer;
}): boolean {
  if (!/^[0-9a-fA-F]{128}$/.test(args.signature)) return false;
  const message = Buffer.concat([Buffer.from(args.timestamp, "utf8"), args.body]);
  return crypto.verify(null, message, args.publicKey, Buffer.from(args.signature, "hex"));
}
