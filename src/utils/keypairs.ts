import { Keypair, PublicKey } from "@solana/web3.js";
import bs58 from "bs58";

export const BASE58_ALPHABET =
  "123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz";

export interface GeneratedKeypair {
  keypair: Keypair;
  /** Base-58 public key. */
  address: string;
  /** 64-byte secret key as a JSON array, the format `SECRET_KEY` expects. */
  secretKey: string;
}

export function encodePublicKey(publicKey: PublicKey | Uint8Array): string {
  const bytes = publicKey instanceof PublicKey ? publicKey.toBytes() : publicKey;
  return bs58.encode(bytes);
}

export function formatSecretKey(secretKey: Uint8Array): string {
  return JSON.stringify(Array.from(secretKey));
}

export function describeKeypair(keypair: Keypair): GeneratedKeypair {
  return {
    keypair,
    address: encodePublicKey(keypair.publicKey),
    secretKey: formatSecretKey(keypair.secretKey),
  };
}

export function generateKeypair(): GeneratedKeypair {
  return describeKeypair(Keypair.generate());
}

export function isBase58(value: string): boolean {
  for (const c of value) {
    if (!BASE58_ALPHABET.includes(c)) return false;
  }
  return true;
}
