import { Keypair } from "@solana/web3.js";
import { ConfigError } from "../core/errors";
import { encodePublicKey, isBase58 } from "./keypairs";

export interface VanitySearchOptions {
  prefix: string;
  maxMinutes: number;
  /** Key source; defaults to `Keypair.generate`. */
  generate?: () => Keypair;
  /** Monotonic clock in ms; defaults to `performance.now`. */
  now?: () => number;
}

export type VanitySearchResult =
  | {
      found: true;
      keypair: Keypair;
      address: string;
      attempts: number;
      elapsedMs: number;
    }
  | {
      found: false;
      prefix: string;
      maxMinutes: number;
      attempts: number;
      elapsedMs: number;
    };

export function validatePrefix(prefix: string): void {
  if (prefix.length === 0) {
    throw new ConfigError("Vanity prefix must not be empty");
  }
  if (!isBase58(prefix)) {
    throw new ConfigError(
      `Vanity prefix '${prefix}' contains characters outside the Base58 alphabet (no 0, O, I, l)`
    );
  }
}

/** Expected number of keys to try before `prefix` turns up. */
export function estimateAttempts(prefix: string): number {
  return Math.pow(58, prefix.length);
}

/**
 * Generates keypairs until one's Base58 address starts with `prefix` or
 * `maxMinutes` have passed on the monotonic clock. The deadline is checked before
 * every generation, so a zero budget returns without generating anything.
 */
export function findVanityKeypair(
  options: VanitySearchOptions
): VanitySearchResult {
  const { prefix, maxMinutes } = options;
  validatePrefix(prefix);
  if (!Number.isFinite(maxMinutes) || maxMinutes < 0) {
    throw new ConfigError("Vanity search budget must be >= 0 minutes");
  }

  const generate = options.generate ?? (() => Keypair.generate());
  const now = options.now ?? (() => performance.now());
  const budgetMs = maxMinutes * 60_000;
  const start = now();
  let attempts = 0;

  while (true) {
    const elapsedMs = now() - start;
    if (elapsedMs >= budgetMs) {
      return { found: false, prefix, maxMinutes, attempts, elapsedMs };
    }

    const keypair = generate();
    attempts++;
    const address = encodePublicKey(keypair.publicKey);

    if (address.startsWith(prefix)) {
      return {
        found: true,
        keypair,
        address,
        attempts,
        elapsedMs: now() - start,
      };
    }
  }
}
