import { Keypair, PublicKey } from "@solana/web3.js";
import { ConfigError, ParseError } from "./errors";
import type { Cluster } from "./utils";
import { validatePrefix } from "../utils/vanity";

export type ConfirmationLevel = "processed" | "confirmed" | "finalized";

export const SECRET_KEY_ENV = "SECRET_KEY";

export const DEFAULT_RPC_URL = "https://api.devnet.solana.com";
export const DEFAULT_WALLET_ADDRESS =
  "8cUNp6LJGfjN3M1mwk537CfY2WBtYUYQNnf4hVtPx7AB";
export const DEFAULT_TOKEN_MINT = "ExJmrjcJj3FuHNvswLkLmAxiEBGcdW5g9WnZqb8VjCiz";
export const DEFAULT_TOKEN_ACCOUNT =
  "CtWYrszfioSrDA8G9GTGMmwjcs1J6LFzTVkkByT5daYy";

export const MEMO_PROGRAM_ID = parseAddress(
  "MEMO_PROGRAM_ID",
  "MemoSq4gqABAXKb96qnH8TysNcWxMyWCqXgDLGmfcHr"
);

export interface TokenMetadataConfig {
  name: string;
  symbol: string;
  uri: string;
}

export interface ToolkitConfig {
  rpcUrl: string;
  cluster: Cluster;
  commitment: ConfirmationLevel;
  /** Raw `SECRET_KEY` value; parsed with {@link parseSecretKey} by signing operations. */
  secretKey?: string;
  confirmTimeoutMs: number;

  balanceAddress: PublicKey;
  airdropAmountSol: number;
  minBalanceSol: number;

  transferRecipient: PublicKey;
  transferAmountSol: number;
  transferMemo: string;

  vanityPrefix: string;
  vanityMaxMinutes: number;

  tokenMint: PublicKey;
  tokenAccountOwner: PublicKey;
  tokenAccount: PublicKey;
  mintDecimals: number;
  mintAmount: number;

  metadata: TokenMetadataConfig;
}

type Env = Record<string, string | undefined>;

const CLUSTERS: readonly Cluster[] = ["devnet", "testnet", "mainnet-beta"];
const CONFIRMATION_LEVELS: readonly ConfirmationLevel[] = [
  "processed",
  "confirmed",
  "finalized",
];

/**
 * Builds the toolkit configuration from environment variables. Called once at
 * startup; addresses are decoded here so a typo fails before any operation runs.
 */
export function loadConfig(env: Env = process.env): ToolkitConfig {
  const walletAddress = env.BALANCE_ADDRESS || DEFAULT_WALLET_ADDRESS;

  return {
    rpcUrl: env.RPC_URL || DEFAULT_RPC_URL,
    cluster: readChoice(env, "CLUSTER", CLUSTERS, "devnet"),
    commitment: readChoice(env, "COMMITMENT", CONFIRMATION_LEVELS, "confirmed"),
    secretKey: env[SECRET_KEY_ENV] || undefined,
    confirmTimeoutMs: readNumber(env, "CONFIRM_TIMEOUT_MS", 60_000, {
      integer: true,
      min: 1,
    }),

    balanceAddress: parseAddress("BALANCE_ADDRESS", walletAddress),
    airdropAmountSol: readNumber(env, "AIRDROP_AMOUNT_SOL", 0.5),
    minBalanceSol: readNumber(env, "MIN_BALANCE_SOL", 1.5),

    transferRecipient: parseAddress(
      "TRANSFER_RECIPIENT",
      env.TRANSFER_RECIPIENT || DEFAULT_WALLET_ADDRESS
    ),
    transferAmountSol: readNumber(env, "TRANSFER_AMOUNT_SOL", 0.01),
    transferMemo: env.TRANSFER_MEMO ?? "Hello from Solana!",

    vanityPrefix: readPrefix(env.VANITY_PREFIX || "Lev"),
    vanityMaxMinutes: readNumber(env, "VANITY_MAX_MINUTES", 3),

    tokenMint: parseAddress("TOKEN_MINT", env.TOKEN_MINT || DEFAULT_TOKEN_MINT),
    tokenAccountOwner: parseAddress(
      "TOKEN_ACCOUNT_OWNER",
      env.TOKEN_ACCOUNT_OWNER || DEFAULT_WALLET_ADDRESS
    ),
    tokenAccount: parseAddress(
      "TOKEN_ACCOUNT",
      env.TOKEN_ACCOUNT || DEFAULT_TOKEN_ACCOUNT
    ),
    mintDecimals: readNumber(env, "MINT_DECIMALS", 2, { integer: true, max: 9 }),
    mintAmount: readNumber(env, "MINT_AMOUNT", 10),

    metadata: {
      name: env.METADATA_NAME || "Solana UA Bootcamp 2024-08-06",
      symbol: env.METADATA_SYMBOL || "UAB-2",
      uri: env.METADATA_URI || "https://arweave.net/1234",
    },
  };
}

function readPrefix(prefix: string): string {
  validatePrefix(prefix);
  return prefix;
}

export function parseAddress(name: string, value: string): PublicKey {
  try {
    return new PublicKey(value);
  } catch (e) {
    throw new ParseError(`${name} is not a valid address: ${value}`, {
      cause: e,
    });
  }
}

/**
 * Decodes a secret key stored as a JSON array of 64 byte values, the format
 * printed by the generate and vanity operations.
 */
export function parseSecretKey(raw: string | undefined): Keypair {
  if (!raw) {
    throw new ConfigError(`Add ${SECRET_KEY_ENV} to .env!`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(
      `Failed to parse ${SECRET_KEY_ENV}: expected a JSON array of bytes`,
      { cause: e }
    );
  }

  if (
    !Array.isArray(parsed) ||
    !parsed.every(
      (b): b is number => Number.isInteger(b) && b >= 0 && b <= 255
    )
  ) {
    throw new ConfigError(
      `Failed to parse ${SECRET_KEY_ENV}: expected a JSON array of bytes`
    );
  }
  if (parsed.length !== 64) {
    throw new ConfigError(
      `${SECRET_KEY_ENV} must hold 64 bytes, got ${parsed.length}`
    );
  }

  try {
    return Keypair.fromSecretKey(Uint8Array.from(parsed));
  } catch (e) {
    throw new ConfigError(`Failed to create keypair from ${SECRET_KEY_ENV}`, {
      cause: e,
    });
  }
}

function readNumber(
  env: Env,
  key: string,
  fallback: number,
  bounds: { integer?: boolean; min?: number; max?: number } = {}
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  const min = bounds.min ?? 0;
  if (
    !Number.isFinite(value) ||
    value < min ||
    (bounds.max !== undefined && value > bounds.max) ||
    (bounds.integer && !Number.isInteger(value))
  ) {
    const kind = bounds.integer ? "whole number" : "number";
    throw new ConfigError(`${key} must be a ${kind} >= ${min}, got "${raw}"`);
  }
  return value;
}

function readChoice<T extends string>(
  env: Env,
  key: string,
  choices: readonly T[],
  fallback: T
): T {
  const raw = env[key];
  if (!raw) return fallback;
  const match = choices.find((c) => c === raw);
  if (!match) {
    throw new ConfigError(
      `${key} must be one of ${choices.join(", ")}, got "${raw}"`
    );
  }
  return match;
}
