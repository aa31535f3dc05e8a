import { LAMPORTS_PER_SOL } from "@solana/web3.js";

export const LOG_LEVELS = {
  INFO: "INFO",
  WARN: "WARN",
  ERROR: "ERROR",
  DEBUG: "DEBUG",
} as const;

export type LogLevel = (typeof LOG_LEVELS)[keyof typeof LOG_LEVELS];

export class Logger {
  static info(msg: string, ...args: unknown[]) {
    console.log(Logger.format(LOG_LEVELS.INFO, msg), ...args);
  }
  static warn(msg: string, ...args: unknown[]) {
    console.warn(Logger.format(LOG_LEVELS.WARN, msg), ...args);
  }
  static error(msg: string, ...args: unknown[]) {
    console.error(Logger.format(LOG_LEVELS.ERROR, msg), ...args);
  }
  static debug(msg: string, ...args: unknown[]) {
    if (process.env.LOG_LEVEL?.toLowerCase() !== "debug") return;
    console.log(Logger.format(LOG_LEVELS.DEBUG, msg), ...args);
  }

  private static format(level: LogLevel, msg: string): string {
    return `[${new Date().toISOString()}] [${level}] ${msg}`;
  }
}

export type Cluster = "devnet" | "testnet" | "mainnet-beta";

export const EXPLORER_URL = "https://explorer.solana.com";

export function getExplorerLink(
  type: "tx" | "address" | "block",
  id: string,
  cluster: Cluster = "devnet"
) {
  return `${EXPLORER_URL}/${type}/${id}?cluster=${cluster}`;
}

export function solToLamports(sol: number): number {
  return Math.floor(sol * LAMPORTS_PER_SOL);
}

export function lamportsToSol(lamports: number): number {
  return lamports / LAMPORTS_PER_SOL;
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export async function sleep(ms: number, signal?: AbortSignal) {
  if (signal?.aborted) return;
  await new Promise<void>((r) => {
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      r();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}
