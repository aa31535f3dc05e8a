import type { SignatureStatus, TransactionSignature } from "@solana/web3.js";
import type { ConfirmationLevel } from "../core/config";
import type { LedgerClient } from "../core/ledger";
import {
  ConfirmationTimeoutError,
  RpcError,
  TransactionFailedError,
} from "../core/errors";
import { Logger, sleep } from "../core/utils";

export interface WaitForConfirmationOptions {
  commitment?: ConfirmationLevel;
  timeoutMs?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  signal?: AbortSignal;
  /** Monotonic clock in ms; defaults to `performance.now`. */
  now?: () => number;
  /** Waits between polls; must return early when `signal` aborts. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const LEVEL_RANK: Record<ConfirmationLevel, number> = {
  processed: 0,
  confirmed: 1,
  finalized: 2,
};

export function confirmationLevelOf(
  status: SignatureStatus
): ConfirmationLevel {
  if (status.confirmationStatus) return status.confirmationStatus;
  // Older nodes leave confirmationStatus unset; null confirmations means rooted.
  return status.confirmations === null ? "finalized" : "processed";
}

export function meetsCommitment(
  status: SignatureStatus,
  commitment: ConfirmationLevel
): boolean {
  return LEVEL_RANK[confirmationLevelOf(status)] >= LEVEL_RANK[commitment];
}

/**
 * Polls the signature status until it reaches `commitment`. Delays double
 * between polls up to `maxDelayMs`; once `timeoutMs` has passed (or `signal`
 * aborts) a {@link ConfirmationTimeoutError} is thrown.
 */
export async function waitForConfirmation(
  client: LedgerClient,
  signature: TransactionSignature,
  options: WaitForConfirmationOptions = {}
): Promise<SignatureStatus> {
  const commitment = options.commitment ?? "confirmed";
  const timeoutMs = options.timeoutMs ?? 60_000;
  const maxDelayMs = options.maxDelayMs ?? 4_000;
  const now = options.now ?? (() => performance.now());
  const wait = options.sleep ?? sleep;

  const start = now();
  const deadline = start + timeoutMs;
  let delay = options.initialDelayMs ?? 500;
  let polls = 0;

  while (true) {
    if (options.signal?.aborted) {
      throw new ConfirmationTimeoutError(signature, now() - start, "aborted");
    }

    let status: SignatureStatus | null;
    try {
      const { value } = await client.getSignatureStatuses([signature]);
      status = value[0] ?? null;
    } catch (e) {
      throw new RpcError("getSignatureStatuses", e);
    }
    polls++;

    if (status?.err) {
      throw new TransactionFailedError(signature, status.err);
    }
    if (status && meetsCommitment(status, commitment)) {
      Logger.debug(
        `Signature ${signature} reached ${commitment} after ${polls} poll(s)`
      );
      return status;
    }

    const remaining = deadline - now();
    if (remaining <= 0) {
      throw new ConfirmationTimeoutError(signature, now() - start);
    }
    await wait(Math.min(delay, remaining), options.signal);
    delay = Math.min(delay * 2, maxDelayMs);
  }
}
