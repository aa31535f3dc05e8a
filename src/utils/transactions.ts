import {
  TransactionMessage,
  VersionedTransaction,
  type Keypair,
  type TransactionInstruction,
  type TransactionSignature,
} from "@solana/web3.js";
import type { ConfirmationLevel } from "../core/config";
import type { LedgerClient } from "../core/ledger";
import { RpcError, ToolkitError } from "../core/errors";
import { Logger } from "../core/utils";
import { waitForConfirmation } from "./confirm";

export interface SenderOptions {
  commitment: ConfirmationLevel;
  confirmTimeoutMs: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
}

export interface SendAndConfirmOptions {
  commitment?: ConfirmationLevel;
  signal?: AbortSignal;
}

/** Builds, signs and submits v0 transactions, then waits for confirmation. */
export class TransactionSender {
  constructor(
    private connection: LedgerClient,
    private options: SenderOptions
  ) {}

  /**
   * The first signer pays the fee. Resolves with the signature once the
   * transaction reaches the requested commitment.
   */
  async sendAndConfirm(
    instructions: TransactionInstruction[],
    signers: Keypair[],
    sendOptions: SendAndConfirmOptions = {}
  ): Promise<TransactionSignature> {
    const [payer] = signers;
    if (!payer) {
      throw new ToolkitError("At least one signer is required");
    }
    const commitment = sendOptions.commitment ?? this.options.commitment;

    let recentBlockhash: string;
    try {
      ({ blockhash: recentBlockhash } =
        await this.connection.getLatestBlockhash(this.options.commitment));
    } catch (e) {
      throw new RpcError("getLatestBlockhash", e);
    }

    const messageV0 = new TransactionMessage({
      payerKey: payer.publicKey,
      recentBlockhash,
      instructions,
    }).compileToV0Message();

    const versionedTx = new VersionedTransaction(messageV0);
    versionedTx.sign(signers);

    let signature: TransactionSignature;
    try {
      signature = await this.connection.sendTransaction(versionedTx);
    } catch (e) {
      throw new RpcError("sendTransaction", e);
    }
    Logger.debug(`Transaction submitted: ${signature}`);

    await waitForConfirmation(this.connection, signature, {
      commitment,
      timeoutMs: this.options.confirmTimeoutMs,
      initialDelayMs: this.options.initialDelayMs,
      maxDelayMs: this.options.maxDelayMs,
      signal: sendOptions.signal,
    });
    return signature;
  }
}
