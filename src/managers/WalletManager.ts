import {
  SystemProgram,
  TransactionInstruction,
  type Keypair,
  type PublicKey,
} from "@solana/web3.js";
import { MEMO_PROGRAM_ID, type ConfirmationLevel } from "../core/config";
import type { LedgerClient } from "../core/ledger";
import { RpcError, errorMessage } from "../core/errors";
import { Logger, lamportsToSol, solToLamports } from "../core/utils";
import { waitForConfirmation } from "../utils/confirm";
import type { TransactionSender } from "../utils/transactions";

export type AirdropOutcome = "requested" | "not-required";

export interface BalanceReport {
  address: PublicKey;
  lamports: number;
  sol: number;
  airdrop: AirdropOutcome | "failed";
}

export interface TransferResult {
  signature: string;
  lamports: number;
}

export class WalletManager {
  constructor(
    private connection: LedgerClient,
    private sender: TransactionSender,
    private options: {
      commitment: ConfirmationLevel;
      confirmTimeoutMs: number;
      initialDelayMs?: number;
      maxDelayMs?: number;
    }
  ) {}

  async getBalance(address: PublicKey): Promise<number> {
    try {
      return await this.connection.getBalance(
        address,
        this.options.commitment
      );
    } catch (e) {
      throw new RpcError("getBalance", e);
    }
  }

  /**
   * Requests `airdropSol` when the balance is below `minBalanceSol` and waits
   * for the airdrop to be processed.
   */
  async airdropIfRequired(
    address: PublicKey,
    airdropSol: number,
    minBalanceSol: number
  ): Promise<AirdropOutcome> {
    const balance = await this.getBalance(address);
    if (balance >= solToLamports(minBalanceSol)) {
      Logger.info("No airdrop required");
      return "not-required";
    }

    Logger.info("Requesting airdrop...");
    let signature: string;
    try {
      signature = await this.connection.requestAirdrop(
        address,
        solToLamports(airdropSol)
      );
    } catch (e) {
      throw new RpcError("requestAirdrop", e);
    }

    await waitForConfirmation(this.connection, signature, {
      commitment: "processed",
      timeoutMs: this.options.confirmTimeoutMs,
      initialDelayMs: this.options.initialDelayMs,
      maxDelayMs: this.options.maxDelayMs,
    });
    Logger.info("Airdrop complete");
    return "requested";
  }

  /**
   * Tops the address up if needed, then reports its balance. A failed airdrop
   * is logged and does not stop the balance query.
   */
  async checkBalance(
    address: PublicKey,
    airdropSol: number,
    minBalanceSol: number
  ): Promise<BalanceReport> {
    let airdrop: BalanceReport["airdrop"];
    try {
      airdrop = await this.airdropIfRequired(address, airdropSol, minBalanceSol);
    } catch (e) {
      Logger.error(`Airdrop failed due to: ${errorMessage(e)}`);
      airdrop = "failed";
    }

    const lamports = await this.getBalance(address);
    const sol = lamportsToSol(lamports);
    Logger.info(
      `💰 The balance for the wallet at address ${address.toBase58()} is: ${sol} SOL`
    );
    return { address, lamports, sol, airdrop };
  }

  /** Transfers SOL with a memo attached in the same transaction. */
  async sendSol(
    from: Keypair,
    to: PublicKey,
    amountSol: number,
    memo: string
  ): Promise<TransferResult> {
    const lamports = solToLamports(amountSol);
    Logger.info(`💸 Attempting to send ${amountSol} SOL to ${to.toBase58()}...`);

    const instructions = [
      SystemProgram.transfer({
        fromPubkey: from.publicKey,
        toPubkey: to,
        lamports,
      }),
    ];
    if (memo) {
      instructions.push(createMemoInstruction(memo));
      Logger.info(`📝 memo is: ${memo}`);
    }

    const signature = await this.sender.sendAndConfirm(instructions, [from], {
      commitment: "processed",
    });
    return { signature, lamports };
  }
}

export function createMemoInstruction(memo: string): TransactionInstruction {
  return new TransactionInstruction({
    keys: [],
    programId: MEMO_PROGRAM_ID,
    data: Buffer.from(memo, "utf8"),
  });
}
