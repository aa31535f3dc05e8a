import {
  Keypair,
  SystemProgram,
  type AccountInfo,
  type PublicKey,
} from "@solana/web3.js";
import {
  MINT_SIZE,
  TOKEN_PROGRAM_ID,
  createAssociatedTokenAccountInstruction,
  createInitializeMintInstruction,
  createMintToInstruction,
  getAssociatedTokenAddressSync,
} from "@solana/spl-token";
import type { LedgerClient } from "../core/ledger";
import { RpcError, errorMessage } from "../core/errors";
import { Logger } from "../core/utils";
import type { TransactionSender } from "../utils/transactions";

export interface MintConfig {
  mintAuthority: PublicKey;
  freezeAuthority?: PublicKey | null;
  decimals: number;
}

export interface CreatedMint {
  mint: PublicKey;
  signature: string;
}

export interface TokenAccountResult {
  address: PublicKey;
  /** False when the associated account already existed. */
  created: boolean;
  signature?: string;
}

/** Converts a major-unit amount to base units, e.g. 10 with 2 decimals → 1000n. */
export function toBaseUnits(amount: number, decimals: number): bigint {
  const [whole = "0", fraction = ""] = amount.toFixed(decimals).split(".");
  return BigInt(whole + fraction.padEnd(decimals, "0"));
}

export class TokenManager {
  constructor(
    private connection: LedgerClient,
    private sender: TransactionSender
  ) {}

  async createMint(payer: Keypair, config: MintConfig): Promise<CreatedMint> {
    const mint = Keypair.generate();
    Logger.info(
      `Creating token mint ${mint.publicKey.toBase58()} with ${config.decimals} decimals...`
    );

    let lamports: number;
    try {
      lamports =
        await this.connection.getMinimumBalanceForRentExemption(MINT_SIZE);
    } catch (e) {
      throw new RpcError("getMinimumBalanceForRentExemption", e);
    }

    const instructions = [
      SystemProgram.createAccount({
        fromPubkey: payer.publicKey,
        newAccountPubkey: mint.publicKey,
        space: MINT_SIZE,
        lamports,
        programId: TOKEN_PROGRAM_ID,
      }),
      createInitializeMintInstruction(
        mint.publicKey,
        config.decimals,
        config.mintAuthority,
        config.freezeAuthority ?? null
      ),
    ];

    try {
      const signature = await this.sender.sendAndConfirm(instructions, [
        payer,
        mint,
      ]);
      Logger.info(`Token Mint create signature: ${signature}`);
      return { mint: mint.publicKey, signature };
    } catch (e) {
      Logger.error(`Token Mint create failed: ${errorMessage(e)}`);
      throw e;
    }
  }

  /**
   * Returns the owner's associated token account for `mint`, creating it
   * (paid by `payer`) when the ledger has no account at that address.
   */
  async getOrCreateAssociatedTokenAccount(
    payer: Keypair,
    mint: PublicKey,
    owner: PublicKey
  ): Promise<TokenAccountResult> {
    const address = getAssociatedTokenAddressSync(mint, owner);

    let existing: AccountInfo<Buffer> | null;
    try {
      existing = await this.connection.getAccountInfo(address);
    } catch (e) {
      throw new RpcError("getAccountInfo", e);
    }
    if (existing) {
      Logger.info(`Token account ${address.toBase58()} already exists`);
      return { address, created: false };
    }

    const signature = await this.sender.sendAndConfirm(
      [
        createAssociatedTokenAccountInstruction(
          payer.publicKey,
          address,
          owner,
          mint
        ),
      ],
      [payer]
    );
    Logger.info(`Token account create signature: ${signature}`);
    return { address, created: true, signature };
  }

  /** Mints `amount` whole tokens (scaled by `decimals`) into `destination`. */
  async mintTokens(
    authority: Keypair,
    mint: PublicKey,
    destination: PublicKey,
    amount: number,
    decimals: number
  ): Promise<string> {
    const baseUnits = toBaseUnits(amount, decimals);
    Logger.info(
      `Minting ${amount} tokens (${baseUnits} base units) to ${destination.toBase58()}...`
    );

    try {
      return await this.sender.sendAndConfirm(
        [
          createMintToInstruction(
            mint,
            destination,
            authority.publicKey,
            baseUnits
          ),
        ],
        [authority]
      );
    } catch (e) {
      Logger.error(`Token Mint supply failed: ${errorMessage(e)}`);
      throw e;
    }
  }
}
