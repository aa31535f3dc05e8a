import { Connection, type Keypair } from "@solana/web3.js";
import {
  WalletManager,
  type BalanceReport,
  type TransferResult,
} from "../managers/WalletManager";
import {
  TokenManager,
  type CreatedMint,
  type TokenAccountResult,
} from "../managers/TokenManager";
import {
  MetadataManager,
  type CreatedMetadata,
} from "../managers/MetadataManager";
import { TransactionSender } from "../utils/transactions";
import {
  describeKeypair,
  generateKeypair,
  type GeneratedKeypair,
} from "../utils/keypairs";
import {
  estimateAttempts,
  findVanityKeypair,
  validatePrefix,
  type VanitySearchOptions,
  type VanitySearchResult,
} from "../utils/vanity";
import { parseSecretKey, type ToolkitConfig } from "./config";
import type { LedgerClient } from "./ledger";
import { errorMessage, isFatal } from "./errors";
import { Logger, getExplorerLink } from "./utils";

export interface ToolkitOptions {
  config: ToolkitConfig;
  /** Defaults to a web3.js `Connection` on `config.rpcUrl`. */
  connection?: LedgerClient;
  /** Poll pacing for confirmation waits. */
  confirmation?: { initialDelayMs?: number; maxDelayMs?: number };
}

export class Toolkit {
  private connection: LedgerClient;
  private config: ToolkitConfig;

  public walletManager: WalletManager;
  public tokenManager: TokenManager;
  public metadataManager: MetadataManager;

  constructor(options: ToolkitOptions) {
    this.config = options.config;
    this.connection =
      options.connection ??
      new Connection(this.config.rpcUrl, this.config.commitment);

    const sender = new TransactionSender(this.connection, {
      commitment: this.config.commitment,
      confirmTimeoutMs: this.config.confirmTimeoutMs,
      ...options.confirmation,
    });

    this.walletManager = new WalletManager(this.connection, sender, {
      commitment: this.config.commitment,
      confirmTimeoutMs: this.config.confirmTimeoutMs,
      ...options.confirmation,
    });
    this.tokenManager = new TokenManager(this.connection, sender);
    this.metadataManager = new MetadataManager(this.connection, sender);
  }

  generateKeypair(): GeneratedKeypair {
    const generated = generateKeypair();
    Logger.info(`The public key is: ${generated.address}`);
    Logger.info(`The secret key is: ${generated.secretKey}`);
    Logger.info("✅ Finished!");
    return generated;
  }

  /** Parses `SECRET_KEY`; throws `ConfigError` when it is missing or malformed. */
  loadKeypair(): Keypair {
    const keypair = parseSecretKey(this.config.secretKey);
    Logger.info(`Public key: ${describeKeypair(keypair).address}`);
    return keypair;
  }

  findVanityKeypair(
    overrides: Partial<VanitySearchOptions> = {}
  ): VanitySearchResult {
    const prefix = overrides.prefix ?? this.config.vanityPrefix;
    const maxMinutes = overrides.maxMinutes ?? this.config.vanityMaxMinutes;
    validatePrefix(prefix);

    Logger.info(
      `🔎 Searching for a public key starting with '${prefix}' for up to ${maxMinutes} minute(s) (~${estimateAttempts(prefix).toLocaleString("en-US")} attempts expected)...`
    );
    const result = findVanityKeypair({ ...overrides, prefix, maxMinutes });

    if (!result.found) {
      Logger.info(
        `⏰ Time out! The public key starting with '${result.prefix}' was not found within ${result.maxMinutes} minutes.`
      );
      return result;
    }

    const seconds = Math.floor(result.elapsedMs / 1000);
    const minutes = (result.elapsedMs / 60_000).toFixed(2);
    const { secretKey } = describeKeypair(result.keypair);
    Logger.info(
      `⌛ Found matching keypair in ${seconds} second(s) or ${minutes} minute(s) after ${result.attempts} attempt(s)!`
    );
    Logger.info(`The public key is: ${result.address}`);
    Logger.info(`The secret key is: ${secretKey}`);
    Logger.info("✅ Finished!");
    return result;
  }

  async checkBalance(): Promise<BalanceReport | undefined> {
    Logger.info(`⚡️ Connected to ${this.config.cluster}`);
    return this.report("Checking balance", () =>
      this.walletManager.checkBalance(
        this.config.balanceAddress,
        this.config.airdropAmountSol,
        this.config.minBalanceSol
      )
    );
  }

  async sendSol(): Promise<TransferResult | undefined> {
    const sender = this.signer();
    return this.report("Sending SOL", async () => {
      const result = await this.walletManager.sendSol(
        sender,
        this.config.transferRecipient,
        this.config.transferAmountSol,
        this.config.transferMemo
      );
      Logger.info(`✅ Transaction confirmed, signature: ${result.signature}!`);
      Logger.info(this.explorer("tx", result.signature));
      return result;
    });
  }

  async createTokenMint(): Promise<CreatedMint | undefined> {
    const payer = this.signer();
    return this.report("Creating token mint", async () => {
      const created = await this.tokenManager.createMint(payer, {
        mintAuthority: payer.publicKey,
        freezeAuthority: null,
        decimals: this.config.mintDecimals,
      });
      Logger.info(
        `✅ Token Mint: ${this.explorer("address", created.mint.toBase58())}`
      );
      return created;
    });
  }

  async createTokenAccount(): Promise<TokenAccountResult | undefined> {
    const payer = this.signer();
    return this.report("Creating token account", async () => {
      const account = await this.tokenManager.getOrCreateAssociatedTokenAccount(
        payer,
        this.config.tokenMint,
        this.config.tokenAccountOwner
      );
      const address = account.address.toBase58();
      Logger.info(`Token Account: ${address}`);
      Logger.info(
        `✅ ${account.created ? "Created" : "Found"} token account: ${this.explorer("address", address)}`
      );
      return account;
    });
  }

  async mintTokens(): Promise<string | undefined> {
    const authority = this.signer();
    return this.report("Minting tokens", async () => {
      const signature = await this.tokenManager.mintTokens(
        authority,
        this.config.tokenMint,
        this.config.tokenAccount,
        this.config.mintAmount,
        this.config.mintDecimals
      );
      Logger.info(
        `✅ Success! Mint Token Transaction: ${this.explorer("tx", signature)}`
      );
      return signature;
    });
  }

  async createTokenMetadata(): Promise<CreatedMetadata | undefined> {
    const authority = this.signer();
    return this.report("Creating token metadata", async () => {
      const created = await this.metadataManager.createMetadata(
        authority,
        this.config.tokenMint,
        this.config.metadata
      );
      Logger.info(`Metadata account: ${created.metadata.toBase58()}`);
      Logger.info(
        `✅ Look at the token mint again: ${this.explorer("address", this.config.tokenMint.toBase58())}`
      );
      return created;
    });
  }

  private signer(): Keypair {
    const keypair = parseSecretKey(this.config.secretKey);
    Logger.info(`🔑 Our public key is: ${keypair.publicKey.toBase58()}`);
    return keypair;
  }

  private explorer(type: "tx" | "address", id: string): string {
    return getExplorerLink(type, id, this.config.cluster);
  }

  /**
   * Runs an operation, logging non-fatal failures as
   * `<label> failed due to: <message>`. Config and parse errors propagate.
   */
  private async report<T>(
    label: string,
    operation: () => Promise<T>
  ): Promise<T | undefined> {
    try {
      return await operation();
    } catch (e) {
      if (isFatal(e)) throw e;
      Logger.error(`${label} failed due to: ${errorMessage(e)}`);
      return undefined;
    }
  }
}
