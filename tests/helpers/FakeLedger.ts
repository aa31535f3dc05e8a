import {
  Keypair,
  PublicKey,
  type AccountInfo,
  type BlockhashWithExpiryBlockHeight,
  type RpcResponseAndContext,
  type SignatureStatus,
  type VersionedTransaction,
} from "@solana/web3.js";
import type { LedgerClient } from "../../src/core/ledger";

type Method = Exclude<keyof LedgerClient, "rpcEndpoint">;

const FINALIZED: SignatureStatus = {
  slot: 1,
  confirmations: null,
  err: null,
  confirmationStatus: "finalized",
};

/** In-memory ledger: records every call and answers from local state. */
export class FakeLedger implements LedgerClient {
  readonly rpcEndpoint = "http://localhost:8899";

  calls: Method[] = [];
  sent: VersionedTransaction[] = [];
  balances = new Map<string, number>();
  accounts = new Set<string>();
  failures: Partial<Record<Method, Error>> = {};
  /** Statuses handed out in order per signature; afterwards FINALIZED. */
  statusScript = new Map<string, (SignatureStatus | null)[]>();
  rentExemption = 1_461_600;
  blockhash: BlockhashWithExpiryBlockHeight = {
    blockhash: Keypair.generate().publicKey.toBase58(),
    lastValidBlockHeight: 123,
  };

  private signatureCount = 0;

  private record(method: Method) {
    this.calls.push(method);
    const failure = this.failures[method];
    if (failure) throw failure;
  }

  async getBalance(publicKey: PublicKey): Promise<number> {
    this.record("getBalance");
    return this.balances.get(publicKey.toBase58()) ?? 0;
  }

  async requestAirdrop(to: PublicKey, lamports: number): Promise<string> {
    this.record("requestAirdrop");
    const key = to.toBase58();
    this.balances.set(key, (this.balances.get(key) ?? 0) + lamports);
    return `airdrop-${++this.signatureCount}`;
  }

  async getLatestBlockhash(): Promise<BlockhashWithExpiryBlockHeight> {
    this.record("getLatestBlockhash");
    return this.blockhash;
  }

  async getMinimumBalanceForRentExemption(): Promise<number> {
    this.record("getMinimumBalanceForRentExemption");
    return this.rentExemption;
  }

  async getAccountInfo(publicKey: PublicKey): Promise<AccountInfo<Buffer> | null> {
    this.record("getAccountInfo");
    if (!this.accounts.has(publicKey.toBase58())) return null;
    return {
      executable: false,
      owner: PublicKey.default,
      lamports: 2_039_280,
      data: Buffer.alloc(165),
    };
  }

  async sendTransaction(transaction: VersionedTransaction): Promise<string> {
    this.record("sendTransaction");
    this.sent.push(transaction);
    return `tx-${++this.signatureCount}`;
  }

  async getSignatureStatuses(
    signatures: string[]
  ): Promise<RpcResponseAndContext<(SignatureStatus | null)[]>> {
    this.record("getSignatureStatuses");
    const value = signatures.map((signature) => {
      const script = this.statusScript.get(signature);
      if (script && script.length > 0) return script.shift() ?? null;
      return FINALIZED;
    });
    return { context: { slot: 1 }, value };
  }
}
