import type {
  AccountInfo,
  BlockhashWithExpiryBlockHeight,
  Commitment,
  PublicKey,
  RpcResponseAndContext,
  SendOptions,
  SignatureStatus,
  SignatureStatusConfig,
  TransactionSignature,
  VersionedTransaction,
} from "@solana/web3.js";

/**
 * The slice of `Connection` the toolkit calls. A web3.js `Connection`
 * satisfies it as is; tests pass an in-memory ledger instead.
 */
export interface LedgerClient {
  readonly rpcEndpoint: string;

  getBalance(publicKey: PublicKey, commitment?: Commitment): Promise<number>;

  requestAirdrop(
    to: PublicKey,
    lamports: number
  ): Promise<TransactionSignature>;

  getLatestBlockhash(
    commitment?: Commitment
  ): Promise<BlockhashWithExpiryBlockHeight>;

  getMinimumBalanceForRentExemption(
    dataLength: number,
    commitment?: Commitment
  ): Promise<number>;

  getAccountInfo(
    publicKey: PublicKey,
    commitment?: Commitment
  ): Promise<AccountInfo<Buffer> | null>;

  sendTransaction(
    transaction: VersionedTransaction,
    options?: SendOptions
  ): Promise<TransactionSignature>;

  getSignatureStatuses(
    signatures: TransactionSignature[],
    config?: SignatureStatusConfig
  ): Promise<RpcResponseAndContext<(SignatureStatus | null)[]>>;
}
