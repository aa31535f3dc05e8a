import { createUmi } from "@metaplex-foundation/umi-bundle-defaults";
import { createSignerFromKeypair, type Umi } from "@metaplex-foundation/umi";
import {
  createMetadataAccountV3,
  findMetadataPda,
  mplTokenMetadata,
} from "@metaplex-foundation/mpl-token-metadata";
import {
  fromWeb3JsKeypair,
  fromWeb3JsPublicKey,
  toWeb3JsInstruction,
  toWeb3JsPublicKey,
} from "@metaplex-foundation/umi-web3js-adapters";
import type { Keypair, PublicKey, TransactionInstruction } from "@solana/web3.js";
import type { TokenMetadataConfig } from "../core/config";
import type { LedgerClient } from "../core/ledger";
import { errorMessage } from "../core/errors";
import { Logger } from "../core/utils";
import type { TransactionSender } from "../utils/transactions";

export interface CreatedMetadata {
  metadata: PublicKey;
  signature: string;
}

export class MetadataManager {
  private umi: Umi;

  constructor(connection: LedgerClient, private sender: TransactionSender) {
    this.umi = createUmi(connection.rpcEndpoint).use(mplTokenMetadata());
  }

  findMetadataAddress(mint: PublicKey): PublicKey {
    const [metadata] = findMetadataPda(this.umi, {
      mint: fromWeb3JsPublicKey(mint),
    });
    return toWeb3JsPublicKey(metadata);
  }

  /**
   * Builds a CreateMetadataAccountV3 instruction where `authority` is the mint
   * authority, the payer and the update authority.
   */
  buildCreateMetadataInstructions(
    authority: Keypair,
    mint: PublicKey,
    metadata: TokenMetadataConfig
  ): TransactionInstruction[] {
    const signer = createSignerFromKeypair(
      this.umi,
      fromWeb3JsKeypair(authority)
    );

    return createMetadataAccountV3(this.umi, {
      mint: fromWeb3JsPublicKey(mint),
      mintAuthority: signer,
      payer: signer,
      updateAuthority: signer,
      data: {
        name: metadata.name,
        symbol: metadata.symbol,
        uri: metadata.uri,
        sellerFeeBasisPoints: 0,
        creators: null,
        collection: null,
        uses: null,
      },
      isMutable: true,
      collectionDetails: null,
    })
      .getInstructions()
      .map(toWeb3JsInstruction);
  }

  async createMetadata(
    authority: Keypair,
    mint: PublicKey,
    metadata: TokenMetadataConfig
  ): Promise<CreatedMetadata> {
    Logger.info(
      `Creating metadata for ${mint.toBase58()}: ${metadata.name} (${metadata.symbol})...`
    );
    const instructions = this.buildCreateMetadataInstructions(
      authority,
      mint,
      metadata
    );

    try {
      const signature = await this.sender.sendAndConfirm(instructions, [
        authority,
      ]);
      Logger.info(`Token metadata create signature: ${signature}`);
      return { metadata: this.findMetadataAddress(mint), signature };
    } catch (e) {
      Logger.error(`Token metadata create failed: ${errorMessage(e)}`);
      throw e;
    }
  }
}
