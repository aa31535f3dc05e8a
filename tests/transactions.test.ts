import { describe, it, expect } from "vitest";
import { Keypair, SystemProgram } from "@solana/web3.js";
import { TransactionSender } from "../src/utils/transactions";
import { RpcError, ToolkitError } from "../src/core/errors";
import { FakeLedger } from "./helpers/FakeLedger";

function transferFrom(payer: Keypair) {
  return SystemProgram.transfer({
    fromPubkey: payer.publicKey,
    toPubkey: Keypair.generate().publicKey,
    lamports: 1_000,
  });
}

describe("TransactionSender", () => {
  it("signs with every signer and waits for confirmation", async () => {
    const ledger = new FakeLedger();
    const sender = new TransactionSender(ledger, {
      commitment: "confirmed",
      confirmTimeoutMs: 1_000,
    });
    const payer = Keypair.generate();

    const signature = await sender.sendAndConfirm([transferFrom(payer)], [payer]);

    expect(signature).toBe("tx-1");
    expect(ledger.calls).toEqual([
      "getLatestBlockhash",
      "sendTransaction",
      "getSignatureStatuses",
    ]);
    const tx = ledger.sent[0]!;
    expect(tx.message.staticAccountKeys[0]!.equals(payer.publicKey)).toBe(true);
    expect(tx.signatures[0]!.some((b) => b !== 0)).toBe(true);
  });

  it("needs a fee payer", async () => {
    const sender = new TransactionSender(new FakeLedger(), {
      commitment: "confirmed",
      confirmTimeoutMs: 1_000,
    });

    await expect(sender.sendAndConfirm([], [])).rejects.toThrow(ToolkitError);
  });

  it("wraps submission failures", async () => {
    const ledger = new FakeLedger();
    ledger.failures.sendTransaction = new Error("blockhash not found");
    const sender = new TransactionSender(ledger, {
      commitment: "confirmed",
      confirmTimeoutMs: 1_000,
    });
    const payer = Keypair.generate();

    await expect(
      sender.sendAndConfirm([transferFrom(payer)], [payer])
    ).rejects.toThrow("sendTransaction failed: blockhash not found");
    expect(ledger.calls).not.toContain("getSignatureStatuses");
  });
});
