import { Command } from "commander";
import dotenv from "dotenv";
import { loadConfig } from "./core/config";
import { Toolkit } from "./core/Toolkit";
import { UsageError } from "./core/errors";

export const OPERATIONS = [
  "generateKeypair",
  "loadKeypair",
  "checkBalance",
  "findKeypair",
  "sendSol",
  "createTokenMint",
  "createTokenAccount",
  "mintTokens",
  "createTokenMetadata",
] as const;

export type Operation = (typeof OPERATIONS)[number];

export type OperationFlags = Partial<Record<Operation, boolean>>;

export function buildProgram(): Command {
  return new Command()
    .name("sol-toolkit")
    .version("0.2.0")
    .description("A multi-function Solana tool")
    .option("-g, --generate-keypair", "Generate a new keypair")
    .option("-l, --load-keypair", "Load keypair from .env SECRET_KEY")
    .option(
      "-c, --check-balance",
      "Check balance on devnet and request airdrop if required"
    )
    .option(
      "-f, --find-keypair",
      "Find a keypair whose public key starts with VANITY_PREFIX within VANITY_MAX_MINUTES"
    )
    .option("-s, --send-sol", "Send SOL with a memo to TRANSFER_RECIPIENT")
    .option("-m, --create-token-mint", "Create a new token mint")
    .option("-a, --create-token-account", "Create a new token account")
    .option("-t, --mint-tokens", "Mint some tokens")
    .option("-d, --create-token-metadata", "Create some token metadata");
}

/** Exactly one flag selects an operation; none means nothing to do. */
export function resolveOperation(flags: OperationFlags): Operation | undefined {
  const selected = OPERATIONS.filter((op) => flags[op] === true);
  if (selected.length > 1) {
    throw new UsageError(
      `Choose one operation at a time (got ${selected.join(", ")})`
    );
  }
  return selected[0];
}

export async function runOperation(
  toolkit: Toolkit,
  operation: Operation
): Promise<void> {
  switch (operation) {
    case "generateKeypair":
      toolkit.generateKeypair();
      return;
    case "loadKeypair":
      toolkit.loadKeypair();
      return;
    case "checkBalance":
      await toolkit.checkBalance();
      return;
    case "findKeypair":
      toolkit.findVanityKeypair();
      return;
    case "sendSol":
      await toolkit.sendSol();
      return;
    case "createTokenMint":
      await toolkit.createTokenMint();
      return;
    case "createTokenAccount":
      await toolkit.createTokenAccount();
      return;
    case "mintTokens":
      await toolkit.mintTokens();
      return;
    case "createTokenMetadata":
      await toolkit.createTokenMetadata();
      return;
  }
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram().parse(argv);
  const operation = resolveOperation(program.opts<OperationFlags>());
  if (!operation) return;

  dotenv.config();
  const toolkit = new Toolkit({ config: loadConfig(process.env) });
  await runOperation(toolkit, operation);
}
