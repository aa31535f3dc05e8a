export class ToolkitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or malformed configuration, including the signing secret. */
export class ConfigError extends ToolkitError {}

/** An address or program id that does not decode to a public key. */
export class ParseError extends ToolkitError {}

/** More than one operation requested on the command line. */
export class UsageError extends ToolkitError {}

/**
 * A call into the ledger client failed. `method` names the RPC call so the
 * console line says which step broke.
 */
export class RpcError extends ToolkitError {
  constructor(public readonly method: string, cause: unknown) {
    super(`${method} failed: ${errorMessage(cause)}`, { cause });
  }
}

export class TransactionFailedError extends ToolkitError {
  constructor(public readonly signature: string, public readonly txError: unknown) {
    super(`Transaction ${signature} failed: ${JSON.stringify(txError)}`);
  }
}

export class ConfirmationTimeoutError extends ToolkitError {
  constructor(
    public readonly signature: string,
    public readonly elapsedMs: number,
    reason: "timeout" | "aborted" = "timeout"
  ) {
    super(
      reason === "aborted"
        ? `Confirmation of ${signature} aborted after ${elapsedMs}ms`
        : `Transaction ${signature} was not confirmed within ${elapsedMs}ms`
    );
  }
}

/** Config, parse and usage errors end the process; everything else is reported. */
export function isFatal(error: unknown): boolean {
  return (
    error instanceof ConfigError ||
    error instanceof ParseError ||
    error instanceof UsageError
  );
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
