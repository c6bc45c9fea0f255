export class DataUnavailableError extends Error {
  public readonly mint: string;

  public constructor(mint: string, message: string) {
    super(message);
    this.name = "DataUnavailableError";
    this.mint = mint;
  }
}

/** No trading pair, or the oracle reported a non-positive price or liquidity. */
export class NoLiquidityError extends DataUnavailableError {
  public constructor(mint: string) {
    super(mint, `No liquid trading pair for ${mint}`);
    this.name = "NoLiquidityError";
  }
}

export class FetchError extends Error {
  public readonly key: string;

  public constructor(key: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Fetch failed for ${key}: ${detail}`, { cause });
    this.name = "FetchError";
    this.key = key;
  }
}

export class InsufficientBalanceError extends Error {
  public readonly requiredSol: number;
  public readonly availableSol: number;

  public constructor(requiredSol: number, availableSol: number) {
    super(`Insufficient SOL balance: need ${requiredSol}, have ${availableSol}`);
    this.name = "InsufficientBalanceError";
    this.requiredSol = requiredSol;
    this.availableSol = availableSol;
  }
}

export class NoRouteFoundError extends Error {
  public readonly inputMint: string;
  public readonly outputMint: string;

  public constructor(inputMint: string, outputMint: string, detail?: string) {
    super(`No route found ${inputMint} -> ${outputMint}${detail ? `: ${detail}` : ""}`);
    this.name = "NoRouteFoundError";
    this.inputMint = inputMint;
    this.outputMint = outputMint;
  }
}

export class TransactionFailedError extends Error {
  public readonly signature: string;

  public constructor(signature: string, reason: string) {
    super(`Transaction ${signature} failed: ${reason}`);
    this.name = "TransactionFailedError";
    this.signature = signature;
  }
}

export class InvalidIdentifierError extends Error {
  public readonly identifier: string;

  public constructor(identifier: string) {
    super(`Invalid asset address: ${identifier}`);
    this.name = "InvalidIdentifierError";
    this.identifier = identifier;
  }
}

const TRANSIENT_MARKERS = [
  "blockhash",
  "429",
  "rate limit",
  "timeout",
  "timed out",
  "expired",
  "too many requests",
  "fetch failed",
  "econnreset",
  "socket hang up",
];

export function isTransientError(error: unknown): boolean {
  if (error instanceof NoRouteFoundError) {
    return true;
  }
  const message = (error instanceof Error ? error.message : String(error)).toLowerCase();
  return TRANSIENT_MARKERS.some((marker) => message.includes(marker));
}
