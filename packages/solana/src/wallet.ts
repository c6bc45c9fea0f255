import { VersionedTransaction, type Connection, type Keypair } from "@solana/web3.js";
import { withTimeout, type Logger, type RateLimiter } from "@qtrader/core";
import { getAssetBalance, getSolBalance, type BalanceReader } from "./rpc.js";

/** Signing account used by the execution layer. */
export interface TradingWallet {
  readonly publicKey: string;
  solBalance(): Promise<number>;
  tokenBalanceRaw(mint: string): Promise<string>;
  /** Signs and submits a base64 serialized transaction; resolves to its signature. */
  signAndSend(serializedTransaction: string): Promise<string>;
}

export type WalletConnection = BalanceReader & Pick<Connection, "simulateTransaction" | "sendRawTransaction">;

export interface SolanaWalletOptions {
  connection: WalletConnection;
  keypair: Keypair;
  /** RPC channel shared with the confirmation monitor. */
  limiter: RateLimiter;
  requestTimeoutMs: number;
  logger: Logger;
}

export class SolanaWallet implements TradingWallet {
  public readonly publicKey: string;
  private readonly connection: WalletConnection;
  private readonly keypair: Keypair;
  private readonly limiter: RateLimiter;
  private readonly requestTimeoutMs: number;
  private readonly logger: Logger;

  public constructor(options: SolanaWalletOptions) {
    this.connection = options.connection;
    this.keypair = options.keypair;
    this.publicKey = options.keypair.publicKey.toBase58();
    this.limiter = options.limiter;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.logger = options.logger;
  }

  public solBalance(): Promise<number> {
    return this.rpc("getBalance", () => getSolBalance(this.connection, this.keypair.publicKey));
  }

  public async tokenBalanceRaw(mint: string): Promise<string> {
    const balance = await this.rpc("getTokenBalance", () =>
      getAssetBalance(this.connection, this.keypair.publicKey, mint),
    );
    return balance.amountRaw;
  }

  public async signAndSend(serializedTransaction: string): Promise<string> {
    const transaction = VersionedTransaction.deserialize(Buffer.from(serializedTransaction, "base64"));

    const simulation = await this.rpc("simulateTransaction", () =>
      this.connection.simulateTransaction(transaction, {
        replaceRecentBlockhash: true,
        sigVerify: false,
        commitment: "processed",
      }),
    );
    if (simulation.value.err) {
      this.logger.warn("SIMULATION_FAIL", "WARNING SWAP SIMULATION FAILED", {
        error: JSON.stringify(simulation.value.err),
        logs: (simulation.value.logs ?? []).slice(0, 12),
      });
      throw new Error(`Simulation failed: ${JSON.stringify(simulation.value.err)}`);
    }

    transaction.sign([this.keypair]);
    const signature = await this.rpc("sendRawTransaction", () =>
      this.connection.sendRawTransaction(transaction.serialize(), {
        skipPreflight: true,
        maxRetries: 2,
      }),
    );
    this.logger.info("TX_SENT", "EXECUTE TX SENT", { signature });
    return signature;
  }

  private async rpc<T>(label: string, call: () => Promise<T>): Promise<T> {
    await this.limiter.acquire();
    return withTimeout(call(), this.requestTimeoutMs, label);
  }
}
