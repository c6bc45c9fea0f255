import fs from "node:fs";
import { Connection, Keypair, PublicKey, type Commitment } from "@solana/web3.js";
import { LAMPORTS_PER_SOL, WSOL_MINT, withTimeout } from "@qtrader/core";

/** The balance queries the wallet needs from a connection. */
export type BalanceReader = Pick<Connection, "getBalance" | "getParsedTokenAccountsByOwner">;

export interface AssetBalance {
  amountRaw: string;
  decimals: number;
}

export function createRpcConnection(rpcUrl: string, commitment: Commitment = "confirmed"): Connection {
  return new Connection(rpcUrl, { commitment });
}

export function loadKeypairFromFile(path: string): Keypair {
  const payload = fs.readFileSync(path, "utf8");
  const raw: unknown = JSON.parse(payload);
  if (!Array.isArray(raw) || !raw.every((value): value is number => typeof value === "number")) {
    throw new Error(`Keypair file ${path} must contain a JSON array of numbers`);
  }
  return Keypair.fromSecretKey(Uint8Array.from(raw));
}

export function isValidMint(address: string): boolean {
  try {
    new PublicKey(address);
    return true;
  } catch {
    return false;
  }
}

export async function checkRpcHealth(
  connection: Connection,
  timeoutMs: number,
): Promise<{ ok: boolean; slot?: number; error?: string }> {
  try {
    const blockhash = await withTimeout(connection.getLatestBlockhash("processed"), timeoutMs, "RPC health check");
    return { ok: true, slot: blockhash.lastValidBlockHeight };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

export async function getSolBalance(connection: BalanceReader, owner: PublicKey): Promise<number> {
  const lamports = await connection.getBalance(owner, "confirmed");
  return lamports / LAMPORTS_PER_SOL;
}

export async function getAssetBalance(connection: BalanceReader, owner: PublicKey, mint: string): Promise<AssetBalance> {
  if (mint === WSOL_MINT) {
    const lamports = await connection.getBalance(owner, "confirmed");
    return { amountRaw: String(lamports), decimals: 9 };
  }

  const mintPk = new PublicKey(mint);
  const accounts = await connection.getParsedTokenAccountsByOwner(owner, { mint: mintPk }, "confirmed");
  let total = 0n;
  let decimals = 0;
  for (const item of accounts.value) {
    const tokenAmount: { amount: string; decimals: number } = item.account.data.parsed.info.tokenAmount;
    total += BigInt(tokenAmount.amount);
    decimals = tokenAmount.decimals;
  }
  return { amountRaw: total.toString(), decimals };
}

export function uiToAtomic(amountUi: number, decimals: number): string {
  const base = 10 ** decimals;
  return String(Math.floor(amountUi * base));
}

/** Takes `fraction` of an atomic amount, rounding down; `fraction` is applied in basis points. */
export function fractionOfAtomic(amountRaw: string, fraction: number): string {
  const bps = BigInt(Math.round(Math.min(1, Math.max(0, fraction)) * 10_000));
  return ((BigInt(amountRaw) * bps) / 10_000n).toString();
}
