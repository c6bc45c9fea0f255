import { LAMPORTS_PER_SOL, NoRouteFoundError, USDC_MINT, WSOL_MINT, type Logger } from "@qtrader/core";

export interface JupiterQuoteRequest {
  inputMint: string;
  outputMint: string;
  amount: string;
  slippageBps: number;
}

export interface JupiterQuoteResponse {
  inputMint: string;
  outputMint: string;
  inAmount: string;
  outAmount: string;
  otherAmountThreshold: string;
  swapMode: string;
  slippageBps: number;
  priceImpactPct: string;
  routePlan: Array<{
    percent: number;
    bps?: number | null;
    swapInfo: {
      ammKey: string;
      label: string;
      inputMint: string;
      outputMint: string;
      inAmount: string;
      outAmount: string;
    };
  }>;
  contextSlot?: number;
  timeTaken?: number;
}

export interface JupiterSwapRequest {
  userPublicKey: string;
  quoteResponse: JupiterQuoteResponse;
  priorityFeeLamports: number;
}

export interface JupiterSwapResponse {
  swapTransaction: string;
  lastValidBlockHeight: number;
  prioritizationFeeLamports?: number;
  computeUnitLimit?: number;
  simulationError?: unknown;
}

/** The slice of the aggregator the execution layer depends on. */
export interface SwapAggregator {
  getQuote(request: JupiterQuoteRequest): Promise<JupiterQuoteResponse>;
  getSwapTransaction(request: JupiterSwapRequest): Promise<JupiterSwapResponse>;
}

const NO_ROUTE_MARKERS = ["could_not_find_any_route", "no route", "no_routes_found", "route not found"];

function isNoRouteBody(body: string): boolean {
  const lower = body.toLowerCase();
  return NO_ROUTE_MARKERS.some((marker) => lower.includes(marker));
}

export class JupiterClient implements SwapAggregator {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger | undefined;

  public constructor(baseUrl: string, timeoutMs: number, logger?: Logger) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.timeoutMs = timeoutMs;
    this.logger = logger;
  }

  public async getQuote(request: JupiterQuoteRequest): Promise<JupiterQuoteResponse> {
    const url = new URL(`${this.baseUrl}/quote`);
    url.searchParams.set("inputMint", request.inputMint);
    url.searchParams.set("outputMint", request.outputMint);
    url.searchParams.set("amount", request.amount);
    url.searchParams.set("slippageBps", String(request.slippageBps));
    url.searchParams.set("swapMode", "ExactIn");

    const response = await fetch(url, {
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      const body = await response.text();
      if (isNoRouteBody(body)) {
        throw new NoRouteFoundError(request.inputMint, request.outputMint, body.slice(0, 200));
      }
      throw new Error(`Jupiter quote failed (${response.status}): ${body}`);
    }

    const quote = (await response.json()) as JupiterQuoteResponse;
    if (!Array.isArray(quote.routePlan) || quote.routePlan.length === 0) {
      throw new NoRouteFoundError(request.inputMint, request.outputMint, "empty route plan");
    }
    this.logger?.debug("GET_QUOTE", "GET QUOTE", {
      inputMint: request.inputMint,
      outputMint: request.outputMint,
      inAmountRaw: request.amount,
      outAmountRaw: quote.outAmount,
      priceImpactPct: quote.priceImpactPct,
    });
    return quote;
  }

  public async getSwapTransaction(request: JupiterSwapRequest): Promise<JupiterSwapResponse> {
    const body: Record<string, unknown> = {
      userPublicKey: request.userPublicKey,
      quoteResponse: request.quoteResponse,
      wrapAndUnwrapSol: true,
      dynamicComputeUnitLimit: true,
    };
    if (request.priorityFeeLamports > 0) {
      body.prioritizationFeeLamports = request.priorityFeeLamports;
    }

    const response = await fetch(`${this.baseUrl}/swap`, {
      method: "POST",
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      const responseBody = await response.text();
      throw new Error(`Jupiter swap build failed (${response.status}): ${responseBody}`);
    }

    return (await response.json()) as JupiterSwapResponse;
  }
}

export function parseRouteSummary(quote: JupiterQuoteResponse): string[] {
  const labels = quote.routePlan.map((part) => part.swapInfo.label).filter(Boolean);
  return [...new Set(labels)];
}

/** USD value of one SOL, from a 1 SOL → USDC quote. `null` when the quote is empty. */
export async function quoteSolPriceUsd(aggregator: SwapAggregator): Promise<number | null> {
  const quote = await aggregator.getQuote({
    inputMint: WSOL_MINT,
    outputMint: USDC_MINT,
    amount: String(LAMPORTS_PER_SOL),
    slippageBps: 30,
  });
  const usdcOut = Number(quote.outAmount) / 1_000_000;
  return Number.isFinite(usdcOut) && usdcOut > 0 ? usdcOut : null;
}
