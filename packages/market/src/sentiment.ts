import type { Logger, SentimentReading } from "@qtrader/core";

export interface SentimentOracle {
  analyze(query: string): Promise<SentimentReading>;
}

export const NEUTRAL_SENTIMENT: SentimentReading = { score: 0, mentions: 0 };

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** Used when no sentiment endpoint is configured. */
export class NeutralSentimentOracle implements SentimentOracle {
  public async analyze(): Promise<SentimentReading> {
    return { ...NEUTRAL_SENTIMENT };
  }
}

/**
 * Queries an HTTP scoring service: `GET <url>?q=<query>` answering
 * `{ "score": 0..1, "mentions": n }`. An empty corpus scores 0.
 */
export class HttpSentimentOracle implements SentimentOracle {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger | undefined;

  public constructor(url: string, timeoutMs: number, logger?: Logger) {
    this.url = url;
    this.timeoutMs = timeoutMs;
    this.logger = logger;
  }

  public async analyze(query: string): Promise<SentimentReading> {
    const url = new URL(this.url);
    url.searchParams.set("q", query);
    const response = await fetch(url, {
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Sentiment query failed (${response.status}): ${body}`);
    }

    const payload = (await response.json()) as { score?: unknown; mentions?: unknown };
    const mentions = typeof payload.mentions === "number" && payload.mentions > 0 ? Math.floor(payload.mentions) : 0;
    if (mentions === 0 || typeof payload.score !== "number" || !Number.isFinite(payload.score)) {
      this.logger?.debug("SENTIMENT_EMPTY", "NO SENTIMENT CORPUS", { query });
      return { ...NEUTRAL_SENTIMENT };
    }
    return { score: clamp(payload.score, 0, 1), mentions };
  }
}
