import { ACTIONS, type Action, type Observation } from "@qtrader/core";

export type ActionValues = Record<Action, number>;

/** Bucketed form of an observation: [priceChange, sentiment, volume, volatility]. */
export type StateKey = readonly [number, number, number, number];

export interface Discretization {
  priceChangeStep: number;
  sentimentStep: number;
  /** Bucket width on log10(1 + volume). */
  volumeLogStep: number;
  volatilityStep: number;
}

export const DEFAULT_DISCRETIZATION: Discretization = {
  priceChangeStep: 0.05,
  sentimentStep: 0.1,
  volumeLogStep: 0.5,
  volatilityStep: 0.01,
};

function bucket(value: number, step: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.floor(value / step);
}

export function discretize(observation: Observation, grid: Discretization = DEFAULT_DISCRETIZATION): StateKey {
  return [
    bucket(observation.priceChange, grid.priceChangeStep),
    bucket(Math.min(1, Math.max(0, observation.sentimentScore)), grid.sentimentStep),
    bucket(Math.log10(1 + Math.max(0, observation.volume24h)), grid.volumeLogStep),
    bucket(Math.max(0, observation.volatility), grid.volatilityStep),
  ];
}

export function encodeKey(key: StateKey): string {
  return key.join(",");
}

function zeroValues(): ActionValues {
  return { buy: 0, sell: 0, hold: 0 };
}

/**
 * Bounded state → action-value table. Rows are created lazily; once the cap
 * is reached the oldest-inserted row is evicted before a new one goes in.
 */
export class QTable {
  private readonly maxEntries: number;
  private readonly grid: Discretization;
  private readonly rows = new Map<string, ActionValues>();
  private evictions = 0;

  public constructor(maxEntries: number, grid: Discretization = DEFAULT_DISCRETIZATION) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new Error("QTable maxEntries must be a positive integer");
    }
    this.maxEntries = maxEntries;
    this.grid = grid;
  }

  public keyOf(observation: Observation): string {
    return encodeKey(discretize(observation, this.grid));
  }

  /** Read without creating; unseen states read as all zeros. */
  public peek(observation: Observation): Readonly<ActionValues> {
    return this.rows.get(this.keyOf(observation)) ?? zeroValues();
  }

  public has(observation: Observation): boolean {
    return this.rows.has(this.keyOf(observation));
  }

  /** Returns the row for `observation`, creating it if needed. The `retain` row is never the one evicted. */
  public ensure(observation: Observation, retain?: Observation): ActionValues {
    const key = this.keyOf(observation);
    const existing = this.rows.get(key);
    if (existing) {
      return existing;
    }
    if (this.rows.size >= this.maxEntries) {
      const keep = retain ? this.keyOf(retain) : undefined;
      for (const candidate of this.rows.keys()) {
        if (candidate !== keep) {
          this.rows.delete(candidate);
          this.evictions += 1;
          break;
        }
      }
    }
    const row = zeroValues();
    this.rows.set(key, row);
    return row;
  }

  public get size(): number {
    return this.rows.size;
  }

  public get evictionCount(): number {
    return this.evictions;
  }
}

export function maxValue(values: Readonly<ActionValues>): number {
  return Math.max(...ACTIONS.map((action) => values[action]));
}
