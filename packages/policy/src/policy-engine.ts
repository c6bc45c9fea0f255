import { ACTIONS, type Action, type Clock, type Logger, type Observation, systemClock } from "@qtrader/core";
import { QTable, maxValue } from "./q-table.js";

export interface PolicyParameters {
  learningRate: number;
  discountFactor: number;
  initialEpsilon: number;
  minEpsilon: number;
  epsilonDecay: number;
  rewardBuyDivisor: number;
  rewardSellDivisor: number;
  rewardHoldDivisor: number;
}

export const DEFAULT_POLICY_PARAMETERS: PolicyParameters = {
  learningRate: 0.1,
  discountFactor: 0.9,
  initialEpsilon: 1,
  minEpsilon: 0.01,
  epsilonDecay: 0.05,
  rewardBuyDivisor: 10,
  rewardSellDivisor: 10,
  rewardHoldDivisor: 20,
};

/**
 * Live market access used while training. Reads are real; nothing here
 * places a trade.
 */
export interface TrainingEnvironment {
  observe(mint: string): Promise<Observation | null>;
  price(mint: string): Promise<number | null>;
}

export interface TrainingOptions {
  tickMs: number;
}

export interface TrainingSummary {
  mint: string;
  episodes: number;
  updates: number;
  skipped: number;
  epsilon: number;
}

export interface PolicyEngineOptions {
  table: QTable;
  params?: Partial<PolicyParameters>;
  random?: () => number;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Tabular Q-learning over discretized observations. Ties between equal
 * action values resolve in `ACTIONS` order: buy, then sell, then hold.
 */
export class PolicyEngine {
  private readonly table: QTable;
  private readonly params: PolicyParameters;
  private readonly random: () => number;
  private readonly clock: Clock;
  private readonly logger: Logger | undefined;
  private currentEpsilon: number;

  public constructor(options: PolicyEngineOptions) {
    this.table = options.table;
    this.params = { ...DEFAULT_POLICY_PARAMETERS, ...options.params };
    this.random = options.random ?? Math.random;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;
    this.currentEpsilon = this.params.initialEpsilon;
  }

  public get epsilon(): number {
    return this.currentEpsilon;
  }

  public set epsilon(value: number) {
    this.currentEpsilon = Math.min(1, Math.max(0, value));
  }

  public get tableSize(): number {
    return this.table.size;
  }

  public selectAction(observation: Observation | null | undefined): Action {
    if (!observation) {
      return "hold";
    }
    if (this.random() < this.currentEpsilon) {
      const index = Math.min(ACTIONS.length - 1, Math.floor(this.random() * ACTIONS.length));
      return ACTIONS[index] ?? "hold";
    }
    return this.greedyAction(observation);
  }

  public greedyAction(observation: Observation): Action {
    const values = this.table.peek(observation);
    let best: Action = ACTIONS[0];
    for (const action of ACTIONS) {
      if (values[action] > values[best]) {
        best = action;
      }
    }
    return best;
  }

  public values(observation: Observation): Readonly<Record<Action, number>> {
    return { ...this.table.peek(observation) };
  }

  /** Q[s][a] += α · (r + γ · max Q[s'] − Q[s][a]) */
  public update(observation: Observation, action: Action, reward: number, next: Observation): void {
    const row = this.table.ensure(observation);
    const nextRow = this.table.ensure(next, observation);
    const { learningRate, discountFactor } = this.params;
    const target = reward + discountFactor * maxValue(nextRow);
    row[action] += learningRate * (target - row[action]);
  }

  public reward(initialPrice: number, finalPrice: number, action: Action): number {
    if (!(initialPrice > 0) || !Number.isFinite(finalPrice)) {
      return 0;
    }
    const changePct = ((finalPrice - initialPrice) / initialPrice) * 100;
    switch (action) {
      case "buy":
        return changePct / this.params.rewardBuyDivisor;
      case "sell":
        return -changePct / this.params.rewardSellDivisor;
      case "hold":
        return changePct / this.params.rewardHoldDivisor;
    }
  }

  public decayEpsilon(): void {
    this.currentEpsilon = Math.max(this.params.minEpsilon, this.currentEpsilon - this.params.epsilonDecay);
  }

  public async train(
    mint: string,
    episodes: number,
    environment: TrainingEnvironment,
    options: TrainingOptions,
  ): Promise<TrainingSummary> {
    let updates = 0;
    let skipped = 0;

    for (let episode = 1; episode <= episodes; episode += 1) {
      try {
        const completed = await this.runEpisode(mint, environment, options);
        if (completed) {
          updates += 1;
        } else {
          skipped += 1;
        }
      } catch (error) {
        skipped += 1;
        this.logger?.warn("TRAIN_EPISODE_FAIL", "WARNING TRAINING EPISODE FAILED", {
          mint,
          episode,
          error: error instanceof Error ? error.message : String(error),
        });
      } finally {
        this.decayEpsilon();
      }
    }

    const summary: TrainingSummary = { mint, episodes, updates, skipped, epsilon: this.currentEpsilon };
    this.logger?.ok("TRAIN_DONE", "TRAINING COMPLETE", { ...summary, tableSize: this.table.size });
    return summary;
  }

  private async runEpisode(mint: string, environment: TrainingEnvironment, options: TrainingOptions): Promise<boolean> {
    const state = await environment.observe(mint);
    if (!state) {
      return false;
    }
    const action = this.selectAction(state);
    const initialPrice = await environment.price(mint);
    if (initialPrice === null) {
      return false;
    }
    await this.clock.sleep(options.tickMs);
    const finalPrice = await environment.price(mint);
    if (finalPrice === null) {
      return false;
    }
    const reward = this.reward(initialPrice, finalPrice, action);
    const next = await environment.observe(mint);
    if (!next) {
      return false;
    }
    this.update(state, action, reward, next);
    this.logger?.debug("TRAIN_STEP", "TRAINING STEP", { mint, action, reward, epsilon: this.currentEpsilon });
    return true;
  }
}
