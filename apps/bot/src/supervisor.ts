import {
  DataUnavailableError,
  FetchError,
  systemClock,
  type Action,
  type AssetObservation,
  type Clock,
  type Logger,
  type Position,
  type RiskManager,
  type SellReason,
  type TxHandle,
} from "@qtrader/core";
import type { MarketDataGateway } from "@qtrader/market";
import type { PolicyEngine } from "@qtrader/policy";
import { fractionOfAtomic, isValidMint, type TxConfirmationMonitor } from "@qtrader/solana";
import type { ExecutionGateway } from "./execution.js";

export type AssetState = "NoPosition" | "Open" | "OpenHold";

export interface TradingSupervisorOptions {
  assets: readonly string[];
  market: MarketDataGateway;
  policy: PolicyEngine;
  risk: RiskManager;
  execution: ExecutionGateway;
  monitor: TxConfirmationMonitor;
  riskFraction: number;
  takeProfitFraction: number;
  surgeSellFraction: number;
  onlineLearning: boolean;
  logger: Logger;
  clock?: Clock;
}

interface Decision {
  observation: AssetObservation;
  action: Action;
}

/**
 * Owns positions and surge-hold flags. Each tick runs every asset
 * concurrently; a failure in one asset is logged and never reaches the others.
 */
export class TradingSupervisor {
  private readonly options: TradingSupervisorOptions;
  private readonly assets: string[];
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly positions = new Map<string, Position>();
  private readonly holds = new Set<string>();
  private readonly invalid = new Set<string>();
  private readonly lastDecisions = new Map<string, Decision>();

  public constructor(options: TradingSupervisorOptions) {
    this.options = options;
    this.assets = [...new Set(options.assets)];
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;
  }

  public get trackedAssets(): readonly string[] {
    return this.assets;
  }

  public position(mint: string): Position | undefined {
    return this.positions.get(mint);
  }

  public openPositions(): Position[] {
    return [...this.positions.values()];
  }

  public state(mint: string): AssetState {
    if (!this.positions.has(mint)) {
      return "NoPosition";
    }
    return this.holds.has(mint) ? "OpenHold" : "Open";
  }

  public skippedAssets(): string[] {
    return [...this.invalid];
  }

  public async tick(): Promise<void> {
    const results = await Promise.allSettled(this.assets.map((mint) => this.processAsset(mint)));
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        this.logger.error("ASSET_ERROR", "ERROR PROCESSING ASSET", {
          mint: this.assets[index],
          error: result.reason instanceof Error ? result.reason.message : String(result.reason),
        });
      }
    });
  }

  private async processAsset(mint: string): Promise<void> {
    if (this.invalid.has(mint)) {
      return;
    }
    if (!isValidMint(mint)) {
      this.invalid.add(mint);
      this.logger.warn("INVALID_ASSET", "WARNING INVALID ASSET ADDRESS, SKIPPING PERMANENTLY", { mint });
      return;
    }

    const position = this.positions.get(mint) ?? null;
    let observation: AssetObservation;
    try {
      observation = await this.options.market.observe(mint, position);
    } catch (error) {
      if (error instanceof DataUnavailableError || error instanceof FetchError) {
        this.logger.warn("DATA_SKIP", "WARNING NO MARKET DATA, SKIPPING ASSET", { mint, reason: error.message });
        return;
      }
      throw error;
    }

    this.learnFromLastDecision(mint, observation);

    if (!position) {
      await this.considerEntry(mint, observation);
      return;
    }
    await this.manageOpenPosition(mint, position, observation);
  }

  private async considerEntry(mint: string, observation: AssetObservation): Promise<void> {
    const action = this.decide(mint, observation);
    if (action !== "buy") {
      return;
    }

    const sizeSol = await this.options.risk.positionSize(this.options.riskFraction);
    if (sizeSol <= 0) {
      this.logger.warn("BUY_SKIP", "WARNING POSITION SIZE IS ZERO, SKIPPING BUY", { mint });
      return;
    }

    const handle = await this.options.execution.buy(mint, sizeSol);
    if (!handle) {
      this.logger.warn("BUY_FAIL", "WARNING BUY NOT EXECUTED, NO POSITION OPENED", { mint });
      return;
    }
    if (!(await this.settled(handle))) {
      return;
    }

    const position: Position = {
      mint,
      entryPriceUsd: observation.priceUsd,
      quantityRaw: handle.expectedOutRaw,
      openedAt: this.clock.now(),
    };
    this.positions.set(mint, position);
    this.logger.ok("POSITION_OPEN", "POSITION OPENED", {
      mint,
      entryPriceUsd: position.entryPriceUsd,
      quantityRaw: position.quantityRaw,
      sizeSol,
      stopLossPriceUsd: this.options.risk.stopLossPrice(position.entryPriceUsd),
    });
  }

  private async manageOpenPosition(mint: string, position: Position, observation: AssetObservation): Promise<void> {
    const stopLossPrice = this.options.risk.stopLossPrice(position.entryPriceUsd);
    if (this.options.risk.checkStopLoss(observation.priceUsd, stopLossPrice)) {
      this.lastDecisions.delete(mint);
      this.logger.warn("STOP_LOSS", "STOP LOSS TRIGGERED", {
        mint,
        priceUsd: observation.priceUsd,
        stopLossPrice,
      });
      await this.exit(mint, position, 1, "STOP_LOSS");
      return;
    }

    if (this.holds.has(mint)) {
      this.lastDecisions.delete(mint);
      await this.exit(mint, position, this.options.surgeSellFraction, "SURGE_PARTIAL");
      return;
    }

    if (await this.options.market.detectSurge(mint, observation.symbol)) {
      this.lastDecisions.delete(mint);
      this.holds.add(mint);
      this.logger.info("SURGE_HOLD", "SURGE DETECTED, HOLDING WITH PARTIAL EXITS", { mint });
      return;
    }

    if (observation.priceChange >= this.options.takeProfitFraction) {
      this.lastDecisions.delete(mint);
      this.logger.ok("TAKE_PROFIT", "TAKE PROFIT REACHED", { mint, priceChange: observation.priceChange });
      await this.exit(mint, position, 1, "TAKE_PROFIT");
      return;
    }

    if (this.decide(mint, observation) === "sell") {
      await this.exit(mint, position, 1, "POLICY_SELL");
    }
  }

  private async exit(mint: string, position: Position, requested: number, reason: SellReason): Promise<void> {
    // A partial step that rounds to nothing sells the remainder instead.
    const fraction = requested < 1 && BigInt(fractionOfAtomic(position.quantityRaw, requested)) <= 0n ? 1 : requested;
    const handle = await this.options.execution.sell(mint, fraction, reason, position.quantityRaw);
    if (!handle) {
      this.logger.warn("SELL_FAIL", "WARNING SELL NOT EXECUTED, POSITION KEPT", { mint, reason });
      return;
    }
    if (!(await this.settled(handle))) {
      return;
    }

    const remaining = fraction >= 1 ? 0n : BigInt(position.quantityRaw) - BigInt(handle.inAmountRaw);
    if (remaining <= 0n) {
      this.positions.delete(mint);
      this.holds.delete(mint);
      this.lastDecisions.delete(mint);
      this.logger.ok("POSITION_CLOSED", "POSITION CLOSED", { mint, reason });
      return;
    }

    this.positions.set(mint, { ...position, quantityRaw: remaining.toString() });
    this.logger.info("POSITION_REDUCED", "POSITION REDUCED", { mint, reason, quantityRaw: remaining.toString() });
  }

  /** Paper handles settle immediately; live ones wait for finality. */
  private async settled(handle: TxHandle): Promise<boolean> {
    if (handle.signature === null) {
      return true;
    }
    const resolution = await this.options.monitor.confirm(handle.signature, handle.mint);
    if (resolution.status !== "CONFIRMED") {
      this.logger.warn("POSITION_UNCHANGED", "WARNING TRANSACTION NOT CONFIRMED, POSITION STATE UNCHANGED", {
        mint: handle.mint,
        side: handle.side,
        signature: handle.signature,
      });
      return false;
    }
    return true;
  }

  private decide(mint: string, observation: AssetObservation): Action {
    const action = this.options.policy.selectAction(observation);
    this.lastDecisions.set(mint, { observation, action });
    this.logger.debug("POLICY_ACTION", "POLICY ACTION", { mint, action, priceChange: observation.priceChange });
    return action;
  }

  private learnFromLastDecision(mint: string, observation: AssetObservation): void {
    const previous = this.lastDecisions.get(mint);
    this.lastDecisions.delete(mint);
    if (!previous || !this.options.onlineLearning) {
      return;
    }
    const reward = this.options.policy.reward(previous.observation.priceUsd, observation.priceUsd, previous.action);
    this.options.policy.update(previous.observation, previous.action, reward, observation);
  }
}
