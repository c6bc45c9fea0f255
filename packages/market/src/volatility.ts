/**
 * Population standard deviation of successive simple returns, clamped to
 * [0, 1]. Fewer than three samples yield 0.
 */
export function returnsDispersion(samples: readonly number[]): number {
  const returns: number[] = [];
  for (let i = 1; i < samples.length; i += 1) {
    const previous = samples[i - 1];
    const current = samples[i];
    if (previous === undefined || current === undefined || previous <= 0) {
      continue;
    }
    returns.push((current - previous) / previous);
  }
  if (returns.length < 2) {
    return 0;
  }

  const mean = returns.reduce((sum, value) => sum + value, 0) / returns.length;
  const variance = returns.reduce((sum, value) => sum + (value - mean) ** 2, 0) / returns.length;
  return Math.min(1, Math.max(0, Math.sqrt(variance)));
}

export class PriceHistory {
  private readonly window: number;
  private readonly series = new Map<string, number[]>();

  public constructor(window: number) {
    this.window = window;
  }

  public record(mint: string, priceUsd: number): void {
    const samples = this.series.get(mint) ?? [];
    samples.push(priceUsd);
    if (samples.length > this.window) {
      samples.splice(0, samples.length - this.window);
    }
    this.series.set(mint, samples);
  }

  public samples(mint: string): readonly number[] {
    return this.series.get(mint) ?? [];
  }

  public volatility(mint: string): number {
    return returnsDispersion(this.samples(mint));
  }
}
