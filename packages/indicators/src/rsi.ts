/**
 * Relative Strength Index with Wilder smoothing applied from the first price
 * change: avg = (avg * (period - 1) + sample) / period. Undefined (null) until
 * `period` changes have been seen.
 */
export class WilderRsi {
  private previousPrice: number | null = null;
  private avgGain = 0;
  private avgLoss = 0;
  private changes = 0;
  private current: number | null = null;

  constructor(readonly period: number) {
    if (!Number.isInteger(period) || period <= 0) {
      throw new Error('RSI period must be a positive integer');
    }
  }

  get value(): number | null {
    return this.current;
  }

  get sampleCount(): number {
    return this.changes;
  }

  update(price: number): number | null {
    if (this.previousPrice === null) {
      this.previousPrice = price;
      return this.current;
    }

    const change = price - this.previousPrice;
    this.previousPrice = price;
    const gain = Math.max(change, 0);
    const loss = Math.max(-change, 0);
    this.avgGain = (this.avgGain * (this.period - 1) + gain) / this.period;
    this.avgLoss = (this.avgLoss * (this.period - 1) + loss) / this.period;
    this.changes += 1;

    this.current =
      this.changes < this.period ? null : rsiFromAverages(this.avgGain, this.avgLoss);
    return this.current;
  }

  reset(): void {
    this.previousPrice = null;
    this.avgGain = 0;
    this.avgLoss = 0;
    this.changes = 0;
    this.current = null;
  }
}

export function rsiFromAverages(avgGain: number, avgLoss: number): number {
  if (avgLoss === 0) {
    // a flat window reads 50 rather than 100: no gain, no loss
    return avgGain > 0 ? 100 : 50;
  }
  const rsi = 100 - 100 / (1 + avgGain / avgLoss);
  return Math.min(100, Math.max(0, rsi));
}

/** Batch form; returns one value per price from index `period` onwards. */
export function rsiSeries(values: number[], period = 14): number[] {
  const rsi = new WilderRsi(period);
  const out: number[] = [];
  for (const value of values) {
    const next = rsi.update(value);
    if (next !== null) {
      out.push(next);
    }
  }
  return out;
}
