/**
 * Derives a closed-position report from fills and funding payments.
 *
 * Fills are replayed in time order. A position episode starts when the net
 * size leaves zero and ends when it returns to zero; a fill that crosses zero
 * closes the episode and opens the next one with the remainder. The report
 * covers the most recent complete episode.
 */

import type { ClosedPositionReport, FeeEntry, OrderSide, PositionSide } from "./types";

export interface ReportFill {
  side: OrderSide;
  amount: number;
  price: number;
  timestamp: Date;
  /** Positive cost means the fee was paid */
  fee?: FeeEntry;
}

export interface FundingPayment {
  amount: number;
  timestamp: Date;
}

export interface PositionReportInput {
  exchange: string;
  symbol: string;
  fills: readonly ReportFill[];
  funding?: readonly FundingPayment[];
  leverage?: number | null;
  contractSize?: number | null;
}

// Float residue from partial fills
const EPSILON = 1e-9;

interface Episode {
  side: PositionSide;
  openedAt: Date;
  closedAt: Date;
  entryAmount: number;
  entryCost: number;
  exitAmount: number;
  exitCost: number;
  fees: Map<string, number>;
}

const openEpisode = (side: PositionSide, openedAt: Date): Episode => ({
  side,
  openedAt,
  closedAt: openedAt,
  entryAmount: 0,
  entryCost: 0,
  exitAmount: 0,
  exitCost: 0,
  fees: new Map(),
});

const addFee = (episode: Episode, fee: FeeEntry | undefined, share: number): void => {
  if (!fee) {
    return;
  }
  episode.fees.set(fee.currency, (episode.fees.get(fee.currency) ?? 0) + fee.cost * share);
};

const percentOf = (value: number, notional: number): number | null =>
  notional > 0 ? (value / notional) * 100 : null;

const sortByTime = <T extends { timestamp: Date }>(items: readonly T[]): T[] =>
  [...items].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

/**
 * Summarizes the latest position that was opened and fully closed.
 *
 * @returns null when no episode completed within the fills
 */
export const summarizeClosedPosition = (
  input: PositionReportInput,
): ClosedPositionReport | null => {
  let net = 0;
  let current: Episode | null = null;
  let completed: Episode | null = null;

  for (const fill of sortByTime(input.fills)) {
    if (fill.amount <= 0) {
      continue;
    }
    const signed = fill.side === "BUY" ? fill.amount : -fill.amount;
    let remaining = fill.amount;

    if (current && Math.sign(signed) !== Math.sign(net)) {
      const closing = Math.min(remaining, Math.abs(net));
      current.exitAmount += closing;
      current.exitCost += closing * fill.price;
      current.closedAt = fill.timestamp;
      addFee(current, fill.fee, closing / fill.amount);
      remaining -= closing;
      net += Math.sign(signed) * closing;

      if (Math.abs(net) < EPSILON) {
        net = 0;
        completed = current;
        current = null;
      }
    }

    if (remaining > EPSILON) {
      current ??= openEpisode(fill.side === "BUY" ? "LONG" : "SHORT", fill.timestamp);
      current.entryAmount += remaining;
      current.entryCost += remaining * fill.price;
      addFee(current, fill.fee, remaining / fill.amount);
      net += Math.sign(signed) * remaining;
    }
  }

  if (!completed) {
    return null;
  }

  const { openedAt, closedAt } = completed;
  const entryPriceAvg = completed.entryCost / completed.entryAmount;
  const exitPriceAvg = completed.exitCost / completed.exitAmount;
  const notional = completed.entryAmount * entryPriceAvg * (input.contractSize ?? 1);

  const fundingIncome = (input.funding ?? [])
    .filter(
      (payment) =>
        payment.timestamp.getTime() >= openedAt.getTime() &&
        payment.timestamp.getTime() <= closedAt.getTime(),
    )
    .reduce((total, payment) => total + payment.amount, 0);

  const fees = [...completed.fees].map(([currency, cost]) => ({ currency, cost }));
  const feesTotal = fees.reduce((total, fee) => total + fee.cost, 0);

  return {
    exchange: input.exchange,
    symbol: input.symbol,
    side: completed.side,
    contracts: completed.entryAmount,
    openedAt,
    closedAt,
    entryPriceAvg,
    exitPriceAvg,
    leverage: input.leverage ?? null,
    fundingIncome,
    feesTotal,
    fees,
    fundingIncomePercent: percentOf(fundingIncome, notional),
    feesTotalPercent: percentOf(feesTotal, notional),
  };
};
