// Common types for the whale position bot

export const TRACKED_SYMBOLS = ['BTC', 'ETH', 'SOL'] as const;

export type TrackedSymbol = typeof TRACKED_SYMBOLS[number];

export type PositionSide = 'LONG' | 'SHORT';

export interface WhaleConfig {
  address: string;
  displayName: string;
}

export interface PositionRecord {
  symbol: TrackedSymbol;
  side: PositionSide;
  absoluteSize: number;
  notionalValue: number;
  entryPrice: number;
  markPrice: number;
  unrealizedPnlUsd: number;
  unrealizedPnlPct: number;
}

export interface WhaleReport {
  config: WhaleConfig;
  positions: PositionRecord[];
  totalValue: number;
}

export interface AggregateSummary {
  activeWhaleCount: number;
  totalWhaleCount: number;
  totalPositionCount: number;
  totalValue: number;
}

export interface AggregatedPositions {
  reports: WhaleReport[];
  summary: AggregateSummary;
}

export type FetchResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

export type PositionFetcher = (address: string) => Promise<FetchResult<PositionRecord[]>>;

export interface ExchangeConfig {
  name: string;
  baseUrl: string;
  timeouts: {
    positionsMs: number;
    quotesMs: number;
  };
}
