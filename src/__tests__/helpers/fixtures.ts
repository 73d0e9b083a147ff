import { PositionRecord, WhaleConfig, WhaleReport } from '../../types/common';

export const EXPLORER_URL = 'https://www.coinglass.com/hyperliquid/';

export const createPosition = (overrides: Partial<PositionRecord> = {}): PositionRecord => ({
  symbol: 'BTC',
  side: 'LONG',
  absoluteSize: 2,
  notionalValue: 130000,
  entryPrice: 60000,
  markPrice: 65000,
  unrealizedPnlUsd: 10000,
  unrealizedPnlPct: 8.333333,
  ...overrides,
});

export const createWhale = (index: number, overrides: Partial<WhaleConfig> = {}): WhaleConfig => ({
  address: `0x${String(index).repeat(40).slice(0, 40)}`,
  displayName: `Whale ${index}`,
  ...overrides,
});

export const createReport = (
  config: WhaleConfig,
  positions: PositionRecord[] = [createPosition()]
): WhaleReport => ({
  config,
  positions,
  totalValue: positions.reduce((sum, p) => sum + p.notionalValue, 0),
});
