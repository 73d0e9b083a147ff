import { BaseExchange } from '../BaseExchange';
import { hyperliquidEndpoints } from '../../config/exchanges/hyperliquid.config';
import {
  FetchResult,
  PositionRecord,
  PositionSide,
  TRACKED_SYMBOLS,
  TrackedSymbol,
} from '../../types/common';
import { calculatePnlPercentage, parseNumber } from '../../utils/helpers';
import { logger } from '../../utils/logger';

type UnknownRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const isTrackedSymbol = (coin: unknown): coin is TrackedSymbol =>
  TRACKED_SYMBOLS.some(symbol => symbol === coin);

export interface QualifyingEntry {
  symbol: TrackedSymbol;
  signedSize: number;
  entryPrice: number;
  markPrice: number | null;
  unrealizedPnlUsd: number;
}

/**
 * Pulls the fields we need out of one `assetPositions` entry. Returns null
 * for entries outside the whitelist, with zero size, or malformed.
 */
export const readAssetPosition = (entry: unknown): QualifyingEntry | null => {
  if (!isRecord(entry) || !isRecord(entry.position)) {
    return null;
  }

  const position = entry.position;
  if (!isTrackedSymbol(position.coin)) {
    return null;
  }

  const signedSize = parseNumber(position.szi);
  if (signedSize === null || signedSize === 0) {
    return null;
  }

  const markPrice = parseNumber(position.markPx);

  return {
    symbol: position.coin,
    signedSize,
    entryPrice: parseNumber(position.entryPx) ?? 0,
    markPrice: markPrice !== null && markPrice > 0 ? markPrice : null,
    unrealizedPnlUsd: parseNumber(position.unrealizedPnl) ?? 0,
  };
};

export const toPositionRecord = (
  entry: QualifyingEntry,
  mids: Record<string, number> = {}
): PositionRecord => {
  const side: PositionSide = entry.signedSize > 0 ? 'LONG' : 'SHORT';
  const absoluteSize = Math.abs(entry.signedSize);
  const markPrice = entry.markPrice ?? mids[entry.symbol] ?? entry.entryPrice;

  return {
    symbol: entry.symbol,
    side,
    absoluteSize,
    notionalValue: absoluteSize * markPrice,
    entryPrice: entry.entryPrice,
    markPrice,
    unrealizedPnlUsd: entry.unrealizedPnlUsd,
    unrealizedPnlPct: calculatePnlPercentage(entry.entryPrice, markPrice, side),
  };
};

export const sortByNotional = (positions: PositionRecord[]): PositionRecord[] =>
  [...positions].sort((a, b) => b.notionalValue - a.notionalValue);

export class HyperliquidExchange extends BaseExchange {
  public async fetchAllMids(): Promise<Record<string, number>> {
    try {
      const response = await this.makeRequest<unknown>(
        'POST',
        hyperliquidEndpoints.info,
        { type: 'allMids' },
        this.config.timeouts.quotesMs
      );

      if (!isRecord(response)) {
        logger.warn('Hyperliquid allMids returned an unexpected payload');
        return {};
      }

      const mids: Record<string, number> = {};
      for (const [symbol, raw] of Object.entries(response)) {
        const price = parseNumber(raw);
        if (price !== null && price > 0) {
          mids[symbol] = price;
        }
      }
      return mids;
    } catch (error) {
      logger.warn('Error fetching Hyperliquid mid prices:', {
        message: error instanceof Error ? error.message : String(error),
      });
      return {};
    }
  }

  public async fetchMidPrice(symbol: string): Promise<number | null> {
    const mids = await this.fetchAllMids();
    return mids[symbol] ?? null;
  }

  public async fetchPositions(address: string): Promise<FetchResult<PositionRecord[]>> {
    let response: unknown;
    try {
      response = await this.makeRequest<unknown>(
        'POST',
        hyperliquidEndpoints.info,
        { type: 'clearinghouseState', user: address },
        this.config.timeouts.positionsMs
      );
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error(`Error fetching Hyperliquid positions for ${address}:`, { reason });
      return { ok: false, reason };
    }

    if (!isRecord(response) || !Array.isArray(response.assetPositions)) {
      const reason = 'clearinghouseState payload has no assetPositions list';
      logger.error(`Error parsing Hyperliquid positions for ${address}:`, { reason });
      return { ok: false, reason };
    }

    const entries = response.assetPositions
      .map(readAssetPosition)
      .filter((entry): entry is QualifyingEntry => entry !== null);

    // Mark prices are optional upstream; fall back to mids before entry price.
    const mids: Record<string, number> = entries.some(entry => entry.markPrice === null)
      ? await this.fetchAllMids()
      : {};

    const positions = sortByNotional(entries.map(entry => toPositionRecord(entry, mids)));
    logger.debug(`Fetched ${positions.length} tracked positions for ${address}`);

    return { ok: true, value: positions };
  }
}
