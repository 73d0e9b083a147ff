import { FetchResult, PositionRecord } from '../../types/common';

export interface IPositionSource {
  /**
   * Get the name of the exchange
   */
  getName(): string;

  /**
   * Get current mid prices for every listed asset. Never rejects; an
   * unavailable upstream yields an empty map.
   */
  fetchAllMids(): Promise<Record<string, number>>;

  /**
   * Get the current mid price for one asset
   * @param symbol Asset symbol, e.g. BTC
   * @returns The price, or null when unavailable
   */
  fetchMidPrice(symbol: string): Promise<number | null>;

  /**
   * Get the whitelisted open positions of an address, largest first
   * @param address Account address
   */
  fetchPositions(address: string): Promise<FetchResult<PositionRecord[]>>;
}
