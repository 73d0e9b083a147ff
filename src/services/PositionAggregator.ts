import {
  AggregatedPositions,
  AggregateSummary,
  FetchResult,
  PositionFetcher,
  PositionRecord,
  WhaleConfig,
  WhaleReport,
} from '../types/common';
import { logger } from '../utils/logger';

export const sumNotional = (positions: readonly PositionRecord[]): number =>
  positions.reduce((sum, position) => sum + position.notionalValue, 0);

const settle = (
  outcome: PromiseSettledResult<FetchResult<PositionRecord[]>>
): FetchResult<PositionRecord[]> => {
  if (outcome.status === 'fulfilled') {
    return outcome.value;
  }
  const error: unknown = outcome.reason;
  return { ok: false, reason: error instanceof Error ? error.message : String(error) };
};

/**
 * Fetches every whale concurrently and folds the results. Output keeps
 * configuration order; an unavailable or rejected fetch counts as no
 * positions.
 */
export const aggregate = async (
  whales: readonly WhaleConfig[],
  fetchPositions: PositionFetcher
): Promise<AggregatedPositions> => {
  const outcomes = await Promise.allSettled(whales.map(whale => fetchPositions(whale.address)));
  const results = outcomes.map(settle);

  const reports: WhaleReport[] = [];
  results.forEach((result, index) => {
    const config = whales[index];
    if (!result.ok) {
      logger.warn(`Positions unavailable for ${config.displayName}, skipping`, {
        reason: result.reason,
      });
      return;
    }
    if (result.value.length === 0) {
      return;
    }

    reports.push({
      config,
      positions: result.value,
      totalValue: sumNotional(result.value),
    });
  });

  const summary: AggregateSummary = {
    activeWhaleCount: reports.length,
    totalWhaleCount: whales.length,
    totalPositionCount: reports.reduce((count, report) => count + report.positions.length, 0),
    totalValue: reports.reduce((sum, report) => sum + report.totalValue, 0),
  };

  return { reports, summary };
};
