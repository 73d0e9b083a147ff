import { describe, it, expect } from '@jest/globals';
import { IPositionSource } from '../../exchanges/interfaces/IPositionSource';
import { NO_POSITIONS_LINE } from '../../services/ReportFormatter';
import { WhaleReportService } from '../../services/WhaleReportService';
import { FetchResult, PositionRecord } from '../../types/common';
import { EXPLORER_URL, createPosition, createWhale } from '../helpers/fixtures';

const sourceFrom = (results: Record<string, FetchResult<PositionRecord[]>>): IPositionSource => ({
  getName: () => 'fake',
  fetchAllMids: async () => ({}),
  fetchMidPrice: async () => null,
  fetchPositions: async (address) => results[address] ?? { ok: false, reason: 'unknown address' },
});

describe('WhaleReportService', () => {
  const generatedAt = new Date(Date.UTC(2024, 5, 1, 12, 0, 0));

  it('renders only the whales that hold tracked positions', async () => {
    const whales = [
      createWhale(1, { displayName: 'Alpha' }),
      createWhale(2, { displayName: 'Bravo' }),
      createWhale(3, { displayName: 'Charlie' }),
    ];
    const service = new WhaleReportService(whales, sourceFrom({
      [whales[0].address]: { ok: true, value: [createPosition({ notionalValue: 1_500_000 })] },
      [whales[1].address]: { ok: true, value: [] },
      [whales[2].address]: { ok: false, reason: 'timeout of 10000ms exceeded' },
    }), EXPLORER_URL);

    const report = await service.generateReport(generatedAt);

    expect(report.summary).toEqual({
      activeWhaleCount: 1,
      totalWhaleCount: 3,
      totalPositionCount: 1,
      totalValue: 1_500_000,
    });
    expect(report.payloads).toHaveLength(1);
    expect(report.payloads[0]).toContain('<code>Generated: 2024-06-01 12:00:00 UTC</code>');
    expect(report.payloads[0]).toContain('>Alpha</a>');
    expect(report.payloads[0]).not.toContain('Bravo');
    expect(report.payloads[0]).not.toContain('Charlie');
    expect(report.payloads[0]).toContain('Active Whales: 1/3');
    expect(report.payloads[0]).toContain('Total Value: $1.50M');
  });

  it('falls back to the no-positions line when every fetch fails', async () => {
    const service = new WhaleReportService([createWhale(1), createWhale(2)], sourceFrom({}), EXPLORER_URL);

    const report = await service.generateReport(generatedAt);

    expect(report.reports).toEqual([]);
    expect(report.payloads).toHaveLength(1);
    expect(report.payloads[0].endsWith(`\n\n${NO_POSITIONS_LINE}`)).toBe(true);
    expect(report.payloads[0]).not.toContain('SUMMARY');
  });
});
