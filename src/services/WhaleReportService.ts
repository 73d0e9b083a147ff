import { IPositionSource } from '../exchanges/interfaces/IPositionSource';
import { AggregatedPositions, WhaleConfig } from '../types/common';
import { aggregate } from './PositionAggregator';
import { format } from './ReportFormatter';

export interface GeneratedReport extends AggregatedPositions {
  payloads: string[];
}

export class WhaleReportService {
  constructor(
    private readonly whales: readonly WhaleConfig[],
    private readonly source: IPositionSource,
    private readonly explorerUrl: string
  ) {}

  public getWhaleCount(): number {
    return this.whales.length;
  }

  public async generateReport(generatedAt: Date = new Date()): Promise<GeneratedReport> {
    const aggregated = await aggregate(this.whales, address => this.source.fetchPositions(address));
    const payloads = format(aggregated.reports, aggregated.summary, generatedAt, {
      explorerUrl: this.explorerUrl,
    });

    return { ...aggregated, payloads };
  }
}
