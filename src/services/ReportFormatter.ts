import { AggregateSummary, PositionRecord, WhaleReport } from '../types/common';
import {
  escapeHtml,
  formatPercentage,
  formatPrice,
  formatSigned,
  formatUtcTimestamp,
  formatValue,
  truncateAddress,
} from '../utils/helpers';

// Telegram rejects messages above 4096 characters.
export const MAX_MESSAGE_LENGTH = 4000;

export const BLOCK_SEPARATOR = '\n\n';

// Whale sections get an extra blank line after them.
export const WHALE_SEPARATOR = '\n\n\n';

export const NO_POSITIONS_LINE = '<i>No active BTC/ETH/SOL positions found</i>';

const RULE_WIDTH = 40;

/**
 * A unit of the report that pagination never splits, together with the
 * gap placed before the next block when both land in the same message.
 */
export interface ReportBlock {
  text: string;
  separator: string;
}

export interface ReportFormatOptions {
  explorerUrl: string;
  maxLength?: number;
}

export const getPnlEmoji = (pnlPct: number): string => {
  if (pnlPct >= 50) return '🚀🚀🚀';
  if (pnlPct >= 20) return '🚀🚀';
  if (pnlPct >= 10) return '🚀';
  if (pnlPct >= 5) return '📈';
  if (pnlPct > 0) return '✅';
  if (pnlPct === 0) return '➖';
  if (pnlPct > -5) return '📉';
  if (pnlPct > -10) return '⚠️';
  if (pnlPct > -20) return '🔻';
  return '💀';
};

const rule = (char: '=' | '-'): string => `<code>${char.repeat(RULE_WIDTH)}</code>`;

export const formatHeader = (generatedAt: Date): string => [
  '<b>🐋 WHALE POSITIONS REPORT 🐋</b>',
  `<code>Generated: ${formatUtcTimestamp(generatedAt)}</code>`,
  rule('='),
].join('\n');

export const formatPosition = (position: PositionRecord): string => [
  `<b>${position.symbol} ${position.side}</b> ${getPnlEmoji(position.unrealizedPnlPct)}`,
  `  Size: ${formatValue(position.notionalValue)}`,
  `  Entry: ${formatPrice(position.entryPrice)}`,
  `  Mark: ${formatPrice(position.markPrice)}`,
  // Both figures carry the sign of the USD amount.
  `  P&amp;L: <b>${formatSigned(position.unrealizedPnlUsd, formatValue)}</b> ` +
    `(<b>${formatSigned(position.unrealizedPnlPct, formatPercentage, position.unrealizedPnlUsd)}</b>)`,
].join('\n');

export const formatWhale = (report: WhaleReport, explorerUrl: string): string => {
  const { address, displayName } = report.config;
  const link = escapeHtml(`${explorerUrl}${address}`);

  const header = [
    `<b>📊 <a href='${link}'>${escapeHtml(displayName)}</a></b>`,
    `<code>Address: ${escapeHtml(truncateAddress(address))}</code>`,
    `<code>Total Value: ${formatValue(report.totalValue)}</code>`,
    rule('-'),
  ].join('\n');

  return [header, report.positions.map(formatPosition).join(BLOCK_SEPARATOR)].join('\n');
};

export const formatSummary = (summary: AggregateSummary): string => [
  rule('='),
  '<b>📈 SUMMARY</b>',
  `Active Whales: ${summary.activeWhaleCount}/${summary.totalWhaleCount}`,
  `Total Positions: ${summary.totalPositionCount}`,
  `Total Value: ${formatValue(summary.totalValue)}`,
].join('\n');

/**
 * Splits a block that is too long by itself on line boundaries, and a line
 * that is too long by itself on characters.
 */
const splitOversizedBlock = (block: string, maxLength: number): string[] => {
  const chunks: string[] = [];
  let current = '';

  for (const line of block.split('\n')) {
    const pieces: string[] = [];
    for (let i = 0; i < line.length || i === 0; i += maxLength) {
      pieces.push(line.slice(i, i + maxLength));
    }

    for (const piece of pieces) {
      const candidate = current ? `${current}\n${piece}` : piece;
      if (candidate.length <= maxLength) {
        current = candidate;
      } else {
        chunks.push(current);
        current = piece;
      }
    }
  }

  if (current) {
    chunks.push(current);
  }
  return chunks;
};

/**
 * Packs whole blocks into messages of at most `maxLength` characters,
 * joining neighbours inside a message with the earlier block's separator.
 * A block is never split across messages unless it cannot fit in one on
 * its own.
 */
export const paginate = (blocks: readonly ReportBlock[], maxLength = MAX_MESSAGE_LENGTH): string[] => {
  const messages: string[] = [];
  let current = '';
  let separator = '';

  for (const block of blocks) {
    if (block.text.length > maxLength) {
      if (current) {
        messages.push(current);
        current = '';
      }
      messages.push(...splitOversizedBlock(block.text, maxLength));
      continue;
    }

    const candidate = current ? `${current}${separator}${block.text}` : block.text;
    if (candidate.length <= maxLength) {
      current = candidate;
    } else {
      messages.push(current);
      current = block.text;
    }
    separator = block.separator;
  }

  if (current) {
    messages.push(current);
  }
  return messages;
};

export const buildReportBlocks = (
  reports: readonly WhaleReport[],
  summary: AggregateSummary,
  generatedAt: Date,
  explorerUrl: string
): ReportBlock[] => {
  const blocks: ReportBlock[] = [{ text: formatHeader(generatedAt), separator: BLOCK_SEPARATOR }];

  if (reports.length === 0) {
    blocks.push({ text: NO_POSITIONS_LINE, separator: BLOCK_SEPARATOR });
    return blocks;
  }

  for (const report of reports) {
    blocks.push({ text: formatWhale(report, explorerUrl), separator: WHALE_SEPARATOR });
  }
  blocks.push({ text: formatSummary(summary), separator: BLOCK_SEPARATOR });
  return blocks;
};

/**
 * Renders the report as Telegram HTML, split into sendable payloads.
 */
export const format = (
  reports: readonly WhaleReport[],
  summary: AggregateSummary,
  generatedAt: Date,
  options: ReportFormatOptions
): string[] => {
  const blocks = buildReportBlocks(reports, summary, generatedAt, options.explorerUrl);
  return paginate(blocks, options.maxLength ?? MAX_MESSAGE_LENGTH);
};
