import { PositionSide } from '../types/common';

const wholeNumber = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

const twoDecimals = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Compact dollar amount used for sizes, totals and P&L.
 */
export const formatValue = (value: number): string => {
  if (value >= 1_000_000) {
    return `$${(value / 1_000_000).toFixed(2)}M`;
  }
  if (value >= 1_000) {
    return `$${(value / 1_000).toFixed(0)}K`;
  }
  return `$${value.toFixed(0)}`;
};

/**
 * Price with precision scaled to its magnitude, so sub-dollar assets keep
 * four decimals.
 */
export const formatPrice = (price: number): string => {
  if (price >= 1000) {
    return `$${wholeNumber.format(price)}`;
  }
  if (price >= 1) {
    return `$${twoDecimals.format(price)}`;
  }
  return `$${price.toFixed(4)}`;
};

/**
 * Formats `|value|` behind a sign. The sign comes from `signSource`, which
 * defaults to the value itself.
 */
export const formatSigned = (
  value: number,
  formatter: (abs: number) => string,
  signSource = value
): string => {
  return `${signSource < 0 ? '-' : '+'}${formatter(Math.abs(value))}`;
};

export const formatPercentage = (value: number): string => `${value.toFixed(2)}%`;

/**
 * `YYYY-MM-DD HH:MM:SS UTC`
 */
export const formatUtcTimestamp = (date: Date): string => {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
};

export const truncateAddress = (address: string, head = 6, tail = 4): string =>
  `${address.slice(0, head)}...${address.slice(-tail)}`;

const HTML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

export const escapeHtml = (text: string): string => {
  return text.replace(/[&<>"']/g, char => HTML_ENTITIES[char] ?? char);
};

export const calculatePnlPercentage = (
  entryPrice: number,
  markPrice: number,
  side: PositionSide
): number => {
  if (entryPrice <= 0) return 0;
  const delta = side === 'LONG' ? markPrice - entryPrice : entryPrice - markPrice;
  return (delta / entryPrice) * 100;
};

/**
 * Parses an upstream numeric field. Returns null for missing or non-finite
 * values.
 */
export const parseNumber = (value: unknown): number | null => {
  if (value === null || value === undefined || value === '') {
    return null;
  }
  const num = Number(value);
  if (isNaN(num) || !isFinite(num)) {
    return null;
  }
  return num;
};
