import 'dotenv/config';
import { ExchangeConfig, WhaleConfig } from '../types/common';
import { TelegramConfig, loadTelegramConfig } from './telegram.config';
import { loadWhaleConfigs } from './whales.config';
import { loadHyperliquidConfig } from './exchanges/hyperliquid.config';

export const DEFAULT_EXPLORER_URL = 'https://www.coinglass.com/hyperliquid/';

export interface AppConfig {
  readonly telegram: Readonly<TelegramConfig>;
  readonly whales: readonly Readonly<WhaleConfig>[];
  readonly exchange: Readonly<ExchangeConfig>;
  readonly explorerUrl: string;
}

const deepFreeze = <T>(value: T): Readonly<T> => {
  if (value !== null && typeof value === 'object') {
    Object.values(value).forEach(child => deepFreeze(child));
    Object.freeze(value);
  }
  return value;
};

/**
 * Builds the process-wide configuration. Throws when a required value is
 * missing; the result is frozen and shared by every component.
 */
export const loadAppConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const telegram = loadTelegramConfig(env);
  const whales = loadWhaleConfigs(env);

  const missing: string[] = [];
  if (!telegram.botToken) missing.push('TELEGRAM_BOT_TOKEN');
  if (telegram.allowedChatIds.length === 0) missing.push('TELEGRAM_CHAT_ID');
  if (whales.length === 0) missing.push('WHALE_1_ADDRESS');

  if (missing.length > 0) {
    throw new Error(`Missing required configuration: ${missing.join(', ')}`);
  }

  return deepFreeze({
    telegram,
    whales,
    exchange: loadHyperliquidConfig(env),
    explorerUrl: env.WHALE_EXPLORER_URL || DEFAULT_EXPLORER_URL,
  });
};
