import { ExchangeConfig } from '../../types/common';

export const HYPERLIQUID_API_URL = 'https://api.hyperliquid.xyz';

export const loadHyperliquidConfig = (env: NodeJS.ProcessEnv): ExchangeConfig => ({
  name: 'hyperliquid',
  baseUrl: env.HYPERLIQUID_API_URL || HYPERLIQUID_API_URL,
  timeouts: {
    positionsMs: 10000,
    quotesMs: 5000,
  },
});

export const hyperliquidEndpoints = {
  info: '/info',
};
