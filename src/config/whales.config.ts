import { WhaleConfig } from '../types/common';

/**
 * Reads WHALE_1_ADDRESS / WHALE_1_NAME, WHALE_2_ADDRESS / WHALE_2_NAME, ...
 * stopping at the first index without an address.
 */
export const loadWhaleConfigs = (env: NodeJS.ProcessEnv): WhaleConfig[] => {
  const whales: WhaleConfig[] = [];

  for (let i = 1; ; i++) {
    const address = (env[`WHALE_${i}_ADDRESS`] || '').trim();
    if (!address) {
      break;
    }

    whales.push({
      address,
      displayName: (env[`WHALE_${i}_NAME`] || '').trim() || `Whale ${i}`,
    });
  }

  return whales;
};
