import { logger, logError } from './utils/logger';
import { AppConfig, loadAppConfig } from './config/app.config';
import { HyperliquidExchange } from './exchanges/hyperliquid/HyperliquidExchange';
import { WhaleReportService } from './services/WhaleReportService';
import { TelegramService } from './services/TelegramService';
import { TRACKED_SYMBOLS } from './types/common';
import { truncateAddress } from './utils/helpers';

class WhalePositionBot {
  private telegramService: TelegramService;

  constructor(private readonly config: AppConfig) {
    const exchange = new HyperliquidExchange(config.exchange);
    const reportService = new WhaleReportService(config.whales, exchange, config.explorerUrl);
    this.telegramService = new TelegramService(config.telegram, reportService);
  }

  public async start(): Promise<void> {
    logger.info(`Starting Whale Position Bot, tracking ${this.config.whales.length} whale(s)`);
    this.config.whales.forEach(whale => {
      logger.info(`  ${whale.displayName}: ${truncateAddress(whale.address, 8, 6)}`);
    });
    logger.info(`Tokens tracked: ${TRACKED_SYMBOLS.join(', ')} only`);

    await this.telegramService.launch();
  }

  public stop(signal: string): void {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    this.telegramService.stop(signal);
  }
}

const main = async (): Promise<void> => {
  let config: AppConfig;
  try {
    config = loadAppConfig();
  } catch (error) {
    logError(error, { context: 'loadAppConfig' });
    process.exit(1);
  }

  const bot = new WhalePositionBot(config);

  process.once('SIGINT', () => bot.stop('SIGINT'));
  process.once('SIGTERM', () => bot.stop('SIGTERM'));

  await bot.start();
};

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection:', { reason: String(reason) });
  process.exit(1);
});

if (require.main === module) {
  main().catch((error: unknown) => {
    logError(error, { context: 'main' });
    process.exit(1);
  });
}
