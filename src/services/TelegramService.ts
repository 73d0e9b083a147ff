import { Telegraf, Context } from 'telegraf';
import { message } from 'telegraf/filters';
import { TelegramConfig } from '../config/telegram.config';
import { TRACKED_SYMBOLS } from '../types/common';
import { escapeHtml } from '../utils/helpers';
import { logger, logError, logReport } from '../utils/logger';
import { WhaleReportService } from './WhaleReportService';

const HTML_NO_PREVIEW = {
  parse_mode: 'HTML' as const,
  link_preview_options: { is_disabled: true },
};

export class TelegramService {
  private bot: Telegraf;
  private allowedChats: Set<string>;
  private pending: Promise<void> = Promise.resolve();

  constructor(
    private readonly config: TelegramConfig,
    private readonly reportService: WhaleReportService,
    bot?: Telegraf
  ) {
    if (!config.botToken) {
      throw new Error('Telegram bot token is not configured');
    }
    if (config.allowedChatIds.length === 0) {
      throw new Error('Telegram chat ID is not configured');
    }

    this.bot = bot ?? new Telegraf(config.botToken);
    this.allowedChats = new Set(config.allowedChatIds);
    this.setupBot();
  }

  private setupBot(): void {
    this.bot.command('start', (ctx: Context) => this.replyWithUsage(ctx));
    this.bot.command('help', (ctx: Context) => this.replyWithUsage(ctx));

    this.bot.on(message('text'), async (ctx) => {
      await this.handleText(String(ctx.chat.id), ctx.message.text);
    });

    this.bot.catch((error: unknown) => {
      logError(error, { context: 'telegramUpdate' });
    });
  }

  public async launch(): Promise<void> {
    if (this.config.sendStartupMessage) {
      await this.sendStartupMessage();
    }

    // launch() only settles once polling stops
    this.bot.launch().catch((error: unknown) => {
      logError(error, { context: 'telegramLaunch' });
    });
    logger.info(`Telegram bot polling, waiting for '${this.config.command}'`);
  }

  public stop(reason: string): void {
    this.bot.stop(reason);
  }

  public isAllowedChat(chatId: string): boolean {
    return this.allowedChats.has(chatId);
  }

  public isReportCommand(text: string): boolean {
    return text.trim().toLowerCase() === this.config.command;
  }

  /**
   * Entry point for inbound text. Returns true when a report was produced.
   * Reports run one after another, in arrival order.
   */
  public handleText(chatId: string, text: string): Promise<boolean> {
    if (!this.isAllowedChat(chatId)) {
      logger.debug(`Ignoring message from chat ${chatId}`);
      return Promise.resolve(false);
    }
    if (!this.isReportCommand(text)) {
      return Promise.resolve(false);
    }

    const run = this.pending
      .then(() => this.deliverReport(chatId))
      .then(
        () => true,
        (error: unknown) => {
          logError(error, { context: 'deliverReport', chatId });
          return false;
        }
      );
    this.pending = run.then(() => undefined);
    return run;
  }

  private async deliverReport(chatId: string): Promise<void> {
    const startedAt = Date.now();

    try {
      await this.bot.telegram.sendChatAction(chatId, 'typing');
    } catch (error) {
      logError(error, { context: 'sendChatAction', chatId });
    }

    const report = await this.reportService.generateReport(new Date());

    let delivered = 0;
    for (const payload of report.payloads) {
      try {
        await this.bot.telegram.sendMessage(chatId, payload, HTML_NO_PREVIEW);
        delivered++;
      } catch (error) {
        logError(error, { context: 'sendReport', chatId, length: payload.length });
      }
    }

    logReport({
      chatId,
      activeWhales: report.summary.activeWhaleCount,
      totalWhales: report.summary.totalWhaleCount,
      positions: report.summary.totalPositionCount,
      payloads: delivered,
      durationMs: Date.now() - startedAt,
    });
  }

  public getUsageText(title = 'Whale Position Info Bot'): string {
    return [
      `🤖 <b>${title}</b>`,
      '',
      `Tracking <b>${this.reportService.getWhaleCount()}</b> whale(s)`,
      `Tokens: <b>${TRACKED_SYMBOLS.join(', ')} only</b>`,
      '',
      `Type <b>${escapeHtml(this.config.command)}</b> to get current positions`,
    ].join('\n');
  }

  private async replyWithUsage(ctx: Context): Promise<void> {
    if (!ctx.chat || !this.isAllowedChat(String(ctx.chat.id))) {
      return;
    }
    try {
      await ctx.reply(this.getUsageText(), { parse_mode: 'HTML' });
    } catch (error) {
      logError(error, { context: 'replyWithUsage' });
    }
  }

  public async sendStartupMessage(): Promise<void> {
    const text = this.getUsageText('Whale Position Info Bot Started!');

    for (const chatId of this.allowedChats) {
      try {
        await this.bot.telegram.sendMessage(chatId, text, { parse_mode: 'HTML' });
      } catch (error) {
        logError(error, { context: 'sendStartupMessage', chatId });
      }
    }
  }
}
