import { jest, describe, beforeEach, it, expect } from '@jest/globals';
import { Telegraf } from 'telegraf';
import { Message } from 'telegraf/types';
import { TelegramConfig } from '../../config/telegram.config';
import { IPositionSource } from '../../exchanges/interfaces/IPositionSource';
import { TelegramService } from '../../services/TelegramService';
import { WhaleReportService } from '../../services/WhaleReportService';
import { PositionRecord } from '../../types/common';
import { EXPLORER_URL, createPosition, createWhale } from '../helpers/fixtures';

const sentMessage: Message.TextMessage = {
  message_id: 1,
  date: 0,
  chat: { id: 42, type: 'private', first_name: 'Test' },
  text: 'ok',
};

const telegramConfig: TelegramConfig = {
  botToken: 'test-token',
  allowedChatIds: ['42', '43'],
  command: 'go',
  sendStartupMessage: true,
};

const createSource = (positions: Record<string, PositionRecord[]>): IPositionSource => ({
  getName: () => 'fake',
  fetchAllMids: async () => ({}),
  fetchMidPrice: async () => null,
  fetchPositions: async (address) => ({ ok: true, value: positions[address] ?? [] }),
});

describe('TelegramService', () => {
  let bot: Telegraf;
  let sendMessage: jest.SpiedFunction<Telegraf['telegram']['sendMessage']>;
  let sendChatAction: jest.SpiedFunction<Telegraf['telegram']['sendChatAction']>;

  const createService = (
    whales = [createWhale(1)],
    positions: Record<string, PositionRecord[]> = { [createWhale(1).address]: [createPosition()] }
  ) => {
    const reportService = new WhaleReportService(whales, createSource(positions), EXPLORER_URL);
    return new TelegramService(telegramConfig, reportService, bot);
  };

  beforeEach(() => {
    bot = new Telegraf('test-token');
    sendMessage = jest.spyOn(bot.telegram, 'sendMessage').mockResolvedValue(sentMessage);
    sendChatAction = jest.spyOn(bot.telegram, 'sendChatAction').mockResolvedValue(true);
  });

  it('refuses to start without a token', () => {
    const reportService = new WhaleReportService([createWhale(1)], createSource({}), EXPLORER_URL);

    expect(() => new TelegramService({ ...telegramConfig, botToken: '' }, reportService, bot)).toThrow(
      'Telegram bot token is not configured'
    );
  });

  it('ignores chats outside the allow-list', async () => {
    const service = createService();

    expect(await service.handleText('999', 'go')).toBe(false);
    expect(sendChatAction).not.toHaveBeenCalled();
    expect(sendMessage).not.toHaveBeenCalled();
  });

  it('ignores other text', async () => {
    const service = createService();

    expect(await service.handleText('42', 'go now')).toBe(false);
    expect(sendMessage).not.toHaveBeenCalled();
  });

  it('replies to the command regardless of case and surrounding whitespace', async () => {
    const service = createService();

    expect(await service.handleText('42', '  GO \n')).toBe(true);

    expect(sendChatAction).toHaveBeenCalledWith('42', 'typing');
    expect(sendMessage).toHaveBeenCalledTimes(1);
    const [chatId, text, extra] = sendMessage.mock.calls[0];
    expect(chatId).toBe('42');
    expect(text).toContain('<b>🐋 WHALE POSITIONS REPORT 🐋</b>');
    expect(text).toContain('Active Whales: 1/1');
    expect(extra).toEqual({ parse_mode: 'HTML', link_preview_options: { is_disabled: true } });
  });

  it('keeps sending the remaining payloads after a failed send', async () => {
    const whales = [1, 2, 3, 4, 5].map(i => createWhale(i, { displayName: `${'W'.repeat(1700)} ${i}` }));
    const positions = Object.fromEntries(whales.map(whale => [whale.address, [createPosition()]]));
    const service = createService(whales, positions);
    sendMessage.mockRejectedValueOnce(new Error('400: Bad Request'));

    expect(await service.handleText('43', 'go')).toBe(true);

    const payloadCount = sendMessage.mock.calls.length;
    expect(payloadCount).toBeGreaterThanOrEqual(2);
    expect(sendMessage.mock.calls.every(([chatId]) => chatId === '43')).toBe(true);
    expect(sendMessage.mock.calls[payloadCount - 1][1]).toContain('Active Whales: 5/5');
  });

  it('still replies when the typing action fails', async () => {
    const service = createService();
    sendChatAction.mockRejectedValueOnce(new Error('429: Too Many Requests'));

    expect(await service.handleText('42', 'go')).toBe(true);
    expect(sendMessage).toHaveBeenCalledTimes(1);
  });

  it('handles triggers one at a time in arrival order', async () => {
    const service = createService();
    const order: string[] = [];
    sendMessage.mockImplementation(async (chatId) => {
      order.push(`start ${chatId}`);
      await new Promise(resolve => setTimeout(resolve, 10));
      order.push(`end ${chatId}`);
      return sentMessage;
    });

    await Promise.all([service.handleText('42', 'go'), service.handleText('43', 'go')]);

    expect(order).toEqual(['start 42', 'end 42', 'start 43', 'end 43']);
  });

  it('announces itself to every allowed chat', async () => {
    const service = createService([createWhale(1), createWhale(2)]);
    sendMessage.mockRejectedValueOnce(new Error('403: Forbidden'));

    await service.sendStartupMessage();

    expect(sendMessage.mock.calls.map(([chatId]) => chatId)).toEqual(['42', '43']);
    expect(sendMessage.mock.calls[1][1]).toBe([
      '🤖 <b>Whale Position Info Bot Started!</b>',
      '',
      'Tracking <b>2</b> whale(s)',
      'Tokens: <b>BTC, ETH, SOL only</b>',
      '',
      'Type <b>go</b> to get current positions',
    ].join('\n'));
  });
});
