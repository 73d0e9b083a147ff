export interface TelegramConfig {
  botToken: string;
  allowedChatIds: readonly string[];
  command: string;
  sendStartupMessage: boolean;
}

export const loadTelegramConfig = (env: NodeJS.ProcessEnv): TelegramConfig => ({
  botToken: env.TELEGRAM_BOT_TOKEN || env.TELEGRAM_TOKEN || '',
  allowedChatIds: (env.TELEGRAM_CHAT_ID || '')
    .split(',')
    .map(id => id.trim())
    .filter(id => id.length > 0),
  command: (env.REPORT_COMMAND || 'go').trim().toLowerCase(),
  sendStartupMessage: env.TELEGRAM_STARTUP_MESSAGE !== 'false',
});
