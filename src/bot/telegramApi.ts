import { Bot } from "grammy";
import { config } from "../core/config.js";

/** Outbound-only client: the bot never starts polling here. */
export type Notifier = {
  sendMessage(chatId: number, text: string): Promise<unknown>;
};

const TELEGRAM_TEXT_LIMIT = 4000;

export function getTelegramBot(): Bot {
  const token = config.botToken;
  if (!token) throw new Error("BOT_TOKEN is required for Telegram API.");
  return new Bot(token);
}

export function telegramNotifier(bot: Bot = getTelegramBot()): Notifier {
  return {
    sendMessage: (chatId, text) => bot.api.sendMessage(chatId, text.slice(0, TELEGRAM_TEXT_LIMIT))
  };
}
