import TelegramBot from "node-telegram-bot-api";
import { ChannelError } from "../errors.js";
import type { MessagingChannel } from "./types.js";

/** The slice of the bot client the channel needs. */
export interface TelegramSender {
  sendMessage(chatId: number, text: string, options?: { parse_mode?: "Markdown" }): Promise<unknown>;
}

interface TelegramFailure {
  code: string | null;
  status: number | null;
  description: string;
  retryAfterSeconds: number | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function numberOrNull(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

// node-telegram-bot-api rejects with errors carrying `code` (ETELEGRAM, EFATAL, EPARSE)
// and, for API errors, the HTTP response with the parsed Bot API body attached.
function describeFailure(err: unknown): TelegramFailure {
  const failure: TelegramFailure = {
    code: null,
    status: null,
    description: err instanceof Error ? err.message : String(err),
    retryAfterSeconds: null,
  };
  if (!isRecord(err)) return failure;

  if (typeof err.code === "string") failure.code = err.code;
  const response = err.response;
  if (isRecord(response)) {
    failure.status = numberOrNull(response.statusCode);
    const body = response.body;
    if (isRecord(body)) {
      failure.status = numberOrNull(body.error_code) ?? failure.status;
      if (typeof body.description === "string") failure.description = body.description;
      if (isRecord(body.parameters)) failure.retryAfterSeconds = numberOrNull(body.parameters.retry_after);
    }
  }
  return failure;
}

export function isMarkdownParseError(err: unknown): boolean {
  const failure = describeFailure(err);
  return failure.status === 400 && /can't parse entities/i.test(failure.description);
}

/**
 * 400 and 403 mean this recipient is unreachable (bot blocked, chat not found,
 * user deactivated). Rate limits, server errors, network failures and
 * bot-wide problems such as a rejected token are retried, since they say
 * nothing about the recipient.
 */
export function classifyTelegramError(err: unknown): ChannelError {
  const failure = describeFailure(err);

  if (failure.status === 400 || failure.status === 403) {
    return new ChannelError("permanent", `Telegram ${failure.status}: ${failure.description}`, { cause: err });
  }
  if (failure.status === 429) {
    return new ChannelError("transient", `Telegram rate limited: ${failure.description}`, {
      cause: err,
      retryAfterMs: failure.retryAfterSeconds !== null ? failure.retryAfterSeconds * 1000 : undefined,
    });
  }
  const label = failure.status !== null ? `Telegram ${failure.status}` : failure.code ?? "Telegram error";
  return new ChannelError("transient", `${label}: ${failure.description}`, { cause: err });
}

export class TelegramChannel implements MessagingChannel {
  private bot: TelegramSender;

  constructor(bot: TelegramSender) {
    this.bot = bot;
  }

  static fromToken(token: string): TelegramChannel {
    // Send-only: the scheduler never consumes updates
    return new TelegramChannel(new TelegramBot(token, { polling: false }));
  }

  async sendMessage(userId: number, text: string): Promise<void> {
    try {
      await this.bot.sendMessage(userId, text, { parse_mode: "Markdown" });
      return;
    } catch (err) {
      if (!isMarkdownParseError(err)) throw classifyTelegramError(err);
      console.warn(`[telegram] Markdown rejected for chat ${userId}, resending as plain text`);
    }

    try {
      await this.bot.sendMessage(userId, text);
    } catch (err) {
      throw classifyTelegramError(err);
    }
  }
}

export function maskToken(token: string | undefined): string {
  if (!token) return "<none>";
  if (token.length <= 8) return "********";
  return `${token.slice(0, 4)}...${token.slice(-4)}`;
}
