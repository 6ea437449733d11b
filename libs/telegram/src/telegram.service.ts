import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Telegraf } from 'telegraf';

export type TelegramApi = Pick<Telegraf['telegram'], 'sendMessage'>;

export const TELEGRAM_API = Symbol('TELEGRAM_API');

/**
 * Best-effort notification sink. `notify` never rejects: without a token or chat
 * id it is a no-op, and delivery errors are only logged.
 */
@Injectable()
export class TelegramService {
  private readonly logger = new Logger(TelegramService.name);
  private readonly api: TelegramApi | null;
  private readonly chatId: string;
  private readonly disableWebPreview: boolean;
  private warnedDisabled = false;

  constructor(
    configService: ConfigService,
    @Optional() @Inject(TELEGRAM_API) api?: TelegramApi,
  ) {
    const token = configService.get<string>('TELEGRAM_BOT_TOKEN', '');
    this.chatId = configService.get<string>('TELEGRAM_CHAT_ID', '');
    this.disableWebPreview = configService.get<boolean>('TELEGRAM_DISABLE_WEB_PAGE_PREVIEW', true);
    this.api = api ?? (token ? new Telegraf(token).telegram : null);
  }

  get enabled(): boolean {
    return Boolean(this.api && this.chatId);
  }

  async notify(text: string): Promise<void> {
    if (!this.api || !this.chatId) {
      if (!this.warnedDisabled) {
        this.warnedDisabled = true;
        this.logger.warn('Telegram is not configured (TELEGRAM_BOT_TOKEN / TELEGRAM_CHAT_ID); notifications are disabled.');
      }
      return;
    }

    try {
      await this.api.sendMessage(this.chatId, text, {
        parse_mode: 'HTML',
        link_preview_options: { is_disabled: this.disableWebPreview },
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(JSON.stringify({ event: 'telegram_send_failed', message }));
    }
  }
}
