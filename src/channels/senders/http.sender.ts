import { HttpService } from '@nestjs/axios';
import { Injectable } from '@nestjs/common';
import { AxiosError } from 'axios';
import { PinoLogger } from 'nestjs-pino';
import { firstValueFrom } from 'rxjs';
import type { ChannelSender, Delivery } from '../channel.types';

/** Request timeout for outbound sends */
const SEND_TIMEOUT_MS = 10_000;

/**
 * Posts `{ provider, chatId, text }` as JSON to the tenant's outbound URL,
 * where a provider bridge turns it into the provider's wire format.
 */
@Injectable()
export class HttpChannelSender implements ChannelSender {
  constructor(
    private readonly logger: PinoLogger,
    private readonly httpService: HttpService,
  ) {
    this.logger.setContext(HttpChannelSender.name);
  }

  async send(delivery: Delivery): Promise<void> {
    const { tenantId, chatId, text, settings } = delivery;
    const url = settings.outbound.url;
    if (!url) {
      throw new Error(`Tenant "${tenantId}" has no outbound URL configured`);
    }

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (settings.outbound.token) {
      headers.Authorization = `Bearer ${settings.outbound.token}`;
    }

    try {
      await firstValueFrom(
        this.httpService.post(
          url,
          { provider: settings.provider, chatId, text },
          { headers, timeout: SEND_TIMEOUT_MS },
        ),
      );
    } catch (error) {
      if (error instanceof AxiosError) {
        const status = error.response?.status ?? 'unknown';
        throw new Error(`Outbound send failed with status ${status}`, {
          cause: error,
        });
      }
      throw error;
    }

    this.logger.debug(
      { tenantId, chatId, provider: settings.provider },
      'Message delivered to outbound endpoint',
    );
  }
}
