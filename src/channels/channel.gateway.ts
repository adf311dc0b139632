import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { attempt, err, type Result } from '../common/result';
import { TenantSettingsService } from '../tenants/tenant-settings.service';
import { ChannelSenderRegistry } from './channel-sender.registry';

/**
 * Send port used by the reply path, the follow-up sweep and reminders.
 * Failures come back as values so each caller decides how to isolate them.
 */
@Injectable()
export class ChannelGateway {
  constructor(
    private readonly logger: PinoLogger,
    private readonly tenantSettings: TenantSettingsService,
    private readonly registry: ChannelSenderRegistry,
  ) {
    this.logger.setContext(ChannelGateway.name);
  }

  async sendText(
    tenantId: string,
    chatId: string,
    text: string,
  ): Promise<Result<void>> {
    const lookup = await attempt(() => this.tenantSettings.lookup(tenantId));
    if (!lookup.ok) return lookup;
    if (lookup.value.status !== 'found') {
      return err(
        new Error(`Tenant "${tenantId}" settings ${lookup.value.status}`),
      );
    }

    const settings = lookup.value.settings;
    const result = await attempt(() =>
      this.registry
        .get(settings.provider)
        .send({ tenantId, chatId, text, settings }),
    );

    if (result.ok) {
      this.logger.info(
        { tenantId, chatId, provider: settings.provider },
        'Message sent',
      );
    } else {
      this.logger.error(
        { err: result.error, tenantId, chatId, provider: settings.provider },
        'Message send failed',
      );
    }
    return result;
  }
}
