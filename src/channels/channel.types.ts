import type { Provider, TenantSettings } from '../tenants/tenant.schemas';

/**
 * One outbound text message, resolved against the tenant's settings.
 */
export interface Delivery {
  tenantId: string;
  chatId: string;
  text: string;
  settings: TenantSettings;
}

/**
 * Adapter that delivers text through one channel provider.
 */
export interface ChannelSender {
  send(delivery: Delivery): Promise<void>;
}

export type { Provider };
