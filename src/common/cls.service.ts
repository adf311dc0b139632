import { Injectable } from '@nestjs/common';
import { ClsService } from 'nestjs-cls';

/**
 * Keys for values stored in continuation-local storage.
 */
export const CLS_KEYS = {
  TENANT_ID: 'tenantId',
  CHAT_ID: 'chatId',
} as const;

/**
 * The conversation a unit of work belongs to.
 */
export interface ConversationContext {
  tenantId: string;
  chatId: string;
}

/**
 * Typed wrapper around ClsService for the conversation being processed.
 *
 * Processors establish the context once per job; the logging mixin reads
 * it back through `CLS_KEYS`.
 */
@Injectable()
export class AppClsService {
  constructor(private readonly cls: ClsService) {}

  /**
   * Run a callback with the specified conversation as context.
   */
  async runWithContext<T>(
    context: ConversationContext,
    callback: () => Promise<T>,
  ): Promise<T> {
    return this.cls.run(async () => {
      this.cls.set(CLS_KEYS.TENANT_ID, context.tenantId);
      this.cls.set(CLS_KEYS.CHAT_ID, context.chatId);
      return callback();
    });
  }
}
