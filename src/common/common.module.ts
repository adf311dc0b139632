import { Global, Module } from '@nestjs/common';
import { AppClsService } from './cls.service';

/**
 * Makes the conversation-scoped CLS wrapper available to every processor
 * and service without importing this module.
 */
@Global()
@Module({
  providers: [AppClsService],
  exports: [AppClsService],
})
export class CommonModule {}
