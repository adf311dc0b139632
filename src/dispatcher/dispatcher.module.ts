import { Global, Module } from '@nestjs/common';
import { QueueDispatcher } from './queue-dispatcher.service';

/**
 * Global module providing the QueueDispatcher.
 *
 * Modules register their queues via `dispatcher.registerQueue()` on init.
 * Services dispatch jobs and upsert sweep schedulers without direct queue
 * references.
 */
@Global()
@Module({
  providers: [QueueDispatcher],
  exports: [QueueDispatcher],
})
export class DispatcherModule {}
