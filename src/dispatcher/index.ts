export { DispatcherModule } from './dispatcher.module';
export type { DispatchOptions, ScheduleOptions } from './dispatcher.types';
export { QueueDispatcher } from './queue-dispatcher.service';
