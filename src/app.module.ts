import { BullModule } from '@nestjs/bullmq';
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { MurLockModule } from 'murlock';
import { ClsModule } from 'nestjs-cls';
import { ChannelsModule } from './channels/channels.module';
import { CommonModule } from './common/common.module';
import { configuration } from './config/configuration';
import { DispatcherModule } from './dispatcher';
import { FollowupModule } from './followup/followup.module';
import { HealthModule } from './health/health.module';
import { InboundModule } from './inbound/inbound.module';
import { LoggingModule } from './logging/logging.module';
import { RemindersModule } from './reminders/reminders.module';

const redisConnection = (configService: ConfigService) => ({
  host: configService.get<string>('redis.host', 'localhost'),
  port: configService.get<number>('redis.port', 6379),
  password: configService.get<string>('redis.password'),
});

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    EventEmitterModule.forRoot(),
    ClsModule.forRoot({
      global: true,
      middleware: { mount: false },
    }),
    MurLockModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => {
        const { host, port, password } = redisConnection(configService);
        const passwordPart = password ? `:${password}@` : '';
        return {
          redisOptions: {
            url: `redis://${passwordPart}${host}:${port}`,
          },
          wait: 1000,
          maxAttempts: 5,
          logLevel: 'warn',
        };
      },
      inject: [ConfigService],
    }),
    BullModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        connection: redisConnection(configService),
      }),
      inject: [ConfigService],
    }),
    CommonModule,
    DispatcherModule,
    HealthModule,
    LoggingModule,
    ChannelsModule,
    InboundModule,
    FollowupModule,
    RemindersModule,
  ],
})
export class AppModule {}
