import { Module } from '@nestjs/common';
import { RedisModule } from '../redis/redis.module';
import { TenantsModule } from '../tenants/tenants.module';
import { PauseService } from './pause.service';

@Module({
  imports: [RedisModule, TenantsModule],
  providers: [PauseService],
  exports: [PauseService],
})
export class PauseModule {}
