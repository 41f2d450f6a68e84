import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { RedisPoolService } from './redis-pool.service';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [RedisPoolService],
  exports: [RedisPoolService],
})
export class RedisModule {}
