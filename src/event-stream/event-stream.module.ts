import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { CLOCK, Clock } from '../common/clock/clock';
import { RedisPoolService } from '../redis/redis-pool.service';
import { InMemoryEventStreamStore } from './adapters/in-memory-event-stream.store';
import { RedisEventStreamStore } from './adapters/redis-event-stream.store';
import {
  EVENT_STREAM_STORE,
  EventStreamStore,
} from './interfaces/event-stream-store.interface';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: EVENT_STREAM_STORE,
      useFactory: (
        config: ConfigService,
        pool: RedisPoolService,
        clock: Clock,
      ): EventStreamStore =>
        config.get<string>('STORE_BACKEND', 'memory') === 'redis'
          ? new RedisEventStreamStore(pool, clock, config)
          : new InMemoryEventStreamStore(clock, config),
      inject: [ConfigService, RedisPoolService, CLOCK],
    },
  ],
  exports: [EVENT_STREAM_STORE],
})
export class EventStreamModule {}
