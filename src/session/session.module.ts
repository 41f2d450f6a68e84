import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { RedisPoolService } from '../redis/redis-pool.service';
import { InMemorySessionStore } from './adapters/in-memory-session.store';
import { RedisSessionStore } from './adapters/redis-session.store';
import { SESSION_STORE, SessionStore } from './interfaces/session-store.interface';
import { SessionService } from './session.service';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: SESSION_STORE,
      useFactory: (config: ConfigService, pool: RedisPoolService): SessionStore =>
        config.get<string>('STORE_BACKEND', 'memory') === 'redis'
          ? new RedisSessionStore(pool)
          : new InMemorySessionStore(),
      inject: [ConfigService, RedisPoolService],
    },
    SessionService,
  ],
  exports: [SESSION_STORE, SessionService],
})
export class SessionModule {}
