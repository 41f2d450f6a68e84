import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { configValidationSchema } from './config/config.schema';
import { BoundaryModule } from './boundary/boundary.module';
import { ClockModule } from './common/clock/clock.module';
import { EventStreamModule } from './event-stream/event-stream.module';
import { ReaperModule } from './reaper/reaper.module';
import { RedisModule } from './redis/redis.module';
import { SessionModule } from './session/session.module';
import { StreamModeModule } from './stream-mode/stream-mode.module';
import { TransportModule } from './transport/transport.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      validationSchema: configValidationSchema,
    }),
    EventEmitterModule.forRoot(),
    ClockModule,
    RedisModule, // Shared Redis connection pool - must be early
    SessionModule,
    EventStreamModule,
    StreamModeModule,
    BoundaryModule,
    ReaperModule,
    TransportModule,
  ],
})
export class AppModule {}
